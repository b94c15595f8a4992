import { Type } from 'class-transformer';
import { IsInt, IsOptional, IsPositive, IsString, IsUUID } from 'class-validator';
import { TransactionSide } from '../entities/transaction.entity';

export class TransactionQueryDto {
  @IsOptional()
  @IsUUID()
  portfolioId?: string;

  @IsOptional()
  @IsString()
  symbol?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @IsPositive()
  limit?: number;
}

export interface TransactionResponseDto {
  id: string;
  side: TransactionSide;
  symbol: string;
  stockName: string | null;
  portfolioId: string;
  portfolioName: string | null;     // null once the portfolio is deleted
  quantity: number;
  price: number;
  total: number;
  timestamp: string;
}
