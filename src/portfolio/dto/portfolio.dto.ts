import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { TransactionResponseDto } from './transaction-response.dto';

export class CreatePortfolioDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  name!: string;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  description?: string;
}

export interface PortfolioSummaryDto {
  id: string;
  name: string;
  description: string;
  holdingsCount: number;
  totalValue: number;               // market value of the holdings
  createdAt: string;
}

export interface PortfolioHoldingDto {
  symbol: string;
  name: string | null;
  quantity: number;
  averageBuyPrice: number;
  currentPrice: number;
  currentValue: number;
  profitLoss: number;
}

export interface PortfolioDetailDto {
  portfolio: PortfolioSummaryDto;
  holdings: PortfolioHoldingDto[];          // by current value, largest first
  transactions: TransactionResponseDto[];   // newest first
}
