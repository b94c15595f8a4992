import { Type } from 'class-transformer';
import { IsInt, IsNumber, IsPositive, IsUUID, Max } from 'class-validator';

// Body of POST /stocks/:symbol/buy and /sell.
// The price is the execution price the caller already resolved.
// Numeric strings are accepted and converted.
export class TradeRequestDto {
  @IsUUID()
  portfolioId!: string;

  @Type(() => Number)
  @IsInt()
  @IsPositive()
  @Max(Number.MAX_SAFE_INTEGER)
  quantity!: number;

  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  price!: number;
}
