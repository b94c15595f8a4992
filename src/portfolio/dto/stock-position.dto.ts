import { StockResponseDto } from '../../price-catalog/dto/stock-response.dto';
import { TransactionResponseDto } from './transaction-response.dto';

// Catalog entry plus what the ledger holds of it
export interface StockSummaryDto extends StockResponseDto {
  totalSharesHeld: number;
  totalValueHeld: number;           // shares held × current price
}

export interface StockHoldingDto {
  portfolioId: string;
  portfolioName: string;
  quantity: number;
  averageBuyPrice: number;
  currentValue: number;
  profitLoss: number;
}

export interface StockDetailDto {
  stock: StockResponseDto;
  holdings: StockHoldingDto[];              // by portfolio name
  transactions: TransactionResponseDto[];   // newest first
}
