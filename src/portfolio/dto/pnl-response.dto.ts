import { IsOptional, IsUUID } from 'class-validator';

export class UnrealizedPnlQueryDto {
  @IsOptional()
  @IsUUID()
  portfolioId?: string;
}

// Realized gains/losses per symbol (FIFO)
export interface RealizedPnlDto {
  symbol: string;
  realizedPnl: number;
  soldQuantity: number;
  soldValue: number;
  costBasis: number;
}

export interface RealizedPnlResponseDto {
  amount: number;
  percentage: number;               // amount / totalSoldCostBasis × 100
  totalSoldValue: number;
  totalSoldCostBasis: number;
  uncoveredQuantity: number;        // shares sold with no lot behind them
  bySymbol: RealizedPnlDto[];
}

// Paper gains/losses on one open holding (weighted-average cost)
export interface UnrealizedHoldingPnlDto {
  portfolioId: string;
  symbol: string;
  quantity: number;
  averageBuyPrice: number;
  currentPrice: number;
  costBasis: number;
  currentValue: number;
  unrealizedPnl: number;
}

export interface UnrealizedPnlResponseDto {
  portfolioId: string | null;       // null when aggregated over all portfolios
  costBasis: number;
  currentValue: number;
  amount: number;
  percentage: number;
  holdings: UnrealizedHoldingPnlDto[];
}
