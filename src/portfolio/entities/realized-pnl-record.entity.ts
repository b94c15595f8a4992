import Decimal from 'decimal.js';

// Realized P&L for one SELL, matched against FIFO lots.
export interface RealizedPnlRecord {
  transactionId: string;
  symbol: string;
  quantity: number;
  sellPrice: Decimal;
  sellValue: Decimal;           // quantity × sellPrice
  costBasis: Decimal;           // from consumed lots
  pnl: Decimal;                 // sellValue - costBasis
  uncoveredQuantity: number;    // shares sold with no open lot behind them
  timestamp: Date;
}

export interface RealizedPnlBySymbol {
  symbol: string;
  realizedPnl: Decimal;
  soldQuantity: number;
  soldValue: Decimal;
  costBasis: Decimal;
}

export interface RealizedPnlSummary {
  amount: Decimal;
  percentage: Decimal;          // amount / totalSoldCostBasis × 100, 0 without cost basis
  totalSoldValue: Decimal;
  totalSoldCostBasis: Decimal;
  uncoveredQuantity: number;
  bySymbol: RealizedPnlBySymbol[];
  records: RealizedPnlRecord[];
}
