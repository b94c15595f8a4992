import Decimal from 'decimal.js';

// One row per executed trade, never merged per day.
export interface NetWorthSnapshot {
  date: string;                 // YYYY-MM-DD (UTC)
  accountBalance: Decimal;
  portfolioValue: Decimal;      // sum of quantity × current price
  totalNetWorth: Decimal;       // accountBalance + portfolioValue
  timestamp: Date;
}
