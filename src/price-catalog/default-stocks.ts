export interface StockSeed {
  symbol: string;
  name: string;
  price: number;
}

export const DEFAULT_STOCKS: readonly StockSeed[] = [
  { symbol: 'AAPL', name: 'Apple Inc.', price: 175.43 },
  { symbol: 'GOOGL', name: 'Alphabet Inc.', price: 2750.12 },
  { symbol: 'MSFT', name: 'Microsoft Corporation', price: 338.85 },
  { symbol: 'AMZN', name: 'Amazon.com Inc.', price: 3380 },
  { symbol: 'TSLA', name: 'Tesla Inc.', price: 890.75 },
  { symbol: 'META', name: 'Meta Platforms Inc.', price: 325.2 },
  { symbol: 'NVDA', name: 'NVIDIA Corporation', price: 445.67 },
  { symbol: 'NFLX', name: 'Netflix Inc.', price: 425.89 },
  { symbol: 'AMD', name: 'Advanced Micro Devices', price: 110.45 },
  { symbol: 'INTC', name: 'Intel Corporation', price: 55.78 },
];
