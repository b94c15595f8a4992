export interface LedgerStats {
  portfolios: number;
  transactions: number;
}

export interface HealthResponse {
  status: 'ok';
  timestamp: string;
  uptime: number;
  service: string;
  ledger: LedgerStats;
}
