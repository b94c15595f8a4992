import { PortfolioSummaryDto } from './portfolio.dto';
import { TransactionResponseDto } from './transaction-response.dto';

export interface PnlFigureDto {
  amount: number;
  percentage: number;
}

export interface DashboardResponseDto {
  portfolios: PortfolioSummaryDto[];        // by value, largest first
  totalValue: number;
  unrealizedPnl: PnlFigureDto & { costBasis: number };
  realizedPnl: PnlFigureDto;
  totalPnl: PnlFigureDto;                   // percentage over total invested
  accountBalance: number;
  totalInvested: number;                    // open cost basis + sold cost basis
  totalHoldings: number;
  recentTransactions: TransactionResponseDto[];
}
