import { ReconciliationAnomaly, ReconciliationReport } from '../ledger-reconciler.service';
import { toMoney } from '../../common/utils/decimal.util';

export interface ReconciliationResponseDto {
  transactionsReplayed: number;
  holdingsRepaired: number;
  holdingsRemoved: number;
  anomalies: ReconciliationAnomaly[];
  balanceBefore: number;
  balanceAfter: number;
}

export function toReconciliationResponse(report: ReconciliationReport): ReconciliationResponseDto {
  return {
    ...report,
    balanceBefore: toMoney(report.balanceBefore),
    balanceAfter: toMoney(report.balanceAfter),
  };
}
