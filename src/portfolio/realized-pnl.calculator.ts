import Decimal from 'decimal.js';
import { Transaction, TransactionSide } from './entities/transaction.entity';
import {
  RealizedPnlBySymbol,
  RealizedPnlRecord,
  RealizedPnlSummary,
} from './entities/realized-pnl-record.entity';
import { percentageOf, sum, ZERO } from '../common/utils/decimal.util';

interface OpenLot {
  quantity: number;
  price: Decimal;
}

function byExecutionOrder(a: Transaction, b: Transaction): number {
  return a.timestamp.getTime() - b.timestamp.getTime() || a.sequence - b.sequence;
}

function groupBySymbol(transactions: readonly Transaction[]): Map<string, Transaction[]> {
  const groups = new Map<string, Transaction[]>();
  for (const transaction of transactions) {
    const group = groups.get(transaction.symbol);
    if (group) {
      group.push(transaction);
    } else {
      groups.set(transaction.symbol, [transaction]);
    }
  }
  return groups;
}

// Consumes lots oldest first. Shares sold beyond the open lots carry
// no cost basis and are reported as uncovered.
function matchSell(lots: OpenLot[], sell: Transaction): RealizedPnlRecord {
  let remaining = sell.quantity;
  let costBasis = ZERO;

  while (remaining > 0 && lots.length > 0) {
    const oldestLot = lots[0];
    const consumed = Math.min(remaining, oldestLot.quantity);

    costBasis = costBasis.plus(oldestLot.price.times(consumed));
    oldestLot.quantity -= consumed;
    remaining -= consumed;

    if (oldestLot.quantity === 0) {
      lots.shift();
    }
  }

  const sellValue = sell.price.times(sell.quantity);
  return {
    transactionId: sell.id,
    symbol: sell.symbol,
    quantity: sell.quantity,
    sellPrice: sell.price,
    sellValue,
    costBasis,
    pnl: sellValue.minus(costBasis),
    uncoveredQuantity: remaining,
    timestamp: sell.timestamp,
  };
}

/**
 * Realized P&L over the whole transaction log using FIFO lot matching.
 *
 * Pure and recomputed on every call: the log is replayed per symbol in
 * timestamp order (log sequence breaks ties), BUYs open lots, SELLs consume
 * them from the front. This deliberately ignores the weighted-average cost
 * kept on holdings.
 */
export function calculateRealizedPnl(transactions: readonly Transaction[]): RealizedPnlSummary {
  const records: RealizedPnlRecord[] = [];
  const bySymbol: RealizedPnlBySymbol[] = [];

  const groups = groupBySymbol(transactions);
  const symbols = Array.from(groups.keys()).sort();

  for (const symbol of symbols) {
    const ordered = [...(groups.get(symbol) ?? [])].sort(byExecutionOrder);
    const lots: OpenLot[] = [];
    const symbolRecords: RealizedPnlRecord[] = [];

    for (const transaction of ordered) {
      if (transaction.side === TransactionSide.BUY) {
        lots.push({ quantity: transaction.quantity, price: transaction.price });
      } else {
        symbolRecords.push(matchSell(lots, transaction));
      }
    }

    if (symbolRecords.length === 0) {
      continue;
    }

    records.push(...symbolRecords);
    bySymbol.push({
      symbol,
      realizedPnl: sum(symbolRecords.map((r) => r.pnl)),
      soldQuantity: symbolRecords.reduce((total, r) => total + r.quantity, 0),
      soldValue: sum(symbolRecords.map((r) => r.sellValue)),
      costBasis: sum(symbolRecords.map((r) => r.costBasis)),
    });
  }

  const amount = sum(bySymbol.map((s) => s.realizedPnl));
  const totalSoldCostBasis = sum(bySymbol.map((s) => s.costBasis));

  return {
    amount,
    percentage: percentageOf(amount, totalSoldCostBasis),
    totalSoldValue: sum(bySymbol.map((s) => s.soldValue)),
    totalSoldCostBasis,
    uncoveredQuantity: records.reduce((total, r) => total + r.uncoveredQuantity, 0),
    bySymbol,
    records,
  };
}
