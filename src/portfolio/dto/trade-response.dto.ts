import { TransactionSide } from '../entities/transaction.entity';
import { TradeResult } from '../trade-executor.service';
import { toMoney, toNumber, toUSD } from '../../common/utils/decimal.util';

export interface HoldingStateDto {
  quantity: number;
  averageBuyPrice: number;
}

// Response after executing a trade
export interface TradeResponseDto {
  transactionId: string;
  portfolioId: string;
  symbol: string;
  side: TransactionSide;
  quantity: number;
  price: number;
  total: number;                    // cost of a buy, proceeds of a sell
  newBalance: number;
  newHolding: HoldingStateDto | null;
  removed: boolean;                 // true when a sell closed the holding
  executedAt: string;
  message: string;
}

export function toTradeResponse(result: TradeResult): TradeResponseDto {
  const { transaction, holding } = result;
  const verb = transaction.side === TransactionSide.BUY ? 'bought' : 'sold';

  return {
    transactionId: transaction.id,
    portfolioId: transaction.portfolioId,
    symbol: transaction.symbol,
    side: transaction.side,
    quantity: transaction.quantity,
    price: toNumber(transaction.price),
    total: toMoney(result.totalAmount),
    newBalance: toMoney(result.balance),
    newHolding: holding && {
      quantity: holding.quantity,
      averageBuyPrice: toNumber(holding.averageBuyPrice),
    },
    removed: result.holdingRemoved,
    executedAt: transaction.timestamp.toISOString(),
    message:
      `Successfully ${verb} ${transaction.quantity} shares of ${transaction.symbol} ` +
      `at $${toUSD(transaction.price)} for $${toUSD(result.totalAmount)}`,
  };
}
