import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { LedgerStore } from './ledger-store';
import { Holding } from './entities/holding.entity';
import { InsufficientSharesException, InvalidInputException } from '../common/exceptions/ledger.exceptions';

export interface HoldingSellResult {
  holding: Holding | null;      // null once the position is closed
  removed: boolean;
}

/**
 * Keeps one holding per (portfolio, symbol) at its weighted-average cost.
 * Only touches the holdings table; the log and the balance belong to the
 * trade executor.
 */
@Injectable()
export class HoldingsAccumulatorService {
  constructor(private readonly store: LedgerStore) {}

  /**
   * Adds a BUY fill to the holding, creating it if needed.
   * newAvg = (oldQty × oldAvg + qty × price) / (oldQty + qty)
   */
  applyBuy(portfolioId: string, symbol: string, quantity: number, price: Decimal): Holding {
    assertValidQuantity(quantity);
    if (!price.greaterThan(0)) {
      throw new InvalidInputException('price', `Price must be positive, got ${price.toString()}`);
    }

    const existing = this.assertCanBuy(portfolioId, symbol, quantity);
    if (!existing) {
      return this.store.saveHolding({ portfolioId, symbol, quantity, averageBuyPrice: price });
    }

    const newQuantity = existing.quantity + quantity;
    const totalCost = existing.averageBuyPrice.times(existing.quantity).plus(price.times(quantity));

    return this.store.saveHolding({
      ...existing,
      quantity: newQuantity,
      averageBuyPrice: totalCost.dividedBy(newQuantity),
    });
  }

  /**
   * Checks that a BUY keeps the holding quantity an exact integer.
   * @returns the current holding, if any
   */
  assertCanBuy(portfolioId: string, symbol: string, quantity: number): Holding | undefined {
    assertValidQuantity(quantity);

    const existing = this.store.findHolding(portfolioId, symbol);
    if (existing && quantity > Number.MAX_SAFE_INTEGER - existing.quantity) {
      throw new InvalidInputException(
        'quantity',
        `Holding of ${symbol} would exceed ${Number.MAX_SAFE_INTEGER} shares`,
      );
    }
    return existing;
  }

  /**
   * Checks that the holding can cover a sell of `quantity` shares.
   * @throws InsufficientSharesException with available and requested amounts
   */
  assertCanSell(portfolioId: string, symbol: string, quantity: number): Holding {
    assertValidQuantity(quantity);

    const holding = this.store.findHolding(portfolioId, symbol);
    if (!holding || holding.quantity < quantity) {
      throw new InsufficientSharesException(symbol, holding?.quantity ?? 0, quantity);
    }
    return holding;
  }

  /**
   * Removes shares from the holding. The average buy price is left alone;
   * a holding that reaches zero is deleted.
   */
  applySell(portfolioId: string, symbol: string, quantity: number): HoldingSellResult {
    const holding = this.assertCanSell(portfolioId, symbol, quantity);
    const newQuantity = holding.quantity - quantity;

    if (newQuantity === 0) {
      this.store.deleteHolding(portfolioId, symbol);
      return { holding: null, removed: true };
    }

    return {
      holding: this.store.saveHolding({ ...holding, quantity: newQuantity }),
      removed: false,
    };
  }
}

function assertValidQuantity(quantity: number): void {
  if (!Number.isSafeInteger(quantity) || quantity <= 0) {
    throw new InvalidInputException('quantity', `Quantity must be a positive whole number, got ${quantity}`);
  }
}
