import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { LedgerStore } from './ledger-store';
import { Portfolio } from './entities/portfolio.entity';
import {
  InvalidInputException,
  PortfolioNameConflictException,
  PortfolioNotFoundException,
} from '../common/exceptions/ledger.exceptions';

export interface DeletedPortfolio {
  portfolio: Portfolio;
  holdingsRemoved: number;
}

// Portfolio lifecycle. Trades go through TradeExecutorService.
@Injectable()
export class PortfolioService {
  private readonly logger = new Logger(PortfolioService.name);

  constructor(private readonly store: LedgerStore) {}

  /**
   * Creates a portfolio with a unique, trimmed name.
   * @throws InvalidInputException for an empty name
   * @throws PortfolioNameConflictException if the name is taken
   */
  createPortfolio(name: string, description = ''): Portfolio {
    const trimmedName = (name ?? '').trim();
    if (!trimmedName) {
      throw new InvalidInputException('name', 'Portfolio name cannot be empty');
    }

    return this.store.runAtomically('create-portfolio', () => {
      if (this.store.findPortfolioByName(trimmedName)) {
        throw new PortfolioNameConflictException(trimmedName);
      }

      const portfolio = this.store.savePortfolio({
        id: uuidv4(),
        name: trimmedName,
        description: (description ?? '').trim(),
        createdAt: new Date(),
      });
      this.logger.log(`Created portfolio "${portfolio.name}" (${portfolio.id})`);
      return portfolio;
    });
  }

  /**
   * Deletes the portfolio and its holdings. Its transactions stay in the log
   * so realized P&L and reconciliation still see them.
   */
  deletePortfolio(id: string): DeletedPortfolio {
    return this.store.runAtomically('delete-portfolio', () => {
      const portfolio = this.store.findPortfolio(id);
      if (!portfolio) {
        throw new PortfolioNotFoundException(id);
      }

      const holdingsRemoved = this.store.deleteHoldingsForPortfolio(id);
      this.store.deletePortfolio(id);

      this.logger.log(`Deleted portfolio "${portfolio.name}" and ${holdingsRemoved} holdings`);
      return { portfolio, holdingsRemoved };
    });
  }
}
