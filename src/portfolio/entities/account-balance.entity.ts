import Decimal from 'decimal.js';

// Single cash register for the one ledger user.
export interface AccountBalance {
  balance: Decimal;
  lastUpdated: Date;
}
