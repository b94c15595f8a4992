import {
  BadRequestException,
  ConflictException,
  HttpStatus,
  InternalServerErrorException,
  NotFoundException,
} from '@nestjs/common';
import Decimal from 'decimal.js';
import { toUSD } from '../utils/decimal.util';

export enum LedgerErrorCode {
  INVALID_INPUT = 'InvalidInput',
  STOCK_NOT_FOUND = 'StockNotFound',
  PORTFOLIO_NOT_FOUND = 'PortfolioNotFound',
  INSUFFICIENT_BALANCE = 'InsufficientBalance',
  INSUFFICIENT_SHARES = 'InsufficientShares',
  PERSISTENCE_FAILURE = 'PersistenceFailure',
  PORTFOLIO_NAME_CONFLICT = 'PortfolioNameConflict',
}

// Every ledger error body carries a code plus the fields a client needs
// to render a specific message.
export class InvalidInputException extends BadRequestException {
  readonly code = LedgerErrorCode.INVALID_INPUT;

  constructor(readonly field: string, message: string) {
    super({
      statusCode: HttpStatus.BAD_REQUEST,
      code: LedgerErrorCode.INVALID_INPUT,
      message,
      field,
    });
  }
}

export class StockNotFoundException extends NotFoundException {
  readonly code = LedgerErrorCode.STOCK_NOT_FOUND;

  constructor(readonly symbol: string) {
    super({
      statusCode: HttpStatus.NOT_FOUND,
      code: LedgerErrorCode.STOCK_NOT_FOUND,
      message: `Stock not found: ${symbol}`,
      symbol,
    });
  }
}

export class PortfolioNotFoundException extends NotFoundException {
  readonly code = LedgerErrorCode.PORTFOLIO_NOT_FOUND;

  constructor(readonly portfolioId: string) {
    super({
      statusCode: HttpStatus.NOT_FOUND,
      code: LedgerErrorCode.PORTFOLIO_NOT_FOUND,
      message: `Portfolio not found: ${portfolioId}`,
      portfolioId,
    });
  }
}

export class InsufficientBalanceException extends BadRequestException {
  readonly code = LedgerErrorCode.INSUFFICIENT_BALANCE;

  constructor(readonly required: Decimal, readonly available: Decimal) {
    super({
      statusCode: HttpStatus.BAD_REQUEST,
      code: LedgerErrorCode.INSUFFICIENT_BALANCE,
      message: `Insufficient balance. You need $${toUSD(required)} but only have $${toUSD(available)}`,
      required: required.toNumber(),
      available: available.toNumber(),
    });
  }
}

export class InsufficientSharesException extends BadRequestException {
  readonly code = LedgerErrorCode.INSUFFICIENT_SHARES;

  constructor(
    readonly symbol: string,
    readonly available: number,
    readonly requested: number,
  ) {
    super({
      statusCode: HttpStatus.BAD_REQUEST,
      code: LedgerErrorCode.INSUFFICIENT_SHARES,
      message: `Insufficient shares of ${symbol}. Available: ${available}, Requested: ${requested}`,
      symbol,
      available,
      requested,
    });
  }
}

export class PortfolioNameConflictException extends ConflictException {
  readonly code = LedgerErrorCode.PORTFOLIO_NAME_CONFLICT;

  constructor(readonly portfolioName: string) {
    super({
      statusCode: HttpStatus.CONFLICT,
      code: LedgerErrorCode.PORTFOLIO_NAME_CONFLICT,
      message: `Portfolio with name "${portfolioName}" already exists`,
      name: portfolioName,
    });
  }
}

/**
 * Storage fault inside a unit of work. The original error is kept as `cause`
 * for logs; clients only see the failed operation.
 */
export class PersistenceFailureException extends InternalServerErrorException {
  readonly code = LedgerErrorCode.PERSISTENCE_FAILURE;

  constructor(readonly operation: string, cause: unknown) {
    super(
      {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        code: LedgerErrorCode.PERSISTENCE_FAILURE,
        message: `Persistence failure during ${operation}`,
        operation,
      },
      { cause },
    );
  }
}
