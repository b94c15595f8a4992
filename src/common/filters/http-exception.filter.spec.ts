import { ArgumentsHost, BadRequestException, HttpStatus } from '@nestjs/common';
import Decimal from 'decimal.js';
import { HttpExceptionFilter } from './http-exception.filter';
import { InsufficientBalanceException, LedgerErrorCode } from '../exceptions/ledger.exceptions';

describe('HttpExceptionFilter', () => {
  let filter: HttpExceptionFilter;
  let status: jest.Mock;
  let json: jest.Mock;
  let host: ArgumentsHost;

  beforeEach(() => {
    filter = new HttpExceptionFilter();
    json = jest.fn();
    status = jest.fn().mockReturnValue({ json });
    const http = {
      getResponse: () => ({ status }),
      getRequest: () => ({ url: '/stocks/AAPL/buy', method: 'POST' }),
      getNext: () => undefined,
    };
    host = { switchToHttp: () => http } as unknown as ArgumentsHost;
  });

  it('should keep structured fields of ledger errors', () => {
    filter.catch(new InsufficientBalanceException(new Decimal(500), new Decimal(120.5)), host);

    expect(status).toHaveBeenCalledWith(HttpStatus.BAD_REQUEST);
    const body = json.mock.calls[0][0];
    expect(body.code).toBe(LedgerErrorCode.INSUFFICIENT_BALANCE);
    expect(body.required).toBe(500);
    expect(body.available).toBe(120.5);
    expect(body.message).toBe('Insufficient balance. You need $500.00 but only have $120.50');
    expect(body.path).toBe('/stocks/AAPL/buy');
    expect(body.timestamp).toBeDefined();
  });

  it('should pass validation message arrays through', () => {
    filter.catch(new BadRequestException(['quantity must be a positive number']), host);

    const body = json.mock.calls[0][0];
    expect(body.statusCode).toBe(400);
    expect(body.message).toEqual(['quantity must be a positive number']);
  });

  it('should hide unexpected errors behind a 500', () => {
    jest.spyOn(filter['logger'], 'error').mockImplementation(() => undefined);

    filter.catch(new Error('connection reset'), host);

    expect(status).toHaveBeenCalledWith(HttpStatus.INTERNAL_SERVER_ERROR);
    expect(json.mock.calls[0][0].message).toBe('Internal server error');
  });
});
