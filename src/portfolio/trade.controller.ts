import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post, Query } from '@nestjs/common';
import { TradeExecutorService } from './trade-executor.service';
import { PortfolioQueryService } from './portfolio-query.service';
import { TradeRequestDto } from './dto/trade-request.dto';
import { TradeResponseDto, toTradeResponse } from './dto/trade-response.dto';
import { TransactionQueryDto, TransactionResponseDto } from './dto/transaction-response.dto';

@Controller()
export class TradeController {
  constructor(
    private readonly executor: TradeExecutorService,
    private readonly queryService: PortfolioQueryService,
  ) {}

  /**
   * Buys shares into a portfolio at the given execution price.
   *
   * POST /stocks/:symbol/buy
   * @returns 201 with the recorded transaction, new balance and holding
   */
  @Post('stocks/:symbol/buy')
  @HttpCode(HttpStatus.CREATED)
  buy(@Param('symbol') symbol: string, @Body() dto: TradeRequestDto): TradeResponseDto {
    return toTradeResponse(this.executor.buy({ ...dto, symbol }));
  }

  /**
   * Sells shares out of a portfolio. `removed` is true when the holding closes.
   *
   * POST /stocks/:symbol/sell
   */
  @Post('stocks/:symbol/sell')
  @HttpCode(HttpStatus.CREATED)
  sell(@Param('symbol') symbol: string, @Body() dto: TradeRequestDto): TradeResponseDto {
    return toTradeResponse(this.executor.sell({ ...dto, symbol }));
  }

  /**
   * Transaction history, newest first.
   *
   * GET /transactions?portfolioId=...&symbol=AAPL&limit=50
   */
  @Get('transactions')
  getTransactions(@Query() query: TransactionQueryDto): TransactionResponseDto[] {
    return this.queryService.getTransactions(query);
  }
}
