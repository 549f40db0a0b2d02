import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post, Query } from '@nestjs/common';
import { MarketService } from './market.service';
import { MarketQueryService } from './market-query.service';
import { CreateInstrumentDto } from './dto/create-instrument.dto';
import { RecordTradeDto } from './dto/record-trade.dto';
import { WindowQueryDto } from './dto/window-query.dto';
import { InstrumentResponseDto } from './dto/instrument-response.dto';
import { TradeResponseDto } from './dto/trade-response.dto';
import { IndexResponseDto, MetricResponseDto } from './dto/metric-response.dto';
import { toInstrumentResponse, toTradeResponse } from './market.mapper';

@Controller()
export class MarketController {
  constructor(
    private readonly marketService: MarketService,
    private readonly queryService: MarketQueryService,
  ) {}

  /**
   * Registers an instrument.
   *
   * POST /instruments
   * @returns 201 with the instrument summary, 409 if the symbol exists
   */
  @Post('instruments')
  @HttpCode(HttpStatus.CREATED)
  registerInstrument(@Body() dto: CreateInstrumentDto): InstrumentResponseDto {
    return toInstrumentResponse(this.marketService.registerInstrument(dto));
  }

  /**
   * GET /instruments
   */
  @Get('instruments')
  listInstruments(): InstrumentResponseDto[] {
    return this.queryService.listInstruments();
  }

  /**
   * GET /instruments/ALE
   */
  @Get('instruments/:symbol')
  getInstrument(@Param('symbol') symbol: string): InstrumentResponseDto {
    return this.queryService.getInstrument(symbol.toUpperCase());
  }

  /**
   * Records a trade. Future timestamps are rejected with 400.
   *
   * POST /instruments/ALE/trades
   */
  @Post('instruments/:symbol/trades')
  @HttpCode(HttpStatus.CREATED)
  recordTrade(@Param('symbol') symbol: string, @Body() dto: RecordTradeDto): TradeResponseDto {
    const normalized = symbol.toUpperCase();
    return toTradeResponse(normalized, this.marketService.recordTrade(normalized, dto));
  }

  /**
   * GET /instruments/ALE/trades
   */
  @Get('instruments/:symbol/trades')
  getTrades(@Param('symbol') symbol: string): TradeResponseDto[] {
    return this.queryService.getTrades(symbol.toUpperCase());
  }

  /**
   * Volume-weighted price over the window.
   *
   * GET /instruments/ALE/price?windowMinutes=15
   */
  @Get('instruments/:symbol/price')
  getPrice(@Param('symbol') symbol: string, @Query() query: WindowQueryDto): MetricResponseDto {
    return this.queryService.getPrice(symbol.toUpperCase(), query.windowMinutes);
  }

  /**
   * GET /instruments/ALE/dividend-yield?windowMinutes=15
   * @returns 422 when the windowed price is zero
   */
  @Get('instruments/:symbol/dividend-yield')
  getDividendYield(@Param('symbol') symbol: string, @Query() query: WindowQueryDto): MetricResponseDto {
    return this.queryService.getDividendYield(symbol.toUpperCase(), query.windowMinutes);
  }

  /**
   * GET /instruments/ALE/pe-ratio?windowMinutes=15
   * @returns 422 when the dividend is zero
   */
  @Get('instruments/:symbol/pe-ratio')
  getPriceEarningsRatio(@Param('symbol') symbol: string, @Query() query: WindowQueryDto): MetricResponseDto {
    return this.queryService.getPriceEarningsRatio(symbol.toUpperCase(), query.windowMinutes);
  }

  /**
   * Geometric-mean index over all registered instruments.
   *
   * GET /index?windowMinutes=15
   */
  @Get('index')
  getIndex(@Query() query: WindowQueryDto): IndexResponseDto {
    return this.queryService.getIndex(query.windowMinutes);
  }
}
