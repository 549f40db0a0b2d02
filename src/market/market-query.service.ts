import { Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { Clock, CLOCK } from '../common/clock/clock';
import { toNumber } from '../common/utils/decimal.util';
import { IndexResponseDto, MetricName, MetricResponseDto } from './dto/metric-response.dto';
import { InstrumentResponseDto } from './dto/instrument-response.dto';
import { TradeResponseDto } from './dto/trade-response.dto';
import { geometricMeanIndex } from './index-aggregator';
import { InstrumentLedger } from './instrument-ledger';
import { InstrumentRegistryService } from './instrument-registry.service';
import { toInstrumentResponse, toTradeResponse } from './market.mapper';
import { MINUTE_MS, minutesToMs } from './trade-window';

// Read-only operations over the registry.
// Mutations live in MarketService.
@Injectable()
export class MarketQueryService {
  private readonly logger = new Logger(MarketQueryService.name);

  constructor(
    private readonly registry: InstrumentRegistryService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  listInstruments(): InstrumentResponseDto[] {
    return this.registry.all().map(toInstrumentResponse);
  }

  /** @throws UnknownInstrumentError */
  getInstrument(symbol: string): InstrumentResponseDto {
    return toInstrumentResponse(this.registry.get(symbol));
  }

  /** @throws UnknownInstrumentError */
  getTrades(symbol: string): TradeResponseDto[] {
    return this.registry
      .get(symbol)
      .getTrades()
      .map((trade) => toTradeResponse(symbol, trade));
  }

  getPrice(symbol: string, windowMinutes?: number): MetricResponseDto {
    return this.metric(symbol, 'price', windowMinutes, (ledger, windowMs) => ledger.price(windowMs));
  }

  /** @throws DivisionUndefinedError when the windowed price is zero */
  getDividendYield(symbol: string, windowMinutes?: number): MetricResponseDto {
    return this.metric(symbol, 'dividendYield', windowMinutes, (ledger, windowMs) =>
      ledger.dividendYield(windowMs),
    );
  }

  /** @throws DivisionUndefinedError when the dividend is zero */
  getPriceEarningsRatio(symbol: string, windowMinutes?: number): MetricResponseDto {
    return this.metric(symbol, 'priceEarningsRatio', windowMinutes, (ledger, windowMs) =>
      ledger.priceEarningsRatio(windowMs),
    );
  }

  /** Geometric-mean index across every registered instrument */
  getIndex(windowMinutes?: number): IndexResponseDto {
    const windowMs = this.resolveWindowMs(windowMinutes);
    const instruments = this.registry.all();
    const value = geometricMeanIndex(instruments, windowMs);
    this.logger.debug(`Index over ${instruments.length} instruments: ${value.toString()}`);

    return {
      value: toNumber(value),
      instrumentCount: instruments.length,
      windowMinutes: windowMs / MINUTE_MS,
      computedAt: this.clock.now().toISOString(),
    };
  }

  private metric(
    symbol: string,
    metric: MetricName,
    windowMinutes: number | undefined,
    compute: (ledger: InstrumentLedger, windowMs: number) => Decimal,
  ): MetricResponseDto {
    const ledger = this.registry.get(symbol);
    const windowMs = this.resolveWindowMs(windowMinutes);

    return {
      symbol: ledger.symbol,
      metric,
      value: toNumber(compute(ledger, windowMs)),
      windowMinutes: windowMs / MINUTE_MS,
      computedAt: this.clock.now().toISOString(),
    };
  }

  private resolveWindowMs(windowMinutes?: number): number {
    return windowMinutes !== undefined ? minutesToMs(windowMinutes) : this.registry.defaultWindowMs;
  }
}
