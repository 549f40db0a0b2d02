import { Inject, Injectable, Logger } from '@nestjs/common';
import { Clock, CLOCK } from '../common/clock/clock';
import { InvalidInstrumentError, InvalidTradeError } from '../common/errors/market.errors';
import { CreateInstrumentDto } from './dto/create-instrument.dto';
import { RecordTradeDto } from './dto/record-trade.dto';
import { InstrumentDefinition, InstrumentKind } from './entities/instrument.entity';
import { Trade } from './entities/trade.entity';
import { InstrumentLedger } from './instrument-ledger';
import { InstrumentRegistryService } from './instrument-registry.service';

// Mutations: instrument registration and trade recording.
@Injectable()
export class MarketService {
  private readonly logger = new Logger(MarketService.name);

  constructor(
    private readonly registry: InstrumentRegistryService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * Registers an instrument from a validated DTO.
   * @throws InvalidInstrumentError if the fixed dividend rate does not match the kind
   * @throws DuplicateInstrumentError if the symbol is taken
   */
  registerInstrument(dto: CreateInstrumentDto): InstrumentLedger {
    return this.registry.register(this.toDefinition(dto));
  }

  private toDefinition(dto: CreateInstrumentDto): InstrumentDefinition {
    const symbol = dto.symbol.toUpperCase();
    const base = { symbol, lastDividend: dto.lastDividend, parValue: dto.parValue };

    if (dto.kind === InstrumentKind.PREFERRED) {
      if (dto.fixedDividendRate === undefined) {
        throw new InvalidInstrumentError(`Preferred instrument ${symbol} needs a fixed dividend rate`);
      }
      return { ...base, kind: InstrumentKind.PREFERRED, fixedDividendRate: dto.fixedDividendRate };
    }

    if (dto.fixedDividendRate !== undefined) {
      throw new InvalidInstrumentError(`Common instrument ${symbol} cannot carry a fixed dividend rate`);
    }
    return { ...base, kind: InstrumentKind.COMMON };
  }

  /**
   * Records a trade; a missing timestamp means "now".
   * @throws UnknownInstrumentError
   * @throws InvalidTradeError - the trade is not recorded
   */
  recordTrade(symbol: string, dto: RecordTradeDto): Trade {
    const ledger = this.registry.get(symbol);
    const timestamp = dto.timestamp !== undefined ? new Date(dto.timestamp) : this.clock.now();

    try {
      const trade = ledger.recordTrade(dto.direction, dto.quantity, dto.price, timestamp);
      this.logger.debug(`${symbol}: ${trade.direction} ${trade.quantity} @ ${trade.price}`);
      return trade;
    } catch (error) {
      if (error instanceof InvalidTradeError) {
        this.logger.warn(`${symbol}: rejected trade - ${error.message}`);
      }
      throw error;
    }
  }

  /** Clears all state - test harness only */
  clearAll(): void {
    this.registry.clear();
  }
}
