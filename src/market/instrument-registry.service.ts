import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { Clock, CLOCK } from '../common/clock/clock';
import { DuplicateInstrumentError, UnknownInstrumentError } from '../common/errors/market.errors';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { InstrumentDefinition, InstrumentKind } from './entities/instrument.entity';
import { InstrumentLedger } from './instrument-ledger';
import { minutesToMs } from './trade-window';

export const SAMPLE_INSTRUMENTS: readonly InstrumentDefinition[] = [
  { symbol: 'TEA', kind: InstrumentKind.COMMON, lastDividend: 0, parValue: 100 },
  { symbol: 'POP', kind: InstrumentKind.COMMON, lastDividend: 8, parValue: 100 },
  { symbol: 'ALE', kind: InstrumentKind.COMMON, lastDividend: 23, parValue: 60 },
  { symbol: 'GIN', kind: InstrumentKind.PREFERRED, lastDividend: 8, fixedDividendRate: 0.02, parValue: 100 },
  { symbol: 'JOE', kind: InstrumentKind.COMMON, lastDividend: 13, parValue: 250 },
];

// Symbol -> ledger map. One instance per Nest container; tests build their own.
// Only register() and clear() change membership; the index only reads.
@Injectable()
export class InstrumentRegistryService implements OnModuleInit {
  private readonly logger = new Logger(InstrumentRegistryService.name);
  private readonly ledgers: Map<string, InstrumentLedger> = new Map();
  private readonly windowMs: number;

  constructor(
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {
    this.windowMs = minutesToMs(config.PRICE_WINDOW_MINUTES);
  }

  onModuleInit(): void {
    if (this.config.SEED_SAMPLE_INSTRUMENTS) {
      this.seedSampleInstruments();
    }
  }

  /** Registers the sample instrument set, skipping symbols already present */
  seedSampleInstruments(): void {
    for (const definition of SAMPLE_INSTRUMENTS) {
      if (!this.ledgers.has(definition.symbol)) {
        this.register(definition);
      }
    }
  }

  /** @throws DuplicateInstrumentError if the symbol is taken */
  register(definition: InstrumentDefinition): InstrumentLedger {
    if (this.ledgers.has(definition.symbol)) {
      throw new DuplicateInstrumentError(definition.symbol);
    }
    const ledger = new InstrumentLedger({ ...definition }, this.clock, { defaultWindowMs: this.windowMs });
    this.ledgers.set(definition.symbol, ledger);
    this.logger.log(`Registered ${definition.kind} instrument ${definition.symbol}`);
    return ledger;
  }

  has(symbol: string): boolean {
    return this.ledgers.has(symbol);
  }

  find(symbol: string): InstrumentLedger | undefined {
    return this.ledgers.get(symbol);
  }

  /** @throws UnknownInstrumentError */
  get(symbol: string): InstrumentLedger {
    const ledger = this.ledgers.get(symbol);
    if (!ledger) {
      throw new UnknownInstrumentError(symbol);
    }
    return ledger;
  }

  /** Ledgers in registration order */
  all(): InstrumentLedger[] {
    return Array.from(this.ledgers.values());
  }

  get size(): number {
    return this.ledgers.size;
  }

  get defaultWindowMs(): number {
    return this.windowMs;
  }

  /** Drops every instrument - test harness only */
  clear(): void {
    this.ledgers.clear();
  }
}
