import { Test, TestingModule } from '@nestjs/testing';
import { CLOCK } from '../common/clock/clock';
import { ManualClock } from '../common/clock/manual-clock';
import { DivisionUndefinedError } from '../common/errors/market.errors';
import { APP_CONFIG, loadConfig } from '../config/app.config';
import { InstrumentKind } from './entities/instrument.entity';
import { TradeDirection } from './entities/trade.entity';
import { InstrumentRegistryService } from './instrument-registry.service';
import { MarketController } from './market.controller';
import { MarketQueryService } from './market-query.service';
import { MarketService } from './market.service';

describe('MarketController', () => {
  let controller: MarketController;
  let service: MarketService;
  let clock: ManualClock;

  beforeEach(async () => {
    clock = new ManualClock('2024-01-15T12:00:00.000Z');
    const module: TestingModule = await Test.createTestingModule({
      controllers: [MarketController],
      providers: [
        { provide: CLOCK, useValue: clock },
        { provide: APP_CONFIG, useValue: loadConfig({ SEED_SAMPLE_INSTRUMENTS: 'false' }) },
        InstrumentRegistryService,
        MarketService,
        MarketQueryService,
      ],
    }).compile();

    controller = module.get<MarketController>(MarketController);
    service = module.get<MarketService>(MarketService);

    controller.registerInstrument({ symbol: 'ALE', kind: InstrumentKind.COMMON, lastDividend: 23, parValue: 60 });
  });

  afterEach(() => {
    service.clearAll();
  });

  describe('registerInstrument', () => {
    it('should return the new instrument summary', () => {
      const result = controller.registerInstrument({
        symbol: 'GIN',
        kind: InstrumentKind.PREFERRED,
        lastDividend: 8,
        fixedDividendRate: 0.02,
        parValue: 100,
      });

      expect(result).toEqual({
        symbol: 'GIN',
        kind: InstrumentKind.PREFERRED,
        lastDividend: 8,
        fixedDividendRate: 0.02,
        parValue: 100,
        tradeCount: 0,
        price: 100,
      });
    });
  });

  describe('recordTrade', () => {
    it('should record a trade against the upper-cased symbol', () => {
      const result = controller.recordTrade('ale', { direction: TradeDirection.SELL, quantity: 300, price: 15 });

      expect(result.id).toBeDefined();
      expect(result.symbol).toBe('ALE');
      expect(result.direction).toBe(TradeDirection.SELL);
      expect(result.sign).toBe(-1);
      expect(result.timestamp).toBe('2024-01-15T12:00:00.000Z');
      expect(controller.getTrades('ALE')).toHaveLength(1);
    });
  });

  describe('metrics', () => {
    beforeEach(() => {
      controller.recordTrade('ALE', { direction: TradeDirection.BUY, quantity: 500, price: 25 });
      controller.recordTrade('ALE', { direction: TradeDirection.SELL, quantity: 300, price: 15 });
      controller.recordTrade('ALE', {
        direction: TradeDirection.BUY,
        quantity: 100,
        price: 87,
        timestamp: clock.minutesAgo(16).toISOString(),
      });
    });

    it('should return the windowed price', () => {
      expect(controller.getPrice('ALE', {}).value).toBe(21.25);
    });

    it('should widen the window on request', () => {
      // (12500 + 4500 + 8700) / 900
      expect(controller.getPrice('ALE', { windowMinutes: 20 }).value).toBe(28.55555556);
    });

    it('should return the dividend yield', () => {
      expect(controller.getDividendYield('ALE', {}).value).toBe(1.08235294);
    });

    it('should return the P/E ratio', () => {
      expect(controller.getPriceEarningsRatio('ALE', {}).value).toBe(0.92391304);
    });

    it('should return the index', () => {
      const index = controller.getIndex({});

      expect(index.instrumentCount).toBe(1);
      expect(index.value).toBe(21.25);
    });
  });

  it('should surface undefined divisions', () => {
    controller.registerInstrument({ symbol: 'TEA', kind: InstrumentKind.COMMON, lastDividend: 0, parValue: 100 });

    expect(() => controller.getPriceEarningsRatio('TEA', {})).toThrow(DivisionUndefinedError);
  });

  it('should list instruments', () => {
    expect(controller.listInstruments().map((i) => i.symbol)).toEqual(['ALE']);
    expect(controller.getInstrument('ale').symbol).toBe('ALE');
  });
});
