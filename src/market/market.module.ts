import { Module } from '@nestjs/common';
import { CLOCK, SystemClock } from '../common/clock/clock';
import { MarketController } from './market.controller';
import { MarketService } from './market.service';
import { MarketQueryService } from './market-query.service';
import { InstrumentRegistryService } from './instrument-registry.service';

@Module({
  controllers: [MarketController],
  providers: [
    { provide: CLOCK, useClass: SystemClock },
    InstrumentRegistryService,
    MarketService,      // Mutations: registerInstrument, recordTrade, clearAll
    MarketQueryService, // Queries: prices, yields, P/E, index
  ],
  exports: [InstrumentRegistryService],
})
export class MarketModule {}
