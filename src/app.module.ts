import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { ConfigModule } from './config/config.module';
import { MarketModule } from './market/market.module';

@Module({
  imports: [ConfigModule, MarketModule],
  controllers: [AppController],
})
export class AppModule {}
