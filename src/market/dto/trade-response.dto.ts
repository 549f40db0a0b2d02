import { TradeDirection } from '../entities/trade.entity';

export interface TradeResponseDto {
  id: string;
  symbol: string;
  direction: TradeDirection;
  sign: 1 | -1;
  quantity: number;
  price: number;
  timestamp: string;
  recordedAt: string;
}
