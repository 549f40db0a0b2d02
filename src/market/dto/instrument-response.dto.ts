import { InstrumentKind } from '../entities/instrument.entity';

// Static attributes plus the current default-window price
export interface InstrumentResponseDto {
  symbol: string;
  kind: InstrumentKind;
  lastDividend: number;
  fixedDividendRate: number | null;   // null for common stock
  parValue: number;
  tradeCount: number;
  price: number;
}
