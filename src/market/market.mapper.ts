import { toNumber } from '../common/utils/decimal.util';
import { InstrumentKind } from './entities/instrument.entity';
import { directionSign, Trade } from './entities/trade.entity';
import { InstrumentLedger } from './instrument-ledger';
import { InstrumentResponseDto } from './dto/instrument-response.dto';
import { TradeResponseDto } from './dto/trade-response.dto';

export function toInstrumentResponse(ledger: InstrumentLedger): InstrumentResponseDto {
  const definition = ledger.definition;
  return {
    symbol: definition.symbol,
    kind: definition.kind,
    lastDividend: definition.lastDividend,
    fixedDividendRate: definition.kind === InstrumentKind.PREFERRED ? definition.fixedDividendRate : null,
    parValue: definition.parValue,
    tradeCount: ledger.tradeCount,
    price: toNumber(ledger.price()),
  };
}

export function toTradeResponse(symbol: string, trade: Trade): TradeResponseDto {
  return {
    id: trade.id,
    symbol,
    direction: trade.direction,
    sign: directionSign(trade.direction),
    quantity: trade.quantity,
    price: trade.price,
    timestamp: new Date(trade.timestamp).toISOString(),
    recordedAt: new Date(trade.recordedAt).toISOString(),
  };
}
