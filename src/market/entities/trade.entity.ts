export enum TradeDirection {
  BUY = 'buy',
  SELL = 'sell',
}

// Immutable trade record. quantity and price are safe integers in minor units;
// arithmetic over them happens in Decimal. Instants are epoch milliseconds so a
// frozen record has no mutable parts.
export interface Trade {
  readonly id: string;                // internal UUID
  readonly direction: TradeDirection;
  readonly quantity: number;          // > 0
  readonly price: number;             // >= 0
  readonly timestamp: number;         // execution time, never after recordedAt
  readonly recordedAt: number;
}

/** Signed direction flag: +1 for buys, -1 for sells */
export function directionSign(direction: TradeDirection): 1 | -1 {
  return direction === TradeDirection.BUY ? 1 : -1;
}
