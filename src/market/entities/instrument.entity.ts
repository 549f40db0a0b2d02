export enum InstrumentKind {
  COMMON = 'common',
  PREFERRED = 'preferred',
}

interface InstrumentBase {
  symbol: string;           // uppercase alphabetic, unique
  lastDividend: number;     // minor units
  parValue: number;         // minor units, fallback price
}

export interface CommonInstrument extends InstrumentBase {
  kind: InstrumentKind.COMMON;
}

export interface PreferredInstrument extends InstrumentBase {
  kind: InstrumentKind.PREFERRED;
  fixedDividendRate: number; // in [0, 1]
}

// Static attributes of an instrument. The tag decides which dividend formula applies.
export type InstrumentDefinition = CommonInstrument | PreferredInstrument;
