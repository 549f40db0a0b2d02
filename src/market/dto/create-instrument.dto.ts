import 'reflect-metadata';
import { Transform } from 'class-transformer';
import { IsEnum, IsInt, IsNumber, Matches, Max, Min, ValidateIf } from 'class-validator';
import { InstrumentKind } from '../entities/instrument.entity';

// Caller-side validation of an instrument definition.
// Symbol is upper-cased and kind lower-cased before the checks run.
export class CreateInstrumentDto {
  @Transform(({ value }) => (typeof value === 'string' ? value.trim().toUpperCase() : value))
  @Matches(/^[A-Z]+$/, { message: 'symbol must be alphabetic' })
  symbol!: string;

  @Transform(({ value }) => (typeof value === 'string' ? value.trim().toLowerCase() : value))
  @IsEnum(InstrumentKind)
  kind!: InstrumentKind;

  @IsInt()
  @Min(0)
  lastDividend!: number;

  // required for preferred stock, rejected for common stock by MarketService
  @ValidateIf((dto: CreateInstrumentDto) => dto.kind === InstrumentKind.PREFERRED)
  @IsNumber()
  @Min(0)
  @Max(1)
  fixedDividendRate?: number;

  @IsInt()
  @Min(0)
  parValue!: number;
}
