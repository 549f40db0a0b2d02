import { IsDateString, IsEnum, IsInt, IsOptional, IsPositive, Min } from 'class-validator';
import { TradeDirection } from '../entities/trade.entity';

// Trade against a registered instrument. timestamp defaults to the time of recording.
export class RecordTradeDto {
  @IsEnum(TradeDirection)
  direction!: TradeDirection;

  @IsInt()
  @IsPositive()
  quantity!: number;

  @IsInt()
  @Min(0)
  price!: number;

  @IsOptional()
  @IsDateString()
  timestamp?: string;
}
