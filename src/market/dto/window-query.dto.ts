import 'reflect-metadata';
import { Type } from 'class-transformer';
import { IsNumber, IsOptional, IsPositive } from 'class-validator';

// ?windowMinutes= on price-derived queries; omitted means the configured default
export class WindowQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  windowMinutes?: number;
}
