import 'reflect-metadata';
import { plainToInstance, Transform, Type } from 'class-transformer';
import { IsBoolean, IsIn, IsInt, IsNumber, IsPositive, Max, Min, validateSync } from 'class-validator';
import { LogLevel } from '@nestjs/common';

export const APP_CONFIG = Symbol('APP_CONFIG');

function parseBoolean(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return value;
}

// Most to least severe; LOG_LEVEL enables its own level and everything above it.
export const LOG_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

// Environment variables read once at startup.
export class AppConfig {
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  PRICE_WINDOW_MINUTES: number = 15;

  @Transform(({ value }) => parseBoolean(value))
  @IsBoolean()
  SEED_SAMPLE_INSTRUMENTS: boolean = true;

  @IsIn(LOG_LEVELS)
  LOG_LEVEL: LogLevel = 'log';
}

/**
 * Builds AppConfig from a raw environment, applying defaults for unset keys.
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const known = new Set(Object.keys(new AppConfig()));
  const defined = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => known.has(key) && value !== undefined && value !== ''),
  );
  const config = plainToInstance(AppConfig, defined);
  const errors = validateSync(config);

  if (errors.length > 0) {
    const details = errors
      .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid configuration - ${details}`);
  }
  return config;
}

/** Enabled Nest log levels for a configured threshold */
export function logLevelsFor(level: LogLevel): LogLevel[] {
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(level) + 1);
}
