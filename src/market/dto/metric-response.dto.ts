export type MetricName = 'price' | 'dividendYield' | 'priceEarningsRatio';

// Single derived figure for one instrument
export interface MetricResponseDto {
  symbol: string;
  metric: MetricName;
  value: number;
  windowMinutes: number;
  computedAt: string;
}

export interface IndexResponseDto {
  value: number;
  instrumentCount: number;
  windowMinutes: number;
  computedAt: string;
}
