// Error body returned by MarketExceptionFilter
export interface HttpExceptionResponse {
  statusCode: number;
  message: string | string[];
  error?: string;
  timestamp?: string;
  path?: string;
}
