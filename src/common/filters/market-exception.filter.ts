import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import {
  DivisionUndefinedError,
  DuplicateInstrumentError,
  InvalidInstrumentError,
  InvalidTradeError,
  MarketError,
  UnknownInstrumentError,
} from '../errors/market.errors';
import { HttpExceptionResponse } from '../interfaces/http-exception.interface';

interface RequestLike {
  url?: string;
}

interface ResponseLike {
  status(code: number): { json(body: unknown): unknown };
}

export function statusFor(error: MarketError): HttpStatus {
  if (error instanceof InvalidTradeError || error instanceof InvalidInstrumentError) {
    return HttpStatus.BAD_REQUEST;
  }
  if (error instanceof UnknownInstrumentError) {
    return HttpStatus.NOT_FOUND;
  }
  if (error instanceof DuplicateInstrumentError) {
    return HttpStatus.CONFLICT;
  }
  if (error instanceof DivisionUndefinedError) {
    return HttpStatus.UNPROCESSABLE_ENTITY;
  }
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

// Maps domain errors onto the HttpExceptionResponse body.
@Catch(MarketError)
export class MarketExceptionFilter implements ExceptionFilter<MarketError> {
  private readonly logger = new Logger(MarketExceptionFilter.name);

  catch(exception: MarketError, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const request = http.getRequest<RequestLike>();
    const response = http.getResponse<ResponseLike>();
    const statusCode = statusFor(exception);

    if (statusCode === HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(exception.message, exception.stack);
    }

    const body: HttpExceptionResponse = {
      statusCode,
      message: exception.message,
      error: exception.name,
      timestamp: new Date().toISOString(),
      path: request.url,
    };
    response.status(statusCode).json(body);
  }
}
