import { ArgumentsHost, Catch, HttpStatus, Logger } from '@nestjs/common';
import { BaseExceptionFilter } from '@nestjs/core';
import type { Response } from 'express';
import {
  ReconnectionExhaustedError,
  StoreClosedError,
  StoreError,
  ValueEncodingError,
  isTransientStoreError,
} from '../../../libs/resilient-store';

/**
 * Maps store failures to HTTP statuses: unreachable store -> 503,
 * unencodable value -> 400, other store errors -> 500. Everything else
 * goes to the default Nest handling.
 */
@Catch()
export class StoreExceptionFilter extends BaseExceptionFilter {
  private readonly logger = new Logger(StoreExceptionFilter.name);

  catch(error: unknown, host: ArgumentsHost) {
    const status = statusFor(error);
    if (status === undefined || !(error instanceof Error)) {
      super.catch(error, host);
      return;
    }

    if (status >= 500) {
      this.logger.error(`${error.name}: ${error.message}`);
    }

    const response = host.switchToHttp().getResponse<Response>();
    response.status(status).json({
      statusCode: status,
      error: error.name,
      message: error.message,
    });
  }
}

function statusFor(error: unknown): HttpStatus | undefined {
  if (error instanceof ValueEncodingError) {
    return HttpStatus.BAD_REQUEST;
  }
  if (
    isTransientStoreError(error) ||
    error instanceof ReconnectionExhaustedError ||
    error instanceof StoreClosedError
  ) {
    return HttpStatus.SERVICE_UNAVAILABLE;
  }
  if (error instanceof StoreError) {
    return HttpStatus.INTERNAL_SERVER_ERROR;
  }
  return undefined;
}
