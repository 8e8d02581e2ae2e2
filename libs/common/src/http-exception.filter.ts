import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';

import { MarketplaceErrorCode, isMarketplaceError } from '@Bazaar/type';

const STATUS_BY_CODE: Partial<Record<MarketplaceErrorCode, HttpStatus>> = {
  [MarketplaceErrorCode.ListingNotFound]: HttpStatus.NOT_FOUND,
  [MarketplaceErrorCode.NotAuthorized]: HttpStatus.FORBIDDEN,
  [MarketplaceErrorCode.NotContractOwner]: HttpStatus.FORBIDDEN,
  [MarketplaceErrorCode.ContractPaused]: HttpStatus.SERVICE_UNAVAILABLE,
};

export type ErrorBody = {
  statusCode: number;
  error: string;
  message: string;
};

/**
 * Marketplace errors become 4xx responses carrying their code; anything
 * else that is not an HttpException is logged and answered with 500.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    const body = this.toBody(exception);
    response.status(body.statusCode).json(body);
  }

  toBody(exception: unknown): ErrorBody {
    if (isMarketplaceError(exception)) {
      return {
        statusCode: STATUS_BY_CODE[exception.code] ?? HttpStatus.BAD_REQUEST,
        error: exception.code,
        message: exception.message,
      };
    }
    if (exception instanceof HttpException) {
      return {
        statusCode: exception.getStatus(),
        error: exception.name,
        message: exception.message,
      };
    }

    this.logger.error(
      'Unhandled error',
      exception instanceof Error ? exception.stack : String(exception),
    );
    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      error: 'InternalServerError',
      message: 'Internal server error',
    };
  }
}
