import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { RegistryError, RegistryErrorCode } from '@core/registry-errors';

export const REGISTRY_ERROR_STATUS: Record<RegistryErrorCode, HttpStatus> = {
  InvalidInput: HttpStatus.BAD_REQUEST,
  Unauthorized: HttpStatus.FORBIDDEN,
  NotFound: HttpStatus.NOT_FOUND,
  AlreadyExists: HttpStatus.CONFLICT,
  Mismatch: HttpStatus.UNPROCESSABLE_ENTITY,
  Invalid: HttpStatus.UNPROCESSABLE_ENTITY,
  Expired: HttpStatus.UNPROCESSABLE_ENTITY,
  NotInitialized: HttpStatus.SERVICE_UNAVAILABLE,
};

/**
 * Maps registry failures to HTTP responses
 */
@Catch(RegistryError)
export class RegistryExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(RegistryExceptionFilter.name);

  catch(exception: RegistryError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    const statusCode = REGISTRY_ERROR_STATUS[exception.code];

    this.logger.debug(`${exception.code} -> ${statusCode}: ${exception.message}`);

    response.status(statusCode).json({
      statusCode,
      error: exception.code,
      message: exception.message,
      timestamp: new Date().toISOString(),
    });
  }
}
