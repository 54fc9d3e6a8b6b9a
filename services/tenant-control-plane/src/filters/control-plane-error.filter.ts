import { sanitizeError } from '@control-plane/utils';
import {
  type ArgumentsHost,
  Catch,
  type ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import {
  AuthError,
  ConfigError,
  ControlPlaneError,
  GraphRequestError,
  NotFoundError,
  RetryExhaustedError,
} from '../errors';
import { CORRELATION_ID_HEADER } from '../tenant/correlation-id';

interface ErrorMapping {
  status: HttpStatus;
  error: string;
}

export function mapControlPlaneError(exception: ControlPlaneError): ErrorMapping {
  if (exception instanceof NotFoundError) {
    return { status: HttpStatus.NOT_FOUND, error: 'Tenant Not Found' };
  }
  if (exception instanceof GraphRequestError) {
    return { status: HttpStatus.BAD_GATEWAY, error: 'Microsoft Graph API Error' };
  }
  if (exception instanceof RetryExhaustedError) {
    return { status: HttpStatus.SERVICE_UNAVAILABLE, error: 'Microsoft Graph Unavailable' };
  }
  if (exception instanceof AuthError) {
    return { status: HttpStatus.BAD_GATEWAY, error: 'Token Acquisition Failed' };
  }
  if (exception instanceof ConfigError) {
    return { status: HttpStatus.INTERNAL_SERVER_ERROR, error: 'Configuration Error' };
  }
  return { status: HttpStatus.INTERNAL_SERVER_ERROR, error: 'Internal Server Error' };
}

@Catch(ControlPlaneError)
export class ControlPlaneErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(ControlPlaneErrorFilter.name);

  public catch(exception: ControlPlaneError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    const { status, error } = mapControlPlaneError(exception);
    const correlationHeader = response.getHeader(CORRELATION_ID_HEADER);
    const correlationId = typeof correlationHeader === 'string' ? correlationHeader : undefined;

    this.logger.error({
      msg: `${error}: ${exception.message}`,
      correlationId,
      error: sanitizeError(exception),
    });

    response.status(status).json({
      statusCode: status,
      error,
      message: exception.message,
      ...(correlationId ? { correlationId } : {}),
      ...(exception instanceof GraphRequestError
        ? {
            upstreamStatus: exception.statusCode,
            code: exception.code,
            requestId: exception.requestId,
          }
        : {}),
    });
  }
}
