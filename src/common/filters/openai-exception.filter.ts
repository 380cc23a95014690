import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { RelayErrorBody } from '../errors';
import { isRecord } from '../utils';

/**
 * Renders every failure as an OpenAI-style `{ error: { message, type } }`
 * body. Streams that already sent headers are only closed.
 */
@Catch()
export class OpenAIExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(OpenAIExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();
    const { status, body } = this.toErrorResponse(exception);

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(`${status} ${body.error.message}`);
    }

    if (res.headersSent) {
      if (!res.writableEnded) res.end();
      return;
    }

    res.status(status).json(body);
  }

  toErrorResponse(exception: unknown): { status: number; body: RelayErrorBody } {
    if (!(exception instanceof HttpException)) {
      const message =
        exception instanceof Error ? exception.message : 'Internal server error';
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        body: { error: { message, type: 'server_error' } },
      };
    }

    const status = exception.getStatus();
    const response = exception.getResponse();

    if (isRecord(response) && isRecord(response.error)) {
      const { message, type } = response.error;
      if (typeof message === 'string' && typeof type === 'string') {
        return { status, body: { error: { message, type } } };
      }
    }

    return {
      status,
      body: {
        error: {
          message: this.extractMessage(response, exception.message),
          type: this.mapErrorType(status),
        },
      },
    };
  }

  private extractMessage(response: string | object, fallback: string): string {
    if (typeof response === 'string') return response;
    if (isRecord(response)) {
      const { message } = response;
      // ValidationPipe reports one message per failed constraint
      if (Array.isArray(message)) return message.map(String).join('; ');
      if (typeof message === 'string') return message;
    }
    return fallback;
  }

  private mapErrorType(status: number): string {
    switch (status) {
      case 400:
      case 401:
      case 404:
        return 'invalid_request_error';
      case 429:
        return 'rate_limit';
      case 503:
        return 'service_unavailable';
      default:
        return status >= 500 ? 'server_error' : 'invalid_request_error';
    }
  }
}
