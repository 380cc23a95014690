import {
  Injectable,
  CanActivate,
  ExecutionContext,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';
import { RelayErrorBody } from '../errors';

/**
 * Bearer-token gate. Open when no `proxyApiKey` is configured.
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  constructor(private readonly configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const apiKey = this.configService.get<string>('proxyApiKey');

    if (!apiKey) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    const token = this.extractBearerToken(request);

    if (token !== apiKey) {
      throw new HttpException(
        {
          error: {
            message: 'Invalid API key',
            type: 'invalid_request_error',
          },
        } satisfies RelayErrorBody,
        HttpStatus.UNAUTHORIZED,
      );
    }

    return true;
  }

  private extractBearerToken(request: Request): string {
    const authHeader = request.headers.authorization ?? '';
    return authHeader.startsWith('Bearer ') ? authHeader.slice(7) : '';
  }
}
