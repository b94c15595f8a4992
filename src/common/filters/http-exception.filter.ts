import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { HttpExceptionResponse } from '../interfaces/http-exception.interface';

// Renders every error as a flat JSON body with timestamp and path.
// Unknown errors are logged with their stack and hidden behind a 500.
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const body = this.toBody(exception);
    body.timestamp = new Date().toISOString();
    body.path = request.url;

    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      const stack = exception instanceof Error ? exception.stack : String(exception);
      this.logger.error(`${request.method} ${request.url} failed: ${String(body.message)}`, stack);
    }

    response.status(body.statusCode).json(body);
  }

  toBody(exception: unknown): HttpExceptionResponse {
    if (exception instanceof HttpException) {
      const statusCode = exception.getStatus();
      const payload = exception.getResponse();

      if (typeof payload === 'string') {
        return { statusCode, message: payload };
      }
      return { ...payload, statusCode, message: this.messageOf(payload, exception.message) };
    }

    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'Internal server error',
    };
  }

  private messageOf(payload: object, fallback: string): string | string[] {
    if ('message' in payload) {
      const { message } = payload;
      if (typeof message === 'string') return message;
      if (Array.isArray(message) && message.every((m): m is string => typeof m === 'string')) return message;
    }
    return fallback;
  }
}
