import { ExceptionFilter, Catch, ArgumentsHost, HttpStatus } from '@nestjs/common';
import type { Type } from '@nestjs/common';
import { Response } from 'express';

export function createHttpFilter(
  status: HttpStatus,
  ...exceptions: Type<Error>[]
): Type<ExceptionFilter> {
  @Catch(...exceptions)
  class HttpExceptionFilter implements ExceptionFilter {
    catch(exception: Error, host: ArgumentsHost) {
      const response = host.switchToHttp().getResponse<Response>();
      response.status(status).json({
        statusCode: status,
        error: exception.name,
        message: exception.message,
      });
    }
  }
  return HttpExceptionFilter;
}
