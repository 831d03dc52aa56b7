import { ExceptionFilter, Catch, ArgumentsHost, HttpStatus } from '@nestjs/common';
import { Response } from 'express';
import { DuplicateRuleException } from '../exceptions/duplicate-rule.exception';

@Catch(DuplicateRuleException)
export class DuplicateRuleFilter implements ExceptionFilter {
  catch(exception: DuplicateRuleException, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    response.status(HttpStatus.CONFLICT).json({
      statusCode: HttpStatus.CONFLICT,
      error: exception.name,
      message: exception.message,
      tuple: exception.tuple,
    });
  }
}
