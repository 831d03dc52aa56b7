import { ExceptionFilter, Catch, ArgumentsHost, HttpStatus } from '@nestjs/common';
import { Response } from 'express';
import { RuleValidationException } from '../exceptions/rule-validation.exception';

@Catch(RuleValidationException)
export class RuleValidationFilter implements ExceptionFilter {
  catch(exception: RuleValidationException, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    response.status(HttpStatus.BAD_REQUEST).json({
      statusCode: HttpStatus.BAD_REQUEST,
      error: exception.name,
      message: exception.message,
      field: exception.field,
    });
  }
}
