import { INestApplication, ValidationPipe } from '@nestjs/common';
import { toRuleValidationException } from './modules/alert-rules/alert-rule.validator';

export const API_PREFIX = 'alarmApi';

/**
 * Global pipes and prefix shared by the server and the e2e tests.
 */
export function configureApp(app: INestApplication): void {
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      // report the same error shape as the rule service does
      exceptionFactory: (errors) => toRuleValidationException(errors),
    }),
  );

  app.setGlobalPrefix(API_PREFIX);
}
