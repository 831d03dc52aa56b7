import { HttpStatus } from '@nestjs/common';
import { createHttpFilter } from './create-http-filter';
import { RuleNotFoundException } from '../exceptions/rule-not-found.exception';
import { ConstraintViolationException } from '../exceptions/constraint-violation.exception';
import { StorageUnavailableException } from '../exceptions/storage-unavailable.exception';

export { RuleValidationFilter } from './rule-validation.filter';
export { DuplicateRuleFilter } from './duplicate-rule.filter';

export const RuleNotFoundFilter = createHttpFilter(HttpStatus.NOT_FOUND, RuleNotFoundException);

export const ConstraintViolationFilter = createHttpFilter(
  HttpStatus.UNPROCESSABLE_ENTITY,
  ConstraintViolationException,
);

export const StorageUnavailableFilter = createHttpFilter(
  HttpStatus.SERVICE_UNAVAILABLE,
  StorageUnavailableException,
);
