import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { AlertRuleInputDto } from '../../common/dto/alert-rule.dto';
import { RuleValidationException } from '../../common/exceptions/rule-validation.exception';
import { AlertRuleRow } from '../../database/services/alert-rule-store.service';

// Most fundamental first: the tuple fields, then the threshold, then the extras.
const FIELD_ORDER = [
  'channel_id',
  'data_type',
  'point_id',
  'rule_name',
  'warning_level',
  'operator',
  'value',
  'enabled',
  'description',
];

// Structural subset of class-validator's ValidationError, which Nest's ValidationPipe also passes.
interface FieldError {
  property: string;
  value?: unknown;
  constraints?: Record<string, string>;
}

function fieldRank(property: string): number {
  const index = FIELD_ORDER.indexOf(property);
  return index === -1 ? FIELD_ORDER.length : index;
}

/**
 * Reduces class-validator errors to the single error reported to the caller:
 * the first failing field in FIELD_ORDER.
 */
export function toRuleValidationException(
  errors: FieldError[],
): RuleValidationException {
  const [first] = [...errors].sort((a, b) => fieldRank(a.property) - fieldRank(b.property));
  if (!first) {
    return new RuleValidationException('input', 'is invalid');
  }
  if (first.value === undefined || first.value === null) {
    return new RuleValidationException(first.property, 'is required');
  }
  const [reason] = Object.values(first.constraints ?? {});
  return new RuleValidationException(first.property, reason ?? 'is invalid');
}

/**
 * Structural validation of a create/update payload. Synchronous and free of
 * I/O; returns the row to persist, with defaults filled in.
 */
export function validateRuleInput(input: unknown): AlertRuleRow {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    throw new RuleValidationException('input', 'must be an object');
  }

  const dto = input instanceof AlertRuleInputDto ? input : plainToInstance(AlertRuleInputDto, input);
  const errors = validateSync(dto);
  if (errors.length > 0) {
    throw toRuleValidationException(errors);
  }

  return {
    channel_id: dto.channel_id,
    data_type: dto.data_type,
    point_id: dto.point_id,
    rule_name: dto.rule_name,
    warning_level: dto.warning_level,
    operator: dto.operator,
    value: dto.value,
    enabled: dto.enabled ?? true,
    description: dto.description ?? '',
  };
}
