export class RuleValidationException extends Error {
  readonly field: string;

  constructor(field: string, reason: string) {
    super(`Invalid ${field}: ${reason}`);
    this.name = 'RuleValidationException';
    this.field = field;
  }
}
