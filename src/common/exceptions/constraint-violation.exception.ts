export type ConstraintKind = 'unique' | 'check' | 'not_null' | 'other';

export class ConstraintViolationException extends Error {
  readonly kind: ConstraintKind;
  readonly columns: string[];

  constructor(kind: ConstraintKind, columns: string[], detail: string) {
    super(`Constraint violation (${kind}): ${detail}`);
    this.name = 'ConstraintViolationException';
    this.kind = kind;
    this.columns = columns;
  }
}
