import { QueryFailedError } from 'typeorm';
import {
  ConstraintKind,
  ConstraintViolationException,
} from '../common/exceptions/constraint-violation.exception';
import { StorageUnavailableException } from '../common/exceptions/storage-unavailable.exception';

interface SqliteFailure {
  code: string;
  message: string;
}

const UNAVAILABLE_PREFIXES = [
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
  'SQLITE_IOERR',
  'SQLITE_FULL',
  'SQLITE_CANTOPEN',
  'SQLITE_READONLY',
  'SQLITE_CORRUPT',
  'SQLITE_NOTADB',
  'SQLITE_PROTOCOL',
  'SQLITE_NOLFS',
];

const ALERT_RULE_COLUMNS = [
  'channel_id',
  'data_type',
  'point_id',
  'rule_name',
  'warning_level',
  'operator',
  'value',
  'enabled',
  'description',
  'created_at',
  'updated_at',
];

// Matched by shape: the driver's SqliteError class can belong to another realm.
function extractSqliteFailure(error: unknown): SqliteFailure | null {
  const candidate: unknown = error instanceof QueryFailedError ? error.driverError : error;
  if (
    typeof candidate === 'object' &&
    candidate !== null &&
    'code' in candidate &&
    'message' in candidate &&
    typeof candidate.code === 'string' &&
    typeof candidate.message === 'string' &&
    candidate.code.startsWith('SQLITE_')
  ) {
    return { code: candidate.code, message: candidate.message };
  }
  return null;
}

function constraintKind(code: string): ConstraintKind {
  switch (code) {
    case 'SQLITE_CONSTRAINT_UNIQUE':
    case 'SQLITE_CONSTRAINT_PRIMARYKEY':
      return 'unique';
    case 'SQLITE_CONSTRAINT_CHECK':
      return 'check';
    case 'SQLITE_CONSTRAINT_NOTNULL':
      return 'not_null';
    default:
      return 'other';
  }
}

/**
 * Columns named by a constraint message, e.g.
 * "UNIQUE constraint failed: alert_rule.channel_id, alert_rule.data_type".
 */
export function constraintColumns(message: string): string[] {
  const separator = message.indexOf(':');
  const detail = separator === -1 ? message : message.slice(separator + 1);

  const qualified = detail
    .split(',')
    .map((part) => part.trim())
    .filter((part) => /^\w+\.\w+$/.test(part))
    .map((part) => part.slice(part.indexOf('.') + 1));
  if (qualified.length > 0) {
    return qualified;
  }

  // CHECK failures carry the expression (or constraint name) instead
  return ALERT_RULE_COLUMNS.filter((column) => new RegExp(`\\b${column}\\b`).test(detail));
}

/**
 * Maps a driver error to the storage error taxonomy. Errors that do not come
 * from SQLite are returned unchanged.
 */
export function translateStorageError(error: unknown): unknown {
  const failure = extractSqliteFailure(error);
  if (!failure) {
    return error;
  }

  if (failure.code.startsWith('SQLITE_CONSTRAINT')) {
    return new ConstraintViolationException(
      constraintKind(failure.code),
      constraintColumns(failure.message),
      failure.message,
    );
  }

  if (UNAVAILABLE_PREFIXES.some((prefix) => failure.code.startsWith(prefix))) {
    return new StorageUnavailableException(failure.code, failure.message);
  }

  return error;
}
