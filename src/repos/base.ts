import Database from 'better-sqlite3';
import { db, generateId, now, transaction, immediateTransaction } from '../db/client';
import type { ErrorDetails, Result } from '../domain/types';
import {
  RegistryError,
  DuplicateKeyError,
  DuplicateRelationError,
  ConstraintError,
  UnavailableError,
  InternalConsistencyError,
} from '../domain/types';
import { isInDomain, type ValueOf, type ValueSetName } from '../domain/value-sets';

// Re-export for convenience
export { db, generateId, now, transaction, immediateTransaction };

/** Values better-sqlite3 can bind. Booleans must be stored as 0/1. */
export type SqlParam = string | number | bigint | Buffer | null;

// --- Query helpers ---

/** Get a single row by query, or null */
export function queryOne<T>(sql: string, params: SqlParam[] = []): T | null {
  return db.prepare<SqlParam[], T>(sql).get(...params) ?? null;
}

/** Get all rows matching query */
export function queryAll<T>(sql: string, params: SqlParam[] = []): T[] {
  return db.prepare<SqlParam[], T>(sql).all(...params);
}

/** Execute a write statement, return changes count */
export function execute(sql: string, params: SqlParam[] = []): number {
  return db.prepare<SqlParam[]>(sql).run(...params).changes;
}

/** Count rows of a table matching a simple where clause */
export function countWhere(table: string, where: string, params: SqlParam[]): number {
  const row = queryOne<{ count: number }>(`SELECT COUNT(*) AS count FROM ${table} WHERE ${where}`, params);
  return row?.count ?? 0;
}

export function placeholders(count: number): string {
  return Array.from({ length: count }, () => '?').join(', ');
}

// --- Timestamp helpers ---

/** Parse ISO timestamp string to Date */
export function toDate(ts: string): Date {
  return new Date(ts);
}

export function toOptionalDate(ts: string | null): Date | undefined {
  return ts ? new Date(ts) : undefined;
}

// --- Column codecs ---

export function toFlag(value: boolean): number {
  return value ? 1 : 0;
}

export function fromFlag(value: number): boolean {
  return value === 1;
}

/** Trimmed text, or null when blank. Undefined passes through (field not provided). */
export function toNullableText(value: string | null | undefined): string | null | undefined {
  if (value === undefined) return undefined;
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Persist a set as a JSON array. Members are deduplicated and sorted so that
 * two encodings of the same set compare equal as text.
 */
export function encodeSet(values: readonly string[]): string {
  return JSON.stringify([...new Set(values)].sort());
}

/** Decode a free-text set column. */
export function decodeTextSet(json: string, column: string): string[] {
  const parsed: unknown = JSON.parse(json);
  if (!Array.isArray(parsed)) {
    throw new InternalConsistencyError(`Column ${column} does not hold a JSON array`, { column });
  }
  return parsed.map(item => {
    if (typeof item !== 'string') {
      throw new InternalConsistencyError(`Column ${column} holds a non-string member`, { column });
    }
    return item;
  });
}

/** Decode an enumerated set column, checking every member against its domain. */
export function decodeEnumSet<N extends ValueSetName>(json: string, column: string, domain: N): ValueOf<N>[] {
  return decodeTextSet(json, column).map(item => readEnum(column, domain, item));
}

/** Narrow a stored enumerated value. The schema CHECK makes a miss an integrity fault. */
export function readEnum<N extends ValueSetName>(column: string, domain: N, value: string): ValueOf<N> {
  if (!isInDomain(domain, value)) {
    throw new InternalConsistencyError(`Column ${column} holds "${value}", outside ${domain}`, { column, value });
  }
  return value;
}

// --- Change detection ---

/**
 * Write only the columns whose stored value differs and stamp updated_at
 * when at least one did. Undefined entries in `next` are left alone.
 * Returns the changed column names.
 */
export function writeChangedColumns(
  table: string,
  id: string,
  existing: Readonly<Record<string, unknown>>,
  next: Readonly<Record<string, SqlParam | undefined>>
): string[] {
  const changed: Array<[string, SqlParam]> = [];
  for (const [column, value] of Object.entries(next)) {
    if (value === undefined || existing[column] === value) continue;
    changed.push([column, value]);
  }
  if (changed.length === 0) {
    return [];
  }

  const assignments = changed.map(([column]) => `${column} = ?`).join(', ');
  execute(
    `UPDATE ${table} SET ${assignments}, updated_at = ? WHERE id = ?`,
    [...changed.map(([, value]) => value), now(), id]
  );
  return changed.map(([column]) => column);
}

// --- SQLite error translation ---

/** Friendly names for the composite unique constraints. */
const UNIQUE_CONSTRAINT_NAMES: Record<string, string> = {
  'nonprofit_clients.email,nonprofit_clients.project_cycle_id,nonprofit_clients.org_name,nonprofit_clients.project_name':
    'nonprofit_clients.email_cycle_org_project',
  'volunteers_exported_to_workspace.volunteer_id,volunteers_exported_to_workspace.job_id':
    'volunteers_exported_to_workspace.volunteer_job',
};

function constraintFromMessage(message: string): string {
  const separator = message.indexOf(':');
  if (separator === -1) return 'unknown';
  const columns = message
    .slice(separator + 1)
    .split(',')
    .map(part => part.trim())
    .filter(Boolean);
  const key = columns.join(',');
  return UNIQUE_CONSTRAINT_NAMES[key] ?? key;
}

function relationFromMessage(message: string): string {
  const constraint = constraintFromMessage(message);
  const table = constraint.split('.')[0];
  return table ?? constraint;
}

/** Map a better-sqlite3 error onto the registry's error taxonomy. */
export function translateSqliteError(error: unknown): unknown {
  if (!(error instanceof Database.SqliteError)) {
    return error;
  }

  const code = error.code;
  if (code === 'SQLITE_CONSTRAINT_UNIQUE') {
    return new DuplicateKeyError(constraintFromMessage(error.message));
  }
  if (code === 'SQLITE_CONSTRAINT_PRIMARYKEY') {
    return new DuplicateRelationError(relationFromMessage(error.message));
  }
  if (code === 'SQLITE_CONSTRAINT_FOREIGNKEY') {
    return new ConstraintError('foreign_key', error.message);
  }
  if (code === 'SQLITE_CONSTRAINT_CHECK' || code === 'SQLITE_CONSTRAINT_NOTNULL') {
    return new ConstraintError(constraintFromMessage(error.message), error.message);
  }
  if (code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED')) {
    return new UnavailableError(`Database is locked: ${error.message}`);
  }
  return error;
}

// --- Result helpers ---

/** Wrap a value in a success result */
export function ok<T>(data: T): Result<T> {
  return { success: true, data };
}

/** Wrap an error in a failure result */
export function err<T>(error: RegistryError): Result<T> {
  const details: ErrorDetails = error.details;
  return Object.keys(details).length > 0
    ? { success: false, error: error.message, code: error.code, details }
    : { success: false, error: error.message, code: error.code };
}

/**
 * Convert a thrown error into a failure result. Errors outside the registry
 * taxonomy are programming faults and are rethrown.
 */
export function fail<T>(error: unknown): Result<T> {
  const translated = translateSqliteError(error);
  if (translated instanceof RegistryError) {
    return err(translated);
  }
  throw translated;
}
