import { queryAll, placeholders } from '../repos/base';
import { InternalConsistencyError } from '../domain/types';

/**
 * Read-side composition of nested record views.
 *
 * A relation descriptor says how one collection hangs off a base table:
 * base -> join table -> related table, plus the columns to project. The
 * engine runs one LEFT JOIN per descriptor for a batch of base ids and
 * groups the rows per base id. A base id with no join rows gets [].
 */

export type SqlValue = string | number | bigint | Buffer | null;
export type ProjectionRow = Record<string, SqlValue>;

export interface RelationDescriptor<T> {
  /** Collection name, used in fault messages. */
  collection: string;
  joinTable: string;
  /** Join table column holding the base id. */
  joinBaseColumn: string;
  /** Join table column holding the related id. */
  joinRelatedColumn: string;
  relatedTable: string;
  /** Output alias -> SQL expression over `j` (join row) and `r` (related row). */
  columns: Record<string, string>;
  /** ORDER BY within one base id. Defaults to the related key. */
  orderBy?: string;
  project: (row: ProjectionRow) => T;
}

export interface BaseTable {
  table: string;
  idColumn: string;
}

/** Per-base-id collection lookup. Unknown ids yield []. */
export interface RelationIndex<T> {
  get(baseId: string): T[];
}

function buildQuery<T>(base: BaseTable, descriptor: RelationDescriptor<T>, idCount: number): string {
  const projected = Object.entries(descriptor.columns)
    .map(([alias, expression]) => `${expression} AS ${alias}`);
  const select = [
    `b.${base.idColumn} AS base_id`,
    `j.${descriptor.joinRelatedColumn} AS link_key`,
    'r.id AS related_key',
    ...projected,
  ].join(', ');

  return `SELECT ${select}
    FROM ${base.table} b
    LEFT JOIN ${descriptor.joinTable} j ON j.${descriptor.joinBaseColumn} = b.${base.idColumn}
    LEFT JOIN ${descriptor.relatedTable} r ON r.id = j.${descriptor.joinRelatedColumn}
    WHERE b.${base.idColumn} IN (${placeholders(idCount)})
    ORDER BY b.${base.idColumn}, ${descriptor.orderBy ?? 'related_key'}`;
}

/**
 * Collect one relation for a batch of base ids. Related rows are
 * deduplicated by their key; a join row pointing at a missing related row
 * raises InternalConsistencyError.
 */
export function collectRelation<T>(
  base: BaseTable,
  baseIds: readonly string[],
  descriptor: RelationDescriptor<T>
): RelationIndex<T> {
  const grouped = new Map<string, T[]>();
  if (baseIds.length === 0) {
    return { get: () => [] };
  }

  const rows = queryAll<ProjectionRow>(buildQuery(base, descriptor, baseIds.length), [...baseIds]);
  const seen = new Map<string, Set<string>>();

  for (const row of rows) {
    const baseId = String(row.base_id);
    const items = grouped.get(baseId) ?? [];
    grouped.set(baseId, items);

    const linkKey = row.link_key ?? null;
    if (linkKey === null) continue;

    const relatedKey = row.related_key ?? null;
    if (relatedKey === null) {
      throw new InternalConsistencyError(
        `${descriptor.collection}: ${descriptor.joinTable}.${descriptor.joinRelatedColumn} references missing ${descriptor.relatedTable} row ${String(linkKey)}`,
        { collection: descriptor.collection, baseId, relatedId: String(linkKey) }
      );
    }

    const keys = seen.get(baseId) ?? new Set<string>();
    seen.set(baseId, keys);
    const key = String(relatedKey);
    if (keys.has(key)) continue;
    keys.add(key);
    items.push(descriptor.project(row));
  }

  return { get: (baseId: string) => grouped.get(baseId) ?? [] };
}

// --- Projection readers ---

function fault(column: string, expected: string): InternalConsistencyError {
  return new InternalConsistencyError(`Projected column ${column} is not ${expected}`, { column });
}

export function readText(row: ProjectionRow, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw fault(column, 'text');
  }
  return value;
}

export function readOptionalText(row: ProjectionRow, column: string): string | undefined {
  const value = row[column];
  if (value === null || value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw fault(column, 'text');
  }
  return value;
}

export function readBoolean(row: ProjectionRow, column: string): boolean {
  const value = row[column];
  if (typeof value !== 'number') {
    throw fault(column, 'a 0/1 flag');
  }
  return value === 1;
}
