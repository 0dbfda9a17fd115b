import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { resolveRegistryDbPath } from '../storage-paths';

export type Connection = Database.Database;

function applyPragmas(connection: Connection): void {
  connection.pragma('journal_mode = WAL');
  connection.pragma('busy_timeout = 5000');
  connection.pragma('foreign_keys = ON');
  connection.pragma('synchronous = NORMAL');
}

export function openDatabase(dbPath: string = resolveRegistryDbPath()): Connection {
  mkdirSync(dirname(dbPath), { recursive: true });
  const connection = new Database(dbPath);
  applyPragmas(connection);
  return connection;
}

export let db = openDatabase();

export function closeDbConnection(): void {
  db.close();
}

export function reopenDbConnection(): void {
  db = openDatabase();
}

// Transaction helpers
export function transaction<T>(fn: () => T): T {
  return db.transaction(fn)();
}

/** Takes the write lock up front (BEGIN IMMEDIATE). */
export function immediateTransaction<T>(fn: () => T): T {
  return db.transaction(fn).immediate();
}

// UUID helper - random UUID v4 as hex string (no dashes)
export function generateId(): string {
  return randomUUID().replace(/-/g, '');
}

// Timestamp helper
export function now(): string {
  return new Date().toISOString();
}
