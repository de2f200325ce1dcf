import { PGlite } from '@electric-sql/pglite';
import { drizzle, type PgliteDatabase, type PgliteQueryResultHKT } from 'drizzle-orm/pglite';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import { mkdirSync, readFileSync } from 'fs';
import * as schema from '../db/schema.js';
import { getConfig } from './config/app.js';

export type Db = PgliteDatabase<typeof schema>;

/** Either the connection or a transaction opened on it. */
export type Executor = PgDatabase<PgliteQueryResultHKT, typeof schema>;

const SCHEMA_SQL = new URL('../db/schema.sql', import.meta.url);

const UNIQUE_VIOLATION = '23505';

/** `:memory:` keeps the database in memory; anything else names a data directory. */
function toDataDir(databaseUrl: string): string | undefined {
  if (databaseUrl === ':memory:' || databaseUrl === 'memory://') return undefined;
  return databaseUrl.startsWith('file:') ? databaseUrl.slice('file:'.length) : databaseUrl;
}

export async function openDatabase(databaseUrl: string): Promise<{ client: PGlite; db: Db }> {
  const dataDir = toDataDir(databaseUrl);
  if (dataDir !== undefined) {
    mkdirSync(dataDir, { recursive: true });
  }

  const client = new PGlite(dataDir);
  await client.exec(readFileSync(SCHEMA_SQL, 'utf8'));

  return { client, db: drizzle(client, { schema }) };
}

const connection = await openDatabase(getConfig().databaseUrl);

export const client: PGlite = connection.client;
export const db: Db = connection.db;

/** First row of a result, for queries that match at most one. */
export function first<T>(rows: T[]): T | undefined {
  return rows[0];
}

let writeQueue: Promise<unknown> = Promise.resolve();

/**
 * Run `fn` in a write transaction. Write transactions are queued so two
 * requests editing the same assignment lineage never interleave.
 * Inside `fn` every query must go through `tx`: the connection is held
 * by the transaction until it settles.
 */
export function writeTransaction<T>(fn: (tx: Executor) => Promise<T>): Promise<T> {
  const run = writeQueue.then(() => db.transaction((tx) => fn(tx)));
  writeQueue = run.catch(() => undefined);
  return run;
}

function errorCode(error: unknown): unknown {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return error.code;
}

/** True when `error` (or the error it wraps) is a Postgres unique violation. */
export function isUniqueViolation(error: unknown): boolean {
  if (errorCode(error) === UNIQUE_VIOLATION) return true;
  return error instanceof Error && errorCode(error.cause) === UNIQUE_VIOLATION;
}
