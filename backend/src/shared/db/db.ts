/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - Table types live in ./schema.ts and must follow the migrations.
 *
 * DATES:
 * - `date` columns (payment intervals) are returned as raw `YYYY-MM-DD` strings.
 *   The default pg parser turns them into local-midnight Date objects, which
 *   shift by a day depending on the server timezone.
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { DB } from './schema';

const PG_DATE_OID = 1082;

pg.types.setTypeParser(PG_DATE_OID, (value: string) => value);

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * Works for both the main DB and a transaction (`trx`).
 */
export type DbExecutor = Kysely<DB>;

export function createDb(databaseUrl: string): Db {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
  });
}
