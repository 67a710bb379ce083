import knex, { type Knex } from 'knex';
import pg from 'pg';
import { logger } from '../utils/logger.js';

// OIDs from pg_type
const PG_DATE = 1082;
const PG_TIMESTAMP = 1114;
const PG_NUMERIC = 1700;

export interface DbOptions {
  url: string;
  poolMin: number;
  poolMax: number;
}

/**
 * Registers the type parsers this app relies on: calendar dates and local
 * timestamps stay as the strings Postgres sends (no timezone shifting through
 * `Date`), and NUMERIC money columns come back as numbers.
 */
export function registerTypeParsers(): void {
  pg.types.setTypeParser(PG_DATE, (value: string) => value);
  pg.types.setTypeParser(PG_TIMESTAMP, (value: string) => value);
  pg.types.setTypeParser(PG_NUMERIC, (value: string) => parseFloat(value));
}

export function createDb(options: DbOptions): Knex {
  registerTypeParsers();

  const db = knex({
    client: 'pg',
    connection: options.url,
    pool: { min: options.poolMin, max: options.poolMax },
  });

  logger.info(
    { poolMin: options.poolMin, poolMax: options.poolMax },
    'Database connection pool created',
  );

  return db;
}
