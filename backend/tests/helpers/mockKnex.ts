import { jest } from '@jest/globals';
import type { Knex } from 'knex';

const BUILDER_METHODS = [
  'where',
  'whereNotNull',
  'whereBetween',
  'whereILike',
  'orWhereILike',
  'orWhereRaw',
  'join',
  'groupBy',
  'orderBy',
  'orderByRaw',
  'limit',
  'select',
  'first',
  'forUpdate',
  'count',
  'avg',
  'insert',
  'update',
  'returning',
] as const;

type BuilderMethod = (typeof BUILDER_METHODS)[number];

export type MockQueryBuilder = Record<BuilderMethod, jest.Mock> & {
  then<T1 = unknown, T2 = never>(
    onfulfilled?: ((value: unknown) => T1 | PromiseLike<T1>) | null,
    onrejected?: ((reason: unknown) => T2 | PromiseLike<T2>) | null,
  ): Promise<T1 | T2>;
};

/**
 * Knex stand-in for service tests.
 *
 * Every chain method returns the same builder, and awaiting the builder
 * resolves the next value queued with `enqueue` (an `Error` rejects instead).
 * `db` and `trx` share the builder and the queue, so results are consumed in
 * the order the service awaits its queries.
 */
export function createMockKnex() {
  const results: unknown[] = [];

  const builder = {
    then<T1 = unknown, T2 = never>(
      onfulfilled?: ((value: unknown) => T1 | PromiseLike<T1>) | null,
      onrejected?: ((reason: unknown) => T2 | PromiseLike<T2>) | null,
    ): Promise<T1 | T2> {
      const next = results.shift();
      const settled = next instanceof Error ? Promise.reject(next) : Promise.resolve(next);
      return settled.then(onfulfilled, onrejected);
    },
  } as MockQueryBuilder;

  for (const method of BUILDER_METHODS) {
    builder[method] = jest.fn().mockReturnValue(builder);
  }

  const trx = Object.assign(jest.fn().mockReturnValue(builder), {
    commit: jest.fn<() => Promise<void>>().mockResolvedValue(undefined),
    rollback: jest.fn<() => Promise<void>>().mockResolvedValue(undefined),
  });

  const db = Object.assign(jest.fn().mockReturnValue(builder), {
    raw: jest.fn((sql: string) => sql),
    transaction: jest.fn<() => Promise<typeof trx>>().mockResolvedValue(trx),
    fn: { now: jest.fn().mockReturnValue('NOW()') },
  });

  function enqueue(...values: unknown[]): void {
    results.push(...values);
  }

  return {
    db,
    trx,
    builder,
    enqueue,
    pending: () => results.length,
    knex: db as unknown as Knex,
  };
}

export type MockKnex = ReturnType<typeof createMockKnex>;

/** 2026-03-15 10:30:00 in Africa/Nairobi (UTC+3). */
export const FIXED_NOW = new Date('2026-03-15T07:30:00.000Z');
export const TIMEZONE = 'Africa/Nairobi';
export const fixedClock = () => FIXED_NOW;
