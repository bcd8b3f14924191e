import { EntityManager, FindOneOptions } from 'typeorm';

/**
 * Row lock for read-modify-write of one aggregate. SQLite has no row locks
 * and serialises writers on its own, so the option is only set on postgres.
 */
export function writeLock<T>(manager: EntityManager): Pick<FindOneOptions<T>, 'lock'> {
  return manager.connection.options.type === 'postgres'
    ? { lock: { mode: 'pessimistic_write' } }
    : {};
}
