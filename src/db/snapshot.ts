import { SnapshotName, SnapshotStore } from './database';
import { ScopedLogger } from '../utils/logger';
import { errorMessage } from '../types/errors';

/**
 * Write a snapshot without letting a storage failure reach the caller.
 * Returns whether the write succeeded.
 */
export function persistSnapshot(
  store: SnapshotStore | null,
  name: SnapshotName,
  document: unknown,
  log: ScopedLogger
): boolean {
  if (!store) {
    return false;
  }

  try {
    store.writeSnapshot(name, document);
    log.debug(`Persisted snapshot ${name}`);
    return true;
  } catch (error) {
    log.error(`Failed to persist snapshot ${name}: ${errorMessage(error)}`);
    return false;
  }
}

/**
 * Read a snapshot, treating an unreadable one as absent
 */
export function loadSnapshot<T>(
  store: SnapshotStore | null,
  name: SnapshotName,
  log: ScopedLogger
): T | null {
  if (!store) {
    return null;
  }

  try {
    return store.readSnapshot<T>(name);
  } catch (error) {
    log.error(`Failed to load snapshot ${name}, starting empty: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Revive an ISO date string, rejecting anything that does not parse
 */
export function reviveDate(value: unknown): Date | null {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * JSON shape of a value after Date fields have been written as ISO strings
 */
export type Serialized<T> = {
  [K in keyof T]: T[K] extends Date
    ? string
    : T[K] extends Date | undefined
      ? string | undefined
      : T[K] extends readonly (infer U)[]
        ? Serialized<U>[]
        : T[K] extends object
          ? Serialized<T[K]>
          : T[K];
};
