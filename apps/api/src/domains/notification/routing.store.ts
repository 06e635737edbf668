import { type Database } from '../../lib/db.js';
import { AppError, StorageUnavailableError } from '../../lib/errors.js';
import {
  createNotificationRepository,
  type NotificationRepository,
} from './notification.repository.js';
import { createDedupRepository, type DedupRepository } from './dedup.repository.js';

export interface RoutingRepositories {
  notifications: NotificationRepository;
  dedup: DedupRepository;
}

export interface RoutingStore extends RoutingRepositories {
  /** Runs `fn` in one database transaction; a thrown error rolls it back. */
  transaction<T>(fn: (repos: RoutingRepositories) => Promise<T>): Promise<T>;
}

function bindRepositories(db: Database): RoutingRepositories {
  return {
    notifications: createNotificationRepository(db),
    dedup: createDedupRepository(db),
  };
}

export function createRoutingStore(db: Database): RoutingStore {
  return {
    ...bindRepositories(db),
    transaction<T>(fn: (repos: RoutingRepositories) => Promise<T>): Promise<T> {
      return db.transaction((tx) => fn(bindRepositories(tx)));
    },
  };
}

/**
 * Runs storage work, re-raising driver and connection failures as
 * StorageUnavailableError. AppErrors pass through unchanged.
 */
export async function withStorage<T>(
  operation: string,
  work: () => Promise<T>,
): Promise<T> {
  try {
    return await work();
  } catch (err: unknown) {
    if (err instanceof AppError) throw err;
    throw new StorageUnavailableError(operation, err);
  }
}
