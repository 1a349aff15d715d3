import type { Logger } from 'pino';
import type { Database } from './client.js';
import { upsertAlert, insertAlertHistory } from './alert-repository.js';
import type { AlertChange } from '../../domain/alert.js';

export interface AlertRecorder {
  /** Queues the change for persistence. Never throws. */
  record(change: AlertChange): void;
  /** Resolves once every queued change has been written or logged as failed. */
  drain(): Promise<void>;
}

/**
 * Persists alert lifecycle changes in the order they happened.
 *
 * Writes are chained so an older upsert never lands after a newer one.
 * Failures are logged and skipped; alert handling never waits on Postgres.
 */
export function createAlertRecorder(db: Database, log: Logger): AlertRecorder {
  let chain: Promise<void> = Promise.resolve();

  const write = async (change: AlertChange): Promise<void> => {
    try {
      await upsertAlert(db, change.alert);
      await insertAlertHistory(db, change);
    } catch (err: unknown) {
      log.error({ err, alert_id: change.alert.id, action: change.action }, 'Failed to persist alert change');
    }
  };

  return {
    record(change) {
      chain = chain.then(() => write(change));
    },
    drain() {
      return chain;
    },
  };
}
