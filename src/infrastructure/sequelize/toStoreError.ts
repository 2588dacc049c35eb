import { ConnectionError, TimeoutError } from 'sequelize';
import { StoreError } from '../../domain/errors/StoreError.js';

/**
 * Classify a Sequelize failure. Lost connections and lock/statement timeouts
 * are transient; constraint, syntax and mapping errors are not.
 */
export function toStoreError(operation: string, error: unknown): StoreError {
  if (error instanceof StoreError) return error;
  const transient = error instanceof ConnectionError || error instanceof TimeoutError;
  const message = error instanceof Error ? error.message : String(error);
  return new StoreError(`${operation} failed: ${message}`, { transient, cause: error });
}
