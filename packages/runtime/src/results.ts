// Typed results for callers that prefer values over exceptions

import { StoreError } from './errors.js';

export type StoreResult<T> =
  | { success: true; data: T }
  | { success: false; error: StoreError };

/**
 * Await a store operation and report its outcome as a StoreResult.
 *
 * Only StoreErrors become failure results; any other error is a bug or an
 * unexpected infrastructure failure and is rethrown.
 *
 * @example
 * ```ts
 * const result = await settle(store.update(id, 3, { title: 'Lead' }, ambient));
 * if (!result.success && result.error.code === 'VERSION_CONFLICT') {
 *   // re-fetch and retry
 * }
 * ```
 */
export async function settle<T>(operation: Promise<T>): Promise<StoreResult<T>> {
  try {
    return { success: true, data: await operation };
  } catch (error) {
    if (error instanceof StoreError) {
      return { success: false, error };
    }
    throw error;
  }
}
