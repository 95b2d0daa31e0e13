/**
 * How a store reacts when a stored document exists but cannot be read.
 *
 * - `surface`: hand the caller `{ error: message }` and cache nothing.
 * - `substitute`: serve a placeholder as if the file were absent.
 */
export type ReadFailurePolicy = 'surface' | 'substitute';

export type ReadFailure = { error: string };

/**
 * Settle a failed read under `policy`. `substitute` runs only under the
 * `substitute` policy.
 */
export function settleReadFailure<T>(
  policy: ReadFailurePolicy,
  message: string,
  substitute: () => T
): T | ReadFailure {
  switch (policy) {
    case 'surface':
      return { error: message };
    case 'substitute':
      return substitute();
  }
}
