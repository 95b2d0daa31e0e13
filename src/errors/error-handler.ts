/**
 * REASON error handler
 *
 * Converts thrown values to user-facing messages.
 */

import { ReasonError, StorageError, ConfigurationError } from './reason-error.js';

export { ReasonError } from './reason-error.js';

export class ErrorHandler {
  /**
   * Convert any thrown value to a user-facing message.
   */
  static toUserMessage(err: unknown): string {
    if (err instanceof ConfigurationError) {
      return `Configuration problem: ${err.message}. Run \`reason config validate\` for details.`;
    }
    if (err instanceof StorageError) {
      const path = typeof err.context?.path === 'string' ? ` (${err.context.path})` : '';
      return `Storage failure${path}: ${err.message}`;
    }
    if (err instanceof ReasonError) {
      return `${err.message} (${err.code})`;
    }
    if (err instanceof Error) {
      return err.message;
    }
    return 'An unexpected error occurred.';
  }
}
