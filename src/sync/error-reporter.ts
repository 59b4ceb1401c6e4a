import type { Logger } from '../logger';
import { classifyFailure, formatSyncError } from '../sync-errors';
import type { DirectoryRow } from '../types';
import { SYNC_ERROR_DISABLED_REASON, type DirectoryPatch, type SyncStore } from './store';

const EMAIL_PATTERN = /[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/i;

const HOUR_MS = 60 * 60 * 1000;

export interface ErrorReporterOptions {
  /** Disable directories on client errors and on transient errors that persist */
  autoDisable: boolean;
  /** How long a transient failure streak may last before the directory is disabled */
  disableAfterHours?: number;
  logger: Logger;
}

export function mentionsEmail(message: string): boolean {
  return EMAIL_PATTERN.test(message);
}

/**
 * Writes the outcome of a pass onto the directory row: the operator-facing
 * error fields on failure, and their reset on success.
 */
export class SyncErrorReporter {
  private readonly disableAfterMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly store: Pick<SyncStore, 'updateDirectory'>,
    private readonly options: ErrorReporterOptions,
  ) {
    this.disableAfterMs = (options.disableAfterHours ?? 24) * HOUR_MS;
    this.logger = options.logger.child({ component: 'SyncErrorReporter' });
  }

  /** Record a failed pass. Returns the stored message. `synced_at` is left alone. */
  async recordFailure(directory: DirectoryRow, err: unknown, at: Date): Promise<string> {
    const message = formatSyncError(err);
    const failureClass = classifyFailure(err);
    const now = at.toISOString();
    // Transient failures keep the first errored_at of the streak; client errors stamp now
    const erroredAt = failureClass === 'transient' ? directory.errored_at ?? now : now;

    const patch: DirectoryPatch = {
      error_message: message,
      errored_at: erroredAt,
      error_email_count: directory.error_email_count + (mentionsEmail(message) ? 1 : 0),
      updated_at: now,
    };

    if (this.options.autoDisable && !Boolean(directory.is_disabled)) {
      const streakMs = at.getTime() - Date.parse(erroredAt);
      if (failureClass === 'client_error' || streakMs >= this.disableAfterMs) {
        patch.is_disabled = true;
        patch.disabled_reason = SYNC_ERROR_DISABLED_REASON;
        patch.is_verified = false;
        this.logger.warn(
          { directoryId: directory.id, failureClass, erroredAt },
          'Directory disabled after sync failure',
        );
      }
    }

    await this.store.updateDirectory(directory.id, patch);
    return message;
  }

  /** Record a successful pass that started at `passStart`. */
  async recordSuccess(directory: DirectoryRow, passStart: string, at: Date): Promise<void> {
    const patch: DirectoryPatch = {
      synced_at: passStart,
      error_message: null,
      errored_at: null,
      error_email_count: 0,
      updated_at: at.toISOString(),
    };
    if (Boolean(directory.is_disabled) && directory.disabled_reason === SYNC_ERROR_DISABLED_REASON) {
      patch.is_disabled = false;
      patch.disabled_reason = null;
      this.logger.info({ directoryId: directory.id }, 'Directory re-enabled after successful sync');
    }
    await this.store.updateDirectory(directory.id, patch);
  }
}
