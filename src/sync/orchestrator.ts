// ---------------------------------------------------------------------------
// SyncOrchestrator: one reconciliation pass per call
//
//   load directory → token → remote snapshot → (in one transaction:
//   local state → plan → deletion check → write) → record outcome
//
// runSync never throws for a pass failure; the outcome says what happened
// and the directory row carries the operator-facing message.
// ---------------------------------------------------------------------------

import type { Logger } from '../logger';
import type { DirectoryProvider, ProviderFactory, ProviderOptions } from '../providers';
import { SyncError, TransportError, formatSyncError } from '../sync-errors';
import type { DirectoryRow, SyncTrigger } from '../types';
import { checkDeletionThreshold } from './circuit-breaker';
import { planSync } from './diff';
import type { SyncErrorReporter } from './error-reporter';
import { buildRemoteSnapshot } from './snapshot';
import type { SyncCounts, SyncStore } from './store';

export type SyncOutcome =
  | { status: 'succeeded'; directoryId: string; runId: string; counts: SyncCounts; durationMs: number }
  | { status: 'failed'; directoryId: string; runId: string; error: Error; message: string }
  | { status: 'skipped'; directoryId: string; reason: string };

export type VerifyOutcome = { verified: true } | { verified: false; message: string };

export interface RunOptions {
  trigger?: SyncTrigger;
  signal?: AbortSignal;
}

export interface SyncOrchestratorDeps {
  store: SyncStore;
  reporter: SyncErrorReporter;
  createProvider: ProviderFactory;
  /** Transport settings for every provider this orchestrator builds */
  provider: Omit<ProviderOptions, 'logger' | 'signal'>;
  logger: Logger;
  now?: () => Date;
  newId?: () => string;
}

export class SyncOrchestrator {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: SyncOrchestratorDeps) {
    this.logger = deps.logger.child({ component: 'SyncOrchestrator' });
    this.now = deps.now ?? (() => new Date());
  }

  async runSync(directoryId: string, options: RunOptions = {}): Promise<SyncOutcome> {
    const trigger = options.trigger ?? 'schedule';
    const log = this.logger.child({ directoryId, trigger });

    const target = await this.deps.store.loadSyncTarget(directoryId, trigger);
    if (!target.ok) {
      log.info({ reason: target.reason }, 'Skipping sync');
      return { status: 'skipped', directoryId, reason: target.reason };
    }
    const { directory } = target;

    const started = this.now();
    const passStart = started.toISOString();
    const runId = await this.deps.store.startRun(directory.id, trigger, passStart);
    log.info({ runId }, 'Sync started');

    try {
      const counts = await this.pass(directory, passStart, log, options.signal);
      const finished = this.now();
      await this.deps.reporter.recordSuccess(directory, passStart, finished);
      await this.deps.store.finishRun(runId, 'succeeded', finished.toISOString(), { counts });

      const durationMs = finished.getTime() - started.getTime();
      log.info({ runId, counts, durationMs }, 'Sync completed');
      return { status: 'succeeded', directoryId, runId, counts, durationMs };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      if (error instanceof SyncError && error.directoryId === null) error.directoryId = directory.id;

      const finished = this.now();
      const message = await this.deps.reporter.recordFailure(directory, error, finished);
      await this.deps.store.finishRun(runId, 'failed', finished.toISOString(), { errorMessage: message });

      log.error(
        {
          runId,
          err: error,
          step: error instanceof SyncError ? error.step : null,
          kind: error instanceof SyncError ? error.kind : null,
        },
        'Sync failed',
      );
      return { status: 'failed', directoryId, runId, error, message };
    }
  }

  /**
   * Check that the directory's credentials work and the API service app can
   * see apps, users and groups. Marks the directory verified on success.
   */
  async verifyDirectory(directoryId: string, signal?: AbortSignal): Promise<VerifyOutcome> {
    const directory = await this.deps.store.getDirectory(directoryId);
    if (!directory) return { verified: false, message: 'Directory not found.' };

    try {
      const provider = this.providerFor(directory, this.logger, signal);
      const token = await step('get_access_token', () => provider.fetchToken());
      await step('verify', () => provider.verifyConnection(token));
    } catch (err) {
      const message = formatSyncError(err);
      this.logger.warn({ directoryId, err }, 'Directory verification failed');
      return { verified: false, message };
    }

    await this.deps.store.updateDirectory(directory.id, {
      is_verified: true,
      updated_at: this.now().toISOString(),
    });
    return { verified: true };
  }

  private async pass(
    directory: DirectoryRow,
    passStart: string,
    log: Logger,
    signal: AbortSignal | undefined,
  ): Promise<SyncCounts> {
    const provider = this.providerFor(directory, log, signal);
    const token = await step('get_access_token', () => provider.fetchToken());
    const snapshot = await buildRemoteSnapshot(provider, token, log);

    // A pass cancelled while reading commits nothing
    if (signal?.aborted) throw TransportError.from(signal.reason);

    const { counts } = await this.deps.store.commit(directory, (local) => {
      const plan = planSync(snapshot, local, passStart, this.deps.newId);
      checkDeletionThreshold(plan, { firstSync: directory.synced_at === null }, log);
      return plan;
    });
    return counts;
  }

  private providerFor(directory: DirectoryRow, logger: Logger, signal: AbortSignal | undefined): DirectoryProvider {
    return this.deps.createProvider(directory, { ...this.deps.provider, logger, signal });
  }
}

async function step<T>(name: 'get_access_token' | 'verify', fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw err instanceof SyncError ? err.at(name) : err;
  }
}
