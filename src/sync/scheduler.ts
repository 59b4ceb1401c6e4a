// ---------------------------------------------------------------------------
// SyncScheduler
//
// Runs a pass for every schedulable directory on a fixed interval, and on
// demand. At most one pass per directory is in flight: a scheduled trigger
// that finds one running joins it, a manual trigger queues a single
// follow-up that every further manual trigger shares.
// ---------------------------------------------------------------------------

import type { Logger } from '../logger';
import type { SyncTrigger } from '../types';
import type { RunOptions, SyncOutcome } from './orchestrator';

export interface SyncRunner {
  runSync(directoryId: string, options?: RunOptions): Promise<SyncOutcome>;
}

export interface DirectorySource {
  listSchedulableDirectoryIds(): Promise<string[]>;
}

export interface SyncSchedulerOptions {
  intervalMs: number;
  logger: Logger;
}

export class SyncScheduler {
  private readonly inFlight = new Map<string, Promise<SyncOutcome>>();
  private readonly queued = new Map<string, Promise<SyncOutcome>>();
  private abort = new AbortController();
  private readonly logger: Logger;
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly runner: SyncRunner,
    private readonly directories: DirectorySource,
    private readonly options: SyncSchedulerOptions,
  ) {
    this.logger = options.logger.child({ component: 'SyncScheduler' });
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    if (this.abort.signal.aborted) this.abort = new AbortController();
    this.logger.info({ intervalMs: this.options.intervalMs }, 'Sync scheduler started');
    this.scheduleNext(0);
  }

  /** Stop ticking, cancel in-flight passes and wait for them to settle. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.abort.abort();
    await Promise.allSettled([...this.inFlight.values(), ...this.queued.values()]);
    this.logger.info('Sync scheduler stopped');
  }

  isRunning(directoryId: string): boolean {
    return this.inFlight.has(directoryId);
  }

  trigger(directoryId: string, trigger: SyncTrigger = 'manual'): Promise<SyncOutcome> {
    const current = this.inFlight.get(directoryId);
    if (!current) return this.launch(directoryId, trigger);

    // A scheduled tick has nothing to add to a pass already running
    if (trigger === 'schedule') return current;

    const queued = this.queued.get(directoryId);
    if (queued) return queued;

    const next = current
      .catch(() => undefined)
      .then(() => {
        this.queued.delete(directoryId);
        return this.launch(directoryId, trigger);
      });
    this.queued.set(directoryId, next);
    this.logger.debug({ directoryId }, 'Sync already running, follow-up queued');
    return next;
  }

  /** One scheduling round over every schedulable directory. */
  async tick(): Promise<void> {
    const ids = await this.directories.listSchedulableDirectoryIds();
    this.logger.debug({ directories: ids.length }, 'Scheduling sync round');

    const outcomes = await Promise.allSettled(ids.map((id) => this.trigger(id, 'schedule')));
    outcomes.forEach((outcome, i) => {
      if (outcome.status === 'rejected') {
        this.logger.error({ err: outcome.reason, directoryId: ids[i] }, 'Sync pass crashed');
      }
    });
  }

  private launch(directoryId: string, trigger: SyncTrigger): Promise<SyncOutcome> {
    const run = this.runner.runSync(directoryId, { trigger, signal: this.abort.signal }).finally(() => {
      if (this.inFlight.get(directoryId) === run) this.inFlight.delete(directoryId);
    });
    this.inFlight.set(directoryId, run);
    return run;
  }

  private scheduleNext(delayMs: number): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      void this.tick()
        .catch((err: unknown) => this.logger.error({ err }, 'Sync round failed'))
        .finally(() => this.scheduleNext(this.options.intervalMs));
    }, delayMs);
  }
}
