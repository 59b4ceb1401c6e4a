import type { Logger } from '../logger';
import { CircuitBreakerError } from '../sync-errors';
import type { SyncPlan } from './diff';

/** Deleting more than this share of an entity type aborts the pass */
export const DELETION_THRESHOLD = 0.9;

/** Below this many local rows the ratio is too noisy to judge */
export const MIN_RECORDS_FOR_CHECK = 10;

export type DeletionDecision =
  | { action: 'skip'; reason: 'first_sync' | 'too_few_records' | 'nothing_to_delete' }
  | { action: 'allow'; ratio: number }
  | { action: 'block'; ratio: number };

export interface DeletionCheckOptions {
  firstSync: boolean;
  threshold?: number;
  minRecords?: number;
}

export function evaluateDeletion(
  total: number,
  toDelete: number,
  { firstSync, threshold = DELETION_THRESHOLD, minRecords = MIN_RECORDS_FOR_CHECK }: DeletionCheckOptions,
): DeletionDecision {
  if (firstSync) return { action: 'skip', reason: 'first_sync' };
  if (total < minRecords) return { action: 'skip', reason: 'too_few_records' };
  if (toDelete === 0) return { action: 'skip', reason: 'nothing_to_delete' };

  const ratio = toDelete / total;
  return ratio > threshold ? { action: 'block', ratio } : { action: 'allow', ratio };
}

/**
 * Throw when the plan would wipe out most of any entity type. A provider that
 * suddenly returns nothing (app unassigned, scopes revoked) looks exactly like
 * a mass deletion.
 */
export function checkDeletionThreshold(plan: SyncPlan, options: DeletionCheckOptions, logger: Logger): void {
  const entities = [
    ['identities', plan.identities.total, plan.identities.delete.length],
    ['groups', plan.groups.total, plan.groups.delete.length],
    ['memberships', plan.memberships.total, plan.memberships.delete.length],
  ] as const;

  for (const [entity, total, toDelete] of entities) {
    const decision = evaluateDeletion(total, toDelete, options);
    if (decision.action === 'block') {
      logger.warn({ entity, total, toDelete, ratio: decision.ratio }, 'Deletion threshold exceeded');
      throw new CircuitBreakerError(entity, total, toDelete, decision.ratio).at('check_deletion_threshold');
    }
    if (decision.action === 'allow') {
      logger.debug({ entity, total, toDelete, ratio: decision.ratio }, 'Deletion threshold check passed');
    }
  }
}
