// ---------------------------------------------------------------------------
// Directory admin endpoints
//
//   GET  /directories/:id          sync health for one directory
//   POST /directories/:id/sync     trigger a pass (202; ?wait=true blocks)
//   POST /directories/:id/verify   test credentials and API access
//   GET  /directories/:id/runs     recent passes, newest first
//
// Directories are created and deleted by the host application; this service
// only reads them and writes sync outcomes.
// ---------------------------------------------------------------------------

import { FastifyInstance, FastifyReply } from 'fastify';
import type { SyncOrchestrator, SyncOutcome } from '../sync/orchestrator';
import type { SyncScheduler } from '../sync/scheduler';
import type { SyncStore } from '../sync/store';
import type { DirectoryRow } from '../types';

export interface DirectoryRoutesOptions {
  store: SyncStore;
  orchestrator: Pick<SyncOrchestrator, 'verifyDirectory'>;
  scheduler: Pick<SyncScheduler, 'trigger' | 'isRunning'>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Directory fields safe to expose; credentials stay behind. */
export function directoryView(row: DirectoryRow, syncing: boolean) {
  return {
    id: row.id,
    accountId: row.account_id,
    provider: row.provider,
    name: row.name,
    oktaDomain: row.okta_domain,
    clientId: row.client_id,
    syncedAt: row.synced_at,
    erroredAt: row.errored_at,
    errorMessage: row.error_message,
    errorEmailCount: row.error_email_count,
    isDisabled: Boolean(row.is_disabled),
    disabledReason: row.disabled_reason,
    isVerified: Boolean(row.is_verified),
    syncing,
  };
}

export function outcomeView(outcome: SyncOutcome) {
  switch (outcome.status) {
    case 'succeeded':
      return {
        status: outcome.status,
        runId: outcome.runId,
        counts: outcome.counts,
        durationMs: outcome.durationMs,
      };
    case 'failed':
      return { status: outcome.status, runId: outcome.runId, message: outcome.message };
    case 'skipped':
      return { status: outcome.status, reason: outcome.reason };
  }
}

function notFound(reply: FastifyReply, id: string) {
  return reply.status(404).send({ error: 'not_found', message: `Directory ${id} not found.` });
}

// ---------------------------------------------------------------------------

export async function directoryRoutes(server: FastifyInstance, opts: DirectoryRoutesOptions): Promise<void> {
  const { store, orchestrator, scheduler } = opts;

  server.addHook('onRequest', server.authenticate);

  // ──────────────────────────────────────────────────────────────────────────
  // GET /directories/:id
  // ──────────────────────────────────────────────────────────────────────────

  server.get<{ Params: { id: string } }>('/:id', async (request, reply) => {
    const { id } = request.params;
    const row = await store.getDirectory(id);
    if (!row) return notFound(reply, id);
    return reply.status(200).send(directoryView(row, scheduler.isRunning(id)));
  });

  // ──────────────────────────────────────────────────────────────────────────
  // POST /directories/:id/sync
  // ──────────────────────────────────────────────────────────────────────────

  server.post<{ Params: { id: string }; Querystring: { wait?: string } }>('/:id/sync', async (request, reply) => {
    const { id } = request.params;
    const row = await store.getDirectory(id);
    if (!row) return notFound(reply, id);

    const pass = scheduler.trigger(id, 'manual');

    if (request.query.wait === 'true') {
      const outcome = await pass;
      return reply.status(200).send(outcomeView(outcome));
    }

    void pass.catch((err: unknown) => server.log.error({ err, directoryId: id }, 'Manual sync crashed'));
    return reply.status(202).send({ status: 'queued', directoryId: id });
  });

  // ──────────────────────────────────────────────────────────────────────────
  // POST /directories/:id/verify
  // ──────────────────────────────────────────────────────────────────────────

  server.post<{ Params: { id: string } }>('/:id/verify', async (request, reply) => {
    const { id } = request.params;
    const row = await store.getDirectory(id);
    if (!row) return notFound(reply, id);

    const result = await orchestrator.verifyDirectory(id);
    if (result.verified) return reply.status(200).send({ verified: true });
    return reply.status(422).send({ verified: false, message: result.message });
  });

  // ──────────────────────────────────────────────────────────────────────────
  // GET /directories/:id/runs
  // ──────────────────────────────────────────────────────────────────────────

  server.get<{ Params: { id: string }; Querystring: { limit?: string } }>('/:id/runs', async (request, reply) => {
    const { id } = request.params;
    const row = await store.getDirectory(id);
    if (!row) return notFound(reply, id);

    const parsed = parseInt(request.query.limit ?? '20', 10);
    const limit = Number.isNaN(parsed) ? 20 : Math.min(Math.max(parsed, 1), 100);
    const runs = await store.listRuns(id, limit);
    return reply.status(200).send({ runs });
  });
}
