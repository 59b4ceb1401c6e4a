// ---------------------------------------------------------------------------
// Fastify application
//
// Built from already-wired collaborators so tests can drive it with
// server.inject() and no listening socket.
// ---------------------------------------------------------------------------

import Fastify, { FastifyInstance, FastifyServerOptions } from 'fastify';
import authPlugin from './plugins/auth';
import { directoryRoutes, type DirectoryRoutesOptions } from './routes/directories';

export interface AppDeps extends DirectoryRoutesOptions {
  apiKey: string;
  /** Passed straight to Fastify; `false` silences request logging */
  logger: FastifyServerOptions['logger'];
  https?: { key: Buffer; cert: Buffer } | null;
}

export async function buildServer(deps: AppDeps): Promise<FastifyInstance> {
  const server = Fastify({
    logger: deps.logger,
    ...(deps.https ? { https: deps.https } : {}),
  });

  // Anything a handler throws becomes a JSON 500 without internals
  server.setErrorHandler(async (err, request, reply) => {
    if (err.statusCode !== undefined && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: 'bad_request', message: err.message });
    }
    request.log.error({ err }, 'Request failed');
    return reply.status(500).send({ error: 'internal_error', message: 'Internal server error' });
  });

  // ── Plugins ───────────────────────────────────────────────────────────────
  await server.register(authPlugin, { apiKey: deps.apiKey });

  // ── Authenticated admin routes ────────────────────────────────────────────
  await server.register(directoryRoutes, {
    prefix: '/directories',
    store: deps.store,
    orchestrator: deps.orchestrator,
    scheduler: deps.scheduler,
  });

  // Health check, unauthenticated
  server.get('/health', async (_request, reply) => {
    return reply.status(200).send({ status: 'ok', service: 'directory-sync' });
  });

  return server;
}
