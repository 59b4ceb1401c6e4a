// ---------------------------------------------------------------------------
// API key authentication plugin
//
// Admin routes accept the key either as `Authorization: Bearer <key>` or as
// the password of HTTP Basic credentials (the username is ignored), so curl
// and browser tooling both work.
//
// Decorates the FastifyInstance with an `authenticate` hook that routes
// attach via:  server.addHook('onRequest', server.authenticate)
// ---------------------------------------------------------------------------

import { timingSafeEqual } from 'crypto';
import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';

declare module 'fastify' {
  interface FastifyInstance {
    authenticate: (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | void>;
  }
}

export interface AuthPluginOptions {
  apiKey: string;
}

/** The presented key, or null when the header carries neither scheme. */
export function presentedKey(authHeader: string | undefined): string | null {
  if (!authHeader) return null;

  if (authHeader.startsWith('Bearer ')) return authHeader.slice(7).trim();

  if (authHeader.startsWith('Basic ')) {
    const decoded = Buffer.from(authHeader.slice(6), 'base64').toString('utf8');
    // username:password, split on the first colon only
    const colonIndex = decoded.indexOf(':');
    return colonIndex === -1 ? decoded : decoded.slice(colonIndex + 1);
  }

  return null;
}

function keysMatch(presented: string, expected: string): boolean {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

async function authPlugin(server: FastifyInstance, opts: AuthPluginOptions): Promise<void> {
  server.decorate(
    'authenticate',
    async (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> => {
      const key = presentedKey(request.headers['authorization']);

      if (key === null) {
        return reply
          .status(401)
          .header('WWW-Authenticate', 'Bearer realm="directory-sync"')
          .send({ error: 'unauthorized', message: 'Authorization header with a Bearer or Basic API key is required.' });
      }

      if (!keysMatch(key, opts.apiKey)) {
        return reply
          .status(401)
          .header('WWW-Authenticate', 'Bearer realm="directory-sync"')
          .send({ error: 'unauthorized', message: 'Invalid credentials.' });
      }
    },
  );
}

export default fp(authPlugin, { name: 'auth' });
