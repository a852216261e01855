import { timingSafeEqual } from 'node:crypto';
import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { authenticateApiKey } from '../../application/index.js';
import { AuthenticationError } from '../../domain/index.js';
import type { Tenant } from '../../domain/index.js';
import { errorResponse } from './response.js';

export interface AuthPluginOptions {
  /** Shared secret for the admin routes. Empty disables them. */
  adminToken: string;
}

type AuthHook = (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | void>;

function tokensMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

function headerValue(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/** The tenant resolved by `requireTenant`. */
export function tenantOf(request: FastifyRequest): Tenant {
  if (request.tenant === null) {
    throw new AuthenticationError('Missing X-API-Key header');
  }
  return request.tenant;
}

/**
 * Authentication pre-handlers.
 *
 * `requireTenant` resolves `X-API-Key` to an active tenant and sets
 * `request.tenant`. `requireAdmin` checks `X-Admin-Token` in constant time.
 */
async function authPlugin(fastify: FastifyInstance, options: AuthPluginOptions): Promise<void> {
  fastify.decorateRequest('tenant', null);

  const requireTenant: AuthHook = async (request) => {
    const apiKey = headerValue(request, 'x-api-key');
    if (apiKey === undefined) {
      throw new AuthenticationError('Missing X-API-Key header');
    }
    request.tenant = await authenticateApiKey(fastify.outbox, apiKey);
  };

  const requireAdmin: AuthHook = async (request, reply) => {
    if (options.adminToken.length === 0) {
      return reply.status(503).send(errorResponse(503, 'Admin API is disabled'));
    }
    const token = headerValue(request, 'x-admin-token');
    if (token === undefined || !tokensMatch(token, options.adminToken)) {
      request.log.warn('Admin request rejected');
      throw new AuthenticationError('Invalid admin token');
    }
  };

  fastify.decorate('requireTenant', requireTenant);
  fastify.decorate('requireAdmin', requireAdmin);
}

export default fp(authPlugin, {
  name: 'auth',
  dependencies: ['outbox'],
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyRequest {
    tenant: Tenant | null;
  }
  interface FastifyInstance {
    requireTenant: AuthHook;
    requireAdmin: AuthHook;
  }
}
