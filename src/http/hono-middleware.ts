/**
 * hono-middleware.ts
 * Wires the adapter into a hono app.
 *
 * Usage:
 *   const app = new Hono<InertiaEnv>();
 *   app.use('*', inertia({ version: '42', registry }));
 *   app.get('/users', (c) => toResponse(c.var.inertia.render('Users/Index', { users })));
 *
 * Every request gets its own Inertia instance; the registry is only read.
 */

import type { Context, MiddlewareHandler } from 'hono';
import { createMiddleware } from 'hono/factory';
import { Inertia } from '../adapter/inertia.js';
import type { AdapterConfig } from '../models/adapter-config.js';
import type { InertiaRequest, InertiaResponse, SessionSource } from '../models/http.js';
import { ConfigResolver } from '../services/config-resolver.js';
import { SharedRegistry } from '../services/shared-registry.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

export type InertiaEnv = {
  Variables: {
    inertia: Inertia;
  };
};

export interface InertiaMiddlewareOptions extends AdapterConfig {
  registry?: SharedRegistry;
  logger?: Logger;
  /** Looks up validation errors, flash messages and the user for a request. */
  session?: (c: Context) => SessionSource | undefined;
}

export function inertia(options: InertiaMiddlewareOptions = {}): MiddlewareHandler<InertiaEnv> {
  const cfg = ConfigResolver.resolve(options);
  const registry = options.registry ?? new SharedRegistry();
  const logger = options.logger ?? new SilentLogger();

  return createMiddleware<InertiaEnv>(async (c, next) => {
    const session = options.session?.(c);
    const request: InertiaRequest = {
      method: c.req.method,
      url: c.req.url,
      headers: c.req.raw.headers,
      ...(session !== undefined && { session }),
    };
    c.set('inertia', new Inertia(request, cfg, { registry, logger }));
    await next();
  });
}

export function toResponse(response: InertiaResponse): Response {
  return new Response(response.body, {
    status: response.status,
    headers: response.headers,
  });
}
