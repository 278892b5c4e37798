/**
 * hono-middleware.test.ts
 *
 * Drives a hono app in process through `app.request()`.
 */

import { Hono } from 'hono';
import { Props } from '../../props/prop-factory.js';
import { decodePage } from '../../services/page-codec.js';
import { SharedRegistry } from '../../services/shared-registry.js';
import { inertia, toResponse } from '../hono-middleware.js';
import type { InertiaEnv } from '../hono-middleware.js';

function makeApp(): Hono<InertiaEnv> {
  const registry = new SharedRegistry();
  registry.share('appName', 'Acme');
  registry.freeze();

  const app = new Hono<InertiaEnv>();
  app.use(
    '*',
    inertia({
      version: 'v1',
      registry,
      session: (c) => ({ user: () => c.req.header('X-User') ?? null }),
    }),
  );
  app.get('/users', (c) =>
    toResponse(
      c.var.inertia.render('Users/Index', {
        users: ['ann', 'bob'],
        stats: Props.defer(() => ({ total: 2 })),
      }),
    ),
  );
  app.put('/users/1', (c) => toResponse(c.var.inertia.redirect('/users')));
  return app;
}

describe('inertia middleware', () => {
  it('answers Inertia visits with a JSON page', async () => {
    const res = await makeApp().request('/users?page=2', {
      headers: { 'X-Inertia': 'true', 'X-User': 'ann' },
    });

    expect(res.status).toBe(200);
    expect(res.headers.get('X-Inertia')).toBe('true');
    expect(res.headers.get('Vary')).toBe('X-Inertia');
    const page = decodePage(await res.text());
    expect(page).toEqual({
      component: 'Users/Index',
      props: {
        errors: {},
        flash: {},
        auth: { user: 'ann' },
        appName: 'Acme',
        users: ['ann', 'bob'],
      },
      url: '/users?page=2',
      version: 'v1',
      encryptHistory: false,
      clearHistory: false,
      deferredProps: { default: ['stats'] },
    });
  });

  it('serves the HTML shell on a first visit', async () => {
    const res = await makeApp().request('/users');

    expect(res.status).toBe(200);
    expect(res.headers.get('Content-Type')).toBe('text/html; charset=utf-8');
    const html = await res.text();
    expect(html).toContain('<div id="app" data-page="{&quot;component&quot;:&quot;Users/Index&quot;');
  });

  it('forces a reload on a stale asset version', async () => {
    const res = await makeApp().request('/users', {
      headers: { 'X-Inertia': 'true', 'X-Inertia-Version': 'v0' },
    });

    expect(res.status).toBe(409);
    expect(res.headers.get('X-Inertia-Location')).toBe('http://localhost/users');
  });

  it('turns redirects after PUT into 303', async () => {
    const res = await makeApp().request('/users/1', {
      method: 'PUT',
      headers: { 'X-Inertia': 'true' },
    });

    expect(res.status).toBe(303);
    expect(res.headers.get('Location')).toBe('/users');
  });
});
