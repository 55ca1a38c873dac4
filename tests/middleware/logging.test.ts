import { describe, it, expect, beforeEach } from 'vitest';
import { createLoggingMiddleware } from '../../src/middleware/logging.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { Handler, HandlerContext, Middleware } from '../../src/middleware/pipeline.js';

const BASE = 'http://localhost/api/v1';
const anonymous: HandlerContext = { clientId: null };
const admin: HandlerContext = { clientId: 'admin-1a2b3c4d' };

function respond(status: number): Handler {
  return async () => new Response(JSON.stringify({ ok: status < 400 }), { status });
}

describe('logging middleware', () => {
  let logs: ConsoleLogProvider;
  let logging: Middleware;

  beforeEach(() => {
    logs = new ConsoleLogProvider();
    logging = createLoggingMiddleware(logs);
  });

  it('should log a routed request at info and pass the response through', async () => {
    const handler: Handler = async () =>
      new Response('{"route":"A"}', { status: 200, headers: { 'X-Route': 'A' } });

    const response = await logging(handler)(
      new Request(`${BASE}/route`, { method: 'POST', body: '{}' }),
      anonymous
    );

    expect(response.headers.get('X-Route')).toBe('A');
    expect(await response.text()).toBe('{"route":"A"}');
    expect(logs.events).toHaveLength(1);
    expect(logs.events[0]).toMatchObject({
      level: 'info',
      method: 'POST',
      path: '/api/v1/route',
      status: 200,
    });
    expect(logs.events[0].message).toMatch(/^POST \/api\/v1\/route → 200 \(\d+ms\)$/);
    expect(logs.events[0]).not.toHaveProperty('clientId');
    expect(logs.events[0]).not.toHaveProperty('fields');
  });

  it('should log the health check path and status', async () => {
    await logging(respond(200))(new Request(`${BASE}/health`), anonymous);

    expect(logs.events[0].message).toMatch(/^GET \/api\/v1\/health → 200 \(\d+ms\)$/);
  });

  it('should attach the admin client and log 4xx at warn', async () => {
    await logging(respond(404))(
      new Request(`${BASE}/gaps/gap-9/resolve`, { method: 'POST', body: '{}' }),
      admin
    );

    expect(logs.events[0]).toMatchObject({
      level: 'warn',
      status: 404,
      clientId: 'admin-1a2b3c4d',
    });
  });

  it('should log 5xx responses at error', async () => {
    await logging(respond(503))(new Request(`${BASE}/gaps/stats`), admin);

    expect(logs.events[0]).toMatchObject({ level: 'error', status: 503 });
  });

  it('should log the path without the query string', async () => {
    await logging(respond(200))(new Request(`${BASE}/gaps?limit=5&resolved=all`), admin);

    expect(logs.events[0]).toMatchObject({ path: '/api/v1/gaps' });
  });

  it('should log a handler exception as a 500 and re-throw it', async () => {
    const handler: Handler = async () => {
      throw new Error('router exploded');
    };

    await expect(
      logging(handler)(new Request(`${BASE}/route`, { method: 'POST', body: '{}' }), anonymous)
    ).rejects.toThrow('router exploded');

    expect(logs.events).toHaveLength(1);
    expect(logs.events[0]).toMatchObject({
      level: 'error',
      status: 500,
      fields: { error: 'router exploded' },
    });
    expect(logs.events[0].message).toContain('POST /api/v1/route → 500');
  });

  it('should mark requests the client abandoned as cancelled', async () => {
    const controller = new AbortController();
    const req = new Request(`${BASE}/route`, {
      method: 'POST',
      body: '{}',
      signal: controller.signal,
    });
    const handler: Handler = async () => {
      controller.abort();
      return new Response(null, { status: 499 });
    };

    await logging(handler)(req, anonymous);

    expect(logs.events[0]).toMatchObject({
      level: 'warn',
      status: 499,
      fields: { cancelled: true },
    });
  });
});
