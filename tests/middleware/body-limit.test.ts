import { describe, it, expect } from 'vitest';
import { bodyLimit } from '../../src/middleware/body-limit.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';
import { readError } from '../helpers/http.js';

describe('bodyLimit', () => {
  const ctx: HandlerContext = { clientId: null };

  const echoHandler: Handler = async (req) => new Response(await req.text(), { status: 200 });

  it('should pass bodies within the limit through unchanged', async () => {
    const wrapped = bodyLimit(100)(echoHandler);
    const res = await wrapped(
      new Request('http://test', { method: 'POST', body: '{"text":"hi"}' }),
      ctx
    );

    expect(res.status).toBe(200);
    expect(await res.text()).toBe('{"text":"hi"}');
  });

  it('should reject bodies over the limit with 413', async () => {
    const wrapped = bodyLimit(10)(echoHandler);
    const res = await wrapped(
      new Request('http://test', { method: 'POST', body: 'x'.repeat(11) }),
      ctx
    );
    const body = await readError(res);

    expect(res.status).toBe(413);
    expect(body.error.code).toBe('PAYLOAD_TOO_LARGE');
    expect(body.error.message).toBe('Request body must be 10 bytes or less');
  });

  it('should skip GET requests', async () => {
    const handler: Handler = async () => new Response('ok', { status: 200 });
    const res = await bodyLimit(0)(handler)(new Request('http://test'), ctx);

    expect(res.status).toBe(200);
  });
});
