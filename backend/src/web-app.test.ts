import { describe, test, expect, vi } from 'vitest';
import { createWebApp } from './web-app';
import { StaticFileStore, type StaticFile } from './static';

const INFERENCE_URL = 'http://inference.test/v1';

interface UpstreamCall {
  url: string;
  method?: string;
  contentType: string | null;
  body?: string;
}

function createUpstream(respond: () => Promise<Response>) {
  const calls: UpstreamCall[] = [];
  const fetchImpl = vi.fn<typeof fetch>(async (input, init) => {
    calls.push({
      url: String(input),
      method: init?.method,
      contentType: new Headers(init?.headers).get('content-type'),
      body: init?.body instanceof ArrayBuffer ? new TextDecoder().decode(init.body) : undefined,
    });
    return respond();
  });
  return { fetchImpl, calls };
}

function textFile(text: string, contentType: string): StaticFile {
  const bytes = new TextEncoder().encode(text);
  const content = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(content).set(bytes);
  return { content, contentType };
}

function createApp(fetchImpl: typeof fetch, staticFiles?: StaticFileStore) {
  return createWebApp({
    inferenceUrl: INFERENCE_URL,
    bucketName: 'test-bucket',
    corsOrigin: '*',
    fetchImpl,
    staticFiles,
  });
}

describe('web app', () => {
  test('GET /api/config returns the bucket name', async () => {
    const { fetchImpl } = createUpstream(async () => new Response());
    const res = await createApp(fetchImpl).request('/api/config');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ bucketName: 'test-bucket' });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  test('GET /api/health reports healthy', async () => {
    const { fetchImpl } = createUpstream(async () => new Response());
    const res = await createApp(fetchImpl).request('/api/health');

    expect(await res.json()).toMatchObject({ status: 'healthy' });
  });

  test('forwards /v1 requests with path, query, method and body', async () => {
    const { fetchImpl, calls } = createUpstream(
      async () =>
        new Response(JSON.stringify({ choices: [{ text: 'Hi', index: 0 }] }), {
          status: 200,
          headers: { 'Content-Type': 'application/json' },
        })
    );
    const payload = JSON.stringify({ model: 'gs://test-bucket/gemma-3-12b-it', prompt: 'Hello', max_tokens: 8 });

    const res = await createApp(fetchImpl).request('/v1/completions?echo=false', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: payload,
    });

    expect(calls).toEqual([
      {
        url: 'http://inference.test/v1/completions?echo=false',
        method: 'POST',
        contentType: 'application/json',
        body: payload,
      },
    ]);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ choices: [{ text: 'Hi', index: 0 }] });
  });

  test('forwards request headers and returns upstream headers', async () => {
    let upstreamHeaders = new Headers();
    const fetchImpl = vi.fn<typeof fetch>(async (_input, init) => {
      upstreamHeaders = new Headers(init?.headers);
      return new Response('{}', {
        status: 200,
        headers: { 'Content-Type': 'application/json', 'X-Request-Id': 'req-42' },
      });
    });

    const res = await createApp(fetchImpl).request('/v1/completions', {
      method: 'POST',
      headers: {
        Authorization: 'Bearer test-secret',
        'Content-Type': 'application/json',
        'X-Trace': 'abc',
      },
      body: '{}',
    });

    expect(upstreamHeaders.get('authorization')).toBe('Bearer test-secret');
    expect(upstreamHeaders.get('x-trace')).toBe('abc');
    expect(res.headers.get('x-request-id')).toBe('req-42');
  });

  test('passes upstream error statuses through unchanged', async () => {
    const { fetchImpl } = createUpstream(
      async () => new Response('model is loading', { status: 503, headers: { 'Content-Type': 'text/plain' } })
    );

    const res = await createApp(fetchImpl).request('/v1/models');

    expect(res.status).toBe(503);
    expect(await res.text()).toBe('model is loading');
  });

  test('answers 502 when the inference server is unreachable', async () => {
    const { fetchImpl } = createUpstream(async () => {
      throw new TypeError('fetch failed');
    });

    const res = await createApp(fetchImpl).request('/v1/completions', { method: 'POST', body: '{}' });

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ error: { message: 'Proxy Error', statusCode: 502 } });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  test('unknown API routes return a JSON 404', async () => {
    const { fetchImpl } = createUpstream(async () => new Response());
    const res = await createApp(fetchImpl).request('/api/deployments');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: { message: 'Route not found: GET /api/deployments', statusCode: 404 } });
  });

  test('serves built files and falls back to index.html', async () => {
    const { fetchImpl } = createUpstream(async () => new Response());
    const store = new StaticFileStore();
    store.set('/index.html', textFile('<html>chat</html>', 'text/html'));
    store.set('/assets/main.js', textFile('console.log(1)', 'application/javascript'));
    const app = createApp(fetchImpl, store);

    const script = await app.request('/assets/main.js');
    expect(script.headers.get('Content-Type')).toBe('application/javascript');
    expect(await script.text()).toBe('console.log(1)');

    const page = await app.request('/chat');
    expect(page.status).toBe(200);
    expect(await page.text()).toBe('<html>chat</html>');
  });

  test('without a frontend build, pages answer 404', async () => {
    const { fetchImpl } = createUpstream(async () => new Response());
    const res = await createApp(fetchImpl).request('/');

    expect(res.status).toBe(404);
    expect(await res.text()).toBe('Chat page not available. Build the frontend first.');
  });
});
