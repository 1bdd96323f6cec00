import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { compress } from 'hono/compress';
import { HTTPException } from 'hono/http-exception';
import type { ErrorResponse, HealthCheckResponse, WebConfig } from '@coldstart/shared';
import logger from './lib/logger';
import { ProxyError } from './lib/errors';
import { StaticFileStore } from './static';

export interface WebAppOptions {
  /** Inference server base URL, e.g. http://localhost:8080/v1 */
  inferenceUrl: string;
  bucketName: string;
  corsOrigin: string;
  fetchImpl?: typeof fetch;
  staticFiles?: StaticFileStore;
}

// Connection-level headers are not forwarded in either direction
const HOP_BY_HOP_HEADERS = new Set([
  'connection',
  'keep-alive',
  'proxy-connection',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
  'host',
  'content-length',
]);

// fetch has already decoded the upstream body
const SKIPPED_RESPONSE_HEADERS = new Set([...HOP_BY_HOP_HEADERS, 'content-encoding']);

function copyHeaders(source: Headers, skip: Set<string>): Headers {
  const headers = new Headers();
  source.forEach((value, name) => {
    if (!skip.has(name)) {
      headers.set(name, value);
    }
  });
  return headers;
}

function errorBody(message: string, statusCode: number): ErrorResponse {
  return { error: { message, statusCode } };
}

/**
 * Chat page backend: configuration endpoint, proxy to the inference server
 * and the built page itself.
 */
export function createWebApp(options: WebAppOptions) {
  const { inferenceUrl, bucketName, corsOrigin } = options;
  const fetchImpl = options.fetchImpl ?? fetch;
  const staticFiles = options.staticFiles ?? new StaticFileStore();

  const app = new Hono();

  // Global middleware
  app.use('*', compress());
  app.use('*', cors({ origin: corsOrigin }));

  // Request logging
  app.use('*', async (c, next) => {
    logger.info({ method: c.req.method, url: c.req.url }, `${c.req.method} ${c.req.path}`);
    await next();
  });

  app.get('/api/health', (c) => {
    const body: HealthCheckResponse = { status: 'healthy', timestamp: new Date().toISOString() };
    return c.json(body);
  });

  app.get('/api/config', (c) => {
    const body: WebConfig = { bucketName };
    return c.json(body);
  });

  // Everything under /v1 goes to the inference server unchanged
  app.all('/v1/*', async (c) => {
    const url = new URL(c.req.url);
    const upstreamUrl = `${inferenceUrl}${url.pathname.slice('/v1'.length)}${url.search}`;
    const method = c.req.method;

    const headers = copyHeaders(c.req.raw.headers, HOP_BY_HOP_HEADERS);
    const body = method === 'GET' || method === 'HEAD' ? undefined : await c.req.arrayBuffer();

    let upstream: Response;
    try {
      upstream = await fetchImpl(upstreamUrl, { method, headers, body });
    } catch (error) {
      throw new ProxyError(upstreamUrl, error);
    }

    logger.info({ method, upstreamUrl, status: upstream.status }, `Proxied ${method} ${upstreamUrl}`);

    const responseHeaders = copyHeaders(upstream.headers, SKIPPED_RESPONSE_HEADERS);
    return new Response(await upstream.arrayBuffer(), { status: upstream.status, headers: responseHeaders });
  });

  // Static file serving middleware
  app.use('*', async (c, next) => {
    if (c.req.path.startsWith('/api/') || c.req.path.startsWith('/v1/')) {
      return next();
    }

    const file = staticFiles.get(c.req.path);
    if (file) {
      return c.body(file.content, 200, { 'Content-Type': file.contentType });
    }

    return next();
  });

  // SPA fallback
  app.notFound((c) => {
    if (c.req.path.startsWith('/api/')) {
      logger.warn(
        { method: c.req.method, url: c.req.url, statusCode: 404 },
        `No route matched: ${c.req.method} ${c.req.url}`
      );
      return c.json(errorBody(`Route not found: ${c.req.method} ${c.req.path}`, 404), 404);
    }

    const indexHtml = staticFiles.getIndexHtml();
    if (indexHtml) {
      return c.body(indexHtml.content, 200, { 'Content-Type': indexHtml.contentType });
    }

    return c.text('Chat page not available. Build the frontend first.', 404);
  });

  // Global error handler
  app.onError((err, c) => {
    if (err instanceof ProxyError) {
      logger.error({ upstreamUrl: err.upstreamUrl, context: err.context }, err.message);
      return c.json(errorBody('Proxy Error', 502), 502);
    }

    logger.error({ error: err, stack: err.stack }, `Error: ${err.message}`);

    if (err instanceof HTTPException) {
      return c.json(errorBody(err.message, err.status), err.status);
    }

    return c.json(errorBody(err.message || 'Internal Server Error', 500), 500);
  });

  return app;
}

export type WebApp = ReturnType<typeof createWebApp>;
