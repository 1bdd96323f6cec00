import { serve } from '@hono/node-server';
import logger from './lib/logger';
import { loadConfig } from './services/config';
import { loadStaticFiles } from './static';
import { createWebApp } from './web-app';

const config = loadConfig();

const app = createWebApp({
  inferenceUrl: config.web.inferenceUrl,
  bucketName: config.web.bucketName,
  corsOrigin: config.web.corsOrigin,
  staticFiles: loadStaticFiles(),
});

serve({ fetch: app.fetch, port: config.web.port }, (info) => {
  logger.info(
    { port: info.port, inferenceUrl: config.web.inferenceUrl },
    `Chat server listening on http://localhost:${info.port}`
  );
});
