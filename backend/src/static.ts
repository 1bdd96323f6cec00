import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';
import logger from './lib/logger';

// Static file serving for the built chat page

export interface StaticFile {
  content: ArrayBuffer;
  contentType: string;
}

const MIME_TYPES: Record<string, string> = {
  '.html': 'text/html',
  '.js': 'application/javascript',
  '.css': 'text/css',
  '.json': 'application/json',
  '.png': 'image/png',
  '.svg': 'image/svg+xml',
  '.ico': 'image/x-icon',
  '.woff2': 'font/woff2',
};

function getMimeType(filePath: string): string {
  const ext = path.extname(filePath).toLowerCase();
  return MIME_TYPES[ext] || 'application/octet-stream';
}

/**
 * In-memory copy of the frontend build, keyed by URL path
 */
export class StaticFileStore {
  private readonly files = new Map<string, StaticFile>();

  set(urlPath: string, file: StaticFile): void {
    this.files.set(urlPath, file);
  }

  get(urlPath: string): StaticFile | undefined {
    const normalizedPath = urlPath.startsWith('/') ? urlPath : `/${urlPath}`;
    return this.files.get(normalizedPath);
  }

  // index.html for SPA fallback
  getIndexHtml(): StaticFile | undefined {
    return this.files.get('/index.html');
  }

  get size(): number {
    return this.files.size;
  }
}

export const defaultStaticDir = (): string =>
  fileURLToPath(new URL('../../frontend/dist', import.meta.url));

function loadFilesFromDir(store: StaticFileStore, baseDir: string, prefix: string): void {
  const entries = fs.readdirSync(baseDir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = path.join(baseDir, entry.name);
    const urlPath = `${prefix}/${entry.name}`;

    if (entry.isDirectory()) {
      loadFilesFromDir(store, fullPath, urlPath);
    } else {
      const data = fs.readFileSync(fullPath);
      const content = new ArrayBuffer(data.byteLength);
      new Uint8Array(content).set(data);
      store.set(urlPath, {
        content,
        contentType: getMimeType(entry.name),
      });
    }
  }
}

/**
 * Load the frontend build from disk. A missing build leaves the store empty.
 */
export function loadStaticFiles(staticDir = defaultStaticDir()): StaticFileStore {
  const store = new StaticFileStore();

  if (!fs.existsSync(staticDir)) {
    logger.warn({ staticDir }, `Frontend build not found: ${staticDir}`);
    logger.warn('Run "npm run build:frontend" to build the chat page.');
    return store;
  }

  loadFilesFromDir(store, staticDir, '');
  logger.info({ count: store.size, staticDir }, `Loaded ${store.size} static files from ${staticDir}`);
  return store;
}
