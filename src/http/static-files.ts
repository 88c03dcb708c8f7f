/**
 * Static Directory
 *
 * Registers one GET route per file found under a directory, grouped under
 * a URL prefix. Files are read per request; the file set is fixed at
 * registration time.
 */

import path from 'path';
import crypto from 'crypto';
import { readdirSync } from 'fs';
import * as fs from 'fs/promises';
import type { RequestContext } from '../context';
import type { Logger } from '../logging';
import type { Handler, Router, RouteGroup } from '../router';

export interface StaticDirOptions {
  /** URL prefix for the group (default: '/' + directory basename) */
  prefix?: string;

  /** Cache-Control max-age in seconds (default: router config) */
  maxAge?: number;
}

/**
 * MIME type mapping
 */
const MIME_TYPES: Record<string, string> = {
  '.html': 'text/html',
  '.htm': 'text/html',
  '.css': 'text/css',
  '.js': 'text/javascript',
  '.mjs': 'text/javascript',
  '.json': 'application/json',
  '.txt': 'text/plain',
  '.xml': 'application/xml',
  '.svg': 'image/svg+xml',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.ico': 'image/x-icon',
  '.webp': 'image/webp',
  '.pdf': 'application/pdf',
  '.woff': 'font/woff',
  '.woff2': 'font/woff2',
  '.ttf': 'font/ttf',
  '.wasm': 'application/wasm',
};

export function getMimeType(filename: string): string {
  const ext = path.extname(filename).toLowerCase();
  return MIME_TYPES[ext] || 'application/octet-stream';
}

/**
 * ETag from file size and mtime
 */
export function generateETag(stats: { size: number; mtimeMs: number }): string {
  const hash = crypto.createHash('md5');
  hash.update(`${stats.size}-${stats.mtimeMs}`);
  return `"${hash.digest('hex')}"`;
}

/**
 * Files under `root`, as '/'-separated paths relative to it, sorted
 */
export function listFiles(root: string): string[] {
  const files: string[] = [];

  const walk = (dir: string, relative: string) => {
    const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      const childRelative = `${relative}/${entry.name}`;
      if (entry.isDirectory()) {
        walk(path.join(dir, entry.name), childRelative);
      } else if (entry.isFile()) {
        files.push(childRelative);
      }
    }
  };

  walk(root, '');
  return files;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function createFileHandler(filePath: string, maxAge: number, logger: Logger): Handler {
  return async (ctx: RequestContext) => {
    let content: Buffer;
    let stats: { size: number; mtimeMs: number; mtime: Date };
    try {
      stats = await fs.stat(filePath);
      content = await fs.readFile(filePath);
    } catch (error) {
      if (isNotFound(error)) {
        return ctx.response.error(`404 ${path.basename(filePath)} not found`, 404);
      }
      logger.error('Failed reading static file', {
        file: filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return ctx.response.error('Internal Server Error', 500);
    }

    const etag = generateETag(stats);
    ctx.response
      .header('ETag', etag)
      .header('Cache-Control', `public, max-age=${maxAge}`)
      .header('Last-Modified', stats.mtime.toUTCString());

    if (ctx.getHeader('if-none-match') === etag) {
      return ctx.response.status(304);
    }

    return ctx.response.append(content, getMimeType(filePath));
  };
}

/**
 * Register every file under `directory` as a GET route
 */
export function serveStaticDir(router: Router, directory: string, options: StaticDirOptions = {}): RouteGroup {
  const root = path.resolve(directory);
  const prefix = options.prefix ?? `/${path.basename(root)}`;
  const maxAge = options.maxAge ?? router.config.static.maxAge;
  const logger = router.logger.child('static');

  const group = router.group(prefix);
  const files = listFiles(root);
  for (const file of files) {
    group.path(file).get(createFileHandler(path.join(root, ...file.split('/')), maxAge, logger));
  }

  logger.debug('Registered static directory', { root, prefix, files: files.length });
  return group;
}
