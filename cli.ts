#!/usr/bin/env node
/**
 * switchyard CLI
 *
 * Serve a directory of static files, or list the routes it would register.
 */

import { program } from 'commander';
import { parsePort } from './src/cli';
import { loadConfig, loadEnvironment } from './src/config';
import type { ConfigOverrides } from './src/config';
import { createRequestListener, createHTTPServer, serveStaticDir } from './src/http';
import { createRouter } from './src/router';
import type { Router } from './src/router';

// Colors for console output
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
};

function log(message: string, color: string = colors.reset) {
  console.log(`${color}${message}${colors.reset}`);
}

interface ServeOptions {
  host?: string;
  port?: number;
  prefix?: string;
  envFile?: string;
}

function buildRouter(directory: string, prefix: string | undefined, overrides: ConfigOverrides = {}): Router {
  const router = createRouter({ config: loadConfig(process.env, overrides) });

  router.path('/healthz').get((ctx) => ctx.response.json({ status: 'ok' }));
  serveStaticDir(router, directory, { prefix });

  return router;
}

program
  .name('switchyard')
  .description('switchyard - embeddable HTTP request dispatch')
  .version('1.0.0');

program
  .command('serve')
  .description('Serve a directory of static files')
  .argument('<directory>', 'directory to serve')
  .option('--host <host>', 'bind address')
  .option('-p, --port <port>', 'port', parsePort)
  .option('--prefix <prefix>', 'URL prefix for the files (default: /<directory name>)')
  .option('--env-file <file>', 'load variables from an env file first')
  .action(async (directory: string, options: ServeOptions) => {
    try {
      if (options.envFile) {
        const applied = await loadEnvironment(options.envFile);
        log(`Loaded ${applied.length} variable(s) from ${options.envFile}`, colors.yellow);
      }

      const router = buildRouter(directory, options.prefix, { host: options.host, port: options.port });
      const server = createHTTPServer(
        { host: router.config.host, port: router.config.port },
        createRequestListener(router)
      );

      await server.start();
      const address = server.getAddress();
      log(`\nServing ${directory} on http://${address?.host}:${address?.port}\n`, colors.green);

      const shutdown = async () => {
        log('\nShutting down...', colors.yellow);
        try {
          await server.stop({ graceful: true, timeout: 5000 });
          process.exit(0);
        } catch (error) {
          log(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`, colors.red);
          process.exit(1);
        }
      };

      process.once('SIGINT', () => void shutdown());
      process.once('SIGTERM', () => void shutdown());
    } catch (error) {
      log(`\nFailed to start: ${error instanceof Error ? error.message : String(error)}\n`, colors.red);
      process.exit(1);
    }
  });

program
  .command('routes')
  .description('List the routes a static directory would register')
  .argument('<directory>', 'directory to scan')
  .option('--prefix <prefix>', 'URL prefix for the files')
  .action((directory: string, options: { prefix?: string }) => {
    const router = buildRouter(directory, options.prefix);
    for (const route of router.routes()) {
      log(`${route.methods.join(',').padEnd(8)} ${route.template}`, colors.bright);
    }
  });

program.parse();
