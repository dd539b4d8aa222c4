import { Command } from 'commander';
import type { Server } from 'node:http';
import { loadConfig, withOverrides, createLogger } from '@taskd/core';
import { createContainer } from '../container.js';
import { startServer, stopServer } from '../http/app.js';
import * as out from '../output.js';
import { parsePort, withErrorHandling } from '../helpers.js';

interface ServeOptions {
  host?: string;
  port?: number;
  db?: string;
}

export function createServeCommand(): Command {
  return new Command('serve')
    .description('Start the HTTP task service')
    .option('-H, --host <host>', 'Interface to bind (default: SERVICE_HOST or 0.0.0.0)')
    .option('-p, --port <port>', 'Port to listen on (default: SERVICE_PORT or 8000)', parsePort)
    .option('--db <path>', 'SQLite database file (default: DATABASE_PATH or the platform data dir)')
    .action(withErrorHandling(async (opts: ServeOptions) => {
      const config = withOverrides(loadConfig(), {
        host: opts.host,
        port: opts.port,
        databasePath: opts.db,
      });
      const logger = createLogger('', config.logLevel);
      const container = createContainer(config, logger);

      let server: Server;
      try {
        server = await startServer(container.listener, config.host, config.port);
      } catch (err: unknown) {
        await container.dispose();
        throw err;
      }

      const address = server.address();
      const port = address !== null && typeof address === 'object' ? address.port : config.port;
      out.success(`taskd listening on ${out.formatAddress(config.host, port)}`);
      out.info(`Database: ${config.databasePath}`);

      let stopping = false;
      const shutdown = (signal: NodeJS.Signals): void => {
        if (stopping) return;
        stopping = true;
        logger.info(`Received ${signal}, shutting down`);
        stopServer(server)
          .then(() => container.dispose())
          .then(() => out.info('Stopped.'))
          .catch((err: unknown) => {
            logger.error('Shutdown failed', err);
            process.exitCode = 1;
          });
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    }));
}
