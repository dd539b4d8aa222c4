import { createServer, type IncomingMessage, type RequestListener, type Server, type ServerResponse } from 'node:http';
import type { Logger } from '@taskd/core';
import { Messages } from '@taskd/core';
import type { Router } from './router.js';
import type { SessionValidator } from './auth.js';
import { authenticate } from './auth.js';
import { BodyParseError, sendDetail } from './respond.js';

export interface AppOptions {
  router: Router;
  sessions: SessionValidator;
  logger: Logger;
}

/**
 * Request listener: authenticate, route, and turn anything thrown along the
 * way into a 500 with the stack in the log.
 */
export function createRequestListener({ router, sessions, logger }: AppOptions): RequestListener {
  const log = logger.child('http');

  async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method ?? 'GET';
    const target = req.url ?? '/';

    try {
      if (!URL.canParse(target, 'http://localhost')) {
        log.warn(`${method} ${target} rejected: malformed request target`);
        return sendDetail(res, 400, 'Malformed request target');
      }
      const url = new URL(target, 'http://localhost');

      const auth = await authenticate(req, sessions);
      if (auth.type === 'rejected') {
        log.warn(`${method} ${url.pathname} rejected: ${auth.detail}`);
        return sendDetail(res, auth.status, auth.detail);
      }

      const match = router.match(method, url.pathname);
      switch (match.type) {
        case 'not-found':
          return sendDetail(res, 404, 'Not Found');
        case 'method-not-allowed':
          return sendDetail(res, 405, 'Method Not Allowed');
        case 'found':
          await match.handler({ req, res, url, params: match.params });
          log.debug(`${method} ${url.pathname} -> ${res.statusCode}`);
          return;
      }
    } catch (err: unknown) {
      if (err instanceof BodyParseError) {
        return sendDetail(res, 422, err.message);
      }
      log.error(`${method} ${target} failed`, err);
      if (!res.headersSent) {
        sendDetail(res, 500, Messages.Internal);
      } else {
        res.end();
      }
    }
  }

  return (req, res) => {
    handle(req, res).catch((err: unknown) => {
      log.error(`${req.method ?? 'GET'} ${req.url ?? '/'} could not be answered`, err);
      if (!res.headersSent) res.writeHead(500);
      res.end();
    });
  };
}

export function startServer(listener: RequestListener, host: string, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createServer(listener);
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve(server);
    });
  });
}

export function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });
}
