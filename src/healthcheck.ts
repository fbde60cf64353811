import http from 'node:http';
import { promisify } from 'node:util';
import logger from './logger';

const DEFAULT_PORT = 3000;

/**
 * Handler for one GET path on the health server. It owns the whole response.
 */
export type RouteHandler = (req: http.IncomingMessage, res: http.ServerResponse) => void;

/**
 * Status information for the health check server.
 */
export interface HealthCheckStatus {
  listening: boolean;
  port: number;
  routes: string[];
}

/**
 * Service handle for the health check server.
 */
export interface HealthCheckService {
  status(): HealthCheckStatus;
  close(): Promise<void>;
}

export const sendJson = (res: http.ServerResponse, statusCode: number, body: unknown): void => {
  res.writeHead(statusCode, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
};

/**
 * Start an HTTP server answering GET requests on the given paths.
 *
 * Without a `/health` route, `GET /health` answers 200 with { status: 'Ok' }.
 * Anything else is a 404.
 */
export const startHealthCheckServer = (routes: Record<string, RouteHandler> = {}, port = DEFAULT_PORT): HealthCheckService => {
  const handlers: Record<string, RouteHandler> = {
    '/health': (_, res) => sendJson(res, 200, { status: 'Ok' }),
    ...routes,
  };

  const server = http.createServer((req, res) => {
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
    const handler = handlers[pathname];

    if (handler && req.method === 'GET') {
      handler(req, res);
    } else {
      res.writeHead(404);
      res.end();
    }
  });

  server.listen(port, () => {
    logger.info({ port, routes: Object.keys(handlers) }, 'Health check server listening');
  });

  return {
    close: promisify(server.close.bind(server)),

    status: (): HealthCheckStatus => ({
      listening: server.listening,
      port,
      routes: Object.keys(handlers),
    }),
  };
};
