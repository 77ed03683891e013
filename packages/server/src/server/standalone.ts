import { createServer, type Server } from 'http';
import { createLogger } from '@tokengate/core';
import {
  validateStandaloneOptions,
  type StandaloneServerOptions,
} from '../config.js';
import { createMiddleware } from './middleware.js';

export interface StandaloneServer {
  server: Server;
  url: string;
  close(): Promise<void>;
}

export async function startServer(
  options: StandaloneServerOptions,
): Promise<StandaloneServer> {
  const opts = validateStandaloneOptions(options);
  const logger = opts.logger ?? createLogger('server');

  const middleware = createMiddleware({ ...options, logger });

  const server = createServer((req, res) => {
    middleware(req, res);
  });

  return new Promise((resolve, reject) => {
    server.on('error', reject);

    server.listen(opts.port, opts.host, () => {
      const addr = server.address();
      /* v8 ignore next 2 -- addr is string only for Unix sockets */
      const url =
        typeof addr === 'string'
          ? addr
          : `http://${opts.host}:${addr?.port ?? opts.port}`;

      logger.info({ url }, 'Server listening');

      resolve({
        server,
        url,
        async close() {
          return new Promise<void>((res, rej) => {
            server.close((err) => {
              if (err) rej(err);
              else res();
            });
          });
        },
      });
    });
  });
}
