import http from 'node:http';
import type { AppContext } from '../app.js';
import { createPipelineRouter } from './routes/pipeline.js';
import { createTelemetryRouter } from './routes/telemetry.js';

export interface HttpServerOptions {
  context: AppContext;
  port?: number;
  host?: string;
  heartbeatMs?: number;
}

export interface HttpServerRuntime {
  server: http.Server;
  port: number;
  close: () => Promise<void>;
}

export async function startHttpServer(options: HttpServerOptions): Promise<HttpServerRuntime> {
  const { context } = options;
  const { logger } = context;
  const port = options.port ?? context.config.server.port;
  const host = options.host ?? context.config.server.host;

  const telemetryRouter = createTelemetryRouter({ context, heartbeatMs: options.heartbeatMs });
  const pipelineRouter = createPipelineRouter({ monitor: context.monitor, logger });

  const server = http.createServer((req, res) => {
    try {
      if (telemetryRouter.handle(req, res)) {
        return;
      }

      if (pipelineRouter.handle(req, res)) {
        return;
      }

      res.statusCode = 404;
      res.setHeader('Content-Type', 'application/json');
      res.end(JSON.stringify({ error: 'Not found' }));
    } catch (error) {
      logger.error({ err: error }, 'HTTP request failed');
      if (!res.headersSent) {
        res.statusCode = 500;
        res.setHeader('Content-Type', 'application/json');
      }
      res.end(JSON.stringify({ error: 'Internal server error' }));
    }
  });

  server.on('close', () => {
    telemetryRouter.close();
  });

  try {
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        resolve();
      });
    });
  } catch (error) {
    telemetryRouter.close();
    throw error;
  }

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : port;

  logger.info({ port: actualPort, host }, 'HTTP server listening');

  return {
    server,
    port: actualPort,
    close: () =>
      new Promise<void>((resolve, reject) => {
        // open event streams would otherwise hold the server open
        telemetryRouter.close();
        server.closeAllConnections();
        server.close(error => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      })
  };
}

export default startHttpServer;
