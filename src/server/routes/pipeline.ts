import { IncomingMessage, ServerResponse } from 'node:http';
import { URL } from 'node:url';
import { ValidationError } from '../../errors.js';
import type { Logger } from '../../logger.js';
import type { PipelineHealthMonitor } from '../../pipeline/healthMonitor.js';
import { readJsonBody, sendJson, type Handler } from './helpers.js';

interface PipelineRouterOptions {
  monitor: PipelineHealthMonitor;
  logger: Logger;
}

export class PipelineRouter {
  private readonly monitor: PipelineHealthMonitor;
  private readonly logger: Logger;
  private readonly handlers: Handler[];

  constructor(options: PipelineRouterOptions) {
    this.monitor = options.monitor;
    this.logger = options.logger;
    this.handlers = [
      (req, res, url) => this.handleUpdate(req, res, url),
      (req, res, url) => this.handleMetrics(req, res, url),
      (req, res, url) => this.handleAlerts(req, res, url)
    ];
  }

  handle(req: IncomingMessage, res: ServerResponse): boolean {
    if (!req.url) {
      return false;
    }

    const url = new URL(req.url, 'http://localhost');
    return this.handlers.some(handler => handler(req, res, url));
  }

  private handleUpdate(req: IncomingMessage, res: ServerResponse, url: URL) {
    if (req.method !== 'POST' || url.pathname !== '/api/pipeline/metrics') {
      return false;
    }

    void this.applyUpdate(req, res);
    return true;
  }

  private async applyUpdate(req: IncomingMessage, res: ServerResponse) {
    let payload: unknown;
    try {
      payload = await readJsonBody(req);
    } catch (error) {
      sendJson(res, 400, { error: 'Invalid JSON body' });
      return;
    }

    try {
      this.monitor.applyUpdate(payload);
      sendJson(res, 200, { status: 'success' });
    } catch (error) {
      if (error instanceof ValidationError) {
        sendJson(res, 400, { error: error.message, field: error.field });
        return;
      }
      this.logger.error({ err: error }, 'Failed to apply pipeline metrics');
      sendJson(res, 500, { error: 'Internal server error' });
    }
  }

  private handleMetrics(req: IncomingMessage, res: ServerResponse, url: URL) {
    if (req.method !== 'GET' || url.pathname !== '/api/pipeline/metrics') {
      return false;
    }

    sendJson(res, 200, this.monitor.getMetrics());
    return true;
  }

  private handleAlerts(req: IncomingMessage, res: ServerResponse, url: URL) {
    if (req.method !== 'GET' || url.pathname !== '/api/pipeline/alerts') {
      return false;
    }

    sendJson(res, 200, this.monitor.getAlerts());
    return true;
  }
}

export function createPipelineRouter(options: PipelineRouterOptions) {
  return new PipelineRouter(options);
}
