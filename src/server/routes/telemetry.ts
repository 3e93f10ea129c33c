import { IncomingMessage, ServerResponse } from 'node:http';
import { URL } from 'node:url';
import type { AppContext } from '../../app.js';
import { PersistenceError, ValidationError } from '../../errors.js';
import { resolveOriginAddress } from '../../ingest/validation.js';
import type { HistorySummary, ReportUpdate } from '../../types.js';
import { readJsonBody, sendJson, writeEvent, type Handler } from './helpers.js';

interface TelemetryRouterOptions {
  context: AppContext;
  heartbeatMs?: number;
}

type ClientState = {
  heartbeat: NodeJS.Timeout;
};

const DEFAULT_HISTORY_HOURS = 24;
const SUMMARY_WINDOW_HOURS = 24;

export class TelemetryRouter {
  private readonly context: AppContext;
  private readonly clients = new Map<ServerResponse, ClientState>();
  private readonly handlers: Handler[];
  private readonly heartbeatMs: number;
  private readonly unsubscribe: () => void;

  constructor(options: TelemetryRouterOptions) {
    this.context = options.context;
    this.heartbeatMs = options.heartbeatMs ?? 15000;
    this.handlers = [
      (req, res, url) => this.handleIngest(req, res, url),
      (req, res, url) => this.handleInstances(req, res, url),
      (req, res, url) => this.handleStats(req, res, url),
      (req, res, url) => this.handleHistory(req, res, url),
      (req, res, url) => this.handleSummary(req, res, url),
      (req, res, url) => this.handleStoredInstances(req, res, url),
      (req, res, url) => this.handleStream(req, res, url),
      (req, res, url) => this.handleMetrics(req, res, url),
      (req, res, url) => this.handleHealth(req, res, url)
    ];
    this.unsubscribe = this.context.ingest.onReport(this.handleReport);
  }

  handle(req: IncomingMessage, res: ServerResponse): boolean {
    if (!req.url) {
      return false;
    }

    const url = new URL(req.url, 'http://localhost');
    for (const handler of this.handlers) {
      if (handler(req, res, url)) {
        return true;
      }
    }

    return false;
  }

  close() {
    this.unsubscribe();
    for (const [client, state] of this.clients) {
      clearInterval(state.heartbeat);
      client.end();
    }
    this.clients.clear();
    this.context.metrics.setStreamClients(0);
  }

  private readonly handleReport = (update: ReportUpdate) => {
    for (const client of this.clients.keys()) {
      if (!writeEvent(client, 'hashrate_update', update)) {
        this.dropClient(client);
      }
    }
    this.context.metrics.recordBroadcast();
  };

  private dropClient(client: ServerResponse) {
    const state = this.clients.get(client);
    if (!state) {
      return;
    }
    clearInterval(state.heartbeat);
    this.clients.delete(client);
    client.destroy();
    this.context.metrics.setStreamClients(this.clients.size);
    this.context.logger.warn({ clients: this.clients.size }, 'Dropping slow stream client');
  }

  private handleIngest(req: IncomingMessage, res: ServerResponse, url: URL) {
    if (req.method !== 'POST' || url.pathname !== '/api/hashrate') {
      return false;
    }

    void this.ingest(req, res);
    return true;
  }

  private async ingest(req: IncomingMessage, res: ServerResponse) {
    const { ingest, logger } = this.context;
    let payload: unknown;
    try {
      payload = await readJsonBody(req);
    } catch (error) {
      sendJson(res, 400, { error: 'Invalid JSON body' });
      return;
    }

    const origin = resolveOriginAddress(req.headers['x-forwarded-for'], req.socket.remoteAddress);
    try {
      await ingest.ingest(payload, origin);
      sendJson(res, 200, { status: 'success' });
    } catch (error) {
      if (error instanceof ValidationError) {
        sendJson(res, 400, { error: error.message, field: error.field });
        return;
      }
      if (error instanceof PersistenceError) {
        sendJson(res, 500, { error: error.message });
        return;
      }
      logger.error({ err: error }, 'Failed to process report');
      sendJson(res, 500, { error: 'Internal server error' });
    }
  }

  private handleInstances(req: IncomingMessage, res: ServerResponse, url: URL) {
    if (req.method !== 'GET' || url.pathname !== '/api/instances') {
      return false;
    }

    sendJson(res, 200, this.context.registry.snapshot());
    return true;
  }

  private handleStats(req: IncomingMessage, res: ServerResponse, url: URL) {
    if (req.method !== 'GET' || url.pathname !== '/api/stats') {
      return false;
    }

    sendJson(res, 200, this.context.registry.stats());
    return true;
  }

  private handleHistory(req: IncomingMessage, res: ServerResponse, url: URL) {
    if (req.method !== 'GET' || !url.pathname.startsWith('/api/history/')) {
      return false;
    }

    let producerId: string;
    try {
      producerId = decodeURIComponent(url.pathname.slice('/api/history/'.length));
    } catch (error) {
      sendJson(res, 400, { error: 'Invalid producer id' });
      return true;
    }

    if (!producerId || producerId.includes('/')) {
      sendJson(res, 400, { error: 'Invalid producer id' });
      return true;
    }

    const hours = parseHours(url.searchParams.get('hours'));
    if (hours === null) {
      sendJson(res, 400, { error: 'Invalid hours' });
      return true;
    }

    void this.sendHistory(res, producerId, hours);
    return true;
  }

  private async sendHistory(res: ServerResponse, producerId: string, hours: number) {
    const { backend, logger } = this.context;
    try {
      const records = await backend.queryHistory(producerId, hours);
      sendJson(res, 200, records);
    } catch (error) {
      logger.error({ err: error, producerId }, 'Failed to load history');
      sendJson(res, 200, []);
    }
  }

  private handleSummary(req: IncomingMessage, res: ServerResponse, url: URL) {
    if (req.method !== 'GET' || url.pathname !== '/api/summary') {
      return false;
    }

    void this.sendSummary(res);
    return true;
  }

  private async sendSummary(res: ServerResponse) {
    const { backend, registry, logger } = this.context;
    const stats = registry.stats();
    let last24h: HistorySummary;
    try {
      last24h = await backend.querySummary(SUMMARY_WINDOW_HOURS);
    } catch (error) {
      logger.error({ err: error }, 'Failed to summarize history');
      last24h = {
        uniqueProducers: 0,
        totalUnits: 0,
        avgRate: 0,
        peakRate: 0,
        sampleCount: 0,
        windowHours: SUMMARY_WINDOW_HOURS,
        basis: 'window'
      };
    }

    sendJson(res, 200, {
      current: {
        activeInstances: stats.instanceCount,
        totalRate: stats.totalRate,
        totalDevices: stats.totalDevices,
        avgRate: stats.avgRate
      },
      last24h
    });
  }

  private handleStoredInstances(req: IncomingMessage, res: ServerResponse, url: URL) {
    if (req.method !== 'GET' || url.pathname !== '/api/stored-instances') {
      return false;
    }

    void this.sendStoredInstances(res);
    return true;
  }

  private async sendStoredInstances(res: ServerResponse) {
    const { backend, logger } = this.context;
    const supported = backend.capabilities.storedInstances;
    try {
      const instances = supported ? await backend.queryInstances() : [];
      sendJson(res, 200, { supported, instances });
    } catch (error) {
      logger.error({ err: error }, 'Failed to load stored instances');
      sendJson(res, 200, { supported, instances: [] });
    }
  }

  private handleStream(req: IncomingMessage, res: ServerResponse, url: URL) {
    if (req.method !== 'GET' || url.pathname !== '/api/stream') {
      return false;
    }

    const { registry, metrics, logger } = this.context;

    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive'
    });
    res.write(': connected\n\n');
    writeEvent(res, 'initial_data', { instances: registry.snapshot(), stats: registry.stats() });

    const heartbeat = setInterval(() => {
      if (!writeEvent(res, 'heartbeat', { ts: Date.now() })) {
        this.dropClient(res);
      }
    }, this.heartbeatMs);

    if (typeof heartbeat.unref === 'function') {
      heartbeat.unref();
    }

    this.clients.set(res, { heartbeat });
    metrics.setStreamClients(this.clients.size);
    logger.info({ clients: this.clients.size }, 'Stream client connected');

    let cleanedUp = false;
    const cleanup = () => {
      if (cleanedUp) {
        return;
      }
      cleanedUp = true;

      req.off('close', cleanup);
      req.off('error', cleanup);
      res.off('error', cleanup);
      res.off('close', cleanup);

      const client = this.clients.get(res);
      if (client) {
        clearInterval(client.heartbeat);
      }
      this.clients.delete(res);
      metrics.setStreamClients(this.clients.size);
      logger.info({ clients: this.clients.size }, 'Stream client disconnected');
    };

    req.on('close', cleanup);
    req.on('error', cleanup);
    res.on('error', cleanup);
    res.on('close', cleanup);
    return true;
  }

  private handleMetrics(req: IncomingMessage, res: ServerResponse, url: URL) {
    if (req.method !== 'GET' || url.pathname !== '/api/metrics') {
      return false;
    }

    const { metrics, registry } = this.context;
    sendJson(res, 200, {
      ...metrics.snapshot(),
      registry: {
        size: registry.size,
        activity: registry.activity()
      }
    });
    return true;
  }

  private handleHealth(req: IncomingMessage, res: ServerResponse, url: URL) {
    if (req.method !== 'GET' || url.pathname !== '/health') {
      return false;
    }

    const backend = this.context.backend.kind;
    sendJson(res, 200, {
      status: backend === 'degraded' ? 'degraded' : 'healthy',
      timestamp: new Date().toISOString(),
      backend
    });
    return true;
  }
}

export function createTelemetryRouter(options: TelemetryRouterOptions) {
  return new TelemetryRouter(options);
}

function parseHours(raw: string | null): number | null {
  if (raw === null || raw.trim() === '') {
    return DEFAULT_HISTORY_HOURS;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) {
    return null;
  }
  return parsed;
}
