import { EventEmitter } from 'node:events';
import { PersistenceError, ValidationError } from '../errors.js';
import loggerModule, { type Logger } from '../logger.js';
import type { MetricsRegistry } from '../metrics/index.js';
import type { LiveRegistry } from '../registry/liveRegistry.js';
import type { PersistenceBackend } from '../storage/types.js';
import type { ProducerReportInput, ReportUpdate, StoredReport } from '../types.js';
import { parseInboundReport } from './validation.js';

const REPORT_CHANNEL = 'report';

interface IngestDependencies {
  registry: LiveRegistry;
  backend: PersistenceBackend;
  metrics: MetricsRegistry;
  logger?: Logger;
}

export type IngestResult = ReportUpdate & {
  stored: StoredReport;
};

/**
 * Accepts producer reports: the live view and subscribers see a report before
 * the durable write is attempted, and a failed write does not undo either.
 */
export class IngestService extends EventEmitter {
  private readonly registry: LiveRegistry;
  private readonly backend: PersistenceBackend;
  private readonly metrics: MetricsRegistry;
  private readonly log: Logger;

  constructor(dependencies: IngestDependencies) {
    super();
    this.registry = dependencies.registry;
    this.backend = dependencies.backend;
    this.metrics = dependencies.metrics;
    this.log = dependencies.logger ?? loggerModule;
  }

  async ingest(payload: unknown, originAddress: string): Promise<IngestResult> {
    let input: ProducerReportInput;
    try {
      input = parseInboundReport(payload, originAddress);
    } catch (error) {
      if (error instanceof ValidationError) {
        this.metrics.recordReportRejected(error.field);
        this.log.debug({ field: error.field, originAddress }, error.message);
      }
      throw error;
    }

    const instance = this.registry.update(input);
    const update: ReportUpdate = { instance, stats: this.registry.stats() };
    this.metrics.recordReportAccepted();
    this.emit(REPORT_CHANNEL, update);

    let stored: StoredReport;
    try {
      stored = await this.metrics.time('persistence.write', () => this.backend.write(instance));
    } catch (error) {
      this.metrics.recordPersistenceFailure(error, instance.producerId);
      this.log.error({ err: error, producerId: instance.producerId }, 'Failed to persist report');
      throw error instanceof PersistenceError
        ? error
        : new PersistenceError(this.backend.kind, `Failed to persist report for ${instance.producerId}`, {
            cause: error
          });
    }

    this.metrics.recordPersistenceWrite();
    this.log.debug(
      { producerId: instance.producerId, recentRate: instance.recentRate },
      'Received report'
    );
    return { ...update, stored };
  }

  onReport(listener: (update: ReportUpdate) => void) {
    this.on(REPORT_CHANNEL, listener);
    return () => {
      this.off(REPORT_CHANNEL, listener);
    };
  }
}
