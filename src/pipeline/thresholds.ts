import type { PipelineThresholdConfig } from '../config/index.js';
import type { AlertSeverity } from '../types.js';

export type ThresholdMetric = 'write-latency' | 'error-rate' | 'queue-depth' | 'buffer-lag' | 'worker-utilization';

export type ThresholdBreach = {
  severity: AlertSeverity;
  triggeredBy: ThresholdMetric;
  threshold: number;
  actual: number;
  message: string;
};

export const DEFAULT_PIPELINE_THRESHOLDS: PipelineThresholdConfig = {
  writeLatencyMs: 100,
  errorRate: 0.01,
  queueDepth: 50_000,
  bufferLagSeconds: 10,
  workerUtilization: 0.9
};

export function evaluateRemoteStoreThresholds(
  metrics: { latencyMs: number; errorRate: number },
  thresholds: PipelineThresholdConfig = DEFAULT_PIPELINE_THRESHOLDS
): ThresholdBreach[] {
  const breaches: ThresholdBreach[] = [];

  if (metrics.latencyMs > thresholds.writeLatencyMs) {
    breaches.push({
      severity: 'warning',
      triggeredBy: 'write-latency',
      threshold: thresholds.writeLatencyMs,
      actual: metrics.latencyMs,
      message: `High remote store latency: ${metrics.latencyMs.toFixed(1)}ms`
    });
  }

  if (metrics.errorRate > thresholds.errorRate) {
    breaches.push({
      severity: 'critical',
      triggeredBy: 'error-rate',
      threshold: thresholds.errorRate,
      actual: metrics.errorRate,
      message: `High error rate: ${formatPercent(metrics.errorRate, 2)}`
    });
  }

  return breaches;
}

export function evaluateBufferThresholds(
  metrics: { queueDepth: number; lagSeconds: number },
  thresholds: PipelineThresholdConfig = DEFAULT_PIPELINE_THRESHOLDS
): ThresholdBreach[] {
  const breaches: ThresholdBreach[] = [];

  if (metrics.queueDepth > thresholds.queueDepth) {
    breaches.push({
      severity: 'warning',
      triggeredBy: 'queue-depth',
      threshold: thresholds.queueDepth,
      actual: metrics.queueDepth,
      message: `Buffer queue backup: ${metrics.queueDepth} messages`
    });
  }

  if (metrics.lagSeconds > thresholds.bufferLagSeconds) {
    breaches.push({
      severity: 'warning',
      triggeredBy: 'buffer-lag',
      threshold: thresholds.bufferLagSeconds,
      actual: metrics.lagSeconds,
      message: `High buffer lag: ${metrics.lagSeconds.toFixed(1)}s`
    });
  }

  return breaches;
}

export function evaluateWorkerThresholds(
  metrics: { utilization: number },
  thresholds: PipelineThresholdConfig = DEFAULT_PIPELINE_THRESHOLDS
): ThresholdBreach[] {
  if (metrics.utilization <= thresholds.workerUtilization) {
    return [];
  }

  return [
    {
      severity: 'info',
      triggeredBy: 'worker-utilization',
      threshold: thresholds.workerUtilization,
      actual: metrics.utilization,
      message: `High worker utilization: ${formatPercent(metrics.utilization, 1)}`
    }
  ];
}

function formatPercent(ratio: number, digits: number) {
  return `${(ratio * 100).toFixed(digits)}%`;
}
