import { ValidationError } from '../errors.js';
import type { DeviceExtras, ProducerReportInput } from '../types.js';

const REQUIRED_FIELDS = [
  'instance_id',
  'total_hashes',
  'overall_hashrate',
  'recent_hashrate',
  'timestamp',
  'gpu_count',
  'gpu_available'
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(field: string): never {
  throw new ValidationError(field, `Invalid field: ${field}`);
}

function readString(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  return typeof value === 'string' ? value : invalid(field);
}

function readNumber(body: Record<string, unknown>, field: string): number {
  const value = body[field];
  return typeof value === 'number' && Number.isFinite(value) ? value : invalid(field);
}

function readCount(body: Record<string, unknown>, field: string): number {
  const value = readNumber(body, field);
  return Number.isInteger(value) && value >= 0 ? value : invalid(field);
}

function readOptionalNumber(body: Record<string, unknown>, field: string): number | undefined {
  const value = body[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  return readNumber(body, field);
}

/**
 * Turns an inbound producer report into the internal shape. Every required
 * field must be present with the right type; the first failure names it.
 */
export function parseInboundReport(payload: unknown, originAddress: string): ProducerReportInput {
  if (!isRecord(payload)) {
    throw new ValidationError('body', 'Report must be a JSON object');
  }

  for (const field of REQUIRED_FIELDS) {
    if (!(field in payload) || payload[field] === undefined) {
      throw new ValidationError(field, `Missing field: ${field}`);
    }
  }

  const producerId = readString(payload, 'instance_id').trim();
  if (!producerId || producerId.includes('#')) {
    return invalid('instance_id');
  }

  const deviceAvailable = payload.gpu_available;
  if (typeof deviceAvailable !== 'boolean') {
    return invalid('gpu_available');
  }

  const extras: DeviceExtras = {};
  const deviceRate = readOptionalNumber(payload, 'hashrate');
  if (deviceRate !== undefined) {
    extras.deviceRate = deviceRate;
  }
  const temperature = readOptionalNumber(payload, 'temperature');
  if (temperature !== undefined) {
    extras.temperature = temperature;
  }
  if (payload.gpu_name !== undefined && payload.gpu_name !== null) {
    extras.deviceName = readString(payload, 'gpu_name');
  }
  const power = readOptionalNumber(payload, 'power');
  if (power !== undefined) {
    extras.power = power;
  }
  const efficiency = readOptionalNumber(payload, 'efficiency');
  if (efficiency !== undefined) {
    extras.efficiency = efficiency;
  }

  return {
    producerId,
    totalUnits: readCount(payload, 'total_hashes'),
    lifetimeRate: readNumber(payload, 'overall_hashrate'),
    recentRate: readNumber(payload, 'recent_hashrate'),
    reportTimestamp: readString(payload, 'timestamp'),
    deviceCount: readCount(payload, 'gpu_count'),
    deviceAvailable,
    originAddress,
    extras: Object.keys(extras).length > 0 ? extras : undefined
  };
}

/** First hop of X-Forwarded-For, else the socket address. */
export function resolveOriginAddress(forwardedFor: string | string[] | undefined, remoteAddress: string | undefined) {
  const header = Array.isArray(forwardedFor) ? forwardedFor[0] : forwardedFor;
  const first = header?.split(',')[0]?.trim();
  return first || remoteAddress || '';
}
