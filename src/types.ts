export type AlertSeverity = 'info' | 'warning' | 'critical';

export interface DeviceExtras {
  deviceRate?: number;
  temperature?: number;
  deviceName?: string;
  power?: number;
  efficiency?: number;
}

/** A report as accepted from a producer, before the registry stamps it. */
export interface ProducerReportInput {
  producerId: string;
  totalUnits: number;
  lifetimeRate: number;
  recentRate: number;
  reportTimestamp: string;
  deviceCount: number;
  deviceAvailable: boolean;
  originAddress: string;
  extras?: DeviceExtras;
}

export interface ProducerReport extends ProducerReportInput {
  /** Epoch seconds at which the registry accepted the report. */
  receivedAt: number;
}

export interface AggregateStats {
  instanceCount: number;
  totalRate: number;
  totalUnits: number;
  totalDevices: number;
  avgRate: number;
}

export interface AlertRecord {
  timestamp: string;
  severity: AlertSeverity;
  message: string;
}

export interface StoredReport {
  producerId: string;
  totalUnits: number;
  lifetimeRate: number;
  recentRate: number;
  reportTimestamp: string;
  deviceCount: number;
  deviceAvailable: boolean;
  originAddress: string;
  extras?: DeviceExtras;
  recordedAt: number;
}

export interface StoredInstance {
  producerId: string;
  lastSeen: string | null;
  totalUnits: number;
  lifetimeRate: number;
  recentRate: number;
  deviceCount: number;
  deviceAvailable: boolean;
  extras: DeviceExtras;
}

export type SummaryBasis = 'window' | 'current-snapshot';

export interface HistorySummary {
  uniqueProducers: number;
  totalUnits: number;
  avgRate: number;
  peakRate: number;
  sampleCount: number;
  windowHours: number;
  basis: SummaryBasis;
}

export interface ReportUpdate {
  instance: ProducerReport;
  stats: AggregateStats;
}
