/**
 * Statistics and Anomaly Types
 */

import { SensorField, SensorStatus } from './reading';

export interface FieldSummary {
  mean: number;
  /** Sample standard deviation (n - 1) */
  std: number;
}

export interface StatusCount {
  status: SensorStatus;
  count: number;
}

export interface StatisticalSummary {
  /** Number of readings the summary was computed over */
  count: number;
  temperature: FieldSummary;
  humidity: FieldSummary;
  pressure: FieldSummary;
  /** Observed statuses only, sorted alphabetically by label */
  statusCounts: StatusCount[];
}

export interface AnomalyParams {
  field?: SensorField;
  /** |z| above this is an anomaly (default: 2) */
  threshold?: number;
  /** Fewer readings than this yield no anomalies (default: 10) */
  minSamples?: number;
}

export interface AnomalyRecord {
  timestamp: number;
  field: SensorField;
  value: number;
  zScore: number;
}
