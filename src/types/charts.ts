/**
 * Chart-ready datasets
 *
 * Plain column arrays a front-end chart library can plot directly.
 * Timestamps are ISO-8601 strings.
 */

import { SensorField } from './reading';

export interface TimeSeriesData {
  timestamps: string[];
  temperature: number[];
  humidity: number[];
  pressure: number[];
}

export interface StatusDistributionData {
  labels: string[];
  values: number[];
  colors: string[];
}

export interface CorrelationData {
  fields: SensorField[];
  /** Pearson coefficients, rows and columns in `fields` order. Empty with < 2 readings. */
  matrix: number[][];
}

export interface AnomalyHighlightData {
  field: SensorField;
  timestamps: string[];
  values: number[];
}

export interface ChartData {
  timeseries: TimeSeriesData;
  status: StatusDistributionData;
  correlation: CorrelationData;
  anomalies: AnomalyHighlightData;
}
