/**
 * Chart-Data Projector
 *
 * Turns a history snapshot and an anomaly list into chart-ready datasets.
 * Rendering is left to the dashboard.
 */

import { CHART_COLORS, FALLBACK_COLOR } from '../config/charts';
import { getSensorFieldNames } from '../config/sensors';
import {
  AnomalyHighlightData,
  ChartData,
  CorrelationData,
  StatusDistributionData,
  TimeSeriesData,
} from '../types/charts';
import { Reading, SensorField } from '../types/reading';
import { AnomalyRecord } from '../types/statistics';
import { column, countStatuses, pearson } from './statistics';
import { toIsoTimestamp } from './time';

export function buildTimeSeries(snapshot: readonly Reading[]): TimeSeriesData {
  return {
    timestamps: snapshot.map((r) => toIsoTimestamp(r.timestamp)),
    temperature: column(snapshot, 'temperature'),
    humidity: column(snapshot, 'humidity'),
    pressure: column(snapshot, 'pressure'),
  };
}

export function buildStatusDistribution(snapshot: readonly Reading[]): StatusDistributionData {
  const counts = countStatuses(snapshot);
  return {
    labels: counts.map((c) => c.status),
    values: counts.map((c) => c.count),
    colors: counts.map((c) => CHART_COLORS[c.status] ?? FALLBACK_COLOR),
  };
}

/**
 * Pearson correlation between every pair of numeric fields
 */
export function buildCorrelationMatrix(snapshot: readonly Reading[]): CorrelationData {
  const fields = getSensorFieldNames();
  if (snapshot.length < 2) {
    return { fields, matrix: [] };
  }

  const columns = new Map<SensorField, number[]>(fields.map((f) => [f, column(snapshot, f)]));
  const matrix = fields.map((rowField) =>
    fields.map((colField) => {
      if (rowField === colField) {
        return 1.0;
      }
      return pearson(columns.get(rowField) ?? [], columns.get(colField) ?? []);
    })
  );

  return { fields, matrix };
}

export function buildAnomalyHighlights(anomalies: AnomalyRecord[], field: SensorField): AnomalyHighlightData {
  return {
    field,
    timestamps: anomalies.map((a) => toIsoTimestamp(a.timestamp)),
    values: anomalies.map((a) => a.value),
  };
}

export function buildChartData(
  snapshot: readonly Reading[],
  anomalies: AnomalyRecord[],
  field: SensorField = 'temperature'
): ChartData {
  return {
    timeseries: buildTimeSeries(snapshot),
    status: buildStatusDistribution(snapshot),
    correlation: buildCorrelationMatrix(snapshot),
    anomalies: buildAnomalyHighlights(anomalies, field),
  };
}
