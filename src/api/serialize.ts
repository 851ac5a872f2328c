/**
 * Core values -> wire shapes
 */

import { QualityFlag, Reading } from '../types/reading';
import { AnomalyRecord, StatisticalSummary } from '../types/statistics';
import { toIsoTimestamp } from '../utils/time';
import { AnomalyJson, QualityFlagJson, ReadingJson, StatisticsResponse } from './schemas';

export function toReadingJson(reading: Reading): ReadingJson {
  return {
    timestamp: toIsoTimestamp(reading.timestamp),
    temperature: reading.temperature,
    humidity: reading.humidity,
    pressure: reading.pressure,
    status: reading.status,
  };
}

export function toStatisticsJson(summary: StatisticalSummary): StatisticsResponse {
  const statusCounts: Record<string, number> = {};
  for (const { status, count } of summary.statusCounts) {
    statusCounts[status] = count;
  }

  return {
    count: summary.count,
    temp_mean: summary.temperature.mean,
    temp_std: summary.temperature.std,
    humidity_mean: summary.humidity.mean,
    humidity_std: summary.humidity.std,
    pressure_mean: summary.pressure.mean,
    pressure_std: summary.pressure.std,
    status_counts: statusCounts,
  };
}

export function toAnomalyJson(anomaly: AnomalyRecord): AnomalyJson {
  const json: AnomalyJson = {
    timestamp: toIsoTimestamp(anomaly.timestamp),
    z_score: anomaly.zScore,
  };
  json[anomaly.field] = anomaly.value;
  return json;
}

export function toQualityFlagJson(flag: QualityFlag): QualityFlagJson {
  return {
    field: flag.field,
    value: flag.value,
    min: flag.min,
    max: flag.max,
  };
}
