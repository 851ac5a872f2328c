import { SensorField, SensorStatus, Reading } from '../types/reading';
import { FieldSummary, StatisticalSummary, StatusCount } from '../types/statistics';

/**
 * Arithmetic mean. 0 for an empty list.
 *
 * Summed as offsets from the first value, so identical inputs give
 * exactly that value back and their deviations are exactly 0.
 */
export function mean(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const first = values[0];
  return first + values.reduce((sum, val) => sum + (val - first), 0) / values.length;
}

/**
 * Sample standard deviation (denominator n - 1). 0 when n <= 1.
 */
export function sampleStdDev(values: number[], valuesMean: number = mean(values)): number {
  if (values.length <= 1) {
    return 0;
  }
  const variance = values.reduce((sum, val) => sum + Math.pow(val - valuesMean, 2), 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/**
 * Pearson correlation coefficient
 *
 * Returns 0 when it is undefined: fewer than 2 points or zero variance on either side.
 */
export function pearson(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error('Series must have same length');
  }
  if (a.length < 2) {
    return 0;
  }

  const meanA = mean(a);
  const meanB = mean(b);

  let covariance = 0;
  let varA = 0;
  let varB = 0;

  for (let i = 0; i < a.length; i++) {
    const da = a[i] - meanA;
    const db = b[i] - meanB;
    covariance += da * db;
    varA += da * da;
    varB += db * db;
  }

  const denominator = Math.sqrt(varA) * Math.sqrt(varB);
  if (denominator === 0) {
    return 0;
  }

  return covariance / denominator;
}

/**
 * Extract one numeric column from a snapshot
 */
export function column(snapshot: readonly Reading[], field: SensorField): number[] {
  return snapshot.map((r) => r[field]);
}

function summarizeField(snapshot: readonly Reading[], field: SensorField): FieldSummary {
  const values = column(snapshot, field);
  const fieldMean = mean(values);
  return {
    mean: fieldMean,
    std: sampleStdDev(values, fieldMean),
  };
}

/**
 * Count readings per observed status, sorted alphabetically by label
 */
export function countStatuses(snapshot: readonly Reading[]): StatusCount[] {
  const counts = new Map<SensorStatus, number>();
  for (const reading of snapshot) {
    counts.set(reading.status, (counts.get(reading.status) ?? 0) + 1);
  }

  return Array.from(counts, ([status, count]) => ({ status, count })).sort((a, b) =>
    a.status.localeCompare(b.status)
  );
}

/**
 * Statistical summary of a snapshot
 *
 * Always computed fresh. An empty snapshot gives count 0 and zeros
 * everywhere, so callers should check `count` before reading the values.
 */
export function summarize(snapshot: readonly Reading[]): StatisticalSummary {
  return {
    count: snapshot.length,
    temperature: summarizeField(snapshot, 'temperature'),
    humidity: summarizeField(snapshot, 'humidity'),
    pressure: summarizeField(snapshot, 'pressure'),
    statusCounts: countStatuses(snapshot),
  };
}
