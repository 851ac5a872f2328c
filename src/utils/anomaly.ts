import { Reading } from '../types/reading';
import { AnomalyParams, AnomalyRecord } from '../types/statistics';
import { column, mean, sampleStdDev } from './statistics';

const DEFAULT_THRESHOLD = 2;
const DEFAULT_MIN_SAMPLES = 10;

/**
 * Flag readings that deviate from the current window
 *
 * Uses Z-score: z = (value - mean) / stddev
 * If |z| > threshold, it's an anomaly
 *
 * Mean and stddev come from the snapshot itself, not a fixed baseline,
 * so a reading can stop being anomalous as the window slides.
 *
 * Returns an empty list when:
 * - the snapshot has fewer than `minSamples` readings
 * - stddev is 0 (every value identical)
 */
export function detectAnomalies(snapshot: readonly Reading[], params: AnomalyParams = {}): AnomalyRecord[] {
  const { field = 'temperature', threshold = DEFAULT_THRESHOLD, minSamples = DEFAULT_MIN_SAMPLES } = params;

  if (snapshot.length < minSamples) {
    return [];
  }

  const values = column(snapshot, field);
  const valuesMean = mean(values);
  const stddev = sampleStdDev(values, valuesMean);

  if (stddev === 0) {
    return [];
  }

  const anomalies: AnomalyRecord[] = [];
  for (const reading of snapshot) {
    const zScore = (reading[field] - valuesMean) / stddev;
    if (Math.abs(zScore) > threshold) {
      anomalies.push({
        timestamp: reading.timestamp,
        field,
        value: reading[field],
        zScore,
      });
    }
  }

  // Ascending by timestamp
  return anomalies.sort((a, b) => a.timestamp - b.timestamp);
}
