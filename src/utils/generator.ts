import { SENSOR_STATUSES, getSensorField } from '../config/sensors';
import { Reading, SensorStatus, ValueRange } from '../types/reading';

export type RandomFn = () => number;

export interface BootstrapOptions {
  /** Number of backdated readings (default: 50) */
  count?: number;
  /** Spacing between readings in seconds (default: 12) */
  intervalSeconds?: number;
  /** Timestamp of the last reading, Unix ms (default: now) */
  end?: number;
}

const DEFAULT_BOOTSTRAP_COUNT = 50;
const DEFAULT_BOOTSTRAP_INTERVAL_SECONDS = 12;

/**
 * Uniform draw from [min, max], rounded to one decimal
 */
function uniform(range: ValueRange, random: RandomFn): number {
  const value = range.min + random() * (range.max - range.min);
  return Math.round(value * 10) / 10;
}

function pickStatus(random: RandomFn): SensorStatus {
  const index = Math.min(Math.floor(random() * SENSOR_STATUSES.length), SENSOR_STATUSES.length - 1);
  return SENSOR_STATUSES[index];
}

/**
 * Generate one synthetic reading
 *
 * Every numeric field and the status are drawn independently, so a reading
 * can be numerically unremarkable and still be labelled "critical".
 */
export function generateReading(timestamp: number = Date.now(), random: RandomFn = Math.random): Reading {
  // Draw order: temperature, humidity, pressure, status
  const temperature = uniform(getSensorField('temperature').generation, random);
  const humidity = uniform(getSensorField('humidity').generation, random);
  const pressure = uniform(getSensorField('pressure').generation, random);

  return Object.freeze({
    timestamp,
    temperature,
    humidity,
    pressure,
    status: pickStatus(random),
  });
}

/**
 * Synthesize backdated history ending at `end`
 *
 * Readings are returned oldest first, spaced `intervalSeconds` apart.
 */
export function bootstrapReadings(options: BootstrapOptions = {}, random: RandomFn = Math.random): Reading[] {
  const {
    count = DEFAULT_BOOTSTRAP_COUNT,
    intervalSeconds = DEFAULT_BOOTSTRAP_INTERVAL_SECONDS,
    end = Date.now(),
  } = options;

  const intervalMs = intervalSeconds * 1000;
  const readings: Reading[] = [];

  for (let i = 0; i < count; i++) {
    const timestamp = end - (count - 1 - i) * intervalMs;
    readings.push(generateReading(timestamp, random));
  }

  return readings;
}
