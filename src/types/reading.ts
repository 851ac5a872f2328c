/**
 * Sensor Reading Types
 *
 * A reading is one timestamped observation from the environmental sensor.
 * Readings are frozen on creation and live only as long as the history buffer keeps them.
 */

export type SensorStatus = 'normal' | 'warning' | 'critical';

export type SensorField = 'temperature' | 'humidity' | 'pressure';

export interface Reading {
  /** Unix epoch milliseconds, strictly increasing within a buffer */
  readonly timestamp: number;

  /** Degrees Celsius */
  readonly temperature: number;

  /** Relative humidity, percent */
  readonly humidity: number;

  /** Atmospheric pressure, hPa */
  readonly pressure: number;

  readonly status: SensorStatus;
}

export interface ValueRange {
  min: number;
  max: number;
}

/**
 * Catalog entry for a numeric sensor field
 *
 * `generation` is what the synthetic generator draws from.
 * `valid` is the physically plausible range a real sensor may report.
 */
export interface SensorFieldDefinition {
  field: SensorField;
  name: string;
  unit: string;
  generation: ValueRange;
  valid: ValueRange;
}

/** A value outside its field's valid range. The reading is still accepted. */
export interface QualityFlag {
  field: SensorField;
  value: number;
  min: number;
  max: number;
}

/** Produces one reading, e.g. the synthetic generator or a hardware adapter */
export type ReadingSource = (timestamp?: number) => Reading;
