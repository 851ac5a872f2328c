import { SENSOR_FIELDS } from '../config/sensors';
import { QualityFlag, Reading } from '../types/reading';

/**
 * Check a reading against each field's valid range
 *
 * Out-of-range values do not reject the reading; the flags travel with it.
 */
export function checkQuality(reading: Reading): QualityFlag[] {
  const flags: QualityFlag[] = [];

  for (const def of SENSOR_FIELDS) {
    const value = reading[def.field];
    if (!Number.isFinite(value) || value < def.valid.min || value > def.valid.max) {
      flags.push({
        field: def.field,
        value,
        min: def.valid.min,
        max: def.valid.max,
      });
    }
  }

  return flags;
}
