import { Reading } from '../types/reading';
import { ReadingInput } from './schemas';

export type ValidationResult = { valid: true; reading: Reading } | { valid: false; reason: string };

// Allow 5 min of clock skew between the sensor adapter and this host
const MAX_CLOCK_SKEW_MS = 5 * 60 * 1000;

/**
 * Validate an adapter reading beyond schema validation
 *
 * Values outside a field's valid range are NOT rejected here;
 * they are accepted and flagged by the quality check.
 */
export function validateReadingInput(input: ReadingInput, now: number = Date.now()): ValidationResult {
  let timestamp = now;

  if (input.timestamp !== undefined) {
    const parsed = Date.parse(input.timestamp);
    if (Number.isNaN(parsed)) {
      return {
        valid: false,
        reason: 'Timestamp is not a valid ISO-8601 date',
      };
    }
    if (parsed > now + MAX_CLOCK_SKEW_MS) {
      return {
        valid: false,
        reason: 'Timestamp is in the future',
      };
    }
    timestamp = parsed;
  }

  return {
    valid: true,
    reading: Object.freeze({
      timestamp,
      temperature: input.temperature,
      humidity: input.humidity,
      pressure: input.pressure,
      status: input.status,
    }),
  };
}
