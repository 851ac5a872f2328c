import pino from 'pino';
import { Reading } from '../types/reading';

export const silentLogger = pino({ level: 'silent' });

/**
 * Build a reading with comfortable defaults
 */
export function makeReading(overrides: Partial<Reading> = {}): Reading {
  return Object.freeze({
    timestamp: 1_700_000_000_000,
    temperature: 21.5,
    humidity: 45.0,
    pressure: 1013.2,
    status: 'normal' as const,
    ...overrides,
  });
}

/**
 * One reading per temperature value, one second apart
 */
export function readingsWithTemperatures(temperatures: number[], start = 1_700_000_000_000): Reading[] {
  return temperatures.map((temperature, i) => makeReading({ timestamp: start + i * 1000, temperature }));
}
