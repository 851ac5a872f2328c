import { describe, it, expect, vi, afterEach } from 'vitest';
import { bootstrapReadings, generateReading } from '../utils/generator';

/** Random source that replays the given values in order */
function sequence(...values: number[]): () => number {
  let i = 0;
  return () => values[i++ % values.length];
}

describe('generateReading', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('draws every field inside its generation range, rounded to one decimal', () => {
    for (let i = 0; i < 500; i++) {
      const r = generateReading(i);

      expect(r.temperature).toBeGreaterThanOrEqual(18);
      expect(r.temperature).toBeLessThanOrEqual(26);
      expect(r.humidity).toBeGreaterThanOrEqual(30);
      expect(r.humidity).toBeLessThanOrEqual(65);
      expect(r.pressure).toBeGreaterThanOrEqual(1000);
      expect(r.pressure).toBeLessThanOrEqual(1030);
      expect(['normal', 'warning', 'critical']).toContain(r.status);

      expect(Math.round(r.temperature * 10) / 10).toBe(r.temperature);
    }
  });

  it('maps the bottom and top of the random source onto the range bounds', () => {
    const low = generateReading(0, sequence(0));
    expect(low).toEqual({ timestamp: 0, temperature: 18, humidity: 30, pressure: 1000, status: 'normal' });

    const high = generateReading(0, sequence(0.9999999));
    expect(high).toEqual({ timestamp: 0, temperature: 26, humidity: 65, pressure: 1030, status: 'critical' });
  });

  it('draws status independently of the numeric fields', () => {
    // Lowest possible values, yet labelled critical
    const r = generateReading(0, sequence(0, 0, 0, 0.9));
    expect(r).toEqual({ timestamp: 0, temperature: 18, humidity: 30, pressure: 1000, status: 'critical' });
  });

  it('uses the current time when no timestamp is given', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-01T12:00:00.000Z'));

    expect(generateReading().timestamp).toBe(Date.parse('2024-03-01T12:00:00.000Z'));
  });

  it('returns frozen readings', () => {
    expect(Object.isFrozen(generateReading(0))).toBe(true);
  });
});

describe('bootstrapReadings', () => {
  it('produces backdated readings at a fixed spacing ending at `end`', () => {
    const end = 1_700_000_000_000;

    const readings = bootstrapReadings({ count: 50, intervalSeconds: 12, end });

    expect(readings).toHaveLength(50);
    expect(readings[0].timestamp).toBe(end - 49 * 12_000);
    expect(readings[49].timestamp).toBe(end);
    for (let i = 1; i < readings.length; i++) {
      expect(readings[i].timestamp - readings[i - 1].timestamp).toBe(12_000);
    }
  });

  it('defaults to 50 readings 12 seconds apart', () => {
    const readings = bootstrapReadings({ end: 0 });
    expect(readings).toHaveLength(50);
    expect(readings[0].timestamp).toBe(-588_000);
  });

  it('returns an empty list for a zero count', () => {
    expect(bootstrapReadings({ count: 0 })).toEqual([]);
  });
});
