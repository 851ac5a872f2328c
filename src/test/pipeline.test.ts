import { describe, it, expect, vi, afterEach } from 'vitest';
import { TelemetryPipeline } from '../utils/pipeline';
import { makeReading, silentLogger } from './helpers';

function createPipeline(overrides: Partial<ConstructorParameters<typeof TelemetryPipeline>[0]> = {}) {
  return new TelemetryPipeline({ logger: silentLogger, ...overrides });
}

describe('TelemetryPipeline', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('bootstraps 50 readings ending now with means inside the generation ranges', () => {
    const pipeline = createPipeline();
    const before = Date.now();

    const count = pipeline.bootstrap({ count: 50, intervalSeconds: 12 });
    const after = Date.now();

    expect(count).toBe(50);
    expect(pipeline.bufferSize).toBe(50);
    expect(pipeline.totalReadings).toBe(50);

    const latest = pipeline.latest();
    expect(latest?.timestamp).toBeGreaterThanOrEqual(before);
    expect(latest?.timestamp).toBeLessThanOrEqual(after);

    const summary = pipeline.summarize();
    expect(summary.count).toBe(50);
    expect(summary.temperature.mean).toBeGreaterThanOrEqual(18);
    expect(summary.temperature.mean).toBeLessThanOrEqual(26);
    expect(summary.humidity.mean).toBeGreaterThanOrEqual(30);
    expect(summary.humidity.mean).toBeLessThanOrEqual(65);
    expect(summary.pressure.mean).toBeGreaterThanOrEqual(1000);
    expect(summary.pressure.mean).toBeLessThanOrEqual(1030);
  });

  it('does not publish bootstrapped history', () => {
    const pipeline = createPipeline();
    const subscription = pipeline.subscribe();

    pipeline.bootstrap({ count: 5 });

    expect(subscription.pendingCount).toBe(0);
    expect(pipeline.broadcastStats().published).toBe(0);
  });

  it('appends then publishes on each tick', async () => {
    const reading = makeReading({ timestamp: 5000, temperature: 19.9 });
    const pipeline = createPipeline({ source: () => reading });
    const subscription = pipeline.subscribe();

    pipeline.tick();

    expect(pipeline.latest()).toEqual(reading);
    await expect(subscription.next()).resolves.toEqual({ value: reading, done: false });
  });

  it('keeps timestamps strictly increasing', () => {
    const pipeline = createPipeline();

    pipeline.ingest(makeReading({ timestamp: 1000 }));
    const { reading } = pipeline.ingest(makeReading({ timestamp: 1000, temperature: 23 }));
    pipeline.ingest(makeReading({ timestamp: 900 }));

    expect(reading.timestamp).toBe(1001);
    expect(reading.temperature).toBe(23);
    expect(pipeline.snapshot().map((r) => r.timestamp)).toEqual([1000, 1001, 1002]);
  });

  it('accepts out-of-range readings and flags them', () => {
    const pipeline = createPipeline();

    const result = pipeline.ingest(makeReading({ humidity: 104.5, pressure: 250 }));

    expect(pipeline.bufferSize).toBe(1);
    expect(result.qualityFlags).toEqual([
      { field: 'humidity', value: 104.5, min: 0, max: 100 },
      { field: 'pressure', value: 250, min: 300, max: 1100 },
    ]);
    expect(pipeline.qualityFlagCount).toBe(2);
  });

  it('stores readings frozen even when the input was not', () => {
    const pipeline = createPipeline();
    pipeline.ingest({ timestamp: 1, temperature: 20, humidity: 40, pressure: 1010, status: 'warning' });

    expect(Object.isFrozen(pipeline.latest())).toBe(true);
  });

  it('respects the configured capacity', () => {
    const pipeline = createPipeline({ capacity: 3 });
    for (let ts = 1; ts <= 5; ts++) {
      pipeline.ingest(makeReading({ timestamp: ts }));
    }

    expect(pipeline.bufferSize).toBe(3);
    expect(pipeline.totalReadings).toBe(5);
    expect(pipeline.snapshot().map((r) => r.timestamp)).toEqual([3, 4, 5]);
  });

  it('produces on a fixed interval until stopped', () => {
    vi.useFakeTimers();
    const pipeline = createPipeline({ tickIntervalMs: 3000 });
    const subscription = pipeline.subscribe();

    pipeline.start();
    pipeline.start();
    expect(pipeline.running).toBe(true);

    vi.advanceTimersByTime(9000);
    expect(pipeline.totalReadings).toBe(3);
    expect(subscription.pendingCount).toBe(3);

    pipeline.stop();
    vi.advanceTimersByTime(9000);

    expect(pipeline.running).toBe(false);
    expect(pipeline.totalReadings).toBe(3);
    expect(subscription.closeReason).toBe('shutdown');
    expect(pipeline.activeSubscriptions).toBe(0);
  });

  it('keeps producing when one consumer fails', () => {
    const pipeline = createPipeline({ source: () => makeReading({ timestamp: Date.now() }) });
    const received: number[] = [];

    pipeline.subscribe({
      sink: {
        deliver() {
          throw new Error('socket closed');
        },
      },
    });
    pipeline.subscribe({
      sink: {
        deliver(reading) {
          received.push(reading.temperature);
        },
      },
    });

    pipeline.tick();
    pipeline.tick();

    expect(received).toEqual([21.5, 21.5]);
    expect(pipeline.activeSubscriptions).toBe(1);
    expect(pipeline.broadcastStats().failures).toBe(1);
  });

  it('fills anomaly parameters from its defaults', () => {
    const pipeline = createPipeline({ anomaly: { threshold: 3, minSamples: 5 } });

    expect(pipeline.resolveAnomalyParams()).toEqual({ field: 'temperature', threshold: 3, minSamples: 5 });
    expect(pipeline.resolveAnomalyParams({ field: 'pressure', threshold: undefined })).toEqual({
      field: 'pressure',
      threshold: 3,
      minSamples: 5,
    });
    expect(createPipeline().resolveAnomalyParams()).toEqual({ field: 'temperature', threshold: 2, minSamples: 10 });
  });

  it('detects anomalies against the current window', () => {
    const pipeline = createPipeline({ capacity: 20 });
    for (let i = 0; i < 20; i++) {
      pipeline.ingest(makeReading({ timestamp: i + 1, temperature: i === 7 ? 40 : 20 }));
    }

    expect(pipeline.detectAnomalies().map((a) => a.timestamp)).toEqual([8]);

    // Slide the spike out of the window
    for (let i = 0; i < 8; i++) {
      pipeline.ingest(makeReading({ timestamp: 100 + i, temperature: 20 }));
    }

    expect(pipeline.detectAnomalies()).toEqual([]);
  });
});
