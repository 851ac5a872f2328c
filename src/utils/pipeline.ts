/**
 * Telemetry Pipeline
 *
 * Owns the history buffer and the broadcast channel.
 * A timer-driven tick draws a reading from the source, appends it,
 * then publishes it to every live subscription.
 *
 * Statistics, anomalies and chart data are read from snapshots and never cached.
 */

import { Logger } from '../config/logger';
import { QualityFlag, Reading, ReadingSource } from '../types/reading';
import { AnomalyParams, AnomalyRecord, StatisticalSummary } from '../types/statistics';
import { detectAnomalies } from './anomaly';
import { BroadcastChannel, BroadcastStats, SubscribeOptions, Subscription } from './broadcast';
import { BootstrapOptions, bootstrapReadings, generateReading } from './generator';
import { HistoryBuffer } from './history';
import { checkQuality } from './quality';
import { summarize } from './statistics';

export interface PipelineOptions {
  logger: Logger;
  /** History capacity (default: 100) */
  capacity?: number;
  /** Producer interval in ms (default: 3000) */
  tickIntervalMs?: number;
  /** Defaults to the synthetic generator */
  source?: ReadingSource;
  /** Defaults applied to detectAnomalies() */
  anomaly?: AnomalyParams;
  /** Queued or unflushed readings a subscription may hold before it is closed as saturated */
  maxPending?: number;
}

export interface IngestOptions {
  /** Push to live subscribers (default: true) */
  publish?: boolean;
}

export interface IngestResult {
  reading: Reading;
  qualityFlags: QualityFlag[];
}

const DEFAULT_CAPACITY = 100;
const DEFAULT_TICK_INTERVAL_MS = 3000;
const DEFAULT_ANOMALY_THRESHOLD = 2;
const DEFAULT_ANOMALY_MIN_SAMPLES = 10;

export class TelemetryPipeline {
  readonly buffer: HistoryBuffer;
  readonly channel: BroadcastChannel<Reading>;
  readonly tickIntervalMs: number;

  private readonly log: Logger;
  private readonly source: ReadingSource;
  private readonly anomalyDefaults: AnomalyParams;
  private timer: ReturnType<typeof setInterval> | undefined;
  private _totalReadings = 0;
  private _qualityFlagCount = 0;

  constructor(options: PipelineOptions) {
    this.log = options.logger.child({ module: 'pipeline' });
    this.buffer = new HistoryBuffer(options.capacity ?? DEFAULT_CAPACITY);
    this.channel = new BroadcastChannel<Reading>(options.maxPending);
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.source = options.source ?? ((timestamp?: number) => generateReading(timestamp));
    this.anomalyDefaults = options.anomaly ?? {};
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  get bufferSize(): number {
    return this.buffer.size;
  }

  get activeSubscriptions(): number {
    return this.channel.size;
  }

  /** Readings ingested since start-up, including evicted ones */
  get totalReadings(): number {
    return this._totalReadings;
  }

  get qualityFlagCount(): number {
    return this._qualityFlagCount;
  }

  broadcastStats(): BroadcastStats {
    return this.channel.stats();
  }

  /**
   * Fill the buffer with backdated synthetic history. Nothing is published.
   */
  bootstrap(options: BootstrapOptions = {}): number {
    const readings = bootstrapReadings(options);
    this.log.debug({ count: readings.length }, 'Generating historical sensor readings');

    for (const reading of readings) {
      this.ingest(reading, { publish: false });
    }

    this.log.info({ count: readings.length }, 'Initialized sensor history');
    return readings.length;
  }

  /**
   * Accept one reading: keep timestamps strictly increasing, flag
   * out-of-range values, append, then publish.
   */
  ingest(input: Reading, options: IngestOptions = {}): IngestResult {
    const { publish = true } = options;

    const previous = this.buffer.latest();
    let reading = input;
    if (previous && input.timestamp <= previous.timestamp) {
      reading = Object.freeze({ ...input, timestamp: previous.timestamp + 1 });
      this.log.debug(
        { original: input.timestamp, adjusted: reading.timestamp },
        'Moved non-increasing reading timestamp forward'
      );
    } else if (!Object.isFrozen(input)) {
      reading = Object.freeze({ ...input });
    }

    const qualityFlags = checkQuality(reading);
    if (qualityFlags.length > 0) {
      this._qualityFlagCount += qualityFlags.length;
      this.log.warn({ flags: qualityFlags, timestamp: reading.timestamp }, 'Sensor reading outside valid range');
    }

    if (reading.status === 'critical') {
      this.log.warn(
        { temperature: reading.temperature, humidity: reading.humidity, pressure: reading.pressure },
        'Critical sensor reading'
      );
    }

    this.buffer.append(reading);
    this._totalReadings++;

    if (publish) {
      const delivered = this.channel.publish(reading);
      this.log.debug({ temperature: reading.temperature, status: reading.status, delivered }, 'Published sensor reading');
    }

    return { reading, qualityFlags };
  }

  /**
   * One producer step: generate, append, publish
   */
  tick(): IngestResult {
    return this.ingest(this.source());
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      try {
        this.tick();
      } catch (err) {
        this.log.error({ err }, 'Producer tick failed');
      }
    }, this.tickIntervalMs);
    this.log.info({ intervalMs: this.tickIntervalMs }, 'Sensor producer started');
  }

  /**
   * Stop the producer and close every live subscription
   */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    this.channel.closeAll('shutdown');
    this.log.info(
      { totalReadings: this._totalReadings, bufferSize: this.buffer.size },
      'Sensor producer stopped'
    );
  }

  /**
   * Open a live subscription. Closes caused by delivery problems log at warn.
   */
  subscribe(options: SubscribeOptions<Reading> = {}): Subscription<Reading> {
    const subscription = this.channel.subscribe(options);
    this.log.info({ subscription: subscription.id, active: this.channel.size }, 'Subscription opened');

    subscription.onClose((reason) => {
      const context = { subscription: subscription.id, reason, active: this.channel.size };
      if (reason === 'delivery_failed' || reason === 'saturated') {
        this.log.warn(context, 'Subscription closed after delivery problem');
      } else {
        this.log.info(context, 'Subscription closed');
      }
    });

    return subscription;
  }

  unsubscribe(subscription: Subscription<Reading>): void {
    this.channel.unsubscribe(subscription);
  }

  snapshot(): readonly Reading[] {
    return this.buffer.snapshot();
  }

  latest(): Reading | undefined {
    return this.buffer.latest();
  }

  summarize(): StatisticalSummary {
    const snapshot = this.buffer.snapshot();
    if (snapshot.length === 0) {
      this.log.warn('Cannot calculate statistics: empty history');
    }
    return summarize(snapshot);
  }

  /**
   * Fill in anything the caller left out from the pipeline's defaults
   */
  resolveAnomalyParams(params: AnomalyParams = {}): Required<AnomalyParams> {
    return {
      field: params.field ?? this.anomalyDefaults.field ?? 'temperature',
      threshold: params.threshold ?? this.anomalyDefaults.threshold ?? DEFAULT_ANOMALY_THRESHOLD,
      minSamples: params.minSamples ?? this.anomalyDefaults.minSamples ?? DEFAULT_ANOMALY_MIN_SAMPLES,
    };
  }

  detectAnomalies(params: AnomalyParams = {}): AnomalyRecord[] {
    const snapshot = this.buffer.snapshot();
    const anomalies = detectAnomalies(snapshot, this.resolveAnomalyParams(params));

    if (anomalies.length > 0) {
      this.log.warn({ count: anomalies.length, field: anomalies[0].field }, 'Detected anomalies');
    } else {
      this.log.debug({ readings: snapshot.length }, 'No anomalies detected');
    }

    return anomalies;
  }
}
