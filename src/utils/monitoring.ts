/**
 * Dashboard Metrics
 *
 * Counters behind /health and /metrics: live stream connections,
 * requests served and chart-data generation times.
 */

import { SLOW_CHART_SECONDS } from '../config/telemetry';
import { Logger } from '../config/logger';

// Generation times kept for averages
const MAX_CHART_SAMPLES = 1000;

export class DashboardMetrics {
  private _connectionCount = 0;
  private _totalRequests = 0;
  private readonly chartTimes: number[] = [];
  private _chartGenerations = 0;
  private _slowChartCount = 0;
  private readonly log: Logger;

  constructor(logger: Logger) {
    this.log = logger.child({ module: 'metrics' });
  }

  get connectionCount(): number {
    return this._connectionCount;
  }

  get totalRequests(): number {
    return this._totalRequests;
  }

  get chartGenerations(): number {
    return this._chartGenerations;
  }

  get slowChartCount(): number {
    return this._slowChartCount;
  }

  trackConnection(): void {
    this._connectionCount++;
    this.log.info({ active: this._connectionCount }, 'New SSE connection established');
  }

  trackDisconnection(): void {
    this._connectionCount = Math.max(0, this._connectionCount - 1);
    this.log.info({ active: this._connectionCount }, 'SSE connection closed');
  }

  trackRequest(): void {
    this._totalRequests++;
    if (this._totalRequests % 100 === 0) {
      this.log.info({ totalRequests: this._totalRequests }, 'Total requests served');
    }
  }

  /**
   * Record one chart-data generation, in seconds
   */
  trackChartGeneration(duration: number): void {
    this._chartGenerations++;
    this.chartTimes.push(duration);
    if (this.chartTimes.length > MAX_CHART_SAMPLES) {
      this.chartTimes.shift();
    }

    if (duration > SLOW_CHART_SECONDS) {
      this._slowChartCount++;
      this.log.warn({ duration }, 'Slow chart generation detected');
    } else {
      this.log.debug({ duration }, 'Chart data generated');
    }
  }

  /**
   * The most recent `count` generation times, oldest first
   */
  recentChartTimes(count: number = 10): number[] {
    return this.chartTimes.slice(-count);
  }

  averageChartTime(count?: number): number {
    const times = count === undefined ? this.chartTimes : this.recentChartTimes(count);
    if (times.length === 0) {
      return 0;
    }
    return times.reduce((a, b) => a + b, 0) / times.length;
  }
}
