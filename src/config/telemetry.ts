import path from 'path';

export const PORT = parseInt(process.env.PORT || '3000', 10);
export const HOST = process.env.HOST || '0.0.0.0';

// Retention window: the last N readings
export const HISTORY_CAPACITY = parseInt(process.env.HISTORY_CAPACITY || '100', 10);

// Backdated history synthesized on start-up so charts are populated immediately
export const BOOTSTRAP_COUNT = parseInt(process.env.BOOTSTRAP_COUNT || '50', 10);
export const BOOTSTRAP_INTERVAL_SECONDS = parseInt(process.env.BOOTSTRAP_INTERVAL_SECONDS || '12', 10);

// Steady-state producer interval
export const TICK_INTERVAL_MS = parseInt(process.env.TICK_INTERVAL_MS || '3000', 10);

export const ANOMALY_THRESHOLD = parseFloat(process.env.ANOMALY_THRESHOLD || '2');
export const ANOMALY_MIN_SAMPLES = parseInt(process.env.ANOMALY_MIN_SAMPLES || '10', 10);

// Readings a live subscription may have queued or unflushed before it is closed as saturated
export const SUBSCRIPTION_MAX_PENDING = parseInt(process.env.SUBSCRIPTION_MAX_PENDING || '256', 10);

export const DASHBOARD_DIR = process.env.DASHBOARD_DIR || path.resolve('dashboard');

// Chart-data generation slower than this is logged as a warning
export const SLOW_CHART_SECONDS = 1.0;
