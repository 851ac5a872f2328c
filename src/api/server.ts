import { buildApp } from './app';
import { logger } from '../config/logger';
import {
  PORT,
  HOST,
  HISTORY_CAPACITY,
  BOOTSTRAP_COUNT,
  BOOTSTRAP_INTERVAL_SECONDS,
  TICK_INTERVAL_MS,
  ANOMALY_THRESHOLD,
  ANOMALY_MIN_SAMPLES,
  SUBSCRIPTION_MAX_PENDING,
  DASHBOARD_DIR,
} from '../config/telemetry';
import { TelemetryPipeline } from '../utils/pipeline';
import { DashboardMetrics } from '../utils/monitoring';

const pipeline = new TelemetryPipeline({
  logger,
  capacity: HISTORY_CAPACITY,
  tickIntervalMs: TICK_INTERVAL_MS,
  anomaly: {
    threshold: ANOMALY_THRESHOLD,
    minSamples: ANOMALY_MIN_SAMPLES,
  },
  maxPending: SUBSCRIPTION_MAX_PENDING,
});

const metrics = new DashboardMetrics(logger);

const app = buildApp({
  pipeline,
  metrics,
  logger,
  dashboardDir: DASHBOARD_DIR,
});

// Graceful shutdown: stop the producer, end every live stream, close the server
const shutdown = async (signal: string) => {
  app.log.info({ signal }, 'Sensor dashboard shutting down');
  pipeline.stop();
  try {
    await app.close();
    app.log.info(
      { connections: metrics.connectionCount, requests: metrics.totalRequests },
      'Final metrics'
    );
    process.exit(0);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

// Start server
const start = async () => {
  try {
    pipeline.bootstrap({
      count: BOOTSTRAP_COUNT,
      intervalSeconds: BOOTSTRAP_INTERVAL_SECONDS,
    });
    pipeline.start();

    await app.listen({ port: PORT, host: HOST });
    app.log.info({ readings: pipeline.bufferSize }, 'Sensor dashboard started');
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

process.once('SIGINT', () => void shutdown('SIGINT'));
process.once('SIGTERM', () => void shutdown('SIGTERM'));

void start();
