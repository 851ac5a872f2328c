import Fastify from 'fastify';
import fastifyStatic from '@fastify/static';
import { TypeBoxTypeProvider } from '@fastify/type-provider-typebox';
import {
  ReadingsResponseSchema,
  LatestReadingResponseSchema,
  ReadingInputSchema,
  IngestResponseSchema,
  StatisticsResponseSchema,
  AnomalyQuerySchema,
  AnomalyResponseSchema,
  ChartsResponseSchema,
  HealthResponseSchema,
  MetricsResponseSchema,
  ErrorResponseSchema,
  HealthResponse,
} from './schemas';
import { validateReadingInput } from './validation';
import { toAnomalyJson, toQualityFlagJson, toReadingJson, toStatisticsJson } from './serialize';
import { createStreamHandler } from './stream';
import { Logger } from '../config/logger';
import { TelemetryPipeline } from '../utils/pipeline';
import { DashboardMetrics } from '../utils/monitoring';
import { buildChartData } from '../utils/charts';
import { toIsoTimestamp } from '../utils/time';
import { detectAnomalies } from '../utils/anomaly';
import { summarize } from '../utils/statistics';

export interface AppDependencies {
  pipeline: TelemetryPipeline;
  metrics: DashboardMetrics;
  logger: Logger;
  /** Static dashboard files; not served when omitted */
  dashboardDir?: string;
}

export function buildApp(deps: AppDependencies) {
  const { pipeline, metrics, logger, dashboardDir } = deps;

  const app = Fastify({
    logger,
  }).withTypeProvider<TypeBoxTypeProvider>();

  // Serve dashboard static files
  if (dashboardDir) {
    app.register(fastifyStatic, {
      root: dashboardDir,
      prefix: '/dashboard/',
    });
  }

  app.addHook('onRequest', async () => {
    metrics.trackRequest();
  });

  /**
   * GET /v1/readings - Current history snapshot, oldest first
   */
  app.get(
    '/v1/readings',
    {
      schema: {
        response: {
          200: ReadingsResponseSchema,
        },
      },
    },
    async () => {
      return { readings: pipeline.snapshot().map(toReadingJson) };
    }
  );

  /**
   * GET /v1/readings/latest - Most recent reading, null before the first one
   */
  app.get(
    '/v1/readings/latest',
    {
      schema: {
        response: {
          200: LatestReadingResponseSchema,
        },
      },
    },
    async (request) => {
      const latest = pipeline.latest();
      if (!latest) {
        request.log.warn('No sensor data available');
        return { reading: null };
      }
      return { reading: toReadingJson(latest) };
    }
  );

  /**
   * POST /v1/readings - Ingest one reading from a sensor adapter
   *
   * 1. Schema validation (automatic via Fastify)
   * 2. Timestamp checks
   * 3. Append + publish; out-of-range values are accepted and flagged
   */
  app.post(
    '/v1/readings',
    {
      schema: {
        body: ReadingInputSchema,
        response: {
          200: IngestResponseSchema,
          400: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const validation = validateReadingInput(request.body);

      if (!validation.valid) {
        return reply.status(400).send({ error: validation.reason });
      }

      const { reading, qualityFlags } = pipeline.ingest(validation.reading);

      return reply.status(200).send({
        reading: toReadingJson(reading),
        quality_flags: qualityFlags.map(toQualityFlagJson),
      });
    }
  );

  /**
   * GET /v1/statistics - Mean / sample stddev per field and status counts
   */
  app.get(
    '/v1/statistics',
    {
      schema: {
        response: {
          200: StatisticsResponseSchema,
        },
      },
    },
    async () => {
      return toStatisticsJson(pipeline.summarize());
    }
  );

  /**
   * GET /v1/anomalies - Readings whose |z| against the current window exceeds the threshold
   *
   * Z-score = (value - window_mean) / window_stddev
   * Empty with fewer than the minimum sample count or zero variance.
   */
  app.get(
    '/v1/anomalies',
    {
      schema: {
        querystring: AnomalyQuerySchema,
        response: {
          200: AnomalyResponseSchema,
        },
      },
    },
    async (request) => {
      const params = pipeline.resolveAnomalyParams(request.query);
      const anomalies = pipeline.detectAnomalies(params);

      return {
        field: params.field,
        threshold: params.threshold,
        anomalies: anomalies.map(toAnomalyJson),
      };
    }
  );

  /**
   * GET /v1/charts - Chart-ready datasets for the dashboard
   */
  app.get(
    '/v1/charts',
    {
      schema: {
        querystring: AnomalyQuerySchema,
        response: {
          200: ChartsResponseSchema,
        },
      },
    },
    async (request) => {
      const startTime = process.hrtime.bigint();

      // One snapshot feeds every dataset
      const snapshot = pipeline.snapshot();
      const params = pipeline.resolveAnomalyParams(request.query);
      const anomalies = detectAnomalies(snapshot, params);
      const charts = buildChartData(snapshot, anomalies, params.field);
      const stats = toStatisticsJson(summarize(snapshot));

      const duration = Number(process.hrtime.bigint() - startTime) / 1e9;
      metrics.trackChartGeneration(duration);
      request.log.debug({ readings: snapshot.length, duration }, 'Chart data generated');

      return {
        ...charts,
        stats,
        anomaly_count: anomalies.length,
      };
    }
  );

  /**
   * GET /stream - Live sensor feed (SSE)
   */
  app.get('/stream', createStreamHandler({ pipeline, metrics }));

  /**
   * GET /health - Health check with system counters
   */
  app.get(
    '/health',
    {
      schema: {
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    async () => {
      const health: HealthResponse = {
        status: 'healthy',
        readings_count: pipeline.bufferSize,
        active_connections: metrics.connectionCount,
        total_readings: pipeline.totalReadings,
        total_requests: metrics.totalRequests,
        timestamp: new Date().toISOString(),
      };

      // Last 10 generations
      const recentTimes = metrics.recentChartTimes(10);
      if (recentTimes.length > 0) {
        health.avg_chart_generation_time = metrics.averageChartTime(10);
        health.max_chart_generation_time = Math.max(...recentTimes);
      }

      return health;
    }
  );

  /**
   * GET /metrics - Detailed counters for monitoring
   */
  app.get(
    '/metrics',
    {
      schema: {
        response: {
          200: MetricsResponseSchema,
        },
      },
    },
    async () => {
      const latest = pipeline.latest();
      const broadcast = pipeline.broadcastStats();

      return {
        connections: {
          active: metrics.connectionCount,
          total_requests: metrics.totalRequests,
        },
        data: {
          readings_stored: pipeline.bufferSize,
          capacity: pipeline.buffer.capacity,
          total_readings: pipeline.totalReadings,
          quality_flags: pipeline.qualityFlagCount,
          latest_reading_time: latest ? toIsoTimestamp(latest.timestamp) : null,
        },
        broadcast: {
          active_subscriptions: broadcast.active,
          published: broadcast.published,
          delivered: broadcast.delivered,
          failures: broadcast.failures,
          saturations: broadcast.saturations,
        },
        performance: {
          chart_generations: metrics.chartGenerations,
          avg_chart_time: metrics.averageChartTime(),
          slow_chart_count: metrics.slowChartCount,
        },
        timestamp: new Date().toISOString(),
      };
    }
  );

  return app;
}
