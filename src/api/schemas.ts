import { Type, Static } from '@sinclair/typebox';

/**
 * Sensor status schema
 */
export const SensorStatusSchema = Type.Union([
  Type.Literal('normal'),
  Type.Literal('warning'),
  Type.Literal('critical'),
]);

/**
 * Numeric sensor field schema
 */
export const SensorFieldSchema = Type.Union([
  Type.Literal('temperature'),
  Type.Literal('humidity'),
  Type.Literal('pressure'),
]);

/**
 * Reading as served to collaborators (timestamp is ISO-8601)
 */
export const ReadingJsonSchema = Type.Object({
  timestamp: Type.String(),
  temperature: Type.Number(),
  humidity: Type.Number(),
  pressure: Type.Number(),
  status: SensorStatusSchema,
});

/**
 * Reading pushed by a sensor adapter (body of POST /v1/readings)
 */
export const ReadingInputSchema = Type.Object({
  timestamp: Type.Optional(Type.String({ format: 'date-time', maxLength: 64 })),
  temperature: Type.Number(),
  humidity: Type.Number(),
  pressure: Type.Number(),
  status: SensorStatusSchema,
});

export const QualityFlagSchema = Type.Object({
  field: SensorFieldSchema,
  value: Type.Number(),
  min: Type.Number(),
  max: Type.Number(),
});

export const IngestResponseSchema = Type.Object({
  reading: ReadingJsonSchema,
  quality_flags: Type.Array(QualityFlagSchema),
});

export const ReadingsResponseSchema = Type.Object({
  readings: Type.Array(ReadingJsonSchema),
});

export const LatestReadingResponseSchema = Type.Object({
  reading: Type.Union([ReadingJsonSchema, Type.Null()]),
});

/**
 * Statistical summary response schema
 */
export const StatisticsResponseSchema = Type.Object({
  count: Type.Number(),
  temp_mean: Type.Number(),
  temp_std: Type.Number(),
  humidity_mean: Type.Number(),
  humidity_std: Type.Number(),
  pressure_mean: Type.Number(),
  pressure_std: Type.Number(),
  status_counts: Type.Record(Type.String(), Type.Number()),
});

/**
 * Anomaly request schema (query params)
 */
export const AnomalyQuerySchema = Type.Object({
  field: Type.Optional(SensorFieldSchema),
  threshold: Type.Optional(Type.Number({ minimum: 0.5, maximum: 10 })),
});

/**
 * One anomaly; only the key named by `field` carries the value
 */
export const AnomalyJsonSchema = Type.Object({
  timestamp: Type.String(),
  temperature: Type.Optional(Type.Number()),
  humidity: Type.Optional(Type.Number()),
  pressure: Type.Optional(Type.Number()),
  z_score: Type.Number(),
});

export const AnomalyResponseSchema = Type.Object({
  field: SensorFieldSchema,
  threshold: Type.Number(),
  anomalies: Type.Array(AnomalyJsonSchema),
});

/**
 * Chart datasets response schema
 */
export const ChartsResponseSchema = Type.Object({
  timeseries: Type.Object({
    timestamps: Type.Array(Type.String()),
    temperature: Type.Array(Type.Number()),
    humidity: Type.Array(Type.Number()),
    pressure: Type.Array(Type.Number()),
  }),
  status: Type.Object({
    labels: Type.Array(Type.String()),
    values: Type.Array(Type.Number()),
    colors: Type.Array(Type.String()),
  }),
  correlation: Type.Object({
    fields: Type.Array(SensorFieldSchema),
    matrix: Type.Array(Type.Array(Type.Number())),
  }),
  anomalies: Type.Object({
    field: SensorFieldSchema,
    timestamps: Type.Array(Type.String()),
    values: Type.Array(Type.Number()),
  }),
  stats: StatisticsResponseSchema,
  anomaly_count: Type.Number(),
});

/**
 * Health check response schema
 */
export const HealthResponseSchema = Type.Object({
  status: Type.String(),
  readings_count: Type.Number(),
  active_connections: Type.Number(),
  total_readings: Type.Number(),
  total_requests: Type.Number(),
  timestamp: Type.String(),
  avg_chart_generation_time: Type.Optional(Type.Number()),
  max_chart_generation_time: Type.Optional(Type.Number()),
});

/**
 * Detailed metrics response schema
 */
export const MetricsResponseSchema = Type.Object({
  connections: Type.Object({
    active: Type.Number(),
    total_requests: Type.Number(),
  }),
  data: Type.Object({
    readings_stored: Type.Number(),
    capacity: Type.Number(),
    total_readings: Type.Number(),
    quality_flags: Type.Number(),
    latest_reading_time: Type.Union([Type.String(), Type.Null()]),
  }),
  broadcast: Type.Object({
    active_subscriptions: Type.Number(),
    published: Type.Number(),
    delivered: Type.Number(),
    failures: Type.Number(),
    saturations: Type.Number(),
  }),
  performance: Type.Object({
    chart_generations: Type.Number(),
    avg_chart_time: Type.Number(),
    slow_chart_count: Type.Number(),
  }),
  timestamp: Type.String(),
});

/**
 * Error response schema
 */
export const ErrorResponseSchema = Type.Object({
  error: Type.String(),
});

// TypeScript types derived from schemas
export type ReadingJson = Static<typeof ReadingJsonSchema>;
export type ReadingInput = Static<typeof ReadingInputSchema>;
export type QualityFlagJson = Static<typeof QualityFlagSchema>;
export type StatisticsResponse = Static<typeof StatisticsResponseSchema>;
export type AnomalyQuery = Static<typeof AnomalyQuerySchema>;
export type AnomalyJson = Static<typeof AnomalyJsonSchema>;
export type ChartsResponse = Static<typeof ChartsResponseSchema>;
export type HealthResponse = Static<typeof HealthResponseSchema>;
export type MetricsResponse = Static<typeof MetricsResponseSchema>;
