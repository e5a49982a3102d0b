/**
 * TypeBox Schema Definitions
 * @module types
 */

import { Type, Static } from '@sinclair/typebox';

// ============================================================================
// Health Schemas
// ============================================================================

export const HealthStatusSchema = Type.Union([
  Type.Literal('Healthy'),
  Type.Literal('Degraded'),
  Type.Literal('Unhealthy'),
  Type.Literal('Critical'),
  Type.Literal('Error'),
]);

/**
 * Single probe result
 */
export const ProbeResultSchema = Type.Object({
  name: Type.String(),
  status: HealthStatusSchema,
  responseTimeMs: Type.Number(),
  metadata: Type.Record(Type.String(), Type.Unknown()),
  error: Type.Optional(Type.String()),
});

export type ProbeResultResponse = Static<typeof ProbeResultSchema>;

/**
 * Composite health report
 */
export const HealthReportSchema = Type.Object({
  overallStatus: HealthStatusSchema,
  timestamp: Type.String({ format: 'date-time' }),
  durationMs: Type.Number(),
  cached: Type.Boolean(),
  probes: Type.Array(ProbeResultSchema),
  summary: Type.Object({
    issues: Type.Array(Type.String()),
    warnings: Type.Array(Type.String()),
    recommendations: Type.Array(Type.String()),
  }),
});

export type HealthReportResponse = Static<typeof HealthReportSchema>;

/**
 * Liveness Probe Response Schema
 */
export const LivenessProbeSchema = Type.Object({
  alive: Type.Boolean(),
  timestamp: Type.String({ format: 'date-time' }),
});

export type LivenessProbe = Static<typeof LivenessProbeSchema>;

/**
 * Readiness Probe Response Schema
 */
export const ReadinessProbeSchema = Type.Object({
  ready: Type.Boolean(),
  timestamp: Type.String({ format: 'date-time' }),
  dependencies: Type.Object({
    database: HealthStatusSchema,
  }),
});

export type ReadinessProbe = Static<typeof ReadinessProbeSchema>;

export const ProbeParamsSchema = Type.Object({
  probe: Type.String({ pattern: '^[a-z][a-z0-9-]*$', maxLength: 64 }),
});

export type ProbeParams = Static<typeof ProbeParamsSchema>;

// ============================================================================
// Performance Schemas
// ============================================================================

const TagsSchema = Type.Record(Type.String(), Type.String());

export const TrackMetricBodySchema = Type.Object({
  name: Type.String(),
  value: Type.Number(),
  tags: Type.Optional(TagsSchema),
});

export type TrackMetricBody = Static<typeof TrackMetricBodySchema>;

export const TrackEventBodySchema = Type.Object({
  name: Type.String(),
  tags: Type.Optional(TagsSchema),
});

export type TrackEventBody = Static<typeof TrackEventBodySchema>;

export const AcceptedSchema = Type.Object({
  accepted: Type.Boolean(),
});

const MetricAggregateSchema = Type.Object({
  count: Type.Number(),
  sum: Type.Number(),
  min: Type.Number(),
  max: Type.Number(),
  avg: Type.Number(),
});

export const MetricSummarySchema = Type.Object({
  since: Type.String({ format: 'date-time' }),
  totalMetrics: Type.Number(),
  totalEvents: Type.Number(),
  metrics: Type.Record(Type.String(), MetricAggregateSchema),
  events: Type.Record(Type.String(), Type.Number()),
});

const TierStatisticsSchema = Type.Object({
  hits: Type.Number(),
  misses: Type.Number(),
  totalRequests: Type.Number(),
  hitRate: Type.Number(),
  sets: Type.Number(),
  removes: Type.Number(),
  sampleCount: Type.Number(),
  totalLatencyMs: Type.Number(),
  averageLatencyMs: Type.Number(),
  currentKeyCount: Type.Number(),
  totalBytesStored: Type.Number(),
  bytesServed: Type.Number(),
});

export const CacheStatisticsSchema = Type.Object({
  mode: Type.Union([Type.Literal('dual-tier'), Type.Literal('local-only')]),
  fallbackReason: Type.Optional(Type.String()),
  memory: TierStatisticsSchema,
  distributed: TierStatisticsSchema,
  combined: TierStatisticsSchema,
  extra: Type.Object({
    startedAt: Type.String({ format: 'date-time' }),
    uptimeSeconds: Type.Number(),
    operationsPerSecond: Type.Number(),
    averageValueSizeBytes: Type.Number(),
    layerPreference: Type.Union([
      Type.Literal('Memory-Heavy'),
      Type.Literal('Redis-Heavy'),
      Type.Literal('Balanced'),
      Type.Literal('None'),
    ]),
    efficiency: Type.Object({
      memory: Type.Number(),
      distributed: Type.Number(),
    }),
  }),
});

export type CacheStatisticsResponse = Static<typeof CacheStatisticsSchema>;

// ============================================================================
// Admin Cache Schemas
// ============================================================================

const DeletionCountsSchema = Type.Object({
  memory: Type.Number(),
  distributed: Type.Number(),
});

export const ClearAllResponseSchema = Type.Object({
  cleared: Type.Boolean(),
  deleted: DeletionCountsSchema,
});

export const PatternQuerySchema = Type.Object({
  pattern: Type.String(),
});

export type PatternQuery = Static<typeof PatternQuerySchema>;

export const PatternRemovalResponseSchema = Type.Object({
  pattern: Type.String(),
  deleted: DeletionCountsSchema,
});

// ============================================================================
// Error Schema
// ============================================================================

export const ErrorResponseSchema = Type.Object({
  statusCode: Type.Number(),
  error: Type.String(),
  message: Type.String(),
  code: Type.String(),
  requestId: Type.Optional(Type.String()),
  timestamp: Type.String(),
  details: Type.Optional(Type.Unknown()),
  cause: Type.Optional(Type.String()),
  validationErrors: Type.Optional(
    Type.Array(
      Type.Object({
        field: Type.String(),
        message: Type.String(),
        code: Type.Optional(Type.String()),
        value: Type.Optional(Type.Unknown()),
      })
    )
  ),
});

export type ErrorResponseBody = Static<typeof ErrorResponseSchema>;
