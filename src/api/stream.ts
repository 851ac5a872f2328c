/**
 * Live sensor feed via Server-Sent Events (GET /stream)
 *
 * Each connection gets its own subscription on the broadcast channel.
 * One `sensor_update` event per published reading, in publish order.
 *
 * The subscription closes when:
 * - the client disconnects (socket `close`)
 * - a write fails, at the latest on the next publish
 * - the client stops reading and `maxPending` events sit unflushed (saturated)
 * - the pipeline shuts down
 */

import { FastifyReply, FastifyRequest } from 'fastify';
import { Reading } from '../types/reading';
import { CloseReason, DeliverySink } from '../utils/broadcast';
import { TelemetryPipeline } from '../utils/pipeline';
import { DashboardMetrics } from '../utils/monitoring';
import { toReadingJson } from './serialize';

export const SENSOR_UPDATE_EVENT = 'sensor_update';

/**
 * The parts of the raw response an SSE sink writes through
 */
export interface SseTarget {
  readonly destroyed: boolean;
  readonly writableEnded: boolean;
  write(chunk: string): boolean;
  end(): void;
  destroy(): void;
  once(event: 'drain', listener: () => void): unknown;
}

/**
 * Encode one SSE event. Multi-line data is split across `data:` lines.
 */
export function formatSseEvent(event: string, data: unknown): string {
  const payload = typeof data === 'string' ? data : JSON.stringify(data);
  const dataLines = payload
    .split(/\r?\n/)
    .map((line) => `data: ${line}`)
    .join('\n');
  return `event: ${event}\n${dataLines}\n\n`;
}

/**
 * Sink writing `sensor_update` events to a response.
 *
 * Events written while the socket is not draining count as backlog;
 * the channel closes the subscription as saturated once it reaches `maxPending`.
 */
export function createSseSink(res: SseTarget, onClose?: (reason: CloseReason) => void): DeliverySink<Reading> {
  let unflushed = 0;
  let awaitingDrain = false;

  return {
    deliver(reading) {
      if (res.destroyed || res.writableEnded) {
        throw new Error('SSE consumer is gone');
      }
      const flushed = res.write(formatSseEvent(SENSOR_UPDATE_EVENT, toReadingJson(reading)));
      if (flushed && !awaitingDrain) {
        return;
      }

      unflushed++;
      if (!awaitingDrain) {
        awaitingDrain = true;
        res.once('drain', () => {
          awaitingDrain = false;
          unflushed = 0;
        });
      }
    },
    backlog() {
      return unflushed;
    },
    close(reason) {
      onClose?.(reason);
      // A stuck or broken socket would keep its buffered events alive
      if (reason === 'saturated' || reason === 'delivery_failed') {
        if (!res.destroyed) {
          res.destroy();
        }
      } else if (!res.writableEnded) {
        res.end();
      }
    },
  };
}

export function createStreamHandler(deps: { pipeline: TelemetryPipeline; metrics: DashboardMetrics }) {
  const { pipeline, metrics } = deps;

  return async function streamHandler(request: FastifyRequest, reply: FastifyReply): Promise<void> {
    reply.hijack();
    const res = reply.raw;

    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
      'X-Accel-Buffering': 'no',
    });
    // Comment line so clients see the stream open before the first reading
    res.write(': connected\n\n');

    metrics.trackConnection();
    request.log.info('Starting SSE stream for sensor data');

    const subscription = pipeline.subscribe({
      sink: createSseSink(res, (reason) => {
        metrics.trackDisconnection();
        request.log.info({ reason }, 'SSE stream closed');
      }),
    });

    res.on('close', () => {
      subscription.close('disconnected');
    });
    res.on('error', (err) => {
      request.log.warn({ err }, 'SSE socket error');
      subscription.close('delivery_failed');
    });
  };
}
