import type { FastifyInstance } from 'fastify';

import { captureInstrumentationError } from '../observability/sentry';
import type { LatencyRecorder } from './latency-recorder';
import type { RequestTimer, TimerToken } from './request-timer';
import type { RouteMatcher } from './route-cache';

declare module 'fastify' {
  interface FastifyRequest {
    monitoringTimer: TimerToken | null;
  }
}

export type MonitoringPluginOptions = {
  matcher: RouteMatcher;
  recorder: LatencyRecorder;
  timer: RequestTimer;
};

/**
 * Times every request and records its latency against the matched route
 * pattern. Nothing in here may change the response: every fault ends as a log
 * line and a missing data point.
 */
export function registerMonitoringPlugin(app: FastifyInstance, options: MonitoringPluginOptions) {
  const { matcher, recorder, timer } = options;

  app.decorateRequest('monitoringTimer', null);

  app.addHook('onRequest', async (request) => {
    try {
      request.monitoringTimer = timer.start();
    } catch (error) {
      request.log.warn({ err: error }, 'Failed to start request timer');
    }
  });

  // onResponse runs after error replies too, so failed requests are observed.
  app.addHook('onResponse', async (request, reply) => {
    const token = request.monitoringTimer;
    request.monitoringTimer = null;

    let durationSeconds: number;
    try {
      durationSeconds = timer.elapsed(token);
    } catch (error) {
      request.log.error({ err: error, method: request.method, url: request.url }, 'Request timer misuse');
      captureInstrumentationError(error, { method: request.method, url: request.url });
      return;
    }

    let pattern: string;
    try {
      pattern = await matcher.resolve(request.method, request.url);
    } catch (error) {
      request.log.warn({ err: error }, 'Route patterns unavailable, latency not recorded');
      return;
    }

    if (!pattern) {
      return;
    }

    try {
      recorder.record({
        method: request.method,
        pattern,
        statusCode: reply.statusCode,
        durationSeconds,
      });
    } catch (error) {
      request.log.error({ err: error, pattern }, 'Failed to record request latency');
    }
  });
}
