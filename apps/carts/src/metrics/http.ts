import type { Registry } from 'prom-client';
import { Histogram } from 'prom-client';

export const REQUEST_DURATION_METRIC = 'http_request_duration_seconds';

export const REQUEST_DURATION_LABELS = ['service', 'method', 'path', 'status_code'] as const;

export type RequestDurationLabel = (typeof REQUEST_DURATION_LABELS)[number];

export type HttpMetrics = {
  requestDuration: Histogram<RequestDurationLabel>;
};

/**
 * Registers the request latency histogram on `registry`. Buckets are
 * prom-client's defaults. Throws when the registry already holds a metric of
 * the same name, so a misconfigured process fails at startup.
 */
export function createHttpMetrics(registry: Registry): HttpMetrics {
  const requestDuration = new Histogram({
    name: REQUEST_DURATION_METRIC,
    help: 'Request duration in seconds.',
    labelNames: REQUEST_DURATION_LABELS,
    registers: [registry],
  });

  return { requestDuration };
}
