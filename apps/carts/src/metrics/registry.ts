import { collectDefaultMetrics, Registry } from 'prom-client';

import type { AppConfig } from '../config';

/** `carts-api` becomes `carts_api_`: metric names only take `[a-zA-Z0-9_:]`. */
export function defaultMetricsPrefix(serviceName: string): string {
  const sanitized = serviceName
    .toLowerCase()
    .replace(/[^a-z0-9_]+/g, '_')
    .replace(/^_+|_+$/g, '');

  if (sanitized.length === 0) {
    return '';
  }

  return /^[0-9]/.test(sanitized) ? `_${sanitized}_` : `${sanitized}_`;
}

/**
 * Process metrics carry the service prefix. The request duration histogram is
 * registered without one, its `service` label tells services apart.
 */
export function createMetricsRegistry(config: AppConfig): Registry {
  const registry = new Registry();

  if (config.metrics.enabled) {
    collectDefaultMetrics({
      register: registry,
      prefix: defaultMetricsPrefix(config.service.name),
    });
  }

  return registry;
}
