import { Registry } from 'prom-client';
import { beforeEach, describe, expect, it } from 'vitest';

import { createHttpMetrics } from '../../metrics/http';
import { LatencyRecorder } from '../latency-recorder';
import { readObservations } from '../../../test/utils/metrics';

describe('LatencyRecorder', () => {
  let registry: Registry;
  let recorder: LatencyRecorder;

  beforeEach(() => {
    registry = new Registry();
    recorder = new LatencyRecorder(createHttpMetrics(registry), 'carts');
  });

  it('records one observation labelled by service, method, pattern and status', async () => {
    recorder.record({ method: 'GET', pattern: '/carts/{id}', statusCode: 200, durationSeconds: 0.25 });

    expect(await readObservations(registry)).toEqual([
      {
        labels: { service: 'carts', method: 'GET', path: '/carts/{id}', status_code: '200' },
        count: 1,
        sum: 0.25,
      },
    ]);
  });

  it('accumulates observations per label combination', async () => {
    recorder.record({ method: 'GET', pattern: '/carts/{id}', statusCode: 200, durationSeconds: 0.5 });
    recorder.record({ method: 'GET', pattern: '/carts/{id}', statusCode: 200, durationSeconds: 0.25 });
    recorder.record({ method: 'GET', pattern: '/carts/{id}', statusCode: 404, durationSeconds: 0.125 });

    const observations = await readObservations(registry);

    expect(observations).toHaveLength(2);
    expect(observations.find((entry) => entry.labels.status_code === '200')).toMatchObject({
      count: 2,
      sum: 0.75,
    });
    expect(observations.find((entry) => entry.labels.status_code === '404')).toMatchObject({
      count: 1,
      sum: 0.125,
    });
  });
});

describe('createHttpMetrics', () => {
  it('refuses to register the histogram twice on one registry', () => {
    const registry = new Registry();
    createHttpMetrics(registry);

    expect(() => createHttpMetrics(registry)).toThrow(/already been registered/);
  });

  it('uses the default buckets', async () => {
    const registry = new Registry();
    const { requestDuration } = createHttpMetrics(registry);
    requestDuration.observe({ service: 'carts', method: 'GET', path: '/carts', status_code: '200' }, 0.2);

    const { values } = await requestDuration.get();
    const bounds = values
      .filter((value) => value.metricName === 'http_request_duration_seconds_bucket')
      .map((value) => {
        const labels: Record<string, string | number | undefined> = { ...value.labels };
        return labels.le;
      });

    expect(bounds).toEqual([0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, '+Inf']);
  });
});
