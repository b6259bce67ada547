import type { HttpMetrics } from '../metrics/http';

export type LatencyObservation = {
  method: string;
  /** Matched route pattern. Callers skip recording when nothing matched. */
  pattern: string;
  statusCode: number;
  durationSeconds: number;
};

export class LatencyRecorder {
  constructor(
    private readonly metrics: HttpMetrics,
    private readonly serviceName: string,
  ) {}

  record(observation: LatencyObservation) {
    this.metrics.requestDuration.observe(
      {
        service: this.serviceName,
        method: observation.method,
        path: observation.pattern,
        status_code: observation.statusCode.toString(),
      },
      observation.durationSeconds,
    );
  }
}
