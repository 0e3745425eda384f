export type MetricsSnapshot = {
  uptimeSeconds: number;
  requests: {
    total: number;
    inFlight: number;
    errors: number;
  };
  durationMs: {
    total: number;
    average: number;
  };
};

/**
 * In-process request counters. A request counts as an error when it ends
 * with a 4xx/5xx status or the client goes away before it finishes.
 */
export class RequestMetrics {
  private readonly now: () => number;
  private readonly startedAt: number;
  private total = 0;
  private completed = 0;
  private errors = 0;
  private totalDurationMs = 0;

  constructor(now: () => number = Date.now) {
    this.now = now;
    this.startedAt = now();
  }

  requestStarted(): void {
    this.total += 1;
  }

  requestFinished(statusCode: number, durationMs: number, aborted = false): void {
    this.completed += 1;
    this.totalDurationMs += durationMs;
    if (aborted || statusCode >= 400) this.errors += 1;
  }

  snapshot(): MetricsSnapshot {
    return {
      uptimeSeconds: Math.floor((this.now() - this.startedAt) / 1000),
      requests: {
        total: this.total,
        inFlight: this.total - this.completed,
        errors: this.errors,
      },
      durationMs: {
        total: this.totalDurationMs,
        average: this.completed ? Math.round(this.totalDurationMs / this.completed) : 0,
      },
    };
  }
}
