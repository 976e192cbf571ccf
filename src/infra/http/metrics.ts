import type { Request, RequestHandler } from 'express';

interface DurationStats {
  sumSeconds: number;
  count: number;
}

function escapeLabel(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

/**
 * Matched route pattern (e.g. `/users/:id`) so label cardinality stays
 * bounded; requests no route matched share one label.
 */
export function routeLabel(req: Request): string {
  const route: unknown = req.route;
  if (route && typeof route === 'object' && 'path' in route && typeof route.path === 'string') {
    return route.path;
  }
  return 'unmatched';
}

export class HttpMetrics {
  private readonly startedAtMs: number;

  private readonly requestTotals = new Map<string, number>();

  private readonly durations = new Map<string, DurationStats>();

  constructor(private readonly now: () => number = () => Date.now()) {
    this.startedAtMs = now();
  }

  observe(method: string, route: string, status: number, durationMs: number): void {
    const requestKey = `method="${escapeLabel(method)}",route="${escapeLabel(route)}",status="${status}"`;
    this.requestTotals.set(requestKey, (this.requestTotals.get(requestKey) ?? 0) + 1);

    const durationKey = `method="${escapeLabel(method)}",route="${escapeLabel(route)}"`;
    const stats = this.durations.get(durationKey) ?? { sumSeconds: 0, count: 0 };
    stats.sumSeconds += Math.max(0, durationMs) / 1000;
    stats.count += 1;
    this.durations.set(durationKey, stats);
  }

  middleware(): RequestHandler {
    return (req, res, next) => {
      const startedAt = this.now();
      res.on('finish', () => {
        this.observe(req.method, routeLabel(req), res.statusCode, this.now() - startedAt);
      });
      next();
    };
  }

  toPrometheus(): string {
    const uptimeSeconds = (this.now() - this.startedAtMs) / 1000;

    const lines = [
      '# HELP process_uptime_seconds Seconds since the service started.',
      '# TYPE process_uptime_seconds gauge',
      `process_uptime_seconds ${uptimeSeconds}`,
      '# HELP http_requests_total Total HTTP requests by method, route and status.',
      '# TYPE http_requests_total counter',
      ...[...this.requestTotals].map(([labels, total]) => `http_requests_total{${labels}} ${total}`),
      '# HELP http_request_duration_seconds HTTP request duration by method and route.',
      '# TYPE http_request_duration_seconds summary',
      ...[...this.durations].flatMap(([labels, stats]) => [
        `http_request_duration_seconds_sum{${labels}} ${stats.sumSeconds}`,
        `http_request_duration_seconds_count{${labels}} ${stats.count}`,
      ]),
    ];

    return `${lines.join('\n')}\n`;
  }
}
