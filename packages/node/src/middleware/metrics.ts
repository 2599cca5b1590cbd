/**
 * Relayer metrics in Prometheus text format.
 *
 * HTTP traffic is labelled by route template, never by raw path, so
 * addresses, nonces and scanner noise cannot grow the label set. Any
 * request outside RELAY_ROUTES is counted as `unmatched`.
 *
 * Series:
 * - http_requests_total{method,route,status}
 * - http_request_duration_seconds{method,route}
 * - presign_authorizations_total{operation,outcome}
 * - presign_authorization_duration_seconds{operation}
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { AuthorizationOutcome } from "../services/relay-service.js";

export const PROMETHEUS_CONTENT_TYPE = "text/plain; version=0.0.4; charset=utf-8";

// =============================================================================
// Routes
// =============================================================================

export const UNMATCHED_ROUTE = "unmatched";

export const RELAY_ROUTES: readonly { readonly method: string; readonly route: string }[] = [
  { method: "GET", route: "/health" },
  { method: "GET", route: "/ready" },
  { method: "GET", route: "/metrics" },
  { method: "GET", route: "/api/v1/domain" },
  { method: "GET", route: "/api/v1/type-hashes" },
  { method: "POST", route: "/api/v1/authorizations/transfer" },
  { method: "POST", route: "/api/v1/authorizations/receive" },
  { method: "POST", route: "/api/v1/authorizations/cancel" },
  { method: "GET", route: "/api/v1/authorizations/:authorizer/:nonce" },
  { method: "GET", route: "/api/v1/accounts/:address/balance" },
  { method: "GET", route: "/api/v1/events" },
];

function segmentsMatch(template: string, path: string): boolean {
  const expected = template.split("/");
  const actual = path.split("/");
  return (
    expected.length === actual.length &&
    expected.every((segment, i) => {
      const value = actual[i] ?? "";
      return segment.startsWith(":") ? value !== "" : segment === value;
    })
  );
}

/**
 * Route template serving a request, or UNMATCHED_ROUTE.
 */
export function matchRoute(method: string, path: string): string {
  const found = RELAY_ROUTES.find((r) => r.method === method && segmentsMatch(r.route, path));
  return found?.route ?? UNMATCHED_ROUTE;
}

// =============================================================================
// Exposition
// =============================================================================

const DEFAULT_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

type Labels = Readonly<Record<string, string>>;

function escapeLabel(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

function formatLabels(labels: Labels): string {
  const pairs = Object.entries(labels).map(([k, v]) => `${k}="${escapeLabel(v)}"`);
  return pairs.length > 0 ? `{${pairs.join(",")}}` : "";
}

function seriesKey(labels: Labels): string {
  return JSON.stringify(Object.entries(labels));
}

class CounterFamily {
  private readonly _series = new Map<string, { labels: Labels; value: number }>();

  constructor(
    private readonly name: string,
    private readonly help: string,
  ) {}

  inc(labels: Labels): void {
    const key = seriesKey(labels);
    const series = this._series.get(key);
    if (series !== undefined) {
      series.value++;
    } else {
      this._series.set(key, { labels, value: 1 });
    }
  }

  render(lines: string[]): void {
    lines.push(`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} counter`);
    for (const { labels, value } of this._series.values()) {
      lines.push(`${this.name}${formatLabels(labels)} ${value}`);
    }
  }

  clear(): void {
    this._series.clear();
  }
}

interface HistogramSeries {
  readonly labels: Labels;
  readonly counts: number[];
  sum: number;
  count: number;
}

class HistogramFamily {
  private readonly _series = new Map<string, HistogramSeries>();

  constructor(
    private readonly name: string,
    private readonly help: string,
    private readonly buckets: readonly number[],
  ) {}

  observe(labels: Labels, seconds: number): void {
    const key = seriesKey(labels);
    const series = this._series.get(key) ?? { labels, counts: this.buckets.map(() => 0), sum: 0, count: 0 };
    this._series.set(key, series);

    series.sum += seconds;
    series.count++;
    this.buckets.forEach((le, i) => {
      if (seconds <= le) {
        series.counts[i] = (series.counts[i] ?? 0) + 1;
      }
    });
  }

  render(lines: string[]): void {
    lines.push(`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} histogram`);
    for (const { labels, counts, sum, count } of this._series.values()) {
      this.buckets.forEach((le, i) => {
        lines.push(`${this.name}_bucket${formatLabels({ ...labels, le: String(le) })} ${counts[i] ?? 0}`);
      });
      lines.push(`${this.name}_bucket${formatLabels({ ...labels, le: "+Inf" })} ${count}`);
      lines.push(`${this.name}_sum${formatLabels(labels)} ${sum}`);
      lines.push(`${this.name}_count${formatLabels(labels)} ${count}`);
    }
  }

  clear(): void {
    this._series.clear();
  }
}

// =============================================================================
// Collector
// =============================================================================

export class MetricsCollector {
  private readonly _requests: CounterFamily;
  private readonly _requestSeconds: HistogramFamily;
  private readonly _outcomes: CounterFamily;
  private readonly _outcomeSeconds: HistogramFamily;

  constructor(buckets: readonly number[] = DEFAULT_BUCKETS) {
    this._requests = new CounterFamily("http_requests_total", "HTTP requests by route and status");
    this._requestSeconds = new HistogramFamily(
      "http_request_duration_seconds",
      "HTTP request duration in seconds",
      buckets,
    );
    this._outcomes = new CounterFamily(
      "presign_authorizations_total",
      "Submitted authorizations by operation and outcome",
    );
    this._outcomeSeconds = new HistogramFamily(
      "presign_authorization_duration_seconds",
      "Time from submission to commit or rejection, in seconds",
      buckets,
    );
  }

  recordRequest(method: string, route: string, status: number, durationMs: number): void {
    this._requests.inc({ method, route, status: String(status) });
    this._requestSeconds.observe({ method, route }, durationMs / 1000);
  }

  recordOutcome(outcome: Pick<AuthorizationOutcome, "operation" | "outcome" | "durationMs">): void {
    this._outcomes.inc({ operation: outcome.operation, outcome: outcome.outcome });
    this._outcomeSeconds.observe({ operation: outcome.operation }, outcome.durationMs / 1000);
  }

  render(): string {
    const lines: string[] = [];
    this._requests.render(lines);
    this._requestSeconds.render(lines);
    this._outcomes.render(lines);
    this._outcomeSeconds.render(lines);
    return lines.join("\n") + "\n";
  }

  clear(): void {
    this._requests.clear();
    this._requestSeconds.clear();
    this._outcomes.clear();
    this._outcomeSeconds.clear();
  }
}

// =============================================================================
// Middleware
// =============================================================================

export function metricsMiddleware(collector: MetricsCollector): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();
    await next();
    collector.recordRequest(
      c.req.method,
      matchRoute(c.req.method, c.req.path),
      c.res.status,
      performance.now() - start,
    );
  };
}
