/**
 * Tests for MetricsCollector and route labelling.
 */

import { describe, it, expect } from "vitest";
import { MetricsCollector, RELAY_ROUTES, UNMATCHED_ROUTE, matchRoute } from "../src/middleware/metrics.js";

const ADDRESS = "0x5FbDB2315678afecb367f032d93F642f64180aa3";
const NONCE = `0x${"ab".repeat(32)}`;

describe("MetricsCollector", () => {
  it("renders request counters and histograms", () => {
    const collector = new MetricsCollector([0.01, 1]);

    collector.recordRequest("GET", "/health", 200, 5);
    collector.recordRequest("GET", "/health", 200, 50);

    const lines = collector.render().split("\n");
    expect(lines).toContain('http_requests_total{method="GET",route="/health",status="200"} 2');
    expect(lines).toContain('http_request_duration_seconds_bucket{method="GET",route="/health",le="0.01"} 1');
    expect(lines).toContain('http_request_duration_seconds_bucket{method="GET",route="/health",le="1"} 2');
    expect(lines).toContain('http_request_duration_seconds_bucket{method="GET",route="/health",le="+Inf"} 2');
    expect(lines).toContain('http_request_duration_seconds_count{method="GET",route="/health"} 2');
  });

  it("counts authorization outcomes and times them per operation", () => {
    const collector = new MetricsCollector([0.01, 1]);
    collector.recordOutcome({ operation: "cancel", outcome: "ok", durationMs: 2 });
    collector.recordOutcome({ operation: "cancel", outcome: "ok", durationMs: 20 });
    collector.recordOutcome({ operation: "cancel", outcome: "INVALID_SIGNATURE", durationMs: 3 });

    const lines = collector.render().split("\n");
    expect(lines).toContain('presign_authorizations_total{operation="cancel",outcome="ok"} 2');
    expect(lines).toContain('presign_authorizations_total{operation="cancel",outcome="INVALID_SIGNATURE"} 1');
    expect(lines).toContain('presign_authorization_duration_seconds_bucket{operation="cancel",le="0.01"} 2');
    expect(lines).toContain('presign_authorization_duration_seconds_count{operation="cancel"} 3');
  });

  it("escapes label values", () => {
    const collector = new MetricsCollector();
    collector.recordOutcome({ operation: "transfer", outcome: 'bad "code"\n', durationMs: 1 });

    expect(collector.render()).toContain(
      'presign_authorizations_total{operation="transfer",outcome="bad \\"code\\"\\n"} 1',
    );
  });

  it("declares every family even before it has samples", () => {
    const text = new MetricsCollector().render();
    expect(text).toContain("# TYPE http_requests_total counter");
    expect(text).toContain("# TYPE presign_authorization_duration_seconds histogram");
  });

  it("clear() drops every series", () => {
    const collector = new MetricsCollector();
    collector.recordRequest("GET", "/health", 200, 1);
    collector.recordOutcome({ operation: "transfer", outcome: "ok", durationMs: 1 });
    collector.clear();

    const text = collector.render();
    expect(text).not.toContain("http_requests_total{");
    expect(text).not.toContain("presign_authorizations_total{");
  });
});

describe("matchRoute", () => {
  it("maps concrete paths to their templates", () => {
    expect(matchRoute("GET", `/api/v1/authorizations/${ADDRESS}/${NONCE}`)).toBe(
      "/api/v1/authorizations/:authorizer/:nonce",
    );
    expect(matchRoute("GET", `/api/v1/accounts/${ADDRESS}/balance`)).toBe("/api/v1/accounts/:address/balance");
    expect(matchRoute("POST", "/api/v1/authorizations/receive")).toBe("/api/v1/authorizations/receive");
  });

  it("does not take a submission path for a lookup", () => {
    expect(matchRoute("GET", "/api/v1/authorizations/transfer")).toBe(UNMATCHED_ROUTE);
  });

  it("sends everything else to unmatched", () => {
    expect(matchRoute("DELETE", "/api/v1/events")).toBe(UNMATCHED_ROUTE);
    expect(matchRoute("GET", "/api/v1/accounts//balance")).toBe(UNMATCHED_ROUTE);
    expect(matchRoute("GET", "/.env")).toBe(UNMATCHED_ROUTE);
  });

  it("matches every listed route to itself", () => {
    for (const { method, route } of RELAY_ROUTES) {
      const concrete = route.replace(":authorizer", ADDRESS).replace(":address", ADDRESS).replace(":nonce", NONCE);
      expect(matchRoute(method, concrete)).toBe(route);
    }
  });
});
