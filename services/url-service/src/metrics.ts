import client from "prom-client";

export const registry = new client.Registry();

client.collectDefaultMetrics({ register: registry });

const httpLabels = ["method", "route", "status_code"] as const;

export const httpRequestsTotal = new client.Counter({
  name: "http_requests_total",
  help: "Requests served, by route and status",
  labelNames: httpLabels,
  registers: [registry]
});

// Redirect lookups sit in the low milliseconds; batch writes to postgres can take seconds.
export const httpRequestDurationSeconds = new client.Histogram({
  name: "http_request_duration_seconds",
  help: "Time from request arrival to response, by route and status",
  labelNames: httpLabels,
  buckets: [0.001, 0.0025, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [registry]
});

export const shortUrlsCreatedTotal = new client.Counter({
  name: "short_urls_created_total",
  help: "Shortening outcomes per submitted URL (batch rows counted one by one)",
  labelNames: ["outcome"] as const,
  registers: [registry]
});
