/**
 * Prometheus metrics middleware + collector.
 *
 * Hand-rolled Prometheus text format. Collects:
 * - http_requests_total (counter, by method + path + status)
 * - named pipeline counters, e.g. pft_node_transactions_total{outcome}
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Metrics Collector
// =============================================================================

type Labels = Record<string, string>;

interface CounterSeries {
  readonly labels: Labels;
  count: number;
}

interface NamedCounter {
  help: string;
  readonly series: Map<string, CounterSeries>;
}

const HTTP_REQUESTS = "http_requests_total";

export class MetricsCollector {
  /** name → { help, labels-key → series } */
  private readonly _counters = new Map<string, NamedCounter>();

  constructor() {
    this.describeCounter(HTTP_REQUESTS, "Total HTTP requests");
  }

  /**
   * Register a counter with its HELP text. Registered counters render
   * even before their first increment.
   */
  describeCounter(name: string, help: string): void {
    const existing = this._counters.get(name);
    if (existing !== undefined) {
      existing.help = help;
    } else {
      this._counters.set(name, { help, series: new Map() });
    }
  }

  /**
   * Record an HTTP request.
   */
  recordRequest(method: string, path: string, status: number): void {
    this.incrementCounter(HTTP_REQUESTS, { method, path, status: String(status) });
  }

  /**
   * Increment a named counter with arbitrary labels.
   */
  incrementCounter(name: string, labels: Labels = {}): void {
    let counter = this._counters.get(name);
    if (counter === undefined) {
      counter = { help: "Counter", series: new Map() };
      this._counters.set(name, counter);
    }

    const key = renderLabels(labels);
    const series = counter.series.get(key);
    if (series !== undefined) {
      series.count++;
    } else {
      counter.series.set(key, { labels: { ...labels }, count: 1 });
    }
  }

  /**
   * Current value of a named counter for an exact label set.
   */
  counterValue(name: string, labels: Labels = {}): number {
    return this._counters.get(name)?.series.get(renderLabels(labels))?.count ?? 0;
  }

  /**
   * Render metrics in Prometheus text exposition format.
   */
  render(): string {
    const lines: string[] = [];

    for (const [name, counter] of this._counters) {
      lines.push(`# HELP ${name} ${counter.help}`);
      lines.push(`# TYPE ${name} counter`);
      for (const [key, series] of counter.series) {
        lines.push(key === "" ? `${name} ${series.count}` : `${name}{${key}} ${series.count}`);
      }
    }

    return lines.join("\n") + "\n";
  }

  clear(): void {
    for (const counter of this._counters.values()) {
      counter.series.clear();
    }
  }
}

/**
 * Labels sorted by name: method="GET",path="/health"
 */
function renderLabels(labels: Labels): string {
  return Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}="${v}"`)
    .join(",");
}

// =============================================================================
// Middleware
// =============================================================================

export function metricsMiddleware(
  collector: MetricsCollector,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    await next();
    collector.recordRequest(c.req.method, c.req.path, c.res.status);
  };
}
