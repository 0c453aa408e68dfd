// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram } from 'prom-client';

export interface MetricsConfig {
  enabled?: boolean;
}

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();

  constructor(config: MetricsConfig = {}) {
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();
    }
  }

  private initializeMetrics(): void {
    // HTTP metrics
    this.counters.set(
      'http_requests_total',
      new Counter({
        name: 'http_requests_total',
        help: 'Total HTTP requests',
        labelNames: ['status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'http_request_duration',
      new Histogram({
        name: 'http_request_duration_seconds',
        help: 'HTTP request duration',
        labelNames: ['status'],
        buckets: [0.1, 0.5, 1, 2, 5, 10],
        registers: [this.registry],
      })
    );

    // Pagination metrics
    this.counters.set(
      'pages_fetched',
      new Counter({
        name: 'pages_fetched_total',
        help: 'Pages fetched, by outcome (ok, failed, empty)',
        labelNames: ['outcome'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'scrape_duration',
      new Histogram({
        name: 'scrape_duration_seconds',
        help: 'Scrape run duration',
        labelNames: [],
        buckets: [1, 5, 15, 30, 60, 120],
        registers: [this.registry],
      })
    );

    // Normalization metrics
    this.counters.set(
      'ads_normalized',
      new Counter({
        name: 'ads_normalized_total',
        help: 'Ads normalized into canonical records',
        labelNames: [],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'normalization_failures',
      new Counter({
        name: 'normalization_failures_total',
        help: 'Ad entries skipped because normalization failed',
        labelNames: [],
        registers: [this.registry],
      })
    );

    // Export metrics
    this.counters.set(
      'records_exported',
      new Counter({
        name: 'records_exported_total',
        help: 'Records written to export files',
        labelNames: ['format'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'export_duration',
      new Histogram({
        name: 'export_duration_seconds',
        help: 'Export duration',
        labelNames: ['format'],
        buckets: [0.01, 0.05, 0.1, 0.5, 1, 5],
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Record<string, string | number> = {}, value: number = 1): void {
    const counter = this.counters.get(name);
    counter?.inc(labels, value);
  }

  recordLatency(name: string, durationMs: number, labels: Record<string, string | number> = {}): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
