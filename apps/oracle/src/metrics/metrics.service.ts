import { Injectable } from '@nestjs/common';
import { promises as fs } from 'fs';
import * as path from 'path';
import { Registry, Counter, Gauge, Histogram } from 'prom-client';

export type SourceOutcome = 'success' | 'network_error' | 'data_error';
export type RunResult = 'success' | 'failure';

/**
 * Service that registers and updates Prometheus metrics for a single run.
 * The oracle exits after one run, so instead of being scraped the registry is
 * written out as a node-exporter textfile when a path is configured.
 */
@Injectable()
export class MetricsService {
  private readonly register: Registry;

  /** Fetch outcomes per source */
  readonly sourceRequests: Counter<'source' | 'outcome'>;

  /** Request latency per source in seconds */
  readonly sourceLatency: Histogram<'source'>;

  /** Completed runs by result */
  readonly runs: Counter<'result'>;

  /** Median published by the last successful run */
  readonly medianPrice: Gauge<string>;

  constructor() {
    this.register = new Registry();
    this.sourceRequests = new Counter({
      name: 'oracle_source_requests_total',
      help: 'Price requests per source by outcome',
      labelNames: ['source', 'outcome'],
      registers: [this.register],
    });
    this.sourceLatency = new Histogram({
      name: 'oracle_source_latency_seconds',
      help: 'Price request duration per source in seconds',
      labelNames: ['source'],
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
      registers: [this.register],
    });
    this.runs = new Counter({
      name: 'oracle_runs_total',
      help: 'Oracle runs by result',
      labelNames: ['result'],
      registers: [this.register],
    });
    this.medianPrice = new Gauge({
      name: 'oracle_median_price_usd',
      help: 'Median USD price of the last successful run',
      registers: [this.register],
    });
  }

  recordSourceOutcome(source: string, outcome: SourceOutcome, latencySeconds: number): void {
    this.sourceRequests.inc({ source, outcome }, 1);
    this.sourceLatency.observe({ source }, latencySeconds);
  }

  recordRun(result: RunResult, medianPrice?: number): void {
    this.runs.inc({ result }, 1);
    if (medianPrice !== undefined) {
      this.medianPrice.set(medianPrice);
    }
  }

  /**
   * Get metrics in Prometheus text format.
   */
  async getMetrics(): Promise<string> {
    return this.register.metrics();
  }

  /**
   * Write the exposition text to `filePath`, creating parent directories.
   */
  async writeTextfile(filePath: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, await this.getMetrics(), 'utf-8');
  }
}
