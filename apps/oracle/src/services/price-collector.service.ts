import { Injectable, Optional } from '@nestjs/common';
import { Source } from '../interfaces/source.interface';
import {
  CollectionResult,
  FailureKind,
  FetchFailure,
  PricePoint,
} from '../interfaces/price-point.interface';
import { QuoteFetcherService } from './quote-fetcher.service';
import { AuditLogService } from '../logging/audit-log.service';
import { MetricsService, SourceOutcome } from '../metrics/metrics.service';
import { PRICE_DECIMALS } from './aggregation.service';
import { NetworkError } from '../exceptions';
import { describeError, roundTo, utcNowIso } from '../utils/format.util';

type CollectOutcome = { ok: true; point: PricePoint } | { ok: false; failure: FetchFailure };

/**
 * Price Collector
 *
 * Asks every source for its price exactly once, all sources in parallel.
 * A source's failure is recorded and never affects the others; every outcome
 * is written to the audit log exactly once.
 */
@Injectable()
export class PriceCollectorService {
  constructor(
    private readonly quoteFetcher: QuoteFetcherService,
    private readonly auditLog: AuditLogService,
    @Optional() private readonly metricsService?: MetricsService,
  ) {}

  /**
   * @returns successes in completion order, and one failure per failed source
   */
  async collect(sources: readonly Source[], timeoutMs: number): Promise<CollectionResult> {
    const successes: PricePoint[] = [];
    const failures: FetchFailure[] = [];

    await Promise.all(
      sources.map(async (source) => {
        const outcome = await this.collectOne(source, timeoutMs);
        if (outcome.ok) {
          successes.push(outcome.point);
        } else {
          failures.push(outcome.failure);
        }
      }),
    );

    return { successes, failures };
  }

  private async collectOne(source: Source, timeoutMs: number): Promise<CollectOutcome> {
    const started = performance.now();

    try {
      const quote = await this.quoteFetcher.fetch(source, timeoutMs);
      const price = source.parser.parse(quote.body);
      const timestamp = utcNowIso();

      this.auditLog.info('api_call_success', {
        api: source.name,
        status: quote.status,
        latency_ms: quote.latencyMs.toFixed(2),
        bytes: quote.byteCount,
        price: price.toFixed(8),
        url: source.url,
      });
      this.metricsService?.recordSourceOutcome(source.name, 'success', quote.latencyMs / 1000);

      return { ok: true, point: { api: source.name, price: roundTo(price, PRICE_DECIMALS), timestamp } };
    } catch (error) {
      const latencyMs = performance.now() - started;
      const kind: FailureKind = error instanceof NetworkError ? 'network' : 'data';

      this.auditLog.warn('api_call_failure', {
        api: source.name,
        latency_ms: latencyMs.toFixed(2),
        error: `${errorName(error)}: ${describeError(error)}`,
        url: source.url,
      });
      this.metricsService?.recordSourceOutcome(source.name, toOutcome(kind), latencyMs / 1000);

      return { ok: false, failure: { api: source.name, kind, error: describeError(error) } };
    }
  }
}

function toOutcome(kind: FailureKind): SourceOutcome {
  return kind === 'network' ? 'network_error' : 'data_error';
}

function errorName(error: unknown): string {
  return error instanceof Error ? error.name : typeof error;
}
