import { Test, TestingModule } from '@nestjs/testing';
import { PriceCollectorService } from './price-collector.service';
import { QuoteFetcherService } from './quote-fetcher.service';
import { AuditLogService } from '../logging/audit-log.service';
import { AUDIT_SINKS, MemoryAuditSink } from '../logging/audit-sink';
import { MetricsService } from '../metrics/metrics.service';
import { createSourceRegistry } from '../config/sources.config';
import { Source } from '../interfaces/source.interface';
import { FetchedQuote } from '../interfaces/fetched-quote.interface';
import { NetworkError } from '../exceptions';
import { mockPayloads } from '../__mocks__/quote-payloads.fixtures';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const quote = (body: unknown, latencyMs = 12.5): FetchedQuote => ({
  body,
  status: 200,
  byteCount: 22,
  latencyMs,
});

describe('PriceCollectorService', () => {
  let service: PriceCollectorService;
  let fetcher: { fetch: jest.Mock<Promise<FetchedQuote>, [Source, number]> };
  let metrics: MetricsService;
  let sink: MemoryAuditSink;
  const registry = createSourceRegistry();

  beforeEach(async () => {
    sink = new MemoryAuditSink();
    fetcher = { fetch: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PriceCollectorService,
        AuditLogService,
        MetricsService,
        { provide: QuoteFetcherService, useValue: fetcher },
        { provide: AUDIT_SINKS, useValue: [sink] },
      ],
    }).compile();

    service = module.get<PriceCollectorService>(PriceCollectorService);
    metrics = module.get<MetricsService>(MetricsService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  it('should collect a price from every healthy source', async () => {
    fetcher.fetch.mockImplementation(async (source) => {
      const payloads: Record<string, unknown> = {
        coingecko: mockPayloads.coingecko,
        coinbase: mockPayloads.coinbase,
        kraken: mockPayloads.kraken,
        cryptocompare: mockPayloads.cryptocompare,
        binance: mockPayloads.binance,
      };
      return quote(payloads[source.name]);
    });

    const result = await service.collect(registry, 5000);

    expect(result.failures).toEqual([]);
    expect(result.successes.map((p) => p.api).sort()).toEqual(
      ['binance', 'coinbase', 'coingecko', 'cryptocompare', 'kraken'],
    );
    expect(result.successes.find((p) => p.api === 'coinbase')?.price).toBe(1.015);
    for (const point of result.successes) {
      expect(point.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/);
    }
    expect(fetcher.fetch).toHaveBeenCalledTimes(5);
    expect(fetcher.fetch).toHaveBeenCalledWith(registry[0], 5000);
  });

  it('should append successes in completion order', async () => {
    const [coingecko, coinbase, kraken] = registry;
    fetcher.fetch.mockImplementation(async (source) => {
      if (source.name === 'coingecko') {
        await delay(40);
        return quote(mockPayloads.coingecko);
      }
      if (source.name === 'coinbase') {
        await delay(20);
        return quote(mockPayloads.coinbase);
      }
      return quote(mockPayloads.kraken);
    });

    const result = await service.collect([coingecko, coinbase, kraken], 5000);

    expect(result.successes.map((p) => p.api)).toEqual(['kraken', 'coinbase', 'coingecko']);
  });

  it('should isolate failing sources and classify them', async () => {
    fetcher.fetch.mockImplementation(async (source) => {
      if (source.name === 'binance') {
        throw new NetworkError('binance', 'HTTP 451');
      }
      if (source.name === 'kraken') {
        return quote(mockPayloads.krakenError);
      }
      return quote(source.name === 'coingecko' ? mockPayloads.coingecko : mockPayloads.coinbase);
    });

    const result = await service.collect([registry[0], registry[1], registry[2], registry[4]], 5000);

    expect(result.successes.map((p) => p.api).sort()).toEqual(['coinbase', 'coingecko']);
    expect(result.failures).toHaveLength(2);
    expect(result.failures).toContainEqual({ api: 'binance', kind: 'network', error: 'HTTP 451' });
    expect(result.failures).toContainEqual({
      api: 'kraken',
      kind: 'data',
      error: 'Kraken returned errors: ["EQuery:Unknown asset pair"]',
    });
  });

  it('should record every source exactly once in the audit log', async () => {
    const [coingecko, , , , binance] = registry;
    fetcher.fetch.mockImplementation(async (source) => {
      if (source.name === 'binance') {
        throw new NetworkError('binance', 'Timed out after 50ms');
      }
      return quote(mockPayloads.coingecko);
    });

    await service.collect([coingecko, binance], 50);

    expect(sink.lines).toHaveLength(2);
    const success = sink.lines.find((line) => line.includes('api_call_success'));
    const failure = sink.lines.find((line) => line.includes('api_call_failure'));
    expect(success).toMatch(
      / INFO api_call_success api=coingecko status=200 latency_ms=12\.50 bytes=22 price=1\.23400000 url=https:\/\/api\.coingecko\.com\/api\/v3\/simple\/price\?ids=near&vs_currencies=usd$/,
    );
    expect(failure).toMatch(
      / WARN api_call_failure api=binance latency_ms=\d+\.\d{2} error="NetworkError: Timed out after 50ms" url=https:\/\/api\.binance\.com\/api\/v3\/ticker\/price\?symbol=NEARUSDT$/,
    );
  });

  it('should round collected prices to 6 decimal places', async () => {
    fetcher.fetch.mockResolvedValue(quote({ USD: 1.23456789 }));

    const result = await service.collect([registry[3]], 5000);

    expect(result.successes[0].price).toBe(1.234568);
    expect(sink.lines[0]).toContain('price=1.23456789');
  });

  it('should record source outcomes in metrics', async () => {
    const recordSpy = jest.spyOn(metrics, 'recordSourceOutcome');
    fetcher.fetch.mockImplementation(async (source) => {
      if (source.name === 'coinbase') {
        throw new NetworkError('coinbase', 'HTTP 500');
      }
      return quote({ USD: 0 }, 250);
    });

    await service.collect([registry[1], registry[3]], 5000);

    expect(recordSpy).toHaveBeenCalledTimes(2);
    expect(recordSpy).toHaveBeenCalledWith('coinbase', 'network_error', expect.any(Number));
    expect(recordSpy).toHaveBeenCalledWith('cryptocompare', 'data_error', expect.any(Number));
  });

  it('should return empty results for an empty source list', async () => {
    await expect(service.collect([], 5000)).resolves.toEqual({ successes: [], failures: [] });
    expect(sink.lines).toEqual([]);
  });
});
