import { AssetPair, Source } from '../interfaces/source.interface';
import { QuoteParser } from '../interfaces/quote-parser.interface';
import {
  BinanceParser,
  CoinbaseParser,
  CoinGeckoParser,
  CryptoCompareParser,
  KrakenParser,
} from '../parsers';

/** Injection token for the immutable source list of a run */
export const SOURCE_REGISTRY = Symbol('SOURCE_REGISTRY');

export const DEFAULT_ASSET: AssetPair = {
  base: 'NEAR',
  coingeckoId: 'near',
};

/**
 * Build the public endpoints quoting `asset` in USD (USDT on Binance).
 * The list and its entries are frozen.
 */
export function createSourceRegistry(asset: AssetPair = DEFAULT_ASSET): readonly Source[] {
  const base = asset.base.toUpperCase();
  const id = asset.coingeckoId.toLowerCase();

  const sources: Source[] = [
    toSource(
      new CoinGeckoParser(id),
      `https://api.coingecko.com/api/v3/simple/price?ids=${encodeURIComponent(id)}&vs_currencies=usd`,
    ),
    toSource(new CoinbaseParser(), `https://api.coinbase.com/v2/prices/${base}-USD/spot`),
    toSource(
      new KrakenParser(`${base}USD`),
      `https://api.kraken.com/0/public/Ticker?pair=${base}USD`,
    ),
    toSource(
      new CryptoCompareParser(),
      `https://min-api.cryptocompare.com/data/price?fsym=${base}&tsyms=USD`,
    ),
    toSource(
      new BinanceParser(),
      `https://api.binance.com/api/v3/ticker/price?symbol=${base}USDT`,
    ),
  ];

  assertUniqueNames(sources);
  return Object.freeze(sources.map((source) => Object.freeze(source)));
}

function toSource(parser: QuoteParser, url: string): Source {
  return { name: parser.source, url, parser };
}

export function assertUniqueNames(sources: readonly Source[]): void {
  const seen = new Set<string>();
  for (const source of sources) {
    if (seen.has(source.name)) {
      throw new Error(`Duplicate source name in registry: ${source.name}`);
    }
    seen.add(source.name);
  }
}
