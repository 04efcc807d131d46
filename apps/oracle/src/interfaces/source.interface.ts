import { QuoteParser, QuoteSource } from './quote-parser.interface';

/**
 * Asset whose USD price is being collected
 */
export interface AssetPair {
  /** Ticker of the base asset (e.g., NEAR) */
  base: string;

  /** CoinGecko asset id (e.g., near) */
  coingeckoId: string;
}

/**
 * One public price endpoint. Defined at start-up and never mutated.
 */
export interface Source {
  readonly name: QuoteSource;
  readonly url: string;
  readonly parser: QuoteParser;
}
