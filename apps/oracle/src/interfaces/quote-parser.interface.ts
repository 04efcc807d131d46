/**
 * Standardized identifiers for the public quote endpoints
 */
export enum QuoteSource {
  COINGECKO = 'coingecko',
  COINBASE = 'coinbase',
  KRAKEN = 'kraken',
  CRYPTOCOMPARE = 'cryptocompare',
  BINANCE = 'binance',
}

/**
 * Interface for source-specific response parsing.
 * Each endpoint has its own payload shape and therefore its own parser.
 */
export interface QuoteParser {
  /** The source whose payloads this parser understands */
  readonly source: QuoteSource;

  /**
   * Extract a single positive price from a decoded response body
   * @throws DataError when the payload is missing, malformed or non-positive
   */
  parse(body: unknown): number;
}
