import { QuoteSource } from '../interfaces/quote-parser.interface';
import { BaseQuoteParser } from './base.parser';

/**
 * Parser for the CoinGecko simple price endpoint.
 *
 * Payload: `{ "<asset id>": { "usd": 1.234 } }`
 */
export class CoinGeckoParser extends BaseQuoteParser {
  readonly source = QuoteSource.COINGECKO;

  constructor(private readonly assetId: string) {
    super();
  }

  protected extractPrice(body: unknown): unknown {
    const asset = this.field(body, this.assetId, this.assetId);
    return this.field(asset, 'usd', `${this.assetId}.usd`);
  }
}
