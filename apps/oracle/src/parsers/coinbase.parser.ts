import { QuoteSource } from '../interfaces/quote-parser.interface';
import { BaseQuoteParser } from './base.parser';

/**
 * Parser for the Coinbase spot price endpoint.
 *
 * Payload: `{ "data": { "amount": "1.015", "base": "NEAR", "currency": "USD" } }`
 */
export class CoinbaseParser extends BaseQuoteParser {
  readonly source = QuoteSource.COINBASE;

  protected extractPrice(body: unknown): unknown {
    const data = this.field(body, 'data', 'data');
    return this.field(data, 'amount', 'data.amount');
  }
}
