import { QuoteSource } from '../interfaces/quote-parser.interface';
import { BaseQuoteParser } from './base.parser';

export class CryptoCompareParser extends BaseQuoteParser {
  readonly source = QuoteSource.CRYPTOCOMPARE;

  protected extractPrice(body: unknown): unknown {
    return this.field(body, 'USD', 'USD');
  }
}
