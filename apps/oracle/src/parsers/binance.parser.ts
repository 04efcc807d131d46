import { QuoteSource } from '../interfaces/quote-parser.interface';
import { BaseQuoteParser } from './base.parser';

/**
 * Parser for the Binance ticker price endpoint: `{ "symbol": "NEARUSDT", "price": "1.01800000" }`
 */
export class BinanceParser extends BaseQuoteParser {
  readonly source = QuoteSource.BINANCE;

  protected extractPrice(body: unknown): unknown {
    return this.field(body, 'price', 'price');
  }
}
