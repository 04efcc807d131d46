import { QuoteSource } from '../interfaces/quote-parser.interface';
import { DataError } from '../exceptions';
import { isRecord } from '../utils/guards.util';
import { BaseQuoteParser } from './base.parser';

/**
 * Parser for the Kraken public ticker endpoint.
 *
 * Handles quirks:
 * - Errors are reported in-band as a top-level `error` list
 * - The result is keyed by Kraken's own pair alias, which may differ from the
 *   requested pair (e.g. "XXBTZUSD" for "XBTUSD")
 * - `c` holds the last closed trade as `[price, lot volume]`
 */
export class KrakenParser extends BaseQuoteParser {
  readonly source = QuoteSource.KRAKEN;

  constructor(private readonly pair: string) {
    super();
  }

  protected extractPrice(body: unknown): unknown {
    const errors = isRecord(body) ? body.error : undefined;
    if ((Array.isArray(errors) && errors.length > 0) || (typeof errors === 'string' && errors !== '')) {
      throw new DataError(this.source, `Kraken returned errors: ${JSON.stringify(errors)}`);
    }

    const result = this.field(body, 'result', 'result');
    if (!isRecord(result) || Object.keys(result).length === 0) {
      throw new DataError(this.source, 'Kraken payload missing result');
    }

    const ticker = this.selectTicker(result);
    const lastClose = this.field(ticker, 'c', 'result.c');
    if (!Array.isArray(lastClose) || lastClose.length === 0) {
      throw new DataError(this.source, 'Kraken ticker field "c" must be a [price, volume] array');
    }
    return lastClose[0];
  }

  private selectTicker(result: Record<string, unknown>): unknown {
    if (this.pair in result) {
      return result[this.pair];
    }
    const keys = Object.keys(result);
    if (keys.length > 1) {
      throw new DataError(
        this.source,
        `Kraken result has ${keys.length} entries and none match ${this.pair}`,
      );
    }
    return result[keys[0]];
  }
}
