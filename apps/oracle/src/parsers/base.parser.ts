import { QuoteParser, QuoteSource } from '../interfaces/quote-parser.interface';
import { DataError } from '../exceptions';
import { isRecord } from '../utils/guards.util';

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Abstract base class for all quote parsers providing common functionality.
 * Subclasses locate the raw price value inside their source's payload; the base
 * class coerces it and enforces that it is a finite positive number.
 */
export abstract class BaseQuoteParser implements QuoteParser {
  abstract readonly source: QuoteSource;

  /**
   * Source-specific lookup of the raw price value - must be implemented by subclasses
   */
  protected abstract extractPrice(body: unknown): unknown;

  parse(body: unknown): number {
    const price = this.toNumber(this.extractPrice(body));
    if (price <= 0) {
      throw new DataError(this.source, `Non-positive price: ${price}`);
    }
    return price;
  }

  /**
   * Read `key` from an object, failing with the dotted path when absent
   */
  protected field(container: unknown, key: string, path: string): unknown {
    if (!isRecord(container) || !(key in container)) {
      throw new DataError(this.source, `Missing field: ${path}`);
    }
    return container[key];
  }

  /**
   * Accepts JSON numbers and decimal strings such as "1.01800000"
   */
  protected toNumber(value: unknown): number {
    let parsed: number;
    if (typeof value === 'number') {
      parsed = value;
    } else if (typeof value === 'string' && DECIMAL_PATTERN.test(value.trim())) {
      parsed = Number(value.trim());
    } else {
      throw new DataError(this.source, `Price is not numeric: ${JSON.stringify(value)}`);
    }

    if (!Number.isFinite(parsed)) {
      throw new DataError(this.source, `Price must be a finite number: ${JSON.stringify(value)}`);
    }
    return parsed;
  }
}
