import { BinanceParser } from './binance.parser';
import { QuoteSource } from '../interfaces/quote-parser.interface';
import { DataError } from '../exceptions';
import { mockPayloads } from '../__mocks__/quote-payloads.fixtures';

describe('BinanceParser', () => {
  let parser: BinanceParser;

  beforeEach(() => {
    parser = new BinanceParser();
  });

  it('should have correct source', () => {
    expect(parser.source).toBe(QuoteSource.BINANCE);
  });

  it('should coerce the top-level string price', () => {
    expect(parser.parse(mockPayloads.binance)).toBe(1.018);
  });

  it('should accept surrounding whitespace and exponents', () => {
    expect(parser.parse({ price: ' 1.5e-3 ' })).toBe(0.0015);
  });

  it('should reject hexadecimal strings', () => {
    expect(() => parser.parse({ price: '0x10' })).toThrow(DataError);
  });

  it('should reject booleans', () => {
    expect(() => parser.parse({ price: true })).toThrow('Price is not numeric: true');
  });

  it('should reject an error payload without price', () => {
    expect(() => parser.parse({ code: -1121, msg: 'Invalid symbol.' })).toThrow(
      'Missing field: price',
    );
  });

  it('should reject a zero price', () => {
    expect(() => parser.parse({ price: '0.00000000' })).toThrow('Non-positive price: 0');
  });
});
