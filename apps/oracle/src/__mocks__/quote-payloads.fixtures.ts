/**
 * Test fixtures for decoded payloads of each public quote endpoint
 */
export const mockPayloads = {
  coingecko: { near: { usd: 1.234 } },
  coinbase: { data: { amount: '1.015', base: 'NEAR', currency: 'USD' } },
  binance: { symbol: 'NEARUSDT', price: '1.01800000' },
  kraken: {
    error: [],
    result: {
      NEARUSD: {
        a: ['1.01300', '120', '120.000'],
        b: ['1.01100', '80', '80.000'],
        c: ['1.01200', '10.0'],
      },
    },
  },
  krakenError: { error: ['EQuery:Unknown asset pair'] },
  cryptocompare: { USD: 1.1001 },
};
