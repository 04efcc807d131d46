export * from './base.parser';
export * from './binance.parser';
export * from './coinbase.parser';
export * from './coingecko.parser';
export * from './cryptocompare.parser';
export * from './kraken.parser';
