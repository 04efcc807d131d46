import { PricePoint } from './price-point.interface';

/**
 * Interface for aggregation strategy implementations
 * Each strategy implements a different method for calculating consensus price
 */
export interface IAggregator {
  /**
   * Calculate consensus price from the prices reported by distinct sources
   * @param prices Price points, in any order
   * @returns The consensus price value
   */
  aggregate(prices: readonly PricePoint[]): number;

  /**
   * Name of the aggregation method
   */
  readonly name: string;
}
