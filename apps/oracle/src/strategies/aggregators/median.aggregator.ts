import { Injectable } from '@nestjs/common';
import { IAggregator } from '../../interfaces/aggregator.interface';
import { PricePoint } from '../../interfaces/price-point.interface';
import { CALCULATION_METHOD } from '../../interfaces/submission-record.interface';

/**
 * Median Aggregator
 *
 * Calculates the median (middle value) of all prices. If there's an even
 * number of prices, returns the average of the two middle values.
 */
@Injectable()
export class MedianAggregator implements IAggregator {
  readonly name = CALCULATION_METHOD;

  aggregate(prices: readonly PricePoint[]): number {
    if (prices.length === 0) {
      throw new Error('Cannot aggregate empty price array');
    }

    const sortedPrices = prices.map((p) => p.price).sort((a, b) => a - b);

    const length = sortedPrices.length;
    const middle = Math.floor(length / 2);

    if (length % 2 === 1) {
      return sortedPrices[middle];
    }

    return (sortedPrices[middle - 1] + sortedPrices[middle]) / 2;
  }
}
