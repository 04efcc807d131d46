import { Injectable, Logger } from '@nestjs/common';
import { PricePoint } from '../interfaces/price-point.interface';
import {
  CALCULATION_METHOD,
  SubmissionRecord,
} from '../interfaces/submission-record.interface';
import { MedianAggregator } from '../strategies/aggregators/median.aggregator';
import { QuorumError } from '../exceptions';
import { roundTo, utcNowIso } from '../utils/format.util';

/** Decimal places kept for published prices */
export const PRICE_DECIMALS = 6;

/**
 * Aggregation Service
 *
 * Turns the prices collected in a run into a submission record: enforces the
 * quorum, takes the median and stamps the record. Apart from the creation
 * timestamp the result depends only on the arguments.
 */
@Injectable()
export class AggregationService {
  private readonly logger = new Logger(AggregationService.name);

  constructor(private readonly medianAggregator: MedianAggregator) {}

  /**
   * Build the submission record for a run
   *
   * @param points Prices of the sources that succeeded, one per source
   * @param codeOrLogs Provenance string stored in `code_or_logs`
   * @param minSources Quorum, an integer of at least 1
   * @throws QuorumError if fewer than `minSources` points were collected
   */
  buildSubmission(
    points: readonly PricePoint[],
    codeOrLogs: string,
    minSources: number,
  ): SubmissionRecord {
    if (!Number.isInteger(minSources) || minSources < 1) {
      throw new RangeError(`Minimum sources must be an integer of at least 1, got ${minSources}`);
    }

    if (points.length < minSources) {
      throw new QuorumError(points.length, minSources);
    }

    const median = this.medianAggregator.aggregate(points);
    const record: SubmissionRecord = {
      median_price_usd: roundTo(median, PRICE_DECIMALS),
      sources: [...points],
      calculation_method: CALCULATION_METHOD,
      calculated_at: utcNowIso(),
      code_or_logs: codeOrLogs,
    };

    this.logger.log(
      `Aggregated ${points.length} source(s): median $${record.median_price_usd} ` +
        `(${points.map((p) => p.api).join(', ')})`,
    );

    return record;
  }
}
