import { PricePoint } from './price-point.interface';

export const CALCULATION_METHOD = 'median';

/**
 * Final output of a run. This exact shape, including the snake_case keys and
 * the literal method tag, is what downstream consumers read.
 */
export interface SubmissionRecord {
  median_price_usd: number;
  sources: PricePoint[];
  calculation_method: typeof CALCULATION_METHOD;
  calculated_at: string;
  code_or_logs: string;
}

export const REQUIRED_SUBMISSION_FIELDS: ReadonlyArray<keyof SubmissionRecord> = [
  'median_price_usd',
  'sources',
  'calculation_method',
  'calculated_at',
  'code_or_logs',
];

export const REQUIRED_SOURCE_FIELDS: ReadonlyArray<keyof PricePoint> = [
  'api',
  'price',
  'timestamp',
];
