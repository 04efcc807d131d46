/**
 * Price reported by one source during a run.
 * Field names are part of the submission file format.
 */
export interface PricePoint {
  /** Source name */
  readonly api: string;

  /** Positive price rounded to 6 decimal places */
  readonly price: number;

  /** UTC timestamp with second precision, e.g. '2026-02-22T00:00:00Z' */
  readonly timestamp: string;
}

export type FailureKind = 'network' | 'data';

/**
 * A source that could not produce a price. Terminal for the run.
 */
export interface FetchFailure {
  readonly api: string;
  readonly kind: FailureKind;
  readonly error: string;
}

/**
 * Result of collecting from every source once
 */
export interface CollectionResult {
  successes: PricePoint[];
  failures: FetchFailure[];
}
