/**
 * Raw outcome of one successful HTTP call to a source
 */
export interface FetchedQuote {
  /** Decoded JSON payload */
  body: unknown;

  /** HTTP status code */
  status: number;

  /** Size of the response body in bytes */
  byteCount: number;

  /** Wall-clock time of the request in milliseconds */
  latencyMs: number;
}
