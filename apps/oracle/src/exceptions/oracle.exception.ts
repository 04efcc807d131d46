/**
 * Base exception for every failure the oracle pipeline raises itself
 */
export class OracleException extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OracleException';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A source could not be reached: connection failure, timeout or non-2xx status
 */
export class NetworkError extends OracleException {
  constructor(
    public readonly source: string,
    message: string,
  ) {
    super(message);
    this.name = 'NetworkError';
  }
}

/**
 * A source answered but its payload did not yield a valid positive price
 */
export class DataError extends OracleException {
  constructor(
    public readonly source: string,
    message: string,
  ) {
    super(message);
    this.name = 'DataError';
  }
}

/**
 * Fewer sources succeeded than the run requires
 */
export class QuorumError extends OracleException {
  constructor(
    public readonly found: number,
    public readonly required: number,
  ) {
    super(`Only ${found} source(s) succeeded. Minimum required: ${required}.`);
    this.name = 'QuorumError';
  }
}

/**
 * A submission record failed validation
 */
export class SchemaError extends OracleException {
  constructor(
    message: string,
    public readonly fields: string[] = [],
  ) {
    super(message);
    this.name = 'SchemaError';
  }
}
