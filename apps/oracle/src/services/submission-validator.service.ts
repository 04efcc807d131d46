import { Injectable } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { SubmissionRecordDto } from '../dto/submission-record.dto';
import {
  CALCULATION_METHOD,
  REQUIRED_SOURCE_FIELDS,
  REQUIRED_SUBMISSION_FIELDS,
  SubmissionRecord,
} from '../interfaces/submission-record.interface';
import { isRecord } from '../utils/guards.util';
import { SchemaError } from '../exceptions';

/**
 * Submission Validator
 *
 * Checks a submission record independently of the code that built it, so it
 * also applies to records read back from disk or supplied by someone else.
 * Rules are checked in order and the first violation is reported; the
 * candidate is never modified.
 */
@Injectable()
export class SubmissionValidatorService {
  /**
   * @throws SchemaError describing the first violated rule
   */
  validate(candidate: unknown, minSources: number): asserts candidate is SubmissionRecord {
    if (!isRecord(candidate)) {
      throw new SchemaError('Submission must be an object');
    }

    const missing = REQUIRED_SUBMISSION_FIELDS.filter((field) => !(field in candidate)).sort();
    if (missing.length > 0) {
      throw new SchemaError(
        `Submission missing required top-level fields: ${missing.join(', ')}`,
        missing,
      );
    }

    if (candidate.calculation_method !== CALCULATION_METHOD) {
      throw new SchemaError(`calculation_method must be '${CALCULATION_METHOD}'`, [
        'calculation_method',
      ]);
    }

    const sources = candidate.sources;
    if (!Array.isArray(sources) || sources.length < minSources) {
      throw new SchemaError(`sources must contain at least ${minSources} entries`, ['sources']);
    }

    this.validateSources(sources);
    this.validateSchema(candidate);
  }

  private validateSources(sources: unknown[]): void {
    const seenApis = new Set<string>();

    for (const item of sources) {
      if (!isRecord(item)) {
        throw new SchemaError('Each source entry must be an object', ['sources']);
      }
      for (const key of REQUIRED_SOURCE_FIELDS) {
        if (!(key in item)) {
          throw new SchemaError(`Source entry missing key: ${key}`, [`sources.${key}`]);
        }
      }

      const apiName = String(item.api);
      if (seenApis.has(apiName)) {
        throw new SchemaError(`Duplicate API source found: ${apiName}`, ['sources.api']);
      }
      seenApis.add(apiName);

      const price = item.price;
      if (typeof price !== 'number' || !Number.isFinite(price) || price <= 0) {
        throw new SchemaError(`Invalid non-positive price for source: ${apiName}`, [
          'sources.price',
        ]);
      }

      const timestamp = item.timestamp;
      if (typeof timestamp !== 'string' || !timestamp.endsWith('Z')) {
        throw new SchemaError(`Timestamp must be UTC ISO string ending with 'Z': ${apiName}`, [
          'sources.timestamp',
        ]);
      }
    }
  }

  /**
   * Type-level checks of the whole record against the output DTO
   */
  private validateSchema(candidate: Record<string, unknown>): void {
    const dto = plainToInstance(SubmissionRecordDto, candidate);
    const errors = validateSync(dto);
    if (errors.length === 0) {
      return;
    }

    const violations = flattenErrors(errors);
    throw new SchemaError(
      `Submission failed schema validation: ${violations.map((v) => v.message).join('; ')}`,
      violations.map((v) => v.path),
    );
  }
}

function flattenErrors(
  errors: ValidationError[],
  parentPath = '',
): Array<{ path: string; message: string }> {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => ({
      path,
      message: parentPath ? `${parentPath}.${message}` : message,
    }));
    return [...own, ...flattenErrors(error.children ?? [], path)];
  });
}
