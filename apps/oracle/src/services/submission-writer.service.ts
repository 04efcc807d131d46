import { Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import * as path from 'path';
import { SubmissionRecord } from '../interfaces/submission-record.interface';

/**
 * Persists a validated submission as pretty-printed JSON (2-space indent,
 * trailing newline), replacing any previous file at the same path.
 */
@Injectable()
export class SubmissionWriterService {
  private readonly logger = new Logger(SubmissionWriterService.name);

  async write(record: SubmissionRecord, outputPath: string): Promise<string> {
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, serializeSubmission(record), 'utf-8');
    this.logger.log(`Submission written to ${outputPath}`);
    return outputPath;
  }
}

export function serializeSubmission(record: SubmissionRecord): string {
  return `${JSON.stringify(record, null, 2)}\n`;
}
