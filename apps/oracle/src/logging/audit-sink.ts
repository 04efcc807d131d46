import { Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { finished } from 'stream/promises';

export type AuditLevel = 'info' | 'warn' | 'error';

/** Injection token for the sinks the audit log fans out to */
export const AUDIT_SINKS = Symbol('AUDIT_SINKS');

/**
 * Destination for formatted audit lines. `write` receives one complete line
 * (without the trailing newline) per event.
 */
export interface AuditSink {
  write(line: string, level: AuditLevel): void;
  close(): Promise<void>;
}

/**
 * Writes the audit trail to a file, truncating it when the run starts.
 * Every line goes out in a single stream write, so lines never interleave.
 *
 * The file is opened synchronously so an unwritable path fails at start-up;
 * a later write error is kept and rethrown by `close()`.
 */
export class FileAuditSink implements AuditSink {
  private readonly logger = new Logger(FileAuditSink.name);
  private readonly stream: fs.WriteStream;
  private failure?: Error;

  constructor(readonly filePath: string) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const fd = fs.openSync(filePath, 'w');
    this.stream = fs.createWriteStream(filePath, { fd, encoding: 'utf-8' });
    this.stream.on('error', (error) => {
      if (!this.failure) {
        this.failure = error;
      }
      this.logger.error(`Audit log ${filePath} is not writable: ${error.message}`);
    });
  }

  write(line: string): void {
    this.stream.write(`${line}\n`);
  }

  async close(): Promise<void> {
    if (!this.stream.destroyed) {
      this.stream.end();
    }
    try {
      await finished(this.stream);
    } catch (error) {
      throw this.failure ?? error;
    }
    if (this.failure) {
      throw this.failure;
    }
  }
}

/**
 * Mirrors audit lines to the Nest logger so they show up on the console.
 */
export class ConsoleAuditSink implements AuditSink {
  private readonly logger = new Logger('Audit');

  write(line: string, level: AuditLevel): void {
    if (level === 'error') {
      this.logger.error(line);
    } else if (level === 'warn') {
      this.logger.warn(line);
    } else {
      this.logger.log(line);
    }
  }

  async close(): Promise<void> {
    return;
  }
}

/**
 * Keeps lines in memory; used by tests in place of a file.
 */
export class MemoryAuditSink implements AuditSink {
  readonly lines: string[] = [];
  closed = false;

  write(line: string): void {
    this.lines.push(line);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
