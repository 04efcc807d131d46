import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import { AUDIT_SINKS, AuditLevel, AuditSink } from './audit-sink';
import { utcNowIso } from '../utils/format.util';

export type AuditValue = string | number | boolean | null | undefined;
export type AuditFields = Record<string, AuditValue>;

const NEEDS_QUOTING = /[\s"]/;

/**
 * Structured audit trail of a run.
 *
 * Each event becomes one line: `<UTC timestamp> <LEVEL> <event> key=value ...`.
 * The trail is the evidence referenced by a submission's `code_or_logs` field,
 * so every network call is recorded here exactly once.
 */
@Injectable()
export class AuditLogService implements OnModuleDestroy {
  constructor(@Inject(AUDIT_SINKS) private readonly sinks: AuditSink[]) {}

  info(event: string, fields: AuditFields = {}): void {
    this.record('info', event, fields);
  }

  warn(event: string, fields: AuditFields = {}): void {
    this.record('warn', event, fields);
  }

  error(event: string, fields: AuditFields = {}): void {
    this.record('error', event, fields);
  }

  record(level: AuditLevel, event: string, fields: AuditFields = {}): void {
    const line = formatAuditLine(utcNowIso(), level, event, fields);
    for (const sink of this.sinks) {
      sink.write(line, level);
    }
  }

  async onModuleDestroy(): Promise<void> {
    await Promise.all(this.sinks.map((sink) => sink.close()));
  }
}

export function formatAuditLine(
  timestamp: string,
  level: AuditLevel,
  event: string,
  fields: AuditFields,
): string {
  const pairs = Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`);
  return [timestamp, level.toUpperCase(), event, ...pairs].join(' ');
}

function formatValue(value: AuditValue): string {
  const text = String(value);
  return text === '' || NEEDS_QUOTING.test(text) ? JSON.stringify(text) : text;
}
