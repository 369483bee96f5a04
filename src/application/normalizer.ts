import type { LogEvent, RawRecord } from '../domain/index.js';

/**
 * Source field names per canonical field, in precedence order.
 * The first alias holding a non-empty string wins.
 */
export const FIELD_ALIASES = {
  timestamp: ['@timestamp', 'timestamp', 'time'],
  level: ['level', 'log.level', 'severity'],
  service: ['service', 'service_name', 'serviceName', 'app'],
  message: ['message', 'msg', 'log'],
  component: ['component', 'logger', 'logger_name', 'class', 'java_class'],
  correlation_id: ['correlation_id', 'trace_id', 'traceId', 'request_id'],
} as const;

/** Raw fields that may hold a multi-line stack trace, in precedence order. */
const FULL_TEXT_FIELDS = ['stack_trace', 'stack', 'log'] as const;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickString(raw: RawRecord, aliases: readonly string[]): string | null {
  for (const key of aliases) {
    const value = raw[key];
    if (typeof value === 'string' && value.trim() !== '') return value;
  }
  return null;
}

/**
 * Maps one heterogeneous raw record onto the canonical event shape.
 * Search hits wrapped as `{ _source: {...} }` are unwrapped first.
 */
export function normalizeRecord(record: RawRecord): LogEvent {
  const raw = isRecord(record['_source']) ? record['_source'] : record;

  return {
    timestamp: pickString(raw, FIELD_ALIASES.timestamp),
    level: pickString(raw, FIELD_ALIASES.level),
    service: pickString(raw, FIELD_ALIASES.service),
    message: pickString(raw, FIELD_ALIASES.message),
    component: pickString(raw, FIELD_ALIASES.component),
    correlation_id: pickString(raw, FIELD_ALIASES.correlation_id),
    raw,
  };
}

export function normalizeRecords(records: readonly RawRecord[]): LogEvent[] {
  return records.map(normalizeRecord);
}

/** Full log text of an event: the stack trace when present, else the message. */
export function fullLogText(event: LogEvent): string {
  return pickString(event.raw, FULL_TEXT_FIELDS) ?? event.message ?? '';
}

/** First `maxLines` lines of the event's full log text. */
export function stackExcerpt(event: LogEvent, maxLines: number): string {
  return fullLogText(event).split(/\r?\n/).slice(0, maxLines).join('\n');
}
