/**
 * Core domain types for log events.
 *
 * A raw record is whatever the log source hands over; a LogEvent is the
 * canonical shape every later stage works with. Neither carries any
 * framework dependency.
 */

/** Free-form record as fetched from a log source. */
export type RawRecord = Record<string, unknown>;

/**
 * Canonical log event.
 *
 * Created once by the normalizer from a single raw record and never
 * mutated afterwards. Every field except `raw` may be absent in the
 * source, hence the nullable types.
 */
export interface LogEvent {
  readonly timestamp: string | null; // ISO-8601 as provided by the source
  readonly level: string | null;
  readonly service: string | null;
  readonly message: string | null;
  readonly component: string | null;
  readonly correlation_id: string | null;
  readonly raw: RawRecord;
}
