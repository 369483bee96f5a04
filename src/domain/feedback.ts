export type FeedbackDecision = 'approved' | 'rejected';

/**
 * One human decision on a ticket draft, keyed by cluster fingerprint.
 *
 * The ledger is append-only: entries are never edited or removed.
 * The optional fields carry context for whoever reads the ledger later.
 */
export interface FeedbackEntry {
  readonly timestamp: string; // ISO-8601
  readonly fingerprint: string;
  readonly decision: FeedbackDecision;
  readonly reason: string | null;
  readonly idx?: number;
  readonly service?: string | null;
  readonly summary?: string;
  readonly label?: string;
}
