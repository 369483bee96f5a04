import type { LogEvent } from './event.js';

/** Bucket used for events that carry no originating component. */
export const UNKNOWN_COMPONENT = '<unknown_component>';

/**
 * A group of events sharing the same (component, message) identity.
 *
 * `count` always equals `timestamps.length`. `message` is the first-seen
 * representative text, never an aggregate. `merged_member_idxs` lists the
 * pre-refinement indices folded into this cluster once refinement ran.
 */
export interface Cluster {
  readonly idx: number;
  readonly component: string;
  readonly message: string;
  readonly service: string | null;
  readonly count: number;
  readonly sample: LogEvent;
  readonly timestamps: readonly (string | null)[];
  readonly merged_member_idxs?: readonly number[];
}

/** Audit record of one refinement pass. */
export interface RefineReport {
  readonly input_count: number;
  readonly output_count: number;
  readonly merged_groups: number;
  readonly skipped_groups: readonly { readonly group: number; readonly reason: string }[];
  readonly unreferenced_idxs: readonly number[];
  readonly degraded: boolean;
}
