import type { Cluster, LogEvent } from '../domain/index.js';
import { UNKNOWN_COMPONENT } from '../domain/index.js';

interface Partition {
  readonly component: string;
  readonly message: string;
  readonly members: { readonly event: LogEvent; readonly order: number }[];
}

/** Epoch ms of an event, or `null` when missing or unparseable. */
function eventTime(event: LogEvent): number | null {
  if (event.timestamp === null) return null;
  const ms = Date.parse(event.timestamp);
  return Number.isFinite(ms) ? ms : null;
}

/**
 * Chronological member order. Untimed members sort after timed ones;
 * ties fall back to input order.
 */
function byTimeThenOrder(
  a: { readonly event: LogEvent; readonly order: number },
  b: { readonly event: LogEvent; readonly order: number },
): number {
  const ta = eventTime(a.event);
  const tb = eventTime(b.event);
  if (ta !== null && tb !== null && ta !== tb) return ta - tb;
  if (ta === null && tb !== null) return 1;
  if (ta !== null && tb === null) return -1;
  return a.order - b.order;
}

/** Equality key of an event: (component, trimmed message). */
export function clusterKey(event: LogEvent): { component: string; message: string } {
  return {
    component: event.component ?? UNKNOWN_COMPONENT,
    message: (event.message ?? '').trim(),
  };
}

/**
 * Partitions events by exact (component, trimmed message) match.
 *
 * Every event lands in exactly one cluster. Clusters are ranked by
 * count descending; equal counts keep the first-seen order of their key.
 * Pure function: persistence is the caller's concern.
 */
export function clusterEvents(events: readonly LogEvent[]): Cluster[] {
  // Map iteration order is insertion order, i.e. first-seen key order.
  const partitions = new Map<string, Partition>();

  events.forEach((event, order) => {
    const { component, message } = clusterKey(event);
    const key = JSON.stringify([component, message]);
    let partition = partitions.get(key);
    if (partition === undefined) {
      partition = { component, message, members: [] };
      partitions.set(key, partition);
    }
    partition.members.push({ event, order });
  });

  const ranked = [...partitions.values()].sort((a, b) => b.members.length - a.members.length);

  return ranked.map((partition, idx) => {
    const members = [...partition.members].sort(byTimeThenOrder);
    const first = members[0];
    if (first === undefined) {
      throw new Error(`Empty partition for component "${partition.component}"`);
    }
    return {
      idx,
      component: partition.component,
      message: partition.message,
      service: first.event.service,
      count: members.length,
      sample: first.event,
      timestamps: members.map((m) => m.event.timestamp),
    };
  });
}

/** Earliest and latest known timestamps of a cluster. */
export function seenRange(cluster: Cluster): { first_seen: string | null; last_seen: string | null } {
  let first: { ms: number; ts: string } | null = null;
  let last: { ms: number; ts: string } | null = null;
  for (const ts of cluster.timestamps) {
    if (ts === null) continue;
    const ms = Date.parse(ts);
    if (!Number.isFinite(ms)) continue;
    if (first === null || ms < first.ms) first = { ms, ts };
    if (last === null || ms > last.ms) last = { ms, ts };
  }
  return { first_seen: first?.ts ?? null, last_seen: last?.ts ?? null };
}
