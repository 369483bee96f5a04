import type { Logger } from 'pino';
import type { Cluster, RefineReport } from '../domain/index.js';
import type { JudgmentOracle } from './ports.js';
import type { UsageContext } from './usage.js';
import { chunked, intLike, isPlainObject } from './oracle-values.js';

const REFINE_SYSTEM = `You are a log clustering assistant for a backend platform.

You will receive a list of log clusters. Each cluster has:
- idx: numeric cluster index
- service: service name (if available)
- component: logger or class that emitted the log
- message: representative log message
- count: number of occurrences

Group clusters that represent the SAME underlying logical error.
Treat dynamic parts such as ids, numbers, file names, UUIDs and timestamps as
the same error when the core message and root cause are the same.

Return a single JSON object with key "groups". Each element has:
- "canonical_idx": the idx of the cluster that best represents the group
- "member_idxs": every idx that belongs to the group, including canonical_idx

Every input idx must appear in exactly one "member_idxs" list.
Do NOT invent idx values.`;

const REFINE_TASK = 'Group the following clusters as described. Respond with {"groups": [...]} only.';

export interface RefineOptions {
  /** Maximum clusters per oracle call; `null` sends everything at once. */
  readonly chunkSize: number | null;
}

export interface RefineOutcome {
  readonly clusters: Cluster[];
  readonly report: RefineReport;
}

type GroupVerdict =
  | { readonly accepted: true; readonly canonical: number; readonly members: number[] }
  | { readonly accepted: false; readonly reason: string };

/**
 * Validates one oracle group against the clusters of the current chunk.
 * Indices consumed by an earlier group, or unknown to the chunk, are
 * filtered out; a group left with no members is rejected.
 */
function judgeGroup(group: unknown, known: ReadonlySet<number>, used: ReadonlySet<number>): GroupVerdict {
  if (!isPlainObject(group)) return { accepted: false, reason: 'group is not an object' };

  const canonical = intLike.safeParse(group['canonical_idx']);
  if (!canonical.success) return { accepted: false, reason: 'canonical_idx missing or not an integer' };

  const rawMembers = group['member_idxs'];
  if (!Array.isArray(rawMembers)) return { accepted: false, reason: 'member_idxs is not a list' };
  if (rawMembers.length === 0) return { accepted: false, reason: 'member_idxs is empty' };

  const parsed: number[] = [];
  for (const value of rawMembers) {
    const idx = intLike.safeParse(value);
    if (!idx.success) return { accepted: false, reason: 'member_idxs contains a non-integer' };
    parsed.push(idx.data);
  }

  const members: number[] = [];
  for (const idx of [canonical.data, ...parsed]) {
    if (known.has(idx) && !used.has(idx) && !members.includes(idx)) members.push(idx);
  }
  if (members.length === 0) {
    return { accepted: false, reason: 'all member indices unknown or already consumed' };
  }

  const fallback = members[0] ?? canonical.data;
  const canonicalIdx = members.includes(canonical.data) ? canonical.data : fallback;
  return { accepted: true, canonical: canonicalIdx, members: [...members].sort((a, b) => a - b) };
}

/** Folds member clusters into the canonical one. */
function mergeMembers(canonical: Cluster, members: readonly Cluster[]): Cluster {
  const timestamps = members
    .flatMap((m) => m.timestamps)
    .map((ts, order) => ({ ts, order, ms: ts === null ? NaN : Date.parse(ts) }))
    .sort((a, b) => {
      const aTimed = Number.isFinite(a.ms);
      const bTimed = Number.isFinite(b.ms);
      if (aTimed && bTimed && a.ms !== b.ms) return a.ms - b.ms;
      if (aTimed !== bTimed) return aTimed ? -1 : 1;
      return a.order - b.order;
    })
    .map((entry) => entry.ts);

  return {
    ...canonical,
    count: members.reduce((total, m) => total + m.count, 0),
    timestamps,
    merged_member_idxs: members.map((m) => m.idx),
  };
}

/**
 * Asks the oracle to merge clusters that differ only in volatile tokens.
 *
 * Degrades to identity for any chunk whose oracle call fails. Indices no
 * valid group references pass through unmerged. The result is renumbered
 * densely from 0, so it must replace the input before fingerprinting and
 * classification.
 */
export async function refineClusters(
  clusters: readonly Cluster[],
  oracle: JudgmentOracle,
  usage: UsageContext,
  options: RefineOptions,
  log: Logger,
): Promise<RefineOutcome> {
  const byIdx = new Map<number, Cluster>(clusters.map((c) => [c.idx, c]));
  const used = new Set<number>();
  const merged: Cluster[] = [];
  const skippedGroups: { group: number; reason: string }[] = [];
  let degraded = false;
  let groupCounter = 0;

  const chunks = options.chunkSize === null ? [clusters] : chunked(clusters, options.chunkSize);

  for (const chunk of chunks) {
    if (chunk.length === 0) continue;

    const result = await oracle.judge(
      {
        purpose: 'refine',
        system: REFINE_SYSTEM,
        task: REFINE_TASK,
        payload: chunk.map((c) => ({
          idx: c.idx,
          service: c.service,
          component: c.component,
          message: c.message,
          count: c.count,
        })),
      },
      usage,
    );

    if (!result.ok) {
      degraded = true;
      log.warn({ error: result.error, detail: result.detail, size: chunk.length }, 'Refinement unavailable, clusters pass through');
      continue;
    }

    const groups = result.data['groups'];
    if (!Array.isArray(groups) || groups.length === 0) {
      degraded = true;
      log.warn({ size: chunk.length }, 'Refinement returned no usable groups, clusters pass through');
      continue;
    }

    const known = new Set(chunk.map((c) => c.idx));

    for (const group of groups) {
      const groupNo = groupCounter++;
      const verdict = judgeGroup(group, known, used);
      if (!verdict.accepted) {
        skippedGroups.push({ group: groupNo, reason: verdict.reason });
        log.debug({ group: groupNo, reason: verdict.reason }, 'Refinement group skipped');
        continue;
      }

      const members = verdict.members.flatMap((idx) => {
        const cluster = byIdx.get(idx);
        return cluster === undefined ? [] : [cluster];
      });
      const canonical = byIdx.get(verdict.canonical);
      if (canonical === undefined || members.length === 0) {
        skippedGroups.push({ group: groupNo, reason: 'canonical cluster not found' });
        continue;
      }

      for (const idx of verdict.members) used.add(idx);
      merged.push(mergeMembers(canonical, members));
    }
  }

  const unreferenced = clusters
    .map((c) => c.idx)
    .filter((idx) => !used.has(idx))
    .sort((a, b) => a - b);

  if (!degraded && unreferenced.length > 0) {
    log.warn({ unreferenced }, 'Oracle left cluster indices ungrouped; passing them through');
  }

  const passthrough = unreferenced.flatMap((idx) => {
    const cluster = byIdx.get(idx);
    return cluster === undefined ? [] : [{ ...cluster, merged_member_idxs: [idx] }];
  });

  const refined = [...merged, ...passthrough].map((cluster, idx) => ({ ...cluster, idx }));

  return {
    clusters: refined,
    report: {
      input_count: clusters.length,
      output_count: refined.length,
      merged_groups: merged.length,
      skipped_groups: skippedGroups,
      unreferenced_idxs: unreferenced,
      degraded,
    },
  };
}
