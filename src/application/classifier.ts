import type { Logger } from 'pino';
import { z } from 'zod';
import type { Cluster, SkippedItem, Triage, TriagedItem } from '../domain/index.js';
import type { JudgmentOracle } from './ports.js';
import type { UsageContext } from './usage.js';
import { fingerprint } from './fingerprint.js';
import { seenRange } from './clusterer.js';
import { stackExcerpt } from './normalizer.js';
import { chunked, confidenceValue, intLike, isPlainObject, labelValue, levelValue } from './oracle-values.js';

const CLASSIFY_SYSTEM = `You are a senior backend engineer triaging application logs.

You will receive a list of log clusters. For EACH cluster decide:
- label: "timeout", "external_service", "internal_error" or "noise"
- priority: "high", "medium" or "low", how much developer attention it deserves
- severity: "high", "medium" or "low", the impact if the issue is real
- confidence: 0.0 to 1.0
- reason: 1 to 3 sentences

Heuristics:
- Failures in core business flows are higher priority.
- Rare but severe exceptions (null dereference, mapping failures) are usually
  "internal_error" with at least medium priority.
- Repeated debug output and non-fatal warnings are "noise" with low priority.
- Integration failures with other systems are "external_service".
- Timeouts and transient network errors are "timeout".
Always take the "count" field into account.

Return a single JSON object with key "items". Each element has:
- "idx": the idx of the input cluster
- "triage": { "label", "priority", "severity", "confidence", "reason" }`;

const CLASSIFY_TASK = 'Triage ALL of the following clusters. Respond with {"items": [...]} only.';

const classificationSchema = z.object({
  label: labelValue,
  priority: levelValue,
  severity: levelValue,
  confidence: confidenceValue,
  reason: z.unknown().transform((value) => (typeof value === 'string' ? value : '')),
});

export interface ClassifyOptions {
  readonly batchSize: number;
  /** Leading lines of the sample's log text passed to the oracle. */
  readonly excerptLines: number;
}

export interface ClassifyOutcome {
  readonly items: TriagedItem[];
  readonly skipped: SkippedItem[];
}

/** Compact per-cluster payload sent to the oracle. */
export function classificationPayload(cluster: Cluster, excerptLines: number) {
  return {
    idx: cluster.idx,
    service: cluster.service ?? cluster.sample.service,
    component: cluster.component,
    message: cluster.message,
    log: stackExcerpt(cluster.sample, excerptLines),
    count: cluster.count,
  };
}

/**
 * Extracts per-index classifications from one oracle response.
 *
 * Accepts both `{ idx, triage: {...} }` items and the flat form with
 * the classification fields next to `idx`. Rejected items are reported
 * with a reason; they never abort the batch.
 */
export function parseClassificationItems(
  data: Readonly<Record<string, unknown>>,
  submitted: ReadonlySet<number>,
): { parsed: Map<number, Triage>; skipped: SkippedItem[] } {
  const parsed = new Map<number, Triage>();
  const skipped: SkippedItem[] = [];

  const items = data['items'];
  if (!Array.isArray(items)) {
    skipped.push({ idx: null, reason: 'response has no "items" list' });
    return { parsed, skipped };
  }

  for (const item of items) {
    if (!isPlainObject(item)) {
      skipped.push({ idx: null, reason: 'item is not an object' });
      continue;
    }

    const idx = intLike.safeParse(item['idx']);
    if (!idx.success) {
      skipped.push({ idx: null, reason: 'item has no idx' });
      continue;
    }
    if (!submitted.has(idx.data)) {
      skipped.push({ idx: idx.data, reason: 'idx was not part of the submitted batch' });
      continue;
    }

    const nested = item['triage'];
    const source = isPlainObject(nested) && Object.keys(nested).length > 0 ? nested : item;
    const classification = classificationSchema.safeParse(source);
    if (!classification.success) {
      const fields = classification.error.issues.map((issue) => issue.path.join('.')).join(', ');
      skipped.push({ idx: idx.data, reason: `invalid classification (${fields})` });
      continue;
    }

    parsed.set(idx.data, { classified: true, ...classification.data });
  }

  return { parsed, skipped };
}

/**
 * Classifies clusters through the oracle in fixed-size batches.
 *
 * Results are keyed by index independently of batch boundaries, so a
 * failed batch only leaves its own clusters unclassified. Clusters
 * without a classification carry the `classified: false` placeholder.
 */
export async function classifyClusters(
  clusters: readonly Cluster[],
  oracle: JudgmentOracle,
  usage: UsageContext,
  options: ClassifyOptions,
  log: Logger,
): Promise<ClassifyOutcome> {
  const triageByIdx = new Map<number, Triage>();
  const unavailable = new Map<number, string>();
  const skipped: SkippedItem[] = [];

  for (const batch of chunked(clusters, options.batchSize)) {
    const result = await oracle.judge(
      {
        purpose: 'classify',
        system: CLASSIFY_SYSTEM,
        task: CLASSIFY_TASK,
        payload: batch.map((c) => classificationPayload(c, options.excerptLines)),
      },
      usage,
    );

    if (!result.ok) {
      log.warn({ error: result.error, detail: result.detail, size: batch.length }, 'Classification batch failed');
      for (const c of batch) unavailable.set(c.idx, `oracle_unavailable: ${result.error}`);
      continue;
    }

    const submitted = new Set(batch.map((c) => c.idx));
    const { parsed, skipped: rejected } = parseClassificationItems(result.data, submitted);

    for (const entry of rejected) {
      log.debug({ idx: entry.idx, reason: entry.reason }, 'Classification item rejected');
    }
    skipped.push(...rejected);
    for (const [idx, triage] of parsed) triageByIdx.set(idx, triage);
  }

  const items = clusters.map((cluster): TriagedItem => {
    const triage: Triage = triageByIdx.get(cluster.idx) ?? {
      classified: false,
      reason: unavailable.get(cluster.idx) ?? 'not_classified',
    };
    const { first_seen, last_seen } = seenRange(cluster);

    return {
      idx: cluster.idx,
      fingerprint: fingerprint(cluster.component, cluster.message),
      service: cluster.service ?? cluster.sample.service,
      component: cluster.component,
      message: cluster.message,
      count: cluster.count,
      first_seen,
      last_seen,
      merged_member_idxs: cluster.merged_member_idxs ?? [cluster.idx],
      stack_excerpt: stackExcerpt(cluster.sample, options.excerptLines),
      triage,
    };
  });

  const unclassified = items.filter((item) => !item.triage.classified).length;
  if (unclassified > 0) {
    log.info({ unclassified, total: items.length }, 'Some clusters remain unclassified');
  }

  return { items, skipped };
}
