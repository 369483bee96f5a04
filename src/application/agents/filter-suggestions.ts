import type { Logger } from 'pino';
import type {
  FilterSuggestion,
  FilterSuggestionSet,
  FilterSuggestionsAction,
  SkippedItem,
  TriagedItem,
} from '../../domain/index.js';
import type { JudgmentOracle } from '../ports.js';
import type { UsageContext } from '../usage.js';
import { chunked, isPlainObject, itemsByIdx } from '../oracle-values.js';

export const FILTER_BATCH_SIZE = 12;

const FILTER_SYSTEM = `You are a log filtering assistant for a backend platform.

For each log cluster propose at most one search-exclusion clause that:
- matches the cluster reliably, using a stable phrase of the error message;
- generalizes dynamic parts such as ids, UUIDs, timestamps and numbers;
- does not exclude a whole component or exception type, since other errors
  can occur there;
- never repeats the same clause for two clusters.

The clause must be insertable as-is into the "must_not" array of a search
query, usually a match_phrase on the "log" field:
  { "match_phrase": { "log": "stable error text" } }
or, if needed, a bool of several match_phrase clauses.

Return a single JSON object:
{ "items": [ { "idx": <int>, "filter_clause": { ... } }, ... ] }
Omit a cluster when no safe clause exists.`;

const FILTER_TASK = 'Propose exclusion clauses for the following clusters. Respond with {"items": [...]} only.';

/** Classified clusters whose label is listed and whose count reaches `min_count`. */
export function selectFilterCandidates(
  items: readonly TriagedItem[],
  action: FilterSuggestionsAction,
): TriagedItem[] {
  const labels = new Set<string>(action.for_labels);
  const minCount = action.min_count ?? 1;
  return items.filter(
    (item) => item.triage.classified && labels.has(item.triage.label) && item.count >= minCount,
  );
}

/** Proposes one exclusion clause per selected cluster. */
export async function suggestFilters(
  items: readonly TriagedItem[],
  action: FilterSuggestionsAction,
  oracle: JudgmentOracle,
  usage: UsageContext,
  log: Logger,
): Promise<FilterSuggestionSet> {
  const candidates = selectFilterCandidates(items, action);
  const clauses = new Map<number, Record<string, unknown>>();
  const failed = new Map<number, string>();
  const skipped: SkippedItem[] = [];

  for (const batch of chunked(candidates, FILTER_BATCH_SIZE)) {
    const result = await oracle.judge(
      {
        purpose: 'filter_suggestions',
        system: FILTER_SYSTEM,
        task: FILTER_TASK,
        payload: batch.map((item) => ({
          idx: item.idx,
          service: item.service,
          component: item.component,
          message: item.message,
          count: item.count,
          triage: item.triage,
        })),
      },
      usage,
    );

    if (!result.ok) {
      log.warn({ error: result.error, detail: result.detail, size: batch.length }, 'Filter batch failed');
      for (const item of batch) failed.set(item.idx, `oracle_unavailable: ${result.error}`);
      continue;
    }

    const { byIdx, skipped: rejected } = itemsByIdx(result.data, new Set(batch.map((i) => i.idx)));
    skipped.push(...rejected);

    for (const [idx, raw] of byIdx) {
      const clause = raw['filter_clause'] ?? raw['es_filter_clause'];
      if (isPlainObject(clause) && Object.keys(clause).length > 0) clauses.set(idx, clause);
      else failed.set(idx, 'filter clause is not an object');
    }
  }

  const suggestions: FilterSuggestion[] = [];
  for (const item of candidates) {
    const clause = clauses.get(item.idx);
    if (clause === undefined) {
      skipped.push({ idx: item.idx, reason: failed.get(item.idx) ?? 'no filter proposed' });
      continue;
    }
    suggestions.push({
      idx: item.idx,
      fingerprint: item.fingerprint,
      service: item.service,
      count: item.count,
      filter_clause: clause,
    });
  }

  log.info({ candidates: candidates.length, suggestions: suggestions.length }, 'Filter suggestions ready');
  return { suggestions, skipped };
}
