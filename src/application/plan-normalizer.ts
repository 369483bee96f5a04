import { z } from 'zod';
import type {
  ActionPlan,
  AgentName,
  FilterSuggestionsAction,
  GlobalPolicy,
  Label,
  PlanAction,
  PlanStrategy,
  ReportDraftAction,
  ReportSection,
  TicketDraftsAction,
} from '../domain/index.js';
import { AGENT_NAMES, REPORT_SECTIONS } from '../domain/index.js';
import { intLike, isPlainObject, labelValue, levelValue } from './oracle-values.js';

export const DEFAULT_FILTER_LABELS: readonly Label[] = ['timeout', 'external_service', 'noise'];
export const DEFAULT_REPORT_SECTIONS: readonly ReportSection[] = ['summary', 'ticket_links', 'filters'];

const DEFAULT_GLOBAL_POLICY: GlobalPolicy = {
  ticket_strategy: 'balanced',
  noise_handling: 'basic_filters',
};

const positiveInt = intLike.pipe(z.number().int().min(1));
const unitInterval = z.number().min(0).max(1);
const sectionValue = z.string().trim().toLowerCase().pipe(z.enum(REPORT_SECTIONS));

function isAgentName(value: unknown): value is AgentName {
  return typeof value === 'string' && AGENT_NAMES.some((name) => name === value);
}

/** Parses `value` with `schema`, or returns `fallback`. */
function parseOr<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, fallback: T): T {
  const parsed = schema.safeParse(value);
  return parsed.success ? parsed.data : fallback;
}

/** Valid entries of a list, deduplicated in first-seen order; `null` if not a list. */
function parseList<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T[] | null {
  if (!Array.isArray(value)) return null;
  const out: T[] = [];
  for (const entry of value) {
    const parsed = schema.safeParse(entry);
    if (parsed.success && !out.includes(parsed.data)) out.push(parsed.data);
  }
  return out;
}

export function ticketAction(run: boolean, overrides: Partial<TicketDraftsAction> = {}): TicketDraftsAction {
  return {
    agent: 'ticket_drafts',
    run,
    max_tickets: overrides.max_tickets ?? null,
    min_severity: overrides.min_severity ?? null,
    min_confidence: overrides.min_confidence ?? null,
    cluster_indices: overrides.cluster_indices ?? null,
    exclude_fingerprints: overrides.exclude_fingerprints ?? [],
  };
}

export function filterAction(run: boolean, overrides: Partial<FilterSuggestionsAction> = {}): FilterSuggestionsAction {
  return {
    agent: 'filter_suggestions',
    run,
    for_labels: overrides.for_labels ?? DEFAULT_FILTER_LABELS,
    min_count: overrides.min_count ?? null,
  };
}

export function reportAction(run: boolean, sections: readonly ReportSection[] = DEFAULT_REPORT_SECTIONS): ReportDraftAction {
  return { agent: 'report_draft', run, include_sections: sections };
}

function normalizeAction(agent: AgentName, raw: Readonly<Record<string, unknown>>): PlanAction {
  const run = raw['run'] === true;

  switch (agent) {
    case 'ticket_drafts': {
      const indices = parseList(intLike, raw['cluster_indices']);
      return ticketAction(run, {
        max_tickets: parseOr(positiveInt.nullable(), raw['max_tickets'], null),
        min_severity: parseOr(levelValue.nullable(), raw['min_severity'], null),
        min_confidence: parseOr(unitInterval.nullable(), raw['min_confidence'], null),
        cluster_indices: indices,
      });
    }
    case 'filter_suggestions': {
      const labels = parseList(labelValue, raw['for_labels']);
      return filterAction(run, {
        for_labels: labels !== null && labels.length > 0 ? labels : DEFAULT_FILTER_LABELS,
        min_count: parseOr(positiveInt.nullable(), raw['min_count'], null),
      });
    }
    case 'report_draft': {
      const sections = parseList(sectionValue, raw['include_sections']);
      return reportAction(run, sections !== null && sections.length > 0 ? sections : DEFAULT_REPORT_SECTIONS);
    }
  }
}

/** Plan that runs nothing; used when no usable actions could be obtained. */
export function defaultPlan(
  reasoning: string,
  dropped: ActionPlan['dropped'] = [],
): ActionPlan {
  return {
    strategy: 'default',
    actions: [ticketAction(false), filterAction(false), reportAction(false, ['summary'])],
    global_policy: DEFAULT_GLOBAL_POLICY,
    reasoning,
    dropped,
  };
}

/**
 * Coerces whatever a planner returned into the fixed action schema.
 *
 * - unknown or repeated agent names are dropped and recorded in `dropped`
 * - `run` is true only for a literal boolean `true`
 * - missing or invalid parameters take their documented defaults
 * - agents the candidate omitted are added with `run: false`
 * - actions are ordered ticket drafts → filter suggestions → report
 *
 * A candidate without a single usable action yields `defaultPlan()`.
 */
export function normalizePlan(candidate: Readonly<Record<string, unknown>>, strategy: PlanStrategy): ActionPlan {
  const rawActions = candidate['actions'];
  if (!Array.isArray(rawActions) || rawActions.length === 0) {
    return defaultPlan('planner returned no actions');
  }

  const byAgent = new Map<AgentName, PlanAction>();
  const dropped: { index: number; reason: string }[] = [];

  rawActions.forEach((raw: unknown, index) => {
    if (!isPlainObject(raw)) {
      dropped.push({ index, reason: 'action is not an object' });
      return;
    }
    const agent = raw['agent'] ?? raw['agent_name'];
    if (!isAgentName(agent)) {
      dropped.push({ index, reason: `unknown agent ${JSON.stringify(agent ?? null)}` });
      return;
    }
    if (byAgent.has(agent)) {
      dropped.push({ index, reason: `duplicate agent "${agent}"` });
      return;
    }
    byAgent.set(agent, normalizeAction(agent, raw));
  });

  if (byAgent.size === 0) {
    return defaultPlan('planner returned no usable actions', dropped);
  }

  const actions = AGENT_NAMES.map((agent): PlanAction => {
    const action = byAgent.get(agent);
    if (action !== undefined) return action;
    switch (agent) {
      case 'ticket_drafts': return ticketAction(false);
      case 'filter_suggestions': return filterAction(false);
      case 'report_draft': return reportAction(false);
    }
  });

  const policy = candidate['global_policy'];
  const globalPolicy: GlobalPolicy = isPlainObject(policy)
    ? {
        ticket_strategy: typeof policy['ticket_strategy'] === 'string'
          ? policy['ticket_strategy']
          : DEFAULT_GLOBAL_POLICY.ticket_strategy,
        noise_handling: typeof policy['noise_handling'] === 'string'
          ? policy['noise_handling']
          : DEFAULT_GLOBAL_POLICY.noise_handling,
      }
    : DEFAULT_GLOBAL_POLICY;

  const reason = candidate['reason'] ?? candidate['reasoning'];

  return {
    strategy,
    actions,
    global_policy: globalPolicy,
    reasoning: typeof reason === 'string' && reason.trim() !== '' ? reason : 'no reason provided',
    dropped,
  };
}
