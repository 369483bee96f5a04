import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { Cluster, Label, Level, LogEvent, Triage, TriagedItem, TicketDraft } from '../src/domain/index.js';
import type {
  Decision,
  DecisionPort,
  JudgmentOracle,
  OracleRequest,
  OracleResult,
  UsageContext,
} from '../src/application/index.js';

export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
  } as unknown as Logger;
}

/**
 * Factory for normalized events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEvent(overrides: Partial<LogEvent> = {}): LogEvent {
  return {
    timestamp: '2025-03-02T08:00:00Z',
    level: 'ERROR',
    service: 'order-service',
    message: 'Failed to finalize order',
    component: 'com.example.orders.OrderService',
    correlation_id: null,
    raw: {},
    ...overrides,
  };
}

export function makeCluster(idx: number, overrides: Partial<Cluster> = {}): Cluster {
  const count = overrides.count ?? 1;
  return {
    idx,
    component: `com.example.Component${idx}`,
    message: `message ${idx}`,
    service: 'order-service',
    count,
    sample: makeEvent({ component: `com.example.Component${idx}`, message: `message ${idx}` }),
    timestamps: Array.from({ length: count }, (_, i) => `2025-03-02T0${i % 10}:00:00Z`),
    ...overrides,
  };
}

export function classified(
  label: Label,
  priority: Level,
  extra: { severity?: Level; confidence?: number } = {},
): Triage {
  return {
    classified: true,
    label,
    priority,
    severity: extra.severity ?? priority,
    confidence: extra.confidence ?? 0.9,
    reason: 'test',
  };
}

export function makeItem(idx: number, triage: Triage, overrides: Partial<TriagedItem> = {}): TriagedItem {
  return {
    idx,
    fingerprint: `fp-${idx}`,
    service: 'order-service',
    component: `com.example.Component${idx}`,
    message: `message ${idx}`,
    count: 1,
    first_seen: '2025-03-02T08:00:00Z',
    last_seen: '2025-03-02T08:00:00Z',
    merged_member_idxs: [idx],
    stack_excerpt: `message ${idx}`,
    triage,
    ...overrides,
  };
}

export function makeDraft(idx: number, overrides: Partial<TicketDraft> = {}): TicketDraft {
  return {
    idx,
    fingerprint: `fp-${idx}`,
    service: 'order-service',
    component: `com.example.Component${idx}`,
    count: 1,
    triage: classified('internal_error', 'high'),
    ticket: {
      summary: `Ticket ${idx}`,
      description: 'description',
      suggested_query: 'service:order-service',
      hits_past_window: '1 hit in past 24 hours',
      notes_for_development: 'notes',
      steps_to_reproduce: 'unknown',
      stack_trace_excerpt: '',
    },
    ...overrides,
  };
}

export const ok = (data: Record<string, unknown>): OracleResult => ({ ok: true, data });

export const failed = (error: 'transport' | 'rate_limited' | 'disabled' = 'transport'): OracleResult => ({
  ok: false,
  error,
  detail: 'scripted failure',
});

/** Oracle that answers from a script and records every request. */
export class ScriptedOracle implements JudgmentOracle {
  readonly requests: OracleRequest[] = [];

  constructor(private readonly respond: (request: OracleRequest, call: number) => OracleResult) {}

  judge(request: OracleRequest, usage: UsageContext): Promise<OracleResult> {
    const call = this.requests.length;
    this.requests.push(request);
    usage.recordCall(10, 5);
    return Promise.resolve(this.respond(request, call));
  }

  purposes(): string[] {
    return this.requests.map((r) => r.purpose);
  }
}

/** Decision port replaying a fixed list; skip-all once the list runs out. */
export class ScriptedDecisions implements DecisionPort {
  readonly asked: number[] = [];

  constructor(private readonly decisions: Decision[]) {}

  requestDecision(draft: TicketDraft): Promise<Decision> {
    this.asked.push(draft.idx);
    return Promise.resolve(this.decisions.shift() ?? { kind: 'skip_all' });
  }
}
