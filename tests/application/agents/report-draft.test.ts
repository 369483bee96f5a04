import { describe, it, expect } from 'vitest';
import { draftReport, renderLocalReport } from '../../../src/application/agents/report-draft.js';
import type { ReportInput } from '../../../src/application/agents/report-draft.js';
import { UsageContext } from '../../../src/application/usage.js';
import type { TriageSummary } from '../../../src/domain/index.js';
import { failed, fakeLogger, makeDraft, ok, ScriptedOracle } from '../../helpers.js';

const summary: TriageSummary = {
  log_count: 21,
  cluster_count: 4,
  triaged_cluster_count: 4,
  classified_count: 3,
  unclassified_count: 1,
  by_label: { timeout: 1, internal_error: 2 },
  by_priority: { high: 2, medium: 1 },
  internal_high_count: 2,
};

const input: ReportInput = {
  summary,
  sections: ['filters', 'ticket_links', 'summary'],
  drafts: [makeDraft(0), makeDraft(1, { service: null, ticket: { ...makeDraft(1).ticket, summary: 'a | b' } })],
  submitted: [{ idx: 0, fingerprint: 'fp-0', ticket_id: 'MOCK-1' }],
  filters: [
    {
      idx: 2,
      fingerprint: 'fp-2',
      service: 'inventory-service',
      count: 6,
      filter_clause: { match_phrase: { log: 'Cache refresh' } },
    },
  ],
};

describe('renderLocalReport', () => {
  it('renders the requested sections in canonical order', () => {
    expect(renderLocalReport(input)).toBe(
      [
        '## Summary',
        '',
        '| Metric | Value |',
        '|---|---|',
        '| Logs | 21 |',
        '| Clusters | 4 |',
        '| Classified | 3 |',
        '| Unclassified | 1 |',
        '| High-priority internal errors | 2 |',
        '| Label: internal_error | 2 |',
        '| Label: timeout | 1 |',
        '',
        '## Tickets',
        '',
        '| Service | Summary | Ticket | Count |',
        '|---|---|---|---|',
        '| order-service | Ticket 0 | MOCK-1 | 1 |',
        '| - | a \\| b | not submitted | 1 |',
        '',
        '## Filters',
        '',
        '| Service | Filter | Count |',
        '|---|---|---|',
        '| inventory-service | `{"match_phrase":{"log":"Cache refresh"}}` | 6 |',
      ].join('\n'),
    );
  });

  it('leaves out sections whose agent did not run', () => {
    const markdown = renderLocalReport({ ...input, drafts: null, filters: [] });
    expect(markdown.split('\n').filter((line) => line.startsWith('## '))).toEqual(['## Summary', '## Filters']);
    expect(markdown.endsWith('_No filter suggestions._')).toBe(true);
  });
});

describe('draftReport', () => {
  it('uses the oracle markdown when present', async () => {
    const oracle = new ScriptedOracle(() => ok({ markdown: '# Report' }));

    const draft = await draftReport(input, oracle, new UsageContext(), fakeLogger());

    expect(draft).toEqual({ markdown: '# Report', generated_by: 'oracle' });
    expect(oracle.requests[0]?.payload).toMatchObject({
      sections: ['filters', 'ticket_links', 'summary'],
      ticket_links: [
        { idx: 0, ticket_id: 'MOCK-1' },
        { idx: 1, ticket_id: null },
      ],
    });
  });

  it('renders locally when the oracle fails or returns no markdown', async () => {
    const log = fakeLogger();

    const unavailable = await draftReport(input, new ScriptedOracle(() => failed()), new UsageContext(), log);
    const empty = await draftReport(input, new ScriptedOracle(() => ok({ markdown: '  ' })), new UsageContext(), log);

    expect(unavailable).toEqual({ markdown: renderLocalReport(input), generated_by: 'local' });
    expect(empty.generated_by).toBe('local');
    expect(log.warn).toHaveBeenCalledTimes(2);
  });
});
