import { describe, it, expect } from 'vitest';
import { defaultPlan, normalizePlan } from '../../src/application/plan-normalizer.js';

describe('normalizePlan', () => {
  it('coerces actions into the fixed schema', () => {
    const plan = normalizePlan(
      {
        actions: [
          { agent: 'report_draft', run: true, include_sections: ['Summary', 'bogus'] },
          {
            agent: 'ticket_drafts',
            run: 'yes',
            max_tickets: '3',
            min_severity: 'HIGH',
            min_confidence: 2,
            cluster_indices: [1, '2', 'x', 1],
          },
          { agent: 'unknown' },
          { agent: 'report_draft', run: false },
          'junk',
        ],
        global_policy: { ticket_strategy: 'conservative' },
        reason: 'because',
      },
      'policy_oracle',
    );

    expect(plan).toEqual({
      strategy: 'policy_oracle',
      actions: [
        {
          agent: 'ticket_drafts',
          run: false,
          max_tickets: 3,
          min_severity: 'high',
          min_confidence: null,
          cluster_indices: [1, 2],
          exclude_fingerprints: [],
        },
        {
          agent: 'filter_suggestions',
          run: false,
          for_labels: ['timeout', 'external_service', 'noise'],
          min_count: null,
        },
        { agent: 'report_draft', run: true, include_sections: ['summary'] },
      ],
      global_policy: { ticket_strategy: 'conservative', noise_handling: 'basic_filters' },
      reasoning: 'because',
      dropped: [
        { index: 2, reason: 'unknown agent "unknown"' },
        { index: 3, reason: 'duplicate agent "report_draft"' },
        { index: 4, reason: 'action is not an object' },
      ],
    });
  });

  it('accepts agent_name and fills default parameters', () => {
    const plan = normalizePlan(
      { actions: [{ agent_name: 'filter_suggestions', run: true, for_labels: [], min_count: 0 }] },
      'policy_oracle',
    );

    expect(plan.actions[1]).toEqual({
      agent: 'filter_suggestions',
      run: true,
      for_labels: ['timeout', 'external_service', 'noise'],
      min_count: null,
    });
    expect(plan.actions[2]).toEqual({
      agent: 'report_draft',
      run: false,
      include_sections: ['summary', 'ticket_links', 'filters'],
    });
    expect(plan.reasoning).toBe('no reason provided');
  });

  it('falls back to the default plan without actions', () => {
    expect(normalizePlan({ reason: 'nothing to do' }, 'policy_oracle')).toEqual(
      defaultPlan('planner returned no actions'),
    );
  });

  it('falls back to the default plan when no action is usable', () => {
    const plan = normalizePlan({ actions: [{ agent: 'deploy' }] }, 'policy_oracle');

    expect(plan.strategy).toBe('default');
    expect(plan.actions.every((a) => !a.run)).toBe(true);
    expect(plan.dropped).toEqual([{ index: 0, reason: 'unknown agent "deploy"' }]);
    expect(plan.reasoning).toBe('planner returned no usable actions');
  });
});

describe('defaultPlan', () => {
  it('runs nothing and reports only the summary section', () => {
    const plan = defaultPlan('why');
    expect(plan.actions.map((a) => [a.agent, a.run])).toEqual([
      ['ticket_drafts', false],
      ['filter_suggestions', false],
      ['report_draft', false],
    ]);
    expect(plan.actions[2]).toEqual({ agent: 'report_draft', run: false, include_sections: ['summary'] });
  });
});
