import { describe, it, expect } from 'vitest';
import { clusterEvents, seenRange } from '../../src/application/clusterer.js';
import { UNKNOWN_COMPONENT } from '../../src/domain/index.js';
import { makeEvent, makeCluster } from '../helpers.js';

describe('clusterEvents', () => {
  it('partitions every event into exactly one cluster', () => {
    const events = [
      makeEvent({ component: 'A', message: 'x' }),
      makeEvent({ component: 'B', message: 'x' }),
      makeEvent({ component: 'A', message: 'x ' }),
      makeEvent({ component: 'A', message: 'y' }),
      makeEvent({ component: null, message: 'x' }),
    ];

    const clusters = clusterEvents(events);

    expect(clusters.reduce((sum, c) => sum + c.count, 0)).toBe(events.length);
    expect(clusters.map((c) => [c.component, c.message, c.count])).toEqual([
      ['A', 'x', 2],
      ['B', 'x', 1],
      ['A', 'y', 1],
      [UNKNOWN_COMPONENT, 'x', 1],
    ]);
    expect(clusters.map((c) => c.idx)).toEqual([0, 1, 2, 3]);
  });

  it('ranks by count and keeps first-seen order on ties', () => {
    const events = [
      makeEvent({ message: 'first' }),
      makeEvent({ message: 'second' }),
      makeEvent({ message: 'second' }),
      makeEvent({ message: 'third' }),
    ];
    expect(clusterEvents(events).map((c) => c.message)).toEqual(['second', 'first', 'third']);
  });

  it('takes the earliest event as sample and orders timestamps chronologically', () => {
    const events = [
      makeEvent({ timestamp: '2025-03-02T10:00:00Z', service: 'late' }),
      makeEvent({ timestamp: null, service: 'untimed' }),
      makeEvent({ timestamp: '2025-03-02T08:00:00Z', service: 'early' }),
    ];

    const [cluster] = clusterEvents(events);

    expect(cluster?.service).toBe('early');
    expect(cluster?.sample.service).toBe('early');
    expect(cluster?.timestamps).toEqual(['2025-03-02T08:00:00Z', '2025-03-02T10:00:00Z', null]);
  });

  it('returns nothing for no events', () => {
    expect(clusterEvents([])).toEqual([]);
  });
});

describe('seenRange', () => {
  it('ignores missing and unparseable timestamps', () => {
    const cluster = makeCluster(0, {
      count: 4,
      timestamps: [null, '2025-03-02T09:00:00Z', 'not a date', '2025-03-01T23:00:00Z'],
    });
    expect(seenRange(cluster)).toEqual({ first_seen: '2025-03-01T23:00:00Z', last_seen: '2025-03-02T09:00:00Z' });
  });

  it('is null on both ends without timestamps', () => {
    expect(seenRange(makeCluster(0, { count: 1, timestamps: [null] }))).toEqual({ first_seen: null, last_seen: null });
  });
});
