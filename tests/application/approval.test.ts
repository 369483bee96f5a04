import { describe, it, expect, vi } from 'vitest';
import { deferredReview, reviewDrafts, submitApproved } from '../../src/application/approval.js';
import type { TicketSink } from '../../src/application/ports.js';
import { MemoryFeedbackStore } from '../../src/infrastructure/store/memory-feedback-store.js';
import { createMockTicketSink } from '../../src/infrastructure/sinks/ticket-sink.js';
import { fakeLogger, makeDraft, ScriptedDecisions } from '../helpers.js';

const clock = () => new Date('2025-03-02T12:00:00Z');

describe('reviewDrafts', () => {
  it('closes the decision port when the session ends on an error', async () => {
    const close = vi.fn();
    const port = {
      requestDecision: vi.fn().mockRejectedValue(new Error('input closed')),
      close,
    };

    await expect(
      reviewDrafts([makeDraft(0)], port, new MemoryFeedbackStore(), clock, fakeLogger()),
    ).rejects.toThrow('input closed');
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('records approve and reject, then stops at skip-all', async () => {
    const drafts = [makeDraft(0), makeDraft(1), makeDraft(2)];
    const port = new ScriptedDecisions([
      { kind: 'approve' },
      { kind: 'reject', reason: '  duplicate of an open bug ' },
      { kind: 'skip_all' },
    ]);
    const feedback = new MemoryFeedbackStore();

    const review = await reviewDrafts(drafts, port, feedback, clock, fakeLogger());
    const submitted = await submitApproved(review.approved, createMockTicketSink(fakeLogger()), fakeLogger());

    expect(port.asked).toEqual([0, 1, 2]);
    expect(review.outcome).toEqual({ reviewed: 2, approved: 1, rejected: 1, skipped_all: true });
    expect(await feedback.load()).toEqual([
      {
        timestamp: '2025-03-02T12:00:00.000Z',
        fingerprint: 'fp-0',
        decision: 'approved',
        reason: null,
        idx: 0,
        service: 'order-service',
        summary: 'Ticket 0',
        label: 'internal_error',
      },
      {
        timestamp: '2025-03-02T12:00:00.000Z',
        fingerprint: 'fp-1',
        decision: 'rejected',
        reason: 'duplicate of an open bug',
        idx: 1,
        service: 'order-service',
        summary: 'Ticket 1',
        label: 'internal_error',
      },
    ]);
    expect(submitted).toEqual([{ idx: 0, fingerprint: 'fp-0', ticket_id: 'MOCK-1' }]);
  });

  it('passes each draft its position', async () => {
    const requestDecision = vi.fn().mockResolvedValue({ kind: 'reject' });

    await reviewDrafts([makeDraft(4), makeDraft(7)], { requestDecision }, new MemoryFeedbackStore(), clock, fakeLogger());

    expect(requestDecision).toHaveBeenNthCalledWith(2, expect.objectContaining({ idx: 7 }), { index: 1, total: 2 });
  });

  it('records nothing under deferred review', async () => {
    const feedback = new MemoryFeedbackStore();

    const review = await reviewDrafts([makeDraft(0)], deferredReview, feedback, clock, fakeLogger());

    expect(review.outcome).toEqual({ reviewed: 0, approved: 0, rejected: 0, skipped_all: true });
    expect(review.approved).toEqual([]);
    expect(await feedback.load()).toEqual([]);
  });
});

describe('submitApproved', () => {
  it('leaves out drafts the sink did not accept', async () => {
    const sink: TicketSink = {
      submit: vi.fn().mockResolvedValueOnce(null).mockResolvedValueOnce('BUG-12'),
    };
    const log = fakeLogger();

    const submitted = await submitApproved([makeDraft(0), makeDraft(1)], sink, log);

    expect(submitted).toEqual([{ idx: 1, fingerprint: 'fp-1', ticket_id: 'BUG-12' }]);
    expect(log.warn).toHaveBeenCalledWith({ idx: 0 }, 'Ticket was not created');
  });
});
