import type { Logger } from 'pino';
import { z } from 'zod';
import type { TicketDraft } from '../../domain/index.js';
import type { TicketSink } from '../../application/index.js';
import type { TicketSinkConfig } from '../config.js';
import type { SinkMode } from './http.js';
import { basicAuth, joinUrl } from './http.js';

const createdIssue = z.object({ key: z.string() });

/** Logs what would be filed and hands out sequential `MOCK-<n>` ids. */
export function createMockTicketSink(log: Logger): TicketSink {
  let next = 1;
  return {
    submit(draft: TicketDraft): Promise<string | null> {
      const id = `MOCK-${next++}`;
      log.info({ id, idx: draft.idx, summary: draft.ticket.summary }, 'Mock ticket created');
      return Promise.resolve(id);
    },
  };
}

function ticketDescription(draft: TicketDraft): string {
  const t = draft.ticket;
  return [
    t.description,
    `Suggested query: ${t.suggested_query}`,
    `Hits: ${t.hits_past_window}`,
    `Notes for development:\n${t.notes_for_development}`,
    `Steps to reproduce:\n${t.steps_to_reproduce}`,
    `Stack trace excerpt:\n${t.stack_trace_excerpt}`,
  ]
    .filter((part) => part.trim() !== '')
    .join('\n\n');
}

/**
 * Files drafts as bugs through the issue tracker's REST API. Missing
 * configuration or a failed request yields `null`, never an exception.
 */
export function createHttpTicketSink(config: TicketSinkConfig, log: Logger): TicketSink {
  return {
    async submit(draft: TicketDraft): Promise<string | null> {
      const { url, project, user, token } = config;
      if (url === null || project === null || user === null || token === null) {
        log.warn(
          'Ticket sink configuration missing (TRIAGE_TICKET_URL / PROJECT / USER / TOKEN), ticket not created',
        );
        return null;
      }

      try {
        const response = await fetch(joinUrl(url, '/rest/api/3/issue'), {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', Authorization: basicAuth(user, token) },
          body: JSON.stringify({
            fields: {
              project: { key: project },
              summary: draft.ticket.summary,
              description: ticketDescription(draft),
              issuetype: { name: 'Bug' },
            },
          }),
        });

        if (!response.ok) {
          log.warn({ status: response.status, idx: draft.idx }, 'Issue tracker returned non-OK status');
          return null;
        }

        const body = createdIssue.safeParse(await response.json());
        if (!body.success) {
          log.warn({ idx: draft.idx }, 'Issue tracker response has no issue key');
          return null;
        }
        log.info({ key: body.data.key, idx: draft.idx }, 'Ticket created');
        return body.data.key;
      } catch (err: unknown) {
        log.warn({ err, idx: draft.idx }, 'Failed to create ticket');
        return null;
      }
    },
  };
}

export function createTicketSink(mode: SinkMode, config: TicketSinkConfig, log: Logger): TicketSink {
  return mode === 'real' ? createHttpTicketSink(config, log) : createMockTicketSink(log);
}
