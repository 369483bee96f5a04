import type { Logger } from 'pino';
import { z } from 'zod';
import type { ReportSink } from '../../application/index.js';
import type { ReportSinkConfig } from '../config.js';
import type { SinkMode } from './http.js';
import { basicAuth, joinUrl } from './http.js';

const page = z.object({
  id: z.string().optional(),
  title: z.string().default(''),
  version: z.object({ number: z.number().int() }).default({ number: 1 }),
  body: z
    .object({ storage: z.object({ value: z.string().default('') }).default({}) })
    .default({}),
});

const updatedPage = z.object({ id: z.string() });

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function createMockReportSink(pageId: string | null, log: Logger): ReportSink {
  return {
    publish(markdown: string): Promise<string | null> {
      log.info({ page_id: pageId ?? '(unset)', length: markdown.length }, 'Mock report publish');
      return Promise.resolve(null);
    },
  };
}

/**
 * Appends the report to a wiki page as a preformatted block. The page
 * is read first so the update carries the next version number.
 */
export function createHttpReportSink(config: ReportSinkConfig, log: Logger): ReportSink {
  return {
    async publish(markdown: string): Promise<string | null> {
      const { url, user, token, pageId } = config;
      if (url === null || user === null || token === null || pageId === null) {
        log.warn(
          'Report sink configuration missing (TRIAGE_REPORT_URL / USER / TOKEN / PAGE_ID), report not published',
        );
        return null;
      }

      const pageUrl = joinUrl(url, `/rest/api/content/${encodeURIComponent(pageId)}`);
      const auth = basicAuth(user, token);

      try {
        const current = await fetch(`${pageUrl}?expand=body.storage,version`, {
          headers: { Accept: 'application/json', Authorization: auth },
        });
        if (!current.ok) {
          log.warn({ status: current.status, page_id: pageId }, 'Failed to fetch report page');
          return null;
        }
        const existing = page.parse(await current.json());

        const response = await fetch(pageUrl, {
          method: 'PUT',
          headers: { 'Content-Type': 'application/json', Authorization: auth },
          body: JSON.stringify({
            id: pageId,
            type: 'page',
            title: existing.title,
            version: { number: existing.version.number + 1 },
            body: {
              storage: {
                value: `${existing.body.storage.value}\n<pre>\n${escapeHtml(markdown)}\n</pre>\n`,
                representation: 'storage',
              },
            },
          }),
        });
        if (!response.ok) {
          log.warn({ status: response.status, page_id: pageId }, 'Failed to update report page');
          return null;
        }

        const updated = updatedPage.safeParse(await response.json());
        const id = updated.success ? updated.data.id : pageId;
        log.info({ page_id: id }, 'Report published');
        return id;
      } catch (err: unknown) {
        log.warn({ err, page_id: pageId }, 'Failed to publish report');
        return null;
      }
    },
  };
}

export function createReportSink(mode: SinkMode, config: ReportSinkConfig, log: Logger): ReportSink {
  return mode === 'real' ? createHttpReportSink(config, log) : createMockReportSink(config.pageId, log);
}
