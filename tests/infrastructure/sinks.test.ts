import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  createHttpTicketSink,
  createMockTicketSink,
  createTicketSink,
} from '../../src/infrastructure/sinks/ticket-sink.js';
import {
  createHttpReportSink,
  createMockReportSink,
  escapeHtml,
} from '../../src/infrastructure/sinks/report-sink.js';
import type { ReportSinkConfig, TicketSinkConfig } from '../../src/infrastructure/config.js';
import { fakeLogger, makeDraft } from '../helpers.js';

const ticketConfig: TicketSinkConfig = {
  url: 'https://tracker.example.test/',
  project: 'OPS',
  user: 'bot@example.test',
  token: 'test-secret',
};

const reportConfig: ReportSinkConfig = {
  url: 'https://wiki.example.test',
  user: 'bot@example.test',
  token: 'test-secret',
  pageId: '42',
};

const auth = `Basic ${Buffer.from('bot@example.test:test-secret').toString('base64')}`;

const jsonResponse = (body: unknown, status = 200) => ({
  ok: status >= 200 && status < 300,
  status,
  json: () => Promise.resolve(body),
});

describe('ticket sink', () => {
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    log = fakeLogger();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('hands out sequential mock ids', async () => {
    const sink = createMockTicketSink(log);
    expect(await sink.submit(makeDraft(0))).toBe('MOCK-1');
    expect(await sink.submit(makeDraft(1))).toBe('MOCK-2');
  });

  it('creates a bug through the REST API', async () => {
    const mockFetch = vi.fn().mockResolvedValue(jsonResponse({ key: 'OPS-101' }));
    vi.stubGlobal('fetch', mockFetch);

    const id = await createTicketSink('real', ticketConfig, log).submit(makeDraft(0));

    expect(id).toBe('OPS-101');
    expect(mockFetch).toHaveBeenCalledWith(
      'https://tracker.example.test/rest/api/3/issue',
      expect.objectContaining({ method: 'POST' }),
    );
    const init = mockFetch.mock.calls[0]?.[1];
    expect(init.headers.Authorization).toBe(auth);
    expect(JSON.parse(init.body).fields).toMatchObject({
      project: { key: 'OPS' },
      summary: 'Ticket 0',
      issuetype: { name: 'Bug' },
    });
  });

  it('returns null without configuration', async () => {
    const mockFetch = vi.fn();
    vi.stubGlobal('fetch', mockFetch);

    const id = await createHttpTicketSink({ ...ticketConfig, token: null }, log).submit(makeDraft(0));

    expect(id).toBeNull();
    expect(mockFetch).not.toHaveBeenCalled();
    expect(log.warn).toHaveBeenCalledWith(
      'Ticket sink configuration missing (TRIAGE_TICKET_URL / PROJECT / USER / TOKEN), ticket not created',
    );
  });

  it('returns null on a non-OK status', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({ errors: {} }, 400)));

    expect(await createHttpTicketSink(ticketConfig, log).submit(makeDraft(3))).toBeNull();
    expect(log.warn).toHaveBeenCalledWith({ status: 400, idx: 3 }, 'Issue tracker returned non-OK status');
  });

  it('returns null when the request fails', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('Network error')));

    expect(await createHttpTicketSink(ticketConfig, log).submit(makeDraft(0))).toBeNull();
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(Error) }),
      'Failed to create ticket',
    );
  });
});

describe('report sink', () => {
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    log = fakeLogger();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('escapes markup', () => {
    expect(escapeHtml('a < b && c > d')).toBe('a &lt; b &amp;&amp; c &gt; d');
  });

  it('publishes nothing in mock mode', async () => {
    expect(await createMockReportSink('42', log).publish('# Report')).toBeNull();
  });

  it('appends the report with the next page version', async () => {
    const mockFetch = vi
      .fn()
      .mockResolvedValueOnce(
        jsonResponse({ id: '42', title: 'Log review', version: { number: 7 }, body: { storage: { value: '<p>old</p>' } } }),
      )
      .mockResolvedValueOnce(jsonResponse({ id: '42' }));
    vi.stubGlobal('fetch', mockFetch);

    const id = await createHttpReportSink(reportConfig, log).publish('| a | b |\n<x>');

    expect(id).toBe('42');
    expect(mockFetch.mock.calls[0]?.[0]).toBe(
      'https://wiki.example.test/rest/api/content/42?expand=body.storage,version',
    );
    const [url, init] = mockFetch.mock.calls[1] ?? [];
    expect(url).toBe('https://wiki.example.test/rest/api/content/42');
    expect(init.method).toBe('PUT');
    expect(JSON.parse(init.body)).toEqual({
      id: '42',
      type: 'page',
      title: 'Log review',
      version: { number: 8 },
      body: {
        storage: {
          value: '<p>old</p>\n<pre>\n| a | b |\n&lt;x&gt;\n</pre>\n',
          representation: 'storage',
        },
      },
    });
  });

  it('returns null when the page cannot be read', async () => {
    const mockFetch = vi.fn().mockResolvedValue(jsonResponse({}, 404));
    vi.stubGlobal('fetch', mockFetch);

    expect(await createHttpReportSink(reportConfig, log).publish('# Report')).toBeNull();
    expect(mockFetch).toHaveBeenCalledOnce();
    expect(log.warn).toHaveBeenCalledWith({ status: 404, page_id: '42' }, 'Failed to fetch report page');
  });

  it('returns null without configuration', async () => {
    expect(await createHttpReportSink({ ...reportConfig, pageId: null }, log).publish('# Report')).toBeNull();
    expect(log.warn).toHaveBeenCalledWith(
      'Report sink configuration missing (TRIAGE_REPORT_URL / USER / TOKEN / PAGE_ID), report not published',
    );
  });
});
