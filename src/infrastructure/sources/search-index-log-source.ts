import { readFile } from 'node:fs/promises';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { RawRecord } from '../../domain/index.js';
import type { LogSource } from '../../application/index.js';
import { isPlainObject } from '../../application/oracle-values.js';
import type { SearchConfig } from '../config.js';

const KEEP_ALIVE = '2m';

const pitResponse = z.object({ id: z.string() });
const searchResponse = z.object({
  pit_id: z.string().optional(),
  hits: z.object({
    hits: z.array(
      z.object({
        _source: z.record(z.string(), z.unknown()).optional(),
        sort: z.array(z.unknown()).optional(),
      }),
    ),
  }),
});

/**
 * Returns a copy of `query` whose `bool.must` clauses include a
 * `@timestamp` range over the last 24 hours, unless one is present.
 */
export function ensureRecentRange(query: Readonly<Record<string, unknown>>): Record<string, unknown> {
  const base = isPlainObject(query['query']) ? query['query'] : {};
  const bool = isPlainObject(base['bool']) ? base['bool'] : {};
  const must: unknown[] = Array.isArray(bool['must']) ? [...bool['must']] : [];

  const hasRange = must.some(
    (clause) => isPlainObject(clause) && isPlainObject(clause['range']) && '@timestamp' in clause['range'],
  );
  if (!hasRange) {
    must.push({ range: { '@timestamp': { gte: 'now-1d', lte: 'now' } } });
  }

  return { ...query, query: { ...base, bool: { ...bool, must } } };
}

/**
 * Pulls every hit of the configured query through a point-in-time
 * search, paginating with `search_after`.
 */
export class SearchIndexLogSource implements LogSource {
  readonly name = 'search';

  constructor(
    private readonly config: SearchConfig,
    private readonly log: Logger,
  ) {}

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    const { username, password } = this.config;
    if (username !== null && password !== null) {
      headers['Authorization'] = `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
    }
    return headers;
  }

  private async request(method: string, path: string, body?: unknown): Promise<unknown> {
    const url = `${(this.config.url ?? '').replace(/\/+$/, '')}${path}`;
    const response = await fetch(url, {
      method,
      headers: this.headers(),
      ...(body === undefined ? {} : { body: JSON.stringify(body) }),
    });
    if (!response.ok) {
      throw new Error(`Search index returned ${response.status} for ${method} ${path}`);
    }
    return response.json();
  }

  private async loadQuery(): Promise<Record<string, unknown>> {
    const json: unknown = JSON.parse(await readFile(this.config.queryFile, 'utf-8'));
    if (!isPlainObject(json)) {
      throw new Error(`Query file ${this.config.queryFile} does not hold a JSON object`);
    }
    return json;
  }

  async fetch(): Promise<RawRecord[]> {
    if (this.config.url === null) {
      throw new Error('TRIAGE_ES_URL is not set');
    }

    const query = {
      ...ensureRecentRange(await this.loadQuery()),
      sort: [{ '@timestamp': { order: 'desc' } }, { _shard_doc: { order: 'desc' } }],
      size: this.config.pageSize,
    };

    this.log.info({ index: this.config.index }, 'Opening point in time');
    const pit = pitResponse.parse(
      await this.request('POST', `/${encodeURIComponent(this.config.index)}/_pit?keep_alive=${KEEP_ALIVE}`),
    );
    let pitId = pit.id;

    const records: RawRecord[] = [];
    try {
      let searchAfter: unknown[] | undefined;
      for (;;) {
        const page = searchResponse.parse(
          await this.request('POST', '/_search', {
            ...query,
            pit: { id: pitId, keep_alive: KEEP_ALIVE },
            ...(searchAfter === undefined ? {} : { search_after: searchAfter }),
          }),
        );
        pitId = page.pit_id ?? pitId;

        const hits = page.hits.hits;
        if (hits.length === 0) break;
        for (const hit of hits) records.push(hit._source ?? {});

        searchAfter = hits.at(-1)?.sort;
        if (searchAfter === undefined || searchAfter.length === 0) break;
      }
    } finally {
      await this.request('DELETE', '/_pit', { id: pitId }).catch((err: unknown) => {
        this.log.warn({ err }, 'Failed to close point in time');
      });
    }

    this.log.info({ count: records.length }, 'Fetched logs from search index');
    return records;
  }
}
