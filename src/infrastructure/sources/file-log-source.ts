import { readFile } from 'node:fs/promises';
import type { RawRecord } from '../../domain/index.js';
import type { LogSource } from '../../application/index.js';
import { isPlainObject } from '../../application/oracle-values.js';

/**
 * Records from a JSON file holding either a search response
 * (`{ hits: { hits: [{ _source }] } }`) or a plain list of records.
 */
export function recordsFromJson(json: unknown): RawRecord[] {
  if (Array.isArray(json)) return json.filter(isPlainObject);

  const outer = isPlainObject(json) ? json['hits'] : undefined;
  const hits = isPlainObject(outer) ? outer['hits'] : undefined;
  if (Array.isArray(hits)) {
    return hits
      .filter(isPlainObject)
      .map((hit) => (isPlainObject(hit['_source']) ? hit['_source'] : {}));
  }

  throw new Error('Log file is neither a list of records nor a search response');
}

export class FileLogSource implements LogSource {
  readonly name = 'file';

  constructor(private readonly path: string) {}

  async fetch(): Promise<RawRecord[]> {
    const content = await readFile(this.path, 'utf-8');
    return recordsFromJson(JSON.parse(content));
  }
}
