import { describe, it, expect, vi, afterEach } from 'vitest';
import pino from 'pino';
import { createLogger } from '../../src/infrastructure/logger.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createLogger', () => {
  it('writes to stderr unless given another destination', () => {
    const destination = vi.spyOn(pino, 'destination');

    createLogger('info');

    expect(destination).toHaveBeenCalledWith(2);
  });

  it('writes JSON lines tagged with the service name', () => {
    const lines: string[] = [];
    const log = createLogger('info', { write: (line: string) => lines.push(line) });

    log.info({ clusters: 2 }, 'Logs clustered');
    log.debug('not written');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
      level: 30,
      service: 'triage-loop',
      clusters: 2,
      msg: 'Logs clustered',
    });
  });
});
