import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';

/**
 * Root logger for CLI runs; components receive children or this logger itself.
 * Writes to stderr by default, keeping stdout for command results and prompts.
 */
export function createLogger(level: string, destination: DestinationStream = pino.destination(2)): Logger {
  return pino({ level, base: { service: 'triage-loop' } }, destination);
}
