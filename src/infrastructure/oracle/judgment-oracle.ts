import type { Logger } from 'pino';
import type {
  JudgmentOracle,
  OracleErrorKind,
  OracleRequest,
  OracleResult,
  UsageContext,
} from '../../application/index.js';
import { isPlainObject } from '../../application/oracle-values.js';
import { parseJsonResponse } from './json-response.js';

export interface Completion {
  readonly text: string;
  readonly prompt_tokens: number;
  readonly completion_tokens: number;
}

/** One round trip to a text-completion model. Throws on transport errors. */
export interface CompletionTransport {
  complete(system: string, user: string): Promise<Completion>;
}

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
}

const JSON_ONLY = '\nYou MUST respond with ONLY a valid JSON object. No markdown, no explanation.';

const wait = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export function isRateLimitError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if (err.name === 'ThrottlingException') return true;
  if ('$metadata' in err && isPlainObject(err.$metadata) && err.$metadata['httpStatusCode'] === 429) {
    return true;
  }
  return /rate limit|429|too many requests/i.test(err.message);
}

function failure(
  usage: UsageContext,
  error: OracleErrorKind,
  detail: string,
  raw?: string,
): OracleResult {
  usage.recordFailure();
  return raw === undefined ? { ok: false, error, detail } : { ok: false, error, detail, raw };
}

/**
 * Wraps a transport as a judgment oracle.
 *
 * Rate-limited calls are retried after `baseDelayMs * 2^attempt` until
 * `maxAttempts` calls were made. Every other outcome, good or bad, is
 * returned as a value.
 */
export function createJudgmentOracle(
  transport: CompletionTransport,
  policy: RetryPolicy,
  log: Logger,
  sleep: (ms: number) => Promise<void> = wait,
): JudgmentOracle {
  return {
    async judge(request: OracleRequest, usage: UsageContext): Promise<OracleResult> {
      const system = request.system + JSON_ONLY;
      const user = `${request.task}\n\n${JSON.stringify(request.payload, null, 2)}`;

      for (let attempt = 0; attempt < policy.maxAttempts; attempt++) {
        let completion: Completion;
        try {
          completion = await transport.complete(system, user);
        } catch (err: unknown) {
          const detail = err instanceof Error ? err.message : String(err);
          if (!isRateLimitError(err)) {
            log.error({ err, purpose: request.purpose }, 'Oracle call failed');
            return failure(usage, 'transport', detail);
          }
          if (attempt + 1 >= policy.maxAttempts) break;

          const delayMs = policy.baseDelayMs * 2 ** attempt;
          usage.recordRetry();
          log.warn({ purpose: request.purpose, attempt, delayMs }, 'Oracle rate limited, retrying');
          await sleep(delayMs);
          continue;
        }

        usage.recordCall(completion.prompt_tokens, completion.completion_tokens);

        const parsed = parseJsonResponse(completion.text);
        if (!parsed.ok) {
          log.warn({ purpose: request.purpose, raw: completion.text.slice(0, 200) }, 'Oracle returned non-JSON');
          return failure(usage, 'json_parse_failed', 'response is not valid JSON', completion.text);
        }
        if (!isPlainObject(parsed.value)) {
          return failure(usage, 'not_an_object', 'response JSON is not an object', completion.text);
        }
        return { ok: true, data: parsed.value };
      }

      log.error({ purpose: request.purpose, attempts: policy.maxAttempts }, 'Oracle retries exhausted');
      return failure(usage, 'rate_limited', `rate limited after ${policy.maxAttempts} attempts`);
    },
  };
}

/** Oracle used when no model is configured: every call fails fast. */
export const disabledOracle: JudgmentOracle = {
  judge() {
    return Promise.resolve({ ok: false, error: 'disabled', detail: 'judgment oracle is disabled' });
  },
};
