import type { UsageSnapshot } from '../domain/index.js';

/**
 * Oracle usage counters for a single run.
 *
 * One instance is created at run start and threaded through every
 * oracle call; nothing here is process-wide.
 */
export class UsageContext {
  private calls = 0;
  private retries = 0;
  private failures = 0;
  private promptTokens = 0;
  private completionTokens = 0;

  recordCall(promptTokens: number, completionTokens: number): void {
    this.calls++;
    this.promptTokens += promptTokens;
    this.completionTokens += completionTokens;
  }

  recordRetry(): void {
    this.retries++;
  }

  recordFailure(): void {
    this.failures++;
  }

  snapshot(): UsageSnapshot {
    return {
      calls: this.calls,
      retries: this.retries,
      failures: this.failures,
      prompt_tokens: this.promptTokens,
      completion_tokens: this.completionTokens,
      total_tokens: this.promptTokens + this.completionTokens,
    };
  }
}
