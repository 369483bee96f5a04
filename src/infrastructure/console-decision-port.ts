import { createInterface } from 'node:readline';
import type { Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { TicketDraft } from '../domain/index.js';
import type { Decision, DecisionPort } from '../application/index.js';

const DESCRIPTION_PREVIEW = 600;

export function formatDraft(draft: TicketDraft, position: { index: number; total: number }): string {
  const triage = draft.triage;
  const description = draft.ticket.description.length > DESCRIPTION_PREVIEW
    ? `${draft.ticket.description.slice(0, DESCRIPTION_PREVIEW)} ... [truncated]`
    : draft.ticket.description;

  return [
    '-'.repeat(80),
    `Draft ${position.index + 1}/${position.total} for cluster idx=${draft.idx}, fingerprint=${draft.fingerprint}`,
    `Service:   ${draft.service ?? '-'}`,
    `Component: ${draft.component}`,
    triage.classified
      ? `Triage:    label=${triage.label}, priority=${triage.priority}, severity=${triage.severity}, confidence=${triage.confidence}`
      : `Triage:    unclassified (${triage.reason})`,
    '',
    `Summary: ${draft.ticket.summary}`,
    '',
    description,
    '',
  ].join('\n');
}

/** Parses one answer; `null` for anything unrecognised. */
export function parseChoice(answer: string): 'approve' | 'reject' | 'skip_all' | null {
  switch (answer.trim().toLowerCase()) {
    case 'a':
    case 'y':
      return 'approve';
    case 'r':
    case 'n':
      return 'reject';
    case 's':
    case 'q':
      return 'skip_all';
    default:
      return null;
  }
}

/**
 * Interactive review on a terminal: [a]pprove, [r]eject or [s]kip all,
 * then an optional reason. Unrecognised answers are asked again.
 *
 * One line reader serves the whole session, so answers piped in ahead of
 * the prompts are consumed in order. End of input counts as skip-all.
 */
export class ConsoleDecisionPort implements DecisionPort {
  private session: { rl: Interface; lines: AsyncIterator<string> } | null = null;

  constructor(
    private readonly input: Readable = process.stdin,
    private readonly output: Writable = process.stdout,
  ) {}

  async requestDecision(draft: TicketDraft, position: { index: number; total: number }): Promise<Decision> {
    this.output.write(`${formatDraft(draft, position)}\n`);

    let answer = await this.ask('[a] approve  [r] reject  [s] skip all > ');
    let choice: Decision['kind'] | null = answer === null ? 'skip_all' : parseChoice(answer);
    while (choice === null) {
      answer = await this.ask('Please answer a, r or s > ');
      choice = answer === null ? 'skip_all' : parseChoice(answer);
    }
    if (choice === 'skip_all') return { kind: 'skip_all' };

    const reason = ((await this.ask('Optional reason (enter to skip) > ')) ?? '').trim();
    return reason === '' ? { kind: choice } : { kind: choice, reason };
  }

  close(): void {
    this.session?.rl.close();
    this.session = null;
  }

  /** Next input line, or `null` once the input has ended. */
  private async ask(prompt: string): Promise<string | null> {
    this.output.write(prompt);
    const next = await this.lines().next();
    return next.done === true ? null : next.value;
  }

  private lines(): AsyncIterator<string> {
    if (this.session === null) {
      const rl = createInterface({ input: this.input, crlfDelay: Infinity });
      this.session = { rl, lines: rl[Symbol.asyncIterator]() };
    }
    return this.session.lines;
  }
}
