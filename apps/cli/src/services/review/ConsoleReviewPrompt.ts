/**
 * Terminal front end for the review stage.
 *
 * Reads one answer per line. Lines are queued as they arrive, so answers
 * piped in ahead of the prompts are not lost.
 */
import * as readline from 'readline';
import type { ReviewDecision, ReviewRequest } from '@dat-curator/shared-types';
import type { InteractionPort } from '../matching/ReviewStage';

export type ReviewAnswer =
  | Exclude<ReviewDecision, { kind: 'abort' }>
  | { kind: 'invalid'; message: string };

export interface ConsoleReviewPromptOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

const RULE = '-'.repeat(70);
const PROMPT = 'Select candidate number to keep, or 0/N to skip: ';

/** Interprets one line typed at the review prompt */
export function parseReviewAnswer(raw: string, candidateCount: number): ReviewAnswer {
  const answer = raw.trim().toLowerCase();
  if (answer === '' || answer === '0' || answer === 'n') {
    return { kind: 'skip' };
  }

  if (!/^[+-]?\d+$/.test(answer)) {
    return { kind: 'invalid', message: "Invalid input. Please enter a number or 'N'." };
  }

  const choice = Number(answer);
  if (choice < 1 || choice > candidateCount) {
    return {
      kind: 'invalid',
      message: `Invalid choice. Please enter a number between 1 and ${candidateCount}, or 0/N.`,
    };
  }
  return { kind: 'select', index: choice - 1 };
}

export class ConsoleReviewPrompt implements InteractionPort {
  private readonly rl: readline.Interface;
  private readonly output: NodeJS.WritableStream;
  private readonly lines: string[] = [];
  private readonly waiting: Array<(line: string | null) => void> = [];
  private closed = false;

  constructor(options: ConsoleReviewPromptOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.rl = readline.createInterface({ input: options.input ?? process.stdin, terminal: false });

    this.rl.on('line', (line) => {
      const resolve = this.waiting.shift();
      if (resolve) {
        resolve(line);
      } else {
        this.lines.push(line);
      }
    });

    this.rl.on('close', () => {
      this.closed = true;
      for (const resolve of this.waiting.splice(0)) {
        resolve(null);
      }
    });
  }

  async presentCandidates(request: ReviewRequest): Promise<ReviewDecision> {
    const { referenceTitle, candidates, automaticThreshold, lowThreshold } = request;

    this.write(`${RULE}\n`);
    this.write(`\nReviewing reference title: ${referenceTitle}\n`);
    this.write(`(No automatic match >= ${automaticThreshold}% was selected)\n`);
    this.write(`Potential discarded catalog candidates (both scores >= ${lowThreshold}%):\n`);
    candidates.forEach((candidate, i) => {
      this.write(`  [${i + 1}] ${candidate.entry.displayName} (Score: ${candidate.primary}%)\n`);
    });
    this.write(`  [0 or N] None of these - keep '${referenceTitle}' as unmatched.\n`);

    for (;;) {
      this.write(PROMPT);
      const line = await this.nextLine();
      if (line === null) {
        this.write(`\n${RULE}\n`);
        return { kind: 'abort' };
      }

      const answer = parseReviewAnswer(line, candidates.length);
      if (answer.kind === 'invalid') {
        this.write(`  ${answer.message}\n`);
        continue;
      }

      this.write(`${RULE}\n`);
      return answer;
    }
  }

  close(): void {
    this.rl.close();
  }

  private nextLine(): Promise<string | null> {
    const buffered = this.lines.shift();
    if (buffered !== undefined) {
      return Promise.resolve(buffered);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  private write(text: string): void {
    this.output.write(text);
  }
}
