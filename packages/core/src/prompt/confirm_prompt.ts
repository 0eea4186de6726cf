import * as readline from 'readline';
import { PromptError } from '../errors';

/**
 * Yes/no question asked on the terminal
 */
export interface ConfirmPrompt {
  confirm(question: string): Promise<boolean>;
}

export type ReadlineConfirmPromptOptions = {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Answer used when the user just presses enter (default: false) */
  defaultAnswer?: boolean;
};

/**
 * Interprets a typed answer.
 * @returns undefined when the answer is neither yes nor no
 */
export function parseConfirmAnswer(answer: string, defaultAnswer: boolean): boolean | undefined {
  const normalized = answer.trim().toLowerCase();
  if (normalized === '') return defaultAnswer;
  if (normalized === 'y' || normalized === 'yes') return true;
  if (normalized === 'n' || normalized === 'no') return false;
  return undefined;
}

type ReadlineSession = {
  rl: readline.Interface;
  lines: AsyncIterator<string>;
  closed: boolean;
};

/**
 * ConfirmPrompt on top of readline. Unrecognized answers re-ask the question.
 * A closed input stream rejects with PromptError.
 *
 * One readline interface serves every question, so answers piped in ahead of
 * time are kept for later calls. The input is paused between questions;
 * call close() to release it.
 */
export class ReadlineConfirmPrompt implements ConfirmPrompt {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private readonly defaultAnswer: boolean;
  private session: ReadlineSession | null = null;

  constructor(options: ReadlineConfirmPromptOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.defaultAnswer = options.defaultAnswer ?? false;
  }

  async confirm(question: string): Promise<boolean> {
    const session = this.getSession();
    const { rl, lines } = session;
    const ask = `${question} ${this.defaultAnswer ? '(Y/n)' : '(y/N)'} `;

    if (!session.closed) rl.resume();
    try {
      this.output.write(ask);
      for (;;) {
        const next = await lines.next();
        if (next.done) {
          throw new PromptError(`Input closed before "${question}" was answered`);
        }
        const parsed = parseConfirmAnswer(next.value, this.defaultAnswer);
        if (parsed !== undefined) {
          return parsed;
        }
        this.output.write(`Please answer "y" or "n".\n${ask}`);
      }
    } catch (error) {
      if (error instanceof PromptError) {
        throw error;
      }
      throw new PromptError(`Failed to read an answer to "${question}"`, error);
    } finally {
      if (!session.closed) rl.pause();
    }
  }

  close(): void {
    this.session?.rl.close();
    this.session = null;
  }

  private getSession(): ReadlineSession {
    if (!this.session) {
      const rl = readline.createInterface({ input: this.input, terminal: false });
      const session: ReadlineSession = { rl, lines: rl[Symbol.asyncIterator](), closed: false };
      rl.once('close', () => {
        session.closed = true;
      });
      this.session = session;
    }
    return this.session;
  }
}
