/**
 * Console prompter
 *
 * Reads validated answers from the console, re-prompting until the input is
 * valid. End of input is reported as `null` instead of an error.
 */

import type { Interface } from 'node:readline/promises';

/**
 * Source of answer lines; resolves `null` once input has ended
 */
export interface LineReader {
  question(query: string): Promise<string | null>;
}

export type Output = (line: string) => void;

export interface IntegerPrompt {
  min: number;
  max: number;
  rangeMessage: string;
}

export const NOT_A_NUMBER_MESSAGE = 'Please enter a number.';
export const NOT_A_LIST_MESSAGE = 'Please enter numbers separated by commas.';
export const INVALID_SELECTION_MESSAGE = 'Invalid selection. Please try again.';

function isInputClosed(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return error.name === 'AbortError' || ('code' in error && error.code === 'ERR_USE_AFTER_CLOSE');
}

/**
 * Adapt a readline interface. Lines are queued as they arrive, so answers
 * typed ahead or piped in one chunk are all kept. Once the interface has
 * closed (Ctrl+D, piped input exhausted) and the queue is drained, every
 * question resolves to `null`.
 */
export function createLineReader(rl: Interface): LineReader {
  const lines = rl[Symbol.asyncIterator]();
  let closed = false;
  let exhausted = false;
  rl.once('close', () => {
    closed = true;
  });

  return {
    async question(query: string): Promise<string | null> {
      if (exhausted) return null;
      if (!closed) {
        rl.setPrompt(query);
        rl.prompt();
      }
      try {
        const next = await lines.next();
        if (next.done) {
          exhausted = true;
          return null;
        }
        return next.value;
      } catch (error) {
        if (isInputClosed(error)) {
          exhausted = true;
          return null;
        }
        throw error;
      }
    },
  };
}

/**
 * Parse a whole-number answer; undefined for anything else
 */
export function parseInteger(answer: string): number | undefined {
  const trimmed = answer.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return undefined;
  }
  return Number.parseInt(trimmed, 10);
}

export class Prompter {
  constructor(
    private readonly reader: LineReader,
    private readonly output: Output = console.log
  ) {}

  print(line = ''): void {
    this.output(line);
  }

  async ask(question: string): Promise<string | null> {
    return this.reader.question(question);
  }

  /**
   * Ask until the answer is a whole number within [min, max]
   */
  async promptInteger(question: string, { min, max, rangeMessage }: IntegerPrompt): Promise<number | null> {
    for (;;) {
      const answer = await this.ask(question);
      if (answer === null) return null;

      const value = parseInteger(answer);
      if (value === undefined) {
        this.print(NOT_A_NUMBER_MESSAGE);
        continue;
      }
      if (value < min || value > max) {
        this.print(rangeMessage);
        continue;
      }
      return value;
    }
  }

  /**
   * Ask for comma-separated 1-based choices out of `count` options.
   * Resolves the zero-based indices, deduplicated, in the order given.
   */
  async promptSelection(question: string, count: number): Promise<number[] | null> {
    for (;;) {
      const answer = await this.ask(question);
      if (answer === null) return null;

      const tokens = answer
        .split(',')
        .map((token) => token.trim())
        .filter((token) => token.length > 0);
      const values = tokens.map(parseInteger);

      if (values.some((value) => value === undefined)) {
        this.print(NOT_A_LIST_MESSAGE);
        continue;
      }

      const choices = values.filter((value): value is number => value !== undefined);
      if (choices.length === 0 || choices.some((value) => value < 1 || value > count)) {
        this.print(INVALID_SELECTION_MESSAGE);
        continue;
      }

      return [...new Set(choices)].map((value) => value - 1);
    }
  }
}
