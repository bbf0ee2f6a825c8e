import * as readline from 'node:readline/promises';
import { stdin, stdout } from 'node:process';
import { PromptClosedError } from '../errors.js';

export interface PromptIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Interpret a yes/no answer. Returns undefined for anything else.
 */
export function parseYesNo(answer: string): boolean | undefined {
  const trimmed = answer.trim().toLowerCase();

  if (trimmed === 'y' || trimmed === 'yes') return true;
  if (trimmed === 'n' || trimmed === 'no') return false;
  return undefined;
}

/**
 * Ask a yes/no question on the terminal, repeating until the answer is valid.
 * @throws PromptClosedError if the input ends first
 */
export async function askYesNo(
  question: string,
  io: PromptIO = { input: stdin, output: stdout }
): Promise<boolean> {
  const rl = readline.createInterface({ input: io.input, output: io.output });
  const controller = new AbortController();
  let closed = false;

  // A pending question does not settle on its own when the input ends
  rl.once('close', () => {
    closed = true;
    controller.abort();
  });

  try {
    while (!closed) {
      let answer: string;
      try {
        answer = await rl.question(`${question} (y/n) `, { signal: controller.signal });
      } catch (error) {
        if (closed) {
          throw new PromptClosedError(question, { cause: error });
        }
        throw error;
      }

      const parsed = parseYesNo(answer);
      if (parsed !== undefined) {
        return parsed;
      }

      io.output.write("Please answer 'y' or 'n'.\n");
    }

    throw new PromptClosedError(question);
  } finally {
    if (!closed) rl.close();
  }
}
