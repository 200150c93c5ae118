import { open } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import { Readable, Writable } from 'node:stream';
import { OrderFileUnavailableError } from '../common/errors';

export const PROMPT = '$ ';

/**
 * Operator lines from a terminal (or any stream). The prompt is written
 * before each read, after the consumer has handled the previous line.
 * Nothing further is written when the consumer stops early (`exit`).
 */
export async function* interactiveLines(
  input: Readable,
  output: Writable,
  prompt: string = PROMPT,
): AsyncGenerator<string> {
  const rl = createInterface({ input, crlfDelay: Infinity });

  try {
    output.write(prompt);
    for await (const line of rl) {
      yield line;
      output.write(prompt);
    }
    // End of input leaves the cursor after the prompt.
    output.write('\n');
  } finally {
    rl.close();
  }
}

/**
 * Lines of an order file, in file order.
 * @throws OrderFileUnavailableError if the file cannot be opened
 */
export async function* batchLines(filePath: string): AsyncGenerator<string> {
  const handle = await open(filePath, 'r').catch((err: unknown) => {
    throw new OrderFileUnavailableError(filePath, { cause: err });
  });

  const rl = createInterface({ input: handle.createReadStream(), crlfDelay: Infinity });
  try {
    for await (const line of rl) {
      yield line;
    }
  } finally {
    rl.close();
    await handle.close();
  }
}
