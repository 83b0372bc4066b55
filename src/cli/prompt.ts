/**
 * Interactive prompts for missing dimensions.
 */
import * as readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { InputError, ErrorCodes } from '../utils/errors.js';

export interface PromptStreams {
  input: Readable;
  output: Writable;
}

export interface DimensionAnswers {
  width: string;
  height: string;
}

/**
 * Ask for whichever of width and height was not supplied, in that order.
 * Answers are returned as raw text; parsing happens in the caller.
 * @throws InputError if the input ends before every question is answered
 */
export async function promptForDimensions(
  known: Partial<DimensionAnswers>,
  streams: PromptStreams = { input: process.stdin, output: process.stdout }
): Promise<DimensionAnswers> {
  if (known.width !== undefined && known.height !== undefined) {
    return { width: known.width, height: known.height };
  }

  const rl = readline.createInterface({
    input: streams.input,
    output: streams.output,
    terminal: false,
  });
  // Lines are buffered by the iterator, so piped input that arrives early is kept.
  const lines = rl[Symbol.asyncIterator]();

  const ask = async (question: string, label: string): Promise<string> => {
    streams.output.write(question);
    const next = await lines.next();
    if (next.done) {
      throw new InputError(ErrorCodes.INPUT_MISSING, `No ${label} was entered`, { label });
    }
    return next.value;
  };

  try {
    const width = known.width ?? (await ask('Enter width: ', 'width'));
    const height = known.height ?? (await ask('Enter height: ', 'height'));
    return { width, height };
  } finally {
    rl.close();
  }
}
