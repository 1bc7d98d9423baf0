/**
 * Console prompt
 *
 * Numbered choices and free-text lines over a readline interface. Invalid
 * selections are asked again; an empty answer takes the defaults.
 */

import { createInterface } from "node:readline/promises";
import type { ChoiceOption, Prompt } from "@clrcall/engine";

export type ConsolePromptStreams = {
  readonly input: NodeJS.ReadableStream;
  readonly output: NodeJS.WritableStream;
};

export type ConsolePrompt = Prompt & {
  readonly close: () => void;
};

/**
 * "1", "1,3" or "1 3" to zero-based indices; undefined when any part is
 * not a listed option number.
 */
export const parseSelection = (
  answer: string,
  optionCount: number
): readonly number[] | undefined => {
  const parts = answer.split(/[\s,]+/).filter((p) => p.length > 0);
  const indices: number[] = [];
  for (const part of parts) {
    if (!/^\d+$/.test(part)) return undefined;
    const index = Number(part) - 1;
    if (index < 0 || index >= optionCount) return undefined;
    if (!indices.includes(index)) indices.push(index);
  }
  return indices;
};

const renderChoices = (
  caption: string,
  message: string,
  options: readonly ChoiceOption[],
  defaultIndices: readonly number[]
): string => {
  const lines = [caption, message];
  options.forEach((option, i) => {
    const marker = defaultIndices.includes(i) ? "*" : " ";
    lines.push(`${marker}[${i + 1}] ${option.label}`);
    if (option.helpText && option.helpText !== option.label) {
      lines.push(`      ${option.helpText.split("\n").join("\n      ")}`);
    }
  });
  return lines.join("\n") + "\n";
};

export const createConsolePrompt = (
  streams: ConsolePromptStreams = { input: process.stdin, output: process.stdout }
): ConsolePrompt => {
  const rl = createInterface({
    input: streams.input,
    output: streams.output,
    terminal: false,
  });

  const choose = async (
    caption: string,
    message: string,
    options: readonly ChoiceOption[],
    defaultIndices: readonly number[],
    allowMultiple: boolean
  ): Promise<readonly number[]> => {
    streams.output.write(renderChoices(caption, message, options, defaultIndices));
    const hint = allowMultiple ? "numbers separated by commas" : "a number";

    while (true) {
      const answer = (await rl.question(`Choose ${hint} (Enter for default): `)).trim();
      if (answer === "") return defaultIndices;

      const selection = parseSelection(answer, options.length);
      if (selection && (allowMultiple || selection.length === 1)) {
        return selection;
      }
      streams.output.write(`Invalid choice '${answer}'\n`);
    }
  };

  const readLine = async (message: string): Promise<string> =>
    rl.question(`${message}: `);

  return {
    choose,
    readLine,
    close: () => rl.close(),
  };
};
