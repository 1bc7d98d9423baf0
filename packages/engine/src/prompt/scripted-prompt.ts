/**
 * Scripted prompt
 *
 * Answers from prepared queues and records every question asked. Used by
 * tests and by the CLI to replay answers given on the command line.
 *
 * When a queue runs out, choices fall back to their defaults and lines to
 * the empty string.
 */

import type { ChoiceOption, Prompt } from "./types.js";

export type PromptEvent =
  | {
      readonly kind: "choose";
      readonly caption: string;
      readonly message: string;
      readonly options: readonly ChoiceOption[];
      readonly defaultIndices: readonly number[];
      readonly answer: readonly number[];
    }
  | {
      readonly kind: "readLine";
      readonly message: string;
      readonly answer: string;
    };

export type PromptScript = {
  /** One entry per choose() call: an index or a list of indices */
  readonly choices?: readonly (number | readonly number[])[];
  /** One entry per readLine() call */
  readonly lines?: readonly string[];
};

export type ScriptedPrompt = Prompt & {
  readonly transcript: () => readonly PromptEvent[];
};

export const createScriptedPrompt = (
  script: PromptScript = {}
): ScriptedPrompt => {
  const choices = [...(script.choices ?? [])];
  const lines = [...(script.lines ?? [])];
  const events: PromptEvent[] = [];

  const choose: Prompt["choose"] = async (
    caption,
    message,
    options,
    defaultIndices,
    allowMultiple
  ) => {
    const scripted = choices.shift();
    const requested =
      scripted === undefined
        ? defaultIndices
        : typeof scripted === "number"
          ? [scripted]
          : scripted;

    const valid = requested.filter(
      (i) => Number.isInteger(i) && i >= 0 && i < options.length
    );
    const answer = allowMultiple ? valid : valid.slice(0, 1);

    events.push({
      kind: "choose",
      caption,
      message,
      options,
      defaultIndices,
      answer,
    });
    return answer;
  };

  const readLine: Prompt["readLine"] = async (message) => {
    const answer = lines.shift() ?? "";
    events.push({ kind: "readLine", message, answer });
    return answer;
  };

  return {
    choose,
    readLine,
    transcript: () => [...events],
  };
};
