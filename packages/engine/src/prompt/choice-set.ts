/**
 * Choice sets - ordered options presented through a Prompt
 */

import type { MethodDescriptor } from "../descriptors/method-descriptor.js";
import { renderSignature } from "../resolution/signature-renderer.js";
import type { Prompt } from "./types.js";

export type ChoiceEntry<T> = {
  readonly label: string;
  readonly value: T;
  readonly helpText: string;
};

export type ChoiceSet<T> = {
  readonly caption: string;
  readonly message: string;
  readonly entries: readonly ChoiceEntry<T>[];
  readonly defaultIndices: readonly number[];
  readonly allowMultiple: boolean;
};

/**
 * One entry per overload, in the order given, labelled with its simple
 * signature. The last overload is the default.
 */
export const createOverloadChoiceSet = (
  methods: readonly MethodDescriptor[],
  caption = "Overload resolution",
  message = "Several overloads match. Choose one:"
): ChoiceSet<MethodDescriptor> => ({
  caption,
  message,
  entries: methods.map((method) => ({
    label: renderSignature(method, "simple"),
    value: method,
    helpText: renderSignature(method, "full"),
  })),
  defaultIndices: methods.length > 0 ? [methods.length - 1] : [],
  allowMultiple: false,
});

/**
 * Ask the prompt and map the selected indices back to values.
 */
export const presentChoiceSet = async <T>(
  prompt: Prompt,
  set: ChoiceSet<T>
): Promise<readonly T[]> => {
  const indices = await prompt.choose(
    set.caption,
    set.message,
    set.entries.map(({ label, helpText }) => ({ label, helpText })),
    set.defaultIndices,
    set.allowMultiple
  );

  const selected: T[] = [];
  for (const index of indices) {
    const entry = set.entries[index];
    if (entry) selected.push(entry.value);
  }
  return selected;
};
