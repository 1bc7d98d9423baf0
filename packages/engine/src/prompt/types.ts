/**
 * Interactive prompt
 *
 * The one place the resolution pipeline waits on a human. Everything the
 * engine asks goes through this interface, so tests and replays script the
 * answers and the CLI reads them from the console.
 */

export type ChoiceOption = {
  readonly label: string;
  readonly helpText: string;
};

export type Prompt = {
  /**
   * Pick from a numbered list.
   *
   * Resolves to the selected indices, in the order given. An empty array
   * means the user declined to choose. With allowMultiple false at most one
   * index is returned.
   */
  readonly choose: (
    caption: string,
    message: string,
    options: readonly ChoiceOption[],
    defaultIndices: readonly number[],
    allowMultiple: boolean
  ) => Promise<readonly number[]>;

  /** Read one line of free text */
  readonly readLine: (message: string) => Promise<string>;
};
