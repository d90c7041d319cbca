import enquirer from 'enquirer';

export const BACK_OPTION = '.. (Back)';

// Choice name of the back entry.
const BACK_CHOICE = '\u0000back';

export type SelectionResult =
  | { kind: 'selected'; item: string }
  | { kind: 'back' }
  | { kind: 'aborted' };

export interface SelectionPort {
  selectWithBack(label: string, items: string[], showBack: boolean): Promise<SelectionResult>;
}

export type PickerChoice = {
  name: string;
  message: string;
};

export type PickerQuestion = {
  type: 'autocomplete';
  name: 'selection';
  message: string;
  choices: PickerChoice[];
};

export type PromptFunction = (question: PickerQuestion) => Promise<{ selection: string }>;

export class EmptySelectionError extends Error {
  constructor(label: string) {
    super(`${label}: no items to select`);
    this.name = 'EmptySelectionError';
  }
}

const enquirerPrompt: PromptFunction = (question) => enquirer.prompt<{ selection: string }>(question);

export function buildChoices(items: string[], showBack: boolean): PickerChoice[] {
  const choices = items.map((item) => ({ name: item, message: item }));
  return showBack ? [{ name: BACK_CHOICE, message: BACK_OPTION }, ...choices] : choices;
}

/**
 * Interactive picker with type-to-filter. enquirer's autocomplete prompt matches
 * the typed text as a case-insensitive substring of each entry.
 */
export class TerminalPicker implements SelectionPort {
  private readonly prompt: PromptFunction;

  constructor(options: { prompt?: PromptFunction } = {}) {
    this.prompt = options.prompt ?? enquirerPrompt;
  }

  async selectWithBack(label: string, items: string[], showBack: boolean): Promise<SelectionResult> {
    if (items.length === 0) {
      throw new EmptySelectionError(label);
    }

    let answer: { selection: string };
    try {
      answer = await this.prompt({
        type: 'autocomplete',
        name: 'selection',
        message: label,
        choices: buildChoices(items, showBack)
      });
    } catch (error) {
      // enquirer rejects a cancelled prompt (Ctrl+C) with a bare value, not an Error.
      if (error instanceof Error) {
        throw error;
      }
      return { kind: 'aborted' };
    }

    if (showBack && answer.selection === BACK_CHOICE) {
      return { kind: 'back' };
    }
    return { kind: 'selected', item: answer.selection };
  }
}
