import { createSilentLogger } from '@s3t/shared';
import type { SelectionPort, SelectionResult } from '../src/lib/picker';

export const silentLogger = createSilentLogger();

export type PickerCall = {
  label: string;
  items: string[];
  showBack: boolean;
};

/**
 * Picker stand-in that answers from a queue. Answers are item names, `'back'`
 * or `'abort'`; an exhausted queue aborts.
 */
export class ScriptedPicker implements SelectionPort {
  readonly calls: PickerCall[] = [];
  private readonly answers: string[];

  constructor(answers: string[]) {
    this.answers = [...answers];
  }

  async selectWithBack(label: string, items: string[], showBack: boolean): Promise<SelectionResult> {
    this.calls.push({ label, items: [...items], showBack });
    const answer = this.answers.shift();
    if (answer === undefined || answer === 'abort') {
      return { kind: 'aborted' };
    }
    if (answer === 'back') {
      return { kind: 'back' };
    }
    if (!items.includes(answer)) {
      throw new Error(`${label}: scripted answer '${answer}' is not one of ${items.join(', ')}`);
    }
    return { kind: 'selected', item: answer };
  }
}
