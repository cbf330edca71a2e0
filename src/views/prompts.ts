import * as vscode from "vscode";
import { Callback, suspend, wrap } from "../async/task";

export interface ChoiceOptions<T> {
  prompt: string;
  formatItem: (item: T) => string;
}

export interface TextOptions {
  prompt: string;
  value?: string;
}

interface ChoiceItem<T> extends vscode.QuickPickItem {
  item: T;
}

/**
 * Shows a quick pick and reports the outcome through `onChoice` exactly once:
 * the accepted item, or `undefined` when the picker is dismissed.
 */
export function selectItem<T>(
  items: readonly T[],
  options: ChoiceOptions<T>,
  onChoice: Callback<T | undefined>
): void {
  const quickPick = vscode.window.createQuickPick<ChoiceItem<T>>();
  quickPick.placeholder = options.prompt;
  quickPick.ignoreFocusOut = true;
  quickPick.items = items.map((item) => ({ label: options.formatItem(item), item }));

  let finished = false;
  const finish = (value: T | undefined) => {
    if (finished) {
      return;
    }
    finished = true;
    accept.dispose();
    hide.dispose();
    quickPick.dispose();
    onChoice(value);
  };

  const accept = quickPick.onDidAccept(() => finish(quickPick.selectedItems[0]?.item));
  const hide = quickPick.onDidHide(() => finish(undefined));
  quickPick.show();
}

/**
 * Shows an input box and reports the typed text, or `undefined` on dismissal, through `onInput`.
 */
export function inputText(options: TextOptions, onInput: Callback<string | undefined>): void {
  const inputBox = vscode.window.createInputBox();
  inputBox.prompt = options.prompt;
  inputBox.value = options.value ?? "";
  inputBox.ignoreFocusOut = true;

  let finished = false;
  const finish = (value: string | undefined) => {
    if (finished) {
      return;
    }
    finished = true;
    accept.dispose();
    hide.dispose();
    inputBox.dispose();
    onInput(value);
  };

  const accept = inputBox.onDidAccept(() => finish(inputBox.value));
  const hide = inputBox.onDidHide(() => finish(undefined));
  inputBox.show();
}

/**
 * Suspends the current task until the user picks one of `items` or dismisses the picker.
 */
export const promptChoice = <T>(items: readonly T[], options: ChoiceOptions<T>): Promise<T | undefined> =>
  suspend<T | undefined>((done) => selectItem(items, options, done));

/**
 * Suspends the current task until the user submits or dismisses a text input.
 */
export const promptText = wrap<[TextOptions], string | undefined>(inputText);
