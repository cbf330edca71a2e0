import * as vscode from "vscode";
import { getInstructionDocumentation } from "../api/compiler-explorer-api";
import { errorNotification, notifyWithLink } from "../views/notifications";
import { CompilerExplorerContext } from "./context";

/**
 * Shows the documentation of the instruction under the cursor in a generated document.
 */
export async function showInstructionTooltip(
  ctx: CompilerExplorerContext,
  editor: vscode.TextEditor
): Promise<void> {
  const document = editor.document;
  const instructionSet = ctx.instructionSets.get(document.uri.toString());
  if (!instructionSet) {
    await errorNotification("No instruction set known for this view. Compile a file first.");
    return;
  }

  const wordRange = document.getWordRangeAtPosition(editor.selection.active, /[A-Za-z][\w.]*/);
  if (!wordRange) {
    return;
  }
  const opcode = document.getText(wordRange);

  const { data, error } = await getInstructionDocumentation(instructionSet, opcode);
  if (error !== undefined || data === undefined) {
    await errorNotification(error ?? `No documentation for ${opcode}`);
    return;
  }

  await notifyWithLink(`${opcode}: ${data.tooltip}`, data.url);
}
