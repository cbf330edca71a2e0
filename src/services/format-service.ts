import * as vscode from "vscode";
import { getFormatters, postFormat } from "../api/compiler-explorer-api";
import { Formatter } from "../api/types/compiler-explorer";
import { yieldPoint } from "../async/task";
import { getExtensionConfig } from "../config/extension-config";
import { formatLabel } from "../utils";
import { errorNotification, infoNotification } from "../views/notifications";
import { promptChoice } from "../views/prompts";

export const DEFAULT_STYLE = "__DefaultStyle";

/**
 * Formats the whole document with a formatter hosted by Compiler Explorer.
 *
 * The document is only replaced once the service returned formatted text.
 */
export async function formatDocument(editor: vscode.TextEditor): Promise<void> {
  const conf = getExtensionConfig();
  const document = editor.document;
  const source = document.getText();

  const { data: formatters, error } = await getFormatters();
  if (error !== undefined || formatters === undefined) {
    await errorNotification(error ?? "Failed to fetch formatters");
    return;
  }
  if (formatters.length === 0) {
    await errorNotification("No formatters available on Compiler Explorer");
    return;
  }

  const formatter = await promptChoice<Formatter>(formatters, {
    prompt: conf.prompt.formatter,
    formatItem: (item) => formatLabel(conf.formatItem.formatter, item),
  });
  if (!formatter) {
    return;
  }

  let style = formatter.styles[0] ?? DEFAULT_STYLE;
  if (formatter.styles.length > 0) {
    const chosen = await promptChoice(formatter.styles, {
      prompt: conf.prompt.formatterStyle,
      formatItem: (item) => formatLabel(conf.formatItem.formatterStyle, item),
    });
    if (chosen === undefined) {
      return;
    }
    style = chosen;
  }

  console.log(`[Format] ${formatter.type} with style ${style} on ${document.uri.toString()}`);
  const { data: result, error: formatError } = await postFormat(formatter.type, source, style);
  if (formatError !== undefined || result === undefined) {
    await errorNotification(`Formatting with ${formatter.name} failed: ${formatError ?? "no result"}`);
    return;
  }
  if (result.exit !== 0) {
    await errorNotification(`Formatting with ${formatter.name} failed: ${result.answer}`);
    return;
  }

  const replaced = await replaceDocumentText(editor, result.answer.split("\n"));
  if (!replaced) {
    await errorNotification("The document changed while formatting; nothing was replaced");
    return;
  }

  await yieldPoint();
  await infoNotification(`Text formatted using ${formatter.name} and style ${style}`);
}

/**
 * Replaces the full text of the editor's document with `lines`.
 */
export async function replaceDocumentText(editor: vscode.TextEditor, lines: readonly string[]): Promise<boolean> {
  const document = editor.document;
  const lastLine = document.lineAt(document.lineCount - 1);
  const fullRange = new vscode.Range(0, 0, lastLine.range.end.line, lastLine.range.end.character);
  return editor.edit((builder) => builder.replace(fullRange, lines.join("\n")));
}
