import * as vscode from "vscode";
import { spawn } from "../async/task";
import { compileSource } from "../services/compile-service";
import { CompilerExplorerContext } from "../services/context";
import { formatDocument } from "../services/format-service";
import { showInstructionTooltip } from "../services/tooltip-service";
import { errorMessage, LineRange } from "../utils";
import { errorNotification } from "../views/notifications";

const reportTaskError = (err: unknown) =>
  errorNotification(`Compiler Explorer: ${errorMessage(err)}`);

/**
 * Reads an optional 1-based line range passed as command arguments, e.g.
 * from a keybinding: `"args": [3, 12]`.
 */
export function lineRangeFromArgs(start: unknown, end: unknown): LineRange | undefined {
  if (typeof start === "number" && typeof end === "number" && Number.isInteger(start) && Number.isInteger(end)) {
    return start <= end ? { start, end } : { start: end, end: start };
  }
  return undefined;
}

/**
 * Registers the Compiler Explorer commands and returns their disposables.
 *
 * Each invocation runs as its own task; the command returns immediately.
 */
export function registerCompilerCommands(ctx: CompilerExplorerContext): vscode.Disposable[] {
  const compile = vscode.commands.registerCommand(
    "compilerExplorer.compile",
    (start?: unknown, end?: unknown) => {
      const editor = vscode.window.activeTextEditor;
      if (!editor) {
        void errorNotification("Open a file to compile it with Compiler Explorer");
        return;
      }
      spawn("compile", () => compileSource(ctx, editor, lineRangeFromArgs(start, end)), reportTaskError);
    }
  );

  const format = vscode.commands.registerCommand("compilerExplorer.format", () => {
    const editor = vscode.window.activeTextEditor;
    if (!editor) {
      void errorNotification("Open a file to format it with Compiler Explorer");
      return;
    }
    spawn("format", () => formatDocument(editor), reportTaskError);
  });

  const tooltip = vscode.commands.registerCommand("compilerExplorer.showTooltip", () => {
    const editor = vscode.window.activeTextEditor;
    if (!editor) {
      return;
    }
    spawn("tooltip", () => showInstructionTooltip(ctx, editor), reportTaskError);
  });

  const clearHighlights = vscode.commands.registerCommand("compilerExplorer.clearHighlights", () => {
    ctx.highlights.endAllSessions();
  });

  return [compile, format, tooltip, clearHighlights];
}
