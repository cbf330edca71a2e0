import * as vscode from "vscode";
import { HighlightNamespace } from "../services/highlight-session";

/**
 * Creates the whole-line decoration used for correlated lines.
 *
 * @param highlightStyle - A theme color id such as "editor.rangeHighlightBackground".
 */
export function createCorrelationDecoration(highlightStyle: string): vscode.TextEditorDecorationType {
  return vscode.window.createTextEditorDecorationType({
    isWholeLine: true,
    backgroundColor: new vscode.ThemeColor(highlightStyle),
    overviewRulerColor: new vscode.ThemeColor(highlightStyle),
    overviewRulerLane: vscode.OverviewRulerLane.Center,
  });
}

/**
 * Highlights lines of one document with a decoration type of its own.
 *
 * Each instance owns its decoration type, so clearing it never touches
 * highlights drawn by another session or another extension.
 */
export class DecorationNamespace implements HighlightNamespace {
  private lines: number[] = [];

  constructor(
    private readonly uri: vscode.Uri,
    private readonly decorationType: vscode.TextEditorDecorationType
  ) {}

  public applyHighlight(line: number): void {
    const document = this.findDocument();
    if (!document || !Number.isInteger(line) || line < 1 || line > document.lineCount) {
      console.log(`[DecorationNamespace] Line ${line} is not in ${this.uri.toString()}, skipping`);
      return;
    }
    this.lines.push(line);
    this.render();
  }

  public clearHighlights(): void {
    if (this.lines.length === 0) {
      return;
    }
    this.lines = [];
    this.render();
  }

  public dispose(): void {
    this.lines = [];
    this.decorationType.dispose();
  }

  private render(): void {
    const ranges = this.lines.map((line) => new vscode.Range(line - 1, 0, line - 1, 0));
    for (const editor of vscode.window.visibleTextEditors) {
      if (editor.document.uri.toString() === this.uri.toString()) {
        editor.setDecorations(this.decorationType, ranges);
      }
    }
  }

  private findDocument(): vscode.TextDocument | undefined {
    return vscode.workspace.textDocuments.find(
      (document) => document.uri.toString() === this.uri.toString()
    );
  }
}
