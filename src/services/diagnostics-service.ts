import * as vscode from "vscode";
import { OutputLine } from "../api/types/compiler-explorer";

/**
 * Maps the severity code of a compiler message to an editor severity.
 */
export function toDiagnosticSeverity(severity: number | undefined): vscode.DiagnosticSeverity {
  switch (severity) {
    case 1:
      return vscode.DiagnosticSeverity.Information;
    case 2:
      return vscode.DiagnosticSeverity.Warning;
    default:
      return vscode.DiagnosticSeverity.Error;
  }
}

/**
 * Turns tagged compiler stderr lines into diagnostics.
 *
 * @param stderr - The compile response's stderr lines; untagged ones are skipped.
 * @param lineOffset - Lines to add to reported positions, for compiles of a selection.
 */
export function parseCompilerErrors(stderr: readonly OutputLine[], lineOffset = 0): vscode.Diagnostic[] {
  const diagnostics: vscode.Diagnostic[] = [];
  for (const entry of stderr) {
    const tag = entry.tag;
    if (!tag || !Number.isInteger(tag.line) || tag.line < 1) {
      continue;
    }
    const line = tag.line - 1 + lineOffset;
    const column = Math.max((tag.column || 1) - 1, 0);
    const diagnostic = new vscode.Diagnostic(
      new vscode.Range(line, column, line, column),
      tag.text,
      toDiagnosticSeverity(tag.severity)
    );
    diagnostic.source = "Compiler Explorer";
    diagnostics.push(diagnostic);
  }
  return diagnostics;
}

/**
 * Publishes compiler messages on the compiled source document.
 * Each compile replaces the previous messages of that document.
 */
export class CompilerDiagnostics implements vscode.Disposable {
  private readonly collection = vscode.languages.createDiagnosticCollection("compiler-explorer");

  public report(uri: vscode.Uri, stderr: readonly OutputLine[], lineOffset = 0): number {
    const diagnostics = parseCompilerErrors(stderr, lineOffset);
    this.collection.set(uri, diagnostics);
    return diagnostics.length;
  }

  public clear(uri: vscode.Uri): void {
    this.collection.delete(uri);
  }

  public dispose(): void {
    this.collection.dispose();
  }
}
