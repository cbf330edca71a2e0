import * as path from "path";
import * as vscode from "vscode";

export const GENERATED_SCHEME = "compiler-explorer";

/**
 * Serves the read-only documents that hold compiler output.
 *
 * There is one generated document per source document; compiling again
 * replaces its contents instead of opening another tab.
 */
export class GeneratedDocumentProvider implements vscode.TextDocumentContentProvider, vscode.Disposable {
  private readonly contents = new Map<string, string>();
  private readonly changeEmitter = new vscode.EventEmitter<vscode.Uri>();

  public readonly onDidChange = this.changeEmitter.event;

  public provideTextDocumentContent(uri: vscode.Uri): string {
    return this.contents.get(uri.toString()) ?? "";
  }

  /**
   * Replaces the whole contents of a generated document.
   */
  public replaceViewContents(uri: vscode.Uri, lines: readonly string[]): void {
    this.contents.set(uri.toString(), lines.join("\n"));
    this.changeEmitter.fire(uri);
  }

  public forget(uri: vscode.Uri): void {
    this.contents.delete(uri.toString());
  }

  public dispose(): void {
    this.contents.clear();
    this.changeEmitter.dispose();
  }
}

/**
 * The generated document paired with a source document, e.g.
 * `compiler-explorer:/main.cpp.asm?file%3A%2F%2F%2Fsrc%2Fmain.cpp`.
 */
export function generatedUriFor(sourceUri: vscode.Uri): vscode.Uri {
  const name = path.basename(sourceUri.path) || "untitled";
  return vscode.Uri.parse(
    `${GENERATED_SCHEME}:/${encodeURIComponent(name)}.asm?${encodeURIComponent(sourceUri.toString())}`
  );
}

/**
 * Opens the generated document beside the source, leaving focus where it is,
 * unless it is already visible.
 */
export async function showGeneratedView(uri: vscode.Uri): Promise<vscode.TextEditor> {
  const visible = vscode.window.visibleTextEditors.find(
    (editor) => editor.document.uri.toString() === uri.toString()
  );
  if (visible) {
    return visible;
  }
  const document = await vscode.workspace.openTextDocument(uri);
  return vscode.window.showTextDocument(document, {
    viewColumn: vscode.ViewColumn.Beside,
    preserveFocus: true,
    preview: false,
  });
}
