import * as vscode from "vscode";
import * as path from "path";
import * as dotenv from "dotenv";
import { registerCompilerCommands } from "./commands/compiler-commands";
import { CompilerExplorerContext } from "./services/context";
import { CompilerDiagnostics } from "./services/diagnostics-service";
import { HighlightController } from "./services/highlight-controller";
import { GENERATED_SCHEME, GeneratedDocumentProvider } from "./views/generated-document";

/** Shared state of the running extension, exposed for tests and other modules. */
export let extensionContext: CompilerExplorerContext | undefined;

export function activate(context: vscode.ExtensionContext) {
  console.log("Compiler Explorer Activated");

  // A .env next to the extension may point COMPILER_EXPLORER_URL at a local instance.
  const envPath = path.resolve(__dirname, "../../.env");
  dotenv.config({ path: envPath });
  console.log("Compiler Explorer URL override:", process.env.COMPILER_EXPLORER_URL || "none");

  const documents = new GeneratedDocumentProvider();
  const highlights = new HighlightController();
  const diagnostics = new CompilerDiagnostics();

  const ctx: CompilerExplorerContext = {
    documents,
    highlights,
    diagnostics,
    instructionSets: new Map<string, string>(),
  };
  extensionContext = ctx;

  context.subscriptions.push(
    documents,
    highlights,
    diagnostics,
    vscode.workspace.registerTextDocumentContentProvider(GENERATED_SCHEME, documents),
    vscode.workspace.onDidCloseTextDocument((document) => {
      if (document.uri.scheme === GENERATED_SCHEME) {
        documents.forget(document.uri);
        ctx.instructionSets.delete(document.uri.toString());
      } else {
        diagnostics.clear(document.uri);
      }
    }),
    ...registerCompilerCommands(ctx)
  );
}

export function deactivate() {
  console.log("Compiler Explorer Deactivated");
  extensionContext = undefined;
}
