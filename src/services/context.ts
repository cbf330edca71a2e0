import { GeneratedDocumentProvider } from "../views/generated-document";
import { HighlightController } from "./highlight-controller";
import { CompilerDiagnostics } from "./diagnostics-service";

/**
 * State shared by the commands for the lifetime of the extension.
 */
export interface CompilerExplorerContext {
  documents: GeneratedDocumentProvider;
  highlights: HighlightController;
  diagnostics: CompilerDiagnostics;
  /** Instruction set of the compiler that produced each generated document, keyed by its URI. */
  instructionSets: Map<string, string>;
}
