import * as vscode from "vscode";
import { getCompilers, getLanguages, postCompile } from "../api/compiler-explorer-api";
import { Compiler, Language } from "../api/types/compiler-explorer";
import { yieldPoint } from "../async/task";
import { getExtensionConfig } from "../config/extension-config";
import { buildLineCorrelationIndex, toAnnotatedLines } from "../correlation/line-correlation-index";
import { formatLabel, getFileExtension, isFullDocument, LineRange } from "../utils";
import { generatedUriFor, showGeneratedView } from "../views/generated-document";
import { errorNotification, infoNotification } from "../views/notifications";
import { promptChoice, promptText } from "../views/prompts";
import { CompilerExplorerContext } from "./context";
import { sessionKey } from "./highlight-controller";

export interface SourceInput {
  text: string;
  range: LineRange;
  /** True when the input covers the whole document, the only case that gets live correlation. */
  fullDocument: boolean;
}

/**
 * Picks the lines to compile: an explicit range, else the selection, else the whole document.
 */
export function resolveSourceInput(editor: vscode.TextEditor, range?: LineRange): SourceInput {
  const document = editor.document;
  const lineCount = document.lineCount;
  let resolved: LineRange;

  if (range) {
    const start = Math.min(Math.max(range.start, 1), lineCount);
    resolved = { start, end: Math.min(Math.max(range.end, start), lineCount) };
  } else if (!editor.selection.isEmpty) {
    const { start, end } = editor.selection;
    // A selection ending at column 0 does not include that line.
    const endLine = end.character === 0 && end.line > start.line ? end.line : end.line + 1;
    resolved = { start: start.line + 1, end: endLine };
  } else {
    resolved = { start: 1, end: lineCount };
  }

  const lines: string[] = [];
  for (let line = resolved.start; line <= resolved.end; line++) {
    lines.push(document.lineAt(line - 1).text);
  }

  return {
    text: lines.join("\n"),
    range: resolved,
    fullDocument: isFullDocument(resolved, lineCount),
  };
}

/**
 * Compiles the editor's text and shows the assembly beside it.
 *
 * Runs as one task: language, compiler and argument prompts, one remote
 * call, then the result. Dismissing a prompt ends the task without touching
 * any view; so does a failed compile, after telling the user.
 */
export async function compileSource(
  ctx: CompilerExplorerContext,
  editor: vscode.TextEditor,
  range?: LineRange
): Promise<void> {
  const conf = getExtensionConfig();
  const document = editor.document;
  const sourceUri = document.uri;
  const input = resolveSourceInput(editor, range);

  const { data: languages, error: languagesError } = await getLanguages();
  if (languagesError !== undefined || languages === undefined) {
    await errorNotification(languagesError ?? "Failed to fetch languages");
    return;
  }

  let possibleLanguages: Language[] = languages;
  // Only infer the language from the file when compiling the whole document.
  if (input.fullDocument) {
    const extension = getFileExtension(document.fileName);
    possibleLanguages = languages.filter((language) => language.extensions.includes(extension));
    if (possibleLanguages.length === 0) {
      await errorNotification(`File type ${extension} not supported by Compiler Explorer`);
      return;
    }
  }

  const language = await promptChoice(possibleLanguages, {
    prompt: conf.prompt.lang,
    formatItem: (item) => formatLabel(conf.formatItem.lang, item),
  });
  if (!language) {
    return;
  }

  const { data: compilers, error: compilersError } = await getCompilers(language.id);
  if (compilersError !== undefined || compilers === undefined) {
    await errorNotification(compilersError ?? "Failed to fetch compilers");
    return;
  }
  if (compilers.length === 0) {
    await errorNotification(`No compilers available for ${language.name}`);
    return;
  }

  const compiler = await promptChoice<Compiler>(compilers, {
    prompt: conf.prompt.compiler,
    formatItem: (item) => formatLabel(conf.formatItem.compiler, item),
  });
  if (!compiler) {
    return;
  }

  const userArguments = await promptText({ prompt: conf.prompt.compilerOpts });
  if (userArguments === undefined) {
    return;
  }

  console.log(`[Compile] ${compiler.id} on lines ${input.range.start}-${input.range.end} of ${sourceUri.toString()}`);
  const { data: result, error: compileError } = await postCompile(compiler.id, {
    source: input.text,
    lang: language.id,
    userArguments,
  });
  if (compileError !== undefined || result === undefined) {
    await errorNotification(`Compilation with ${compiler.name} failed: ${compileError ?? "no result"}`);
    return;
  }

  const generatedUri = generatedUriFor(sourceUri);
  // The old index no longer describes the output; a full compile starts a new session below.
  ctx.highlights.endSession(sessionKey(sourceUri, generatedUri));
  ctx.documents.replaceViewContents(
    generatedUri,
    result.asm.map((line) => line.text)
  );
  await showGeneratedView(generatedUri);
  await yieldPoint();
  await infoNotification(`Compilation done ${compiler.name}`);

  if (compiler.instructionSet) {
    ctx.instructionSets.set(generatedUri.toString(), compiler.instructionSet);
  } else {
    ctx.instructionSets.delete(generatedUri.toString());
  }

  if (conf.enableLiveCorrelation && input.fullDocument) {
    const index = buildLineCorrelationIndex(toAnnotatedLines(result.asm));
    ctx.highlights.startSession(sourceUri, generatedUri, index, conf.highlightStyle);
  }

  const reported = ctx.diagnostics.report(sourceUri, result.stderr, input.range.start - 1);
  if (reported > 0) {
    console.log(`[Compile] ${reported} compiler message(s) for ${sourceUri.toString()}`);
  }
}
