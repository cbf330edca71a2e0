jest.mock("../../api/compiler-explorer-api", () => ({
  getLanguages: jest.fn(),
  getCompilers: jest.fn(),
  postCompile: jest.fn(),
}));

jest.mock("../../views/prompts", () => ({
  promptChoice: jest.fn(),
  promptText: jest.fn(),
}));

jest.mock("../../views/notifications", () => ({
  errorNotification: jest.fn(),
  infoNotification: jest.fn(),
}));

import * as vscode from "vscode";
import { mocked } from "jest-mock";
import { getCompilers, getLanguages, postCompile } from "../../api/compiler-explorer-api";
import { AsmLine, Compiler, Language } from "../../api/types/compiler-explorer";
import { compileSource, resolveSourceInput } from "../../services/compile-service";
import { CompilerExplorerContext } from "../../services/context";
import { CompilerDiagnostics } from "../../services/diagnostics-service";
import { HighlightController } from "../../services/highlight-controller";
import { GeneratedDocumentProvider, generatedUriFor } from "../../views/generated-document";
import { errorNotification, infoNotification } from "../../views/notifications";
import { promptChoice, promptText } from "../../views/prompts";
import { FakeNamespace } from "../helpers/fake-namespace";

const languages: Language[] = [
  { id: "c++", name: "C++", extensions: [".cpp", ".cxx", ".h"] },
  { id: "rust", name: "Rust", extensions: [".rs"] },
];

const gcc: Compiler = { id: "g132", name: "x86-64 gcc 13.2", lang: "c++", instructionSet: "amd64" };

const sourceLines = [
  "#include <cstdio>",
  "",
  "int main() {",
  "    int total = 0;",
  "    for (int i = 0; i < 4; ++i) {",
  "        total += i;",
  "    }",
  "    std::printf(\"%d\\n\", total);",
  "    return 0;",
  "}",
];

/** 8 output lines: 3 and 4 come from source line 6, 7 from source line 9. */
const asm: AsmLine[] = [
  { text: "main:", source: null },
  { text: "        push    rbx", source: { file: null, line: 3 } },
  { text: "        add     ebx, eax", source: { file: null, line: 6 } },
  { text: "        inc     eax", source: { file: null, line: 6 } },
  { text: ".LC0:", source: null },
  { text: "        .string \"%d\\n\"", source: null },
  { text: "        xor     eax, eax", source: { file: null, line: 9 } },
  { text: "        ret", source: null },
];

function fakeEditor(lines: string[], fileName = "/work/main.cpp", selection = new vscode.Selection(0, 0, 0, 0)) {
  const uri = vscode.Uri.parse(`file://${fileName}`);
  const document = {
    uri,
    fileName,
    lineCount: lines.length,
    lineAt: (line: number) => ({ text: lines[line] }),
  };
  return { document, selection } as unknown as vscode.TextEditor;
}

describe("compileSource", () => {
  let ctx: CompilerExplorerContext;
  let namespaces: Map<string, FakeNamespace>;

  const queueSuccessfulCompile = () => {
    mocked(getLanguages).mockResolvedValue({ data: languages });
    mocked(getCompilers).mockResolvedValue({ data: [gcc] });
    mocked(promptChoice).mockResolvedValueOnce(languages[0]).mockResolvedValueOnce(gcc);
    mocked(promptText).mockResolvedValueOnce("-O2");
    mocked(postCompile).mockResolvedValue({ data: { code: 0, asm, stdout: [], stderr: [] } });
  };

  beforeAll(() => {
    jest.spyOn(console, "log").mockImplementation(() => {});
  });

  beforeEach(() => {
    jest.clearAllMocks();
    mocked(getLanguages).mockReset();
    mocked(getCompilers).mockReset();
    mocked(postCompile).mockReset();
    mocked(promptChoice).mockReset();
    mocked(promptText).mockReset();
    namespaces = new Map();
    ctx = {
      documents: new GeneratedDocumentProvider(),
      highlights: new HighlightController((uri) => {
        const namespace = new FakeNamespace();
        namespaces.set(uri.toString(), namespace);
        return namespace;
      }),
      diagnostics: new CompilerDiagnostics(),
      instructionSets: new Map(),
    };
  });

  it("compiles the whole file and correlates source and output lines", async () => {
    queueSuccessfulCompile();
    const editor = fakeEditor(sourceLines);
    const sourceUri = editor.document.uri;
    const generatedUri = generatedUriFor(sourceUri);

    await compileSource(ctx, editor);

    expect(mocked(promptChoice).mock.calls[0][0]).toEqual([languages[0]]);
    expect(getCompilers).toHaveBeenCalledWith("c++");
    expect(postCompile).toHaveBeenCalledWith("g132", {
      source: sourceLines.join("\n"),
      lang: "c++",
      userArguments: "-O2",
    });
    expect(ctx.documents.provideTextDocumentContent(generatedUri)).toBe(asm.map((line) => line.text).join("\n"));
    expect(vscode.window.showTextDocument).toHaveBeenCalled();
    expect(infoNotification).toHaveBeenCalledWith("Compilation done x86-64 gcc 13.2");
    expect(ctx.instructionSets.get(generatedUri.toString())).toBe("amd64");

    const generatedView = namespaces.get(generatedUri.toString());
    ctx.highlights.handleCursorMoved(sourceUri, 6);
    expect(generatedView?.lines).toEqual([3, 4]);

    ctx.highlights.handleCursorMoved(sourceUri, 1);
    expect(generatedView?.lines).toEqual([]);
  });

  it("uses the configured prompts and label templates", async () => {
    queueSuccessfulCompile();

    await compileSource(ctx, fakeEditor(sourceLines));

    const [, options] = mocked(promptChoice).mock.calls[0];
    expect(options.prompt).toBe("Select language> ");
    expect(options.formatItem(languages[0])).toBe("C++");
    expect(promptText).toHaveBeenCalledWith({ prompt: "Select compiler options> " });
  });

  it("stops before any prompt when no language matches the file", async () => {
    mocked(getLanguages).mockResolvedValue({ data: languages });

    await compileSource(ctx, fakeEditor(["const x = 1;"], "/work/main.zig"));

    expect(errorNotification).toHaveBeenCalledWith("File type .zig not supported by Compiler Explorer");
    expect(promptChoice).not.toHaveBeenCalled();
    expect(postCompile).not.toHaveBeenCalled();
  });

  it("reports a failure to fetch languages", async () => {
    mocked(getLanguages).mockResolvedValue({ error: "Failed to fetch languages: timeout of 30000ms exceeded" });

    await compileSource(ctx, fakeEditor(sourceLines));

    expect(errorNotification).toHaveBeenCalledWith("Failed to fetch languages: timeout of 30000ms exceeded");
    expect(promptChoice).not.toHaveBeenCalled();
  });

  it("ends quietly when the compiler prompt is dismissed, and a later compile still works", async () => {
    mocked(getLanguages).mockResolvedValue({ data: languages });
    mocked(getCompilers).mockResolvedValue({ data: [gcc] });
    mocked(promptChoice).mockResolvedValueOnce(languages[0]).mockResolvedValueOnce(undefined);
    const replaceViewContents = jest.spyOn(ctx.documents, "replaceViewContents");
    const editor = fakeEditor(sourceLines);

    await compileSource(ctx, editor);

    expect(promptText).not.toHaveBeenCalled();
    expect(postCompile).not.toHaveBeenCalled();
    expect(replaceViewContents).not.toHaveBeenCalled();
    expect(vscode.workspace.openTextDocument).not.toHaveBeenCalled();
    expect(errorNotification).not.toHaveBeenCalled();
    expect(ctx.highlights.sessionCount).toBe(0);

    queueSuccessfulCompile();
    await compileSource(ctx, editor);

    expect(postCompile).toHaveBeenCalledTimes(1);
    expect(ctx.highlights.sessionCount).toBe(1);
  });

  it("ends quietly when the options prompt is dismissed", async () => {
    mocked(getLanguages).mockResolvedValue({ data: languages });
    mocked(getCompilers).mockResolvedValue({ data: [gcc] });
    mocked(promptChoice).mockResolvedValueOnce(languages[0]).mockResolvedValueOnce(gcc);
    mocked(promptText).mockResolvedValueOnce(undefined);

    await compileSource(ctx, fakeEditor(sourceLines));

    expect(postCompile).not.toHaveBeenCalled();
  });

  it("reports a language without compilers", async () => {
    mocked(getLanguages).mockResolvedValue({ data: languages });
    mocked(getCompilers).mockResolvedValue({ data: [] });
    mocked(promptChoice).mockResolvedValueOnce(languages[0]);

    await compileSource(ctx, fakeEditor(sourceLines));

    expect(errorNotification).toHaveBeenCalledWith("No compilers available for C++");
    expect(promptChoice).toHaveBeenCalledTimes(1);
  });

  it("keeps the previous output when the remote compile fails", async () => {
    queueSuccessfulCompile();
    const editor = fakeEditor(sourceLines);
    const generatedUri = generatedUriFor(editor.document.uri);
    await compileSource(ctx, editor);

    mocked(promptChoice).mockResolvedValueOnce(languages[0]).mockResolvedValueOnce(gcc);
    mocked(promptText).mockResolvedValueOnce("-O3");
    mocked(postCompile).mockResolvedValueOnce({ error: "Compiler not found: g132" });
    await compileSource(ctx, editor);

    expect(errorNotification).toHaveBeenCalledWith("Compilation with x86-64 gcc 13.2 failed: Compiler not found: g132");
    expect(ctx.documents.provideTextDocumentContent(generatedUri)).toBe(asm.map((line) => line.text).join("\n"));
    expect(infoNotification).toHaveBeenCalledTimes(1);
  });

  it("offers every language and skips correlation for a selection", async () => {
    queueSuccessfulCompile();
    mocked(postCompile).mockResolvedValue({
      data: {
        code: 1,
        asm: [{ text: "<Compilation failed>", source: null }],
        stdout: [],
        stderr: [{ text: "<source>:2:5: error: x", tag: { line: 2, column: 5, text: "x", severity: 3 } }],
      },
    });
    const editor = fakeEditor(sourceLines, "/work/main.cpp", new vscode.Selection(2, 0, 5, 3));
    const collection = jest.mocked(vscode.languages.createDiagnosticCollection).mock.results[0].value;

    await compileSource(ctx, editor);

    expect(mocked(promptChoice).mock.calls[0][0]).toEqual(languages);
    expect(postCompile).toHaveBeenCalledWith("g132", {
      source: sourceLines.slice(2, 6).join("\n"),
      lang: "c++",
      userArguments: "-O2",
    });
    expect(ctx.highlights.sessionCount).toBe(0);
    expect(collection.set).toHaveBeenCalledWith(editor.document.uri, [
      expect.objectContaining({ range: new vscode.Range(3, 4, 3, 4) }),
    ]);
  });

  it("ends the previous correlation when a selection is compiled", async () => {
    queueSuccessfulCompile();
    const fullEditor = fakeEditor(sourceLines);
    const sourceUri = fullEditor.document.uri;
    await compileSource(ctx, fullEditor);
    const firstGenerated = namespaces.get(generatedUriFor(sourceUri).toString());

    mocked(promptChoice).mockResolvedValueOnce(languages[0]).mockResolvedValueOnce(gcc);
    mocked(promptText).mockResolvedValueOnce("-O2");
    mocked(postCompile).mockResolvedValueOnce({
      data: { code: 0, asm: [{ text: "square:", source: null }], stdout: [], stderr: [] },
    });
    await compileSource(ctx, fakeEditor(sourceLines, "/work/main.cpp", new vscode.Selection(2, 0, 5, 3)));

    expect(ctx.highlights.sessionCount).toBe(0);
    expect(firstGenerated?.disposed).toBe(true);

    ctx.highlights.handleCursorMoved(sourceUri, 6);
    expect(firstGenerated?.lines).toEqual([]);
  });

  it("ends the previous correlation when the next compile has it disabled", async () => {
    queueSuccessfulCompile();
    const editor = fakeEditor(sourceLines);
    await compileSource(ctx, editor);
    expect(ctx.highlights.sessionCount).toBe(1);

    mocked(promptChoice).mockResolvedValueOnce(languages[0]).mockResolvedValueOnce(gcc);
    mocked(promptText).mockResolvedValueOnce("-O2");
    (vscode.workspace.getConfiguration as jest.Mock).mockReturnValueOnce({
      get: (key: string) => (key === "liveCorrelation.enable" ? false : undefined),
    });
    await compileSource(ctx, editor);

    expect(ctx.highlights.sessionCount).toBe(0);
  });

  it("skips correlation when it is disabled in the settings", async () => {
    queueSuccessfulCompile();
    (vscode.workspace.getConfiguration as jest.Mock).mockReturnValueOnce({
      get: (key: string) => (key === "liveCorrelation.enable" ? false : undefined),
    });

    await compileSource(ctx, fakeEditor(sourceLines));

    expect(postCompile).toHaveBeenCalled();
    expect(ctx.highlights.sessionCount).toBe(0);
  });
});

describe("resolveSourceInput", () => {
  it("takes the whole document when nothing is selected", () => {
    const input = resolveSourceInput(fakeEditor(["a", "b", "c"]));

    expect(input).toEqual({ text: "a\nb\nc", range: { start: 1, end: 3 }, fullDocument: true });
  });

  it("leaves out the last line of a selection ending at its first column", () => {
    const input = resolveSourceInput(fakeEditor(["a", "b", "c"], "/work/a.cpp", new vscode.Selection(0, 0, 2, 0)));

    expect(input).toEqual({ text: "a\nb", range: { start: 1, end: 2 }, fullDocument: false });
  });

  it("clamps an explicit range to the document", () => {
    const input = resolveSourceInput(fakeEditor(["a", "b", "c"]), { start: 2, end: 40 });

    expect(input).toEqual({ text: "b\nc", range: { start: 2, end: 3 }, fullDocument: false });
  });

  it("treats a selection of every line as the whole document", () => {
    const input = resolveSourceInput(fakeEditor(["a", "b"], "/work/a.cpp", new vscode.Selection(0, 0, 1, 1)));

    expect(input.fullDocument).toBe(true);
  });
});
