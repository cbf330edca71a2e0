// __mocks__/vscode.ts
// Stand-in for the `vscode` module, mapped in by jest's moduleNameMapper.

type Listener<T> = (value: T) => unknown;

export class Disposable {
  constructor(private readonly callOnDispose: () => void = () => {}) {}
  static from(...items: { dispose(): unknown }[]) {
    return new Disposable(() => items.forEach((item) => item.dispose()));
  }
  dispose() {
    this.callOnDispose();
  }
}

export class EventEmitter<T> {
  private listeners: Listener<T>[] = [];

  event = (listener: Listener<T>) => {
    this.listeners.push(listener);
    return new Disposable(() => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    });
  };

  fire(value: T) {
    [...this.listeners].forEach((listener) => listener(value));
  }

  dispose() {
    this.listeners = [];
  }
}

export class Position {
  constructor(public line: number, public character: number) {}
}

export class Range {
  public start: Position;
  public end: Position;
  constructor(startLine: number, startCharacter: number, endLine: number, endCharacter: number) {
    this.start = new Position(startLine, startCharacter);
    this.end = new Position(endLine, endCharacter);
  }
}

export class Selection extends Range {
  public anchor: Position;
  public active: Position;
  constructor(anchorLine: number, anchorCharacter: number, activeLine: number, activeCharacter: number) {
    super(anchorLine, anchorCharacter, activeLine, activeCharacter);
    this.anchor = new Position(anchorLine, anchorCharacter);
    this.active = new Position(activeLine, activeCharacter);
  }
  get isEmpty() {
    return this.anchor.line === this.active.line && this.anchor.character === this.active.character;
  }
}

export enum DiagnosticSeverity {
  Error = 0,
  Warning = 1,
  Information = 2,
  Hint = 3,
}

export class Diagnostic {
  public source?: string;
  constructor(public range: Range, public message: string, public severity: DiagnosticSeverity = DiagnosticSeverity.Error) {}
}

export class ThemeColor {
  constructor(public id: string) {}
}

export enum ViewColumn {
  Active = -1,
  Beside = -2,
  One = 1,
  Two = 2,
}

export enum OverviewRulerLane {
  Left = 1,
  Center = 2,
  Right = 4,
  Full = 7,
}

export const Uri = {
  parse: jest.fn((value: string) => {
    const scheme = value.split(":")[0] || "";
    const rest = value.slice(scheme.length + 1);
    const [pathPart, query = ""] = rest.split("?");
    return {
      toString: () => value,
      fsPath: pathPart,
      path: pathPart,
      query,
      scheme,
    };
  }),
  file: jest.fn((path: string) => ({
    toString: () => `file://${path}`,
    fsPath: path,
    path: path,
    query: "",
    scheme: "file",
  })),
};

const disposable = () => ({ dispose: jest.fn() });

export const window = {
  showInformationMessage: jest.fn(() => Promise.resolve(undefined)),
  showErrorMessage: jest.fn(() => Promise.resolve(undefined)),
  showWarningMessage: jest.fn(() => Promise.resolve(undefined)),
  createQuickPick: jest.fn(),
  createInputBox: jest.fn(),
  createTextEditorDecorationType: jest.fn(() => ({ key: "decoration", dispose: jest.fn() })),
  showTextDocument: jest.fn(() => Promise.resolve(undefined)),
  onDidChangeTextEditorSelection: jest.fn(disposable),
  onDidChangeActiveTextEditor: jest.fn(disposable),
  visibleTextEditors: [] as unknown[],
  activeTextEditor: undefined as unknown,
};

export const workspace = {
  getConfiguration: jest.fn(() => ({ get: jest.fn(() => undefined) })),
  openTextDocument: jest.fn((uri: unknown) => Promise.resolve({ uri })),
  registerTextDocumentContentProvider: jest.fn(disposable),
  onDidCloseTextDocument: jest.fn(disposable),
  textDocuments: [] as unknown[],
};

export const languages = {
  createDiagnosticCollection: jest.fn(() => ({
    set: jest.fn(),
    delete: jest.fn(),
    clear: jest.fn(),
    dispose: jest.fn(),
  })),
};

export const commands = {
  registerCommand: jest.fn(disposable),
  executeCommand: jest.fn(),
};

export const env = {
  openExternal: jest.fn(() => Promise.resolve(true)),
};
