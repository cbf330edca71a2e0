import * as vscode from "vscode";
import { LineCorrelationIndex } from "../correlation/line-correlation-index";
import { HighlightNamespace, HighlightSession, ViewRole } from "./highlight-session";
import { DecorationNamespace, createCorrelationDecoration } from "../views/decoration-namespace";

export type NamespaceFactory = (uri: vscode.Uri, highlightStyle: string) => HighlightNamespace;

const decorationNamespaceFactory: NamespaceFactory = (uri, highlightStyle) =>
  new DecorationNamespace(uri, createCorrelationDecoration(highlightStyle));

interface SessionEntry {
  session: HighlightSession;
  sourceUri: string;
  generatedUri: string;
}

export const sessionKey = (sourceUri: vscode.Uri, generatedUri: vscode.Uri): string =>
  `${sourceUri.toString()} -> ${generatedUri.toString()}`;

/**
 * Keeps source and generated views correlated while the cursor moves.
 *
 * Holds at most one session per (source, generated) pair and routes editor
 * events to the sessions that involve the affected document. Handlers run
 * synchronously and only read the sessions' immutable indexes.
 */
export class HighlightController implements vscode.Disposable {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly subscriptions: vscode.Disposable[];
  private activeUri: string | undefined;

  constructor(private readonly createNamespace: NamespaceFactory = decorationNamespaceFactory) {
    this.activeUri = vscode.window.activeTextEditor?.document.uri.toString();
    this.subscriptions = [
      vscode.window.onDidChangeTextEditorSelection((event) => {
        const active = event.selections[0]?.active;
        if (active) {
          this.handleCursorMoved(event.textEditor.document.uri, active.line + 1);
        }
      }),
      vscode.window.onDidChangeActiveTextEditor((editor) => {
        const next = editor?.document.uri.toString();
        if (this.activeUri !== undefined && this.activeUri !== next) {
          this.handleLeave(this.activeUri);
        }
        this.activeUri = next;
      }),
      vscode.workspace.onDidCloseTextDocument((document) => {
        this.handleDocumentClosed(document.uri);
      }),
    ];
  }

  /**
   * Wires an index to a view pair, replacing any session the pair already has.
   */
  public startSession(
    sourceUri: vscode.Uri,
    generatedUri: vscode.Uri,
    index: LineCorrelationIndex,
    highlightStyle: string
  ): HighlightSession {
    const key = sessionKey(sourceUri, generatedUri);
    this.endSession(key);

    const session = new HighlightSession(key, index, {
      source: this.createNamespace(sourceUri, highlightStyle),
      generated: this.createNamespace(generatedUri, highlightStyle),
    });
    this.sessions.set(key, {
      session,
      sourceUri: sourceUri.toString(),
      generatedUri: generatedUri.toString(),
    });
    console.log(`[HighlightController] Session started: ${key}`);
    return session;
  }

  public getSession(sourceUri: vscode.Uri, generatedUri: vscode.Uri): HighlightSession | undefined {
    return this.sessions.get(sessionKey(sourceUri, generatedUri))?.session;
  }

  public get sessionCount(): number {
    return this.sessions.size;
  }

  public endSession(key: string): void {
    const entry = this.sessions.get(key);
    if (!entry) {
      return;
    }
    entry.session.dispose();
    this.sessions.delete(key);
    console.log(`[HighlightController] Session ended: ${key}`);
  }

  public endAllSessions(): void {
    for (const key of [...this.sessions.keys()]) {
      this.endSession(key);
    }
  }

  /**
   * @param line - 1-based line under the cursor.
   */
  public handleCursorMoved(uri: vscode.Uri, line: number): void {
    for (const { session, role } of this.sessionsInvolving(uri.toString())) {
      session.onCursorMoved(role, line);
    }
  }

  public handleLeave(uri: string): void {
    for (const { session, role } of this.sessionsInvolving(uri)) {
      session.onLeave(role);
    }
  }

  public handleDocumentClosed(uri: vscode.Uri): void {
    const closed = uri.toString();
    for (const [key, entry] of [...this.sessions]) {
      if (entry.sourceUri === closed || entry.generatedUri === closed) {
        this.endSession(key);
      }
    }
  }

  public dispose(): void {
    this.endAllSessions();
    for (const subscription of this.subscriptions) {
      subscription.dispose();
    }
  }

  private sessionsInvolving(uri: string): { session: HighlightSession; role: ViewRole }[] {
    const matches: { session: HighlightSession; role: ViewRole }[] = [];
    for (const entry of this.sessions.values()) {
      if (entry.sourceUri === uri) {
        matches.push({ session: entry.session, role: "source" });
      } else if (entry.generatedUri === uri) {
        matches.push({ session: entry.session, role: "generated" });
      }
    }
    return matches;
  }
}
