import {
  LineCorrelationIndex,
  generatedLinesFor,
  sourceLineFor,
} from "../correlation/line-correlation-index";

export type ViewRole = "source" | "generated";

export type SessionState = "idle" | "active";

/**
 * A set of line highlights owned by one session inside one view.
 * Clearing only removes what this namespace applied.
 */
export interface HighlightNamespace {
  /** Highlights a 1-based line. A line the view does not have is ignored. */
  applyHighlight(line: number): void;
  /** Removes every highlight of this namespace. A no-op when nothing is applied. */
  clearHighlights(): void;
  dispose(): void;
}

export const otherRole = (role: ViewRole): ViewRole =>
  role === "source" ? "generated" : "source";

/**
 * Live wiring of one correlation index to a (source, generated) view pair.
 *
 * A cursor move in one view clears the session's namespace in the other view
 * and applies the correlated lines there. Every application replaces the
 * previous one; highlights never accumulate.
 */
export class HighlightSession {
  /** Lines currently highlighted, keyed by the view that shows them. */
  private readonly highlighted: Record<ViewRole, readonly number[]> = {
    source: [],
    generated: [],
  };
  private disposed = false;

  /**
   * @param targets - The namespace to draw into, keyed by the view it draws in.
   */
  constructor(
    public readonly key: string,
    private readonly index: LineCorrelationIndex,
    private readonly targets: Record<ViewRole, HighlightNamespace>
  ) {}

  public get state(): SessionState {
    return this.highlighted.source.length > 0 || this.highlighted.generated.length > 0
      ? "active"
      : "idle";
  }

  /** Lines this session currently highlights in the given view. */
  public highlightedLines(view: ViewRole): readonly number[] {
    return this.highlighted[view];
  }

  /**
   * Handles the cursor landing on `line` (1-based) in `origin`.
   */
  public onCursorMoved(origin: ViewRole, line: number): void {
    if (this.disposed) {
      return;
    }

    const target = otherRole(origin);
    this.clear(target);

    const correlated = this.correlatedLines(origin, line);
    for (const correlatedLine of correlated) {
      this.targets[target].applyHighlight(correlatedLine);
    }
    this.highlighted[target] = correlated;
  }

  /**
   * Handles `origin` losing focus: the highlights it caused in the other view go away.
   */
  public onLeave(origin: ViewRole): void {
    if (this.disposed) {
      return;
    }
    this.clear(otherRole(origin));
  }

  /**
   * Clears both views and releases the namespaces. The session ignores events afterwards.
   */
  public dispose(): void {
    if (this.disposed) {
      return;
    }
    this.clear("source");
    this.clear("generated");
    this.targets.source.dispose();
    this.targets.generated.dispose();
    this.disposed = true;
  }

  private correlatedLines(origin: ViewRole, line: number): readonly number[] {
    if (origin === "source") {
      return generatedLinesFor(this.index, line);
    }
    const sourceLine = sourceLineFor(this.index, line);
    return sourceLine === undefined ? [] : [sourceLine];
  }

  private clear(view: ViewRole): void {
    this.targets[view].clearHighlights();
    this.highlighted[view] = [];
  }
}
