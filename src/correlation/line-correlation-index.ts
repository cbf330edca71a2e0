import { AsmLine } from "../api/types/compiler-explorer";

/** One line of generated output and the source line it came from, if any. */
export interface AnnotatedLine {
  /** 1-based position in the generated output. */
  readonly index: number;
  readonly text: string;
  /** 1-based line in the original text; absent for directives, labels, blank separators. */
  readonly sourceLine?: number;
}

/**
 * Bidirectional line lookup between a source document and its generated output.
 *
 * `g` is listed under `sourceToGenerated.get(s)` exactly when
 * `generatedToSource.get(g) === s`. Lists are in generated-line order and
 * never empty.
 */
export interface LineCorrelationIndex {
  readonly sourceToGenerated: ReadonlyMap<number, readonly number[]>;
  readonly generatedToSource: ReadonlyMap<number, number>;
}

const NO_LINES: readonly number[] = Object.freeze([]);

/**
 * Builds the index in a single pass over the generated lines.
 *
 * Unannotated lines are skipped. Source references are kept as they are,
 * even when they point past the end of the source document.
 */
export function buildLineCorrelationIndex(lines: readonly AnnotatedLine[]): LineCorrelationIndex {
  const sourceToGenerated = new Map<number, number[]>();
  const generatedToSource = new Map<number, number>();

  for (const line of lines) {
    if (line.sourceLine === undefined) {
      continue;
    }

    const generated = sourceToGenerated.get(line.sourceLine);
    if (generated) {
      generated.push(line.index);
    } else {
      sourceToGenerated.set(line.sourceLine, [line.index]);
    }
    generatedToSource.set(line.index, line.sourceLine);
  }

  return { sourceToGenerated, generatedToSource };
}

/** Generated lines produced by a source line, or an empty list. */
export function generatedLinesFor(index: LineCorrelationIndex, sourceLine: number): readonly number[] {
  return index.sourceToGenerated.get(sourceLine) ?? NO_LINES;
}

export function sourceLineFor(index: LineCorrelationIndex, generatedLine: number): number | undefined {
  return index.generatedToSource.get(generatedLine);
}

/**
 * Converts the `asm` array of a compile response into annotated lines.
 */
export function toAnnotatedLines(asm: readonly AsmLine[]): AnnotatedLine[] {
  return asm.map((line, i) => {
    const sourceLine = line.source?.line;
    return typeof sourceLine === "number"
      ? { index: i + 1, text: line.text, sourceLine }
      : { index: i + 1, text: line.text };
  });
}
