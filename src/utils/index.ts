import * as path from "path";

/**
 * Renders a label template for a quick pick item.
 *
 * `${field}` placeholders are filled from the item's fields; array fields
 * are joined with ", " and missing fields render as "". A plain string item
 * is exposed as `${value}`.
 *
 * @param template - The label template, e.g. "${name} (${semver})".
 * @param item - The catalog entry being displayed.
 * @returns The rendered label.
 */
export const formatLabel = (template: string, item: unknown): string => {
  const fields: Record<string, unknown> =
    typeof item === "object" && item !== null
      ? Object.fromEntries(Object.entries(item))
      : { value: item };

  return template.replace(/\$\{(\w+)\}/g, (_match, key: string) => {
    const value = fields[key];
    if (value === undefined || value === null) {
      return "";
    }
    if (Array.isArray(value)) {
      return value.join(", ");
    }
    return String(value);
  });
};

/**
 * Returns the extension of a file name with its leading dot, or "." when
 * there is none (untitled documents), so it never matches a language.
 */
export function getFileExtension(fileName: string): string {
  const ext = path.extname(fileName);
  return ext === "" ? "." : ext;
}

/** A 1-based, inclusive line range. */
export interface LineRange {
  start: number;
  end: number;
}

export const isFullDocument = (range: LineRange, lineCount: number): boolean =>
  range.start === 1 && range.end === lineCount;

/**
 * Extracts a readable message from anything thrown.
 */
export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
