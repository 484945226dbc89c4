/**
 * src/extract/model-name.ts
 * Reduce a free-form model string to the token listing sites use in URLs.
 *
 *   "Silverado LTZ 5.3 4x4" -> "silverado_4x4"
 *   "CX-5"                  -> "cx_5"
 */

// Trim/equipment words that never identify the model family.
const STOPWORDS = new Set([
  "ls", "lt", "ltz", "se", "ex", "dx", "gl", "gls",
  "ii", "iii", "iv",
  "cargo", "box", "base", "full", "limited", "sport", "premium",
]);

const DISPLACEMENT = /^\d+\.\d+$/;

export interface NormalizeOptions {
  maxWords?: number;
}

/**
 * Words are whitespace separated; hyphens and underscores split a word into
 * parts ("Aveo-LS" is one word of two parts). Trim words and displacements
 * are dropped part by part, and the surviving parts are joined with "_".
 */
export function normalizeModel(text: string, opts: NormalizeOptions = {}): string {
  const maxWords = Math.max(1, opts.maxWords ?? 2);
  const words = (text || "")
    .toLowerCase()
    .trim()
    .split(/\s+/)
    .map((word) =>
      word
        .split(/[-_]+/)
        .filter((part) => part && !STOPWORDS.has(part) && !DISPLACEMENT.test(part))
        .join("_"),
    )
    .filter(Boolean)
    .slice(0, maxWords);

  return words.join("_");
}

export function slugMake(make: string): string {
  return (make || "").trim().toLowerCase().replace(/\s+/g, "-");
}
