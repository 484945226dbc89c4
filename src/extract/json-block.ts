import { ProviderUnavailableError } from "../errors.js";

/**
 * First balanced `{...}` block in `text`. Braces inside JSON strings are
 * ignored, so prose, markdown fences and citation markers around the object
 * don't matter.
 */
export function findFirstJsonBlock(text: string): string | undefined {
  const start = text.indexOf("{");
  if (start < 0) return undefined;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return undefined;
}

export function parseFirstJsonObject(text: string): unknown {
  const block = findFirstJsonBlock(text || "");
  if (!block) throw new ProviderUnavailableError("reply contained no JSON object");
  try {
    return JSON.parse(block);
  } catch (err) {
    throw new ProviderUnavailableError("reply contained malformed JSON", { cause: err });
  }
}
