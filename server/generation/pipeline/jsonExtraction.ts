/**
 * Pulls a JSON array out of free-form model output.
 *
 * Precedence:
 *   1. the whole trimmed content (structured-output responses); an object
 *      holding an array under `key` yields that array
 *   2. the first fenced code block, optionally tagged `json`
 *   3. the first balanced `[...]` span that parses
 *
 * Only an actual array ends the search early. When none is found, a JSON
 * object from step 1 or 2 is wrapped in a one-element array. Returns `[]`
 * when nothing parses.
 */

const FENCED_BLOCK = /```(?:json)?\s*\n?([\s\S]*?)```/;
const MAX_SCAN_ATTEMPTS = 20;

type ParseResult = { ok: true; value: unknown } | { ok: false };

function tryParse(text: string): ParseResult {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function arrayIn(value: unknown, key?: string): unknown[] | null {
  if (Array.isArray(value)) return value;
  if (key && isRecord(value)) {
    const nested = value[key];
    if (Array.isArray(nested)) return nested;
  }
  return null;
}

/** Yields every balanced `[...]` span, skipping brackets inside string literals. */
export function* balancedArraySpans(text: string): Generator<string> {
  let from = 0;
  let attempts = 0;

  while (attempts < MAX_SCAN_ATTEMPTS) {
    const start = text.indexOf("[", from);
    if (start === -1) return;
    attempts++;

    let depth = 0;
    let inString = false;
    let escaped = false;
    let end = -1;

    for (let i = start; i < text.length; i++) {
      const ch = text[i];
      if (inString) {
        if (escaped) escaped = false;
        else if (ch === "\\") escaped = true;
        else if (ch === '"') inString = false;
        continue;
      }
      if (ch === '"') inString = true;
      else if (ch === "[") depth++;
      else if (ch === "]") {
        depth--;
        if (depth === 0) {
          end = i;
          break;
        }
      }
    }

    if (end === -1) return;
    yield text.slice(start, end + 1);
    from = start + 1;
  }
}

export function extractJsonArray(content: string, key?: string): unknown[] {
  const trimmed = content.trim();
  if (!trimmed) return [];

  const candidates: unknown[] = [];

  const whole = tryParse(trimmed);
  if (whole.ok) {
    const found = arrayIn(whole.value, key);
    if (found) return found;
    candidates.push(whole.value);
  }

  const fenced = FENCED_BLOCK.exec(content);
  if (fenced) {
    const block = tryParse(fenced[1].trim());
    if (block.ok) {
      const found = arrayIn(block.value, key);
      if (found) return found;
      candidates.push(block.value);
    }
  }

  for (const span of balancedArraySpans(content)) {
    const parsed = tryParse(span);
    if (parsed.ok && Array.isArray(parsed.value)) return parsed.value;
  }

  const single = candidates.find((value) => value !== null && value !== undefined);
  return single === undefined ? [] : [single];
}
