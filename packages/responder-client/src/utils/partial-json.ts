/**
 * Best-effort parsing of a JSON prefix, used to expose structured output
 * while it is still streaming.
 *
 * The prefix is completed by closing an open string and every open array
 * and object. If that does not parse (a dangling key, a half-written
 * literal), the text is cut back to the last structural boundary and
 * retried.
 */

type Attempt = { ok: true; value: unknown } | { ok: false };

function tryParse(text: string): Attempt {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/** Close the prefix's open string, then its open arrays and objects. */
function complete(prefix: string): string {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (const ch of prefix) {
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") stack.push("}");
    else if (ch === "[") stack.push("]");
    else if (ch === "}" || ch === "]") stack.pop();
  }

  let text = prefix;
  if (inString) {
    if (escaped) text = text.slice(0, -1);
    text += '"';
  }
  return text.trimEnd().replace(/,$/, "") + stack.reverse().join("");
}

/** Positions where the prefix may be cut: after `{`/`[` and before `,`. */
function cutPoints(text: string): number[] {
  const cuts: number[] = [];
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{" || ch === "[") cuts.push(i + 1);
    else if (ch === ",") cuts.push(i);
  }
  return cuts.reverse();
}

/**
 * Parse a possibly truncated JSON document. Returns `undefined` when no
 * prefix of the text can be completed into valid JSON.
 */
export function parsePartialJson(text: string): unknown {
  const trimmed = text.trim();
  if (trimmed.length === 0) return undefined;

  const whole = tryParse(trimmed);
  if (whole.ok) return whole.value;

  for (const cut of [trimmed.length, ...cutPoints(trimmed)]) {
    const attempt = tryParse(complete(trimmed.slice(0, cut)));
    if (attempt.ok) return attempt.value;
  }
  return undefined;
}
