const FENCE_OPEN = /^\s*```(?:json)?\s*/i;
const FENCE_CLOSE = /\s*```\s*$/i;

function stripFencesAndQuotes(input: string): string {
  return input
    .replaceAll(/[“”]/g, "\"")
    .replaceAll(/[‘’]/g, "'")
    .replace(FENCE_OPEN, "")
    .replace(FENCE_CLOSE, "")
    .trim();
}

function relaxedToStrict(input: string): string {
  return input
    .replaceAll(/,\s*([}\]])/g, "$1")
    .replaceAll(/([{,]\s*)'([^']+?)'\s*:/g, '$1"$2":')
    .replaceAll(/:\s*'([^'\\]*(?:\\.[^'\\]*)*)'/g, ': "$1"');
}

function firstStructureStart(input: string): number {
  const objectAt = input.indexOf("{");
  const arrayAt = input.indexOf("[");
  if (objectAt === -1) {
    return arrayAt;
  }

  return arrayAt === -1 ? objectAt : Math.min(objectAt, arrayAt);
}

interface ScanState {
  inString: boolean;
  escaped: boolean;
}

/** Advances string/escape tracking; returns true when `char` is structural. */
function scan(state: ScanState, char: string): boolean {
  if (state.escaped) {
    state.escaped = false;
    return false;
  }

  if (char === "\\") {
    state.escaped = true;
    return false;
  }

  if (char === "\"") {
    state.inString = !state.inString;
    return false;
  }

  return !state.inString;
}

/** Closes brackets and strings left open by a truncated model response. */
function closeTruncated(input: string): string {
  const source = input.trim();
  const start = firstStructureStart(source);
  if (start === -1) {
    return source;
  }

  const pending: string[] = [];
  const state: ScanState = { inString: false, escaped: false };
  let repaired = "";

  for (const char of source.slice(start)) {
    if (!scan(state, char)) {
      repaired += char;
      continue;
    }

    if (char === "{" || char === "[") {
      pending.push(char === "{" ? "}" : "]");
    } else if (char === "}" || char === "]") {
      if (pending.at(-1) !== char) {
        continue;
      }
      pending.pop();
    }

    repaired += char;
  }

  if (state.inString) {
    repaired += "\"";
  }

  return repaired + pending.reverse().join("");
}

function sliceFirstStructure(input: string): string {
  const start = firstStructureStart(input);
  if (start === -1) {
    throw new Error("No JSON found in model output");
  }

  const opener = input[start];
  const closer = opener === "{" ? "}" : "]";
  const state: ScanState = { inString: false, escaped: false };
  let depth = 0;

  for (let i = start; i < input.length; i += 1) {
    const char = input[i];
    if (!scan(state, char)) {
      continue;
    }

    if (char === opener) {
      depth += 1;
    } else if (char === closer) {
      depth -= 1;
      if (depth === 0) {
        return input.slice(start, i + 1);
      }
    }
  }

  throw new Error("Incomplete JSON structure in model output");
}

function tryParse(candidate: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(candidate) };
  } catch {
    return { ok: false };
  }
}

/**
 * Reads the first JSON value from model text, tolerating code fences, smart quotes,
 * single-quoted keys, trailing commas and truncated output.
 */
export function parseJsonFromText(input: string): unknown {
  const trimmed = stripFencesAndQuotes(input);
  if (!trimmed) {
    throw new Error("Empty model output");
  }

  const sources = [trimmed];
  try {
    sources.push(sliceFirstStructure(trimmed));
  } catch {
    sources.push(closeTruncated(trimmed));
  }

  for (const source of sources) {
    const repaired = closeTruncated(source);
    for (const candidate of [source, relaxedToStrict(source), repaired, relaxedToStrict(repaired)]) {
      const attempt = tryParse(candidate);
      if (attempt.ok) {
        return attempt.value;
      }
    }
  }

  throw new Error("Failed to parse JSON from model output");
}
