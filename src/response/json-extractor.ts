/**
 * Locates JSON objects embedded in free-form backend text.
 *
 * The scan starts at an opening brace and tracks two things: whether the
 * cursor is inside a double-quoted string (with backslash escapes), and the
 * brace depth counted outside strings. The candidate ends at the brace that
 * returns the depth to zero.
 */

interface ScanResult {
  start: number;
  end: number;
}

function scanBalancedObject(text: string, start: number): ScanResult | undefined {
  let depth = 0;
  let inString = false;
  let escapeNext = false;
  for (let i = start; i < text.length; i += 1) {
    const ch = text[i];
    if (inString) {
      if (escapeNext) {
        escapeNext = false;
        continue;
      }
      if (ch === '\\') {
        escapeNext = true;
        continue;
      }
      if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
      continue;
    }
    if (ch === '{') {
      depth += 1;
      continue;
    }
    if (ch === '}') {
      depth -= 1;
      if (depth === 0) {
        return { start, end: i + 1 };
      }
    }
  }
  return undefined;
}

/** First balanced `{...}` region of `rawText`, or undefined when none closes. */
export function extractJson(rawText: string): string | undefined {
  const start = rawText.indexOf('{');
  if (start === -1) return undefined;
  const region = scanBalancedObject(rawText, start);
  return region !== undefined ? rawText.slice(region.start, region.end) : undefined;
}

/**
 * Every balanced region in order of appearance, so a caller can move past a
 * brace pair in prose that turns out not to be JSON.
 */
export function extractJsonCandidates(rawText: string, limit = 8): string[] {
  const candidates: string[] = [];
  let cursor = rawText.indexOf('{');
  while (cursor !== -1 && candidates.length < limit) {
    const region = scanBalancedObject(rawText, cursor);
    if (region === undefined) {
      cursor = rawText.indexOf('{', cursor + 1);
      continue;
    }
    candidates.push(rawText.slice(region.start, region.end));
    cursor = rawText.indexOf('{', region.end);
  }
  return candidates;
}

/**
 * Removes `//` and `/* *\/` comments outside strings and escapes raw line
 * breaks inside strings. Backends emit both when they annotate their JSON.
 */
export function sanitizeJsonCandidate(candidate: string): string {
  let out = '';
  let inString = false;
  let escapeNext = false;
  for (let i = 0; i < candidate.length; i += 1) {
    const ch = candidate[i];
    if (inString) {
      if (escapeNext) {
        escapeNext = false;
        out += ch;
        continue;
      }
      if (ch === '\\') {
        escapeNext = true;
        out += ch;
        continue;
      }
      if (ch === '"') {
        inString = false;
        out += ch;
        continue;
      }
      if (ch === '\n') {
        out += '\\n';
        continue;
      }
      if (ch === '\r') {
        out += '\\r';
        continue;
      }
      if (ch === '\t') {
        out += '\\t';
        continue;
      }
      out += ch;
      continue;
    }
    if (ch === '"') {
      inString = true;
      out += ch;
      continue;
    }
    if (ch === '/' && candidate[i + 1] === '/') {
      const lineEnd = candidate.indexOf('\n', i);
      if (lineEnd === -1) break;
      i = lineEnd - 1;
      continue;
    }
    if (ch === '/' && candidate[i + 1] === '*') {
      const blockEnd = candidate.indexOf('*/', i + 2);
      if (blockEnd === -1) break;
      i = blockEnd + 1;
      continue;
    }
    out += ch;
  }
  return out;
}
