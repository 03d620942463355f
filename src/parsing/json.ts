/**
 * JSON extraction for model output.
 *
 * Models wrap JSON in code fences and, when they hit their token limit, stop
 * mid-value. `repairTruncatedJson` cuts a truncated document back to the last
 * point where it was structurally complete and closes every open container.
 */

type Container = 'object' | 'array';

/**
 * Where the scanner is inside the innermost container.
 * Objects cycle key → colon → value → after; arrays cycle value → after.
 */
type ExpectState = 'key' | 'colon' | 'value' | 'after';

interface Frame {
  container: Container;
  state: ExpectState;
}

interface SafeCut {
  /** Slice the text here... */
  position: number;
  /** ...then append these to close every open container. */
  closers: string;
}

interface ScanState {
  stack: Frame[];
  lastSafe: SafeCut | null;
  /** Set once the root value is complete; trailing text is ignored. */
  rootEnd: number | null;
}

const PRIMITIVE_END = /[\s,}\]]/;

export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const fenced = /^```(?:json)?\s*\n?([\s\S]*?)(?:\n?```\s*)?$/i.exec(trimmed);
  return fenced ? fenced[1].trim() : trimmed;
}

export function repairTruncatedJson(text: string): string | null {
  const input = stripCodeFences(text);
  const scan: ScanState = { stack: [], lastSafe: null, rootEnd: null };
  const { stack } = scan;

  let i = 0;
  while (i < input.length && scan.rootEnd === null) {
    const ch = input[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    const top = stack[stack.length - 1];

    if (ch === '{' || ch === '[') {
      stack.push({ container: ch === '{' ? 'object' : 'array', state: ch === '{' ? 'key' : 'value' });
      i++;
      markSafe(scan, i);
      continue;
    }

    if (ch === '}' || ch === ']') {
      const expected: Container = ch === '}' ? 'object' : 'array';
      if (!top || top.container !== expected) return null;
      stack.pop();
      i++;
      completeValue(scan, i);
      continue;
    }

    if (ch === '"') {
      const end = findStringEnd(input, i + 1);
      if (end === -1) break; // truncated inside a string
      i = end + 1;
      if (top && top.container === 'object' && top.state === 'key') {
        top.state = 'colon';
      } else {
        completeValue(scan, i);
      }
      continue;
    }

    if (ch === ':') {
      if (!top || top.state !== 'colon') return null;
      top.state = 'value';
      i++;
      continue;
    }

    if (ch === ',') {
      if (!top || top.state !== 'after') return null;
      top.state = top.container === 'object' ? 'key' : 'value';
      i++;
      continue;
    }

    // Number or literal: only complete if something follows it.
    let end = i;
    while (end < input.length && !PRIMITIVE_END.test(input[end])) end++;
    if (end >= input.length) break;
    if (!isJsonPrimitive(input.slice(i, end))) return null;
    i = end;
    completeValue(scan, i);
  }

  if (scan.rootEnd !== null) return input.slice(0, scan.rootEnd);
  if (!scan.lastSafe) return null;
  return input.slice(0, scan.lastSafe.position) + scan.lastSafe.closers;
}

function markSafe(scan: ScanState, position: number): void {
  const closers = scan.stack
    .slice()
    .reverse()
    .map((f) => (f.container === 'object' ? '}' : ']'))
    .join('');
  scan.lastSafe = { position, closers };
}

function completeValue(scan: ScanState, position: number): void {
  const top = scan.stack[scan.stack.length - 1];
  if (!top) {
    scan.rootEnd = position;
    return;
  }
  top.state = 'after';
  markSafe(scan, position);
}

/**
 * Parse model output as JSON. Truncated output is repaired first.
 * Returns undefined when nothing parseable can be recovered.
 */
export function parseModelJson(text: string, truncated: boolean): unknown {
  const candidate = truncated ? repairTruncatedJson(text) : stripCodeFences(text);
  if (candidate === null) return undefined;
  try {
    const value: unknown = JSON.parse(candidate);
    return value;
  } catch {
    return undefined;
  }
}

/** Index of the closing quote of a string whose body starts at `from`, or -1. */
function findStringEnd(input: string, from: number): number {
  for (let i = from; i < input.length; i++) {
    if (input[i] === '\\') {
      i++;
      continue;
    }
    if (input[i] === '"') return i;
  }
  return -1;
}

function isJsonPrimitive(token: string): boolean {
  if (token === 'true' || token === 'false' || token === 'null') return true;
  return /^-?(0|[1-9]\d*)(\.\d+)?([eE][+-]?\d+)?$/.test(token);
}
