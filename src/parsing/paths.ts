/**
 * Field lookup by column name or dot-path (`a.b.0.c`, `a.b[0].c`).
 */

export type PathLookup = { found: true; value: unknown } | { found: false };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function splitPath(path: string): string[] {
  return path
    .replace(/\[(\d+)\]/g, '.$1')
    .split('.')
    .filter((segment) => segment !== '');
}

/** Exact key first (CSV headers contain dots), then path traversal. */
export function resolvePath(source: unknown, path: string): PathLookup {
  if (isRecord(source) && Object.prototype.hasOwnProperty.call(source, path)) {
    return { found: true, value: source[path] };
  }

  let current: unknown = source;
  for (const segment of splitPath(path)) {
    if (Array.isArray(current)) {
      const index = Number(segment);
      if (!Number.isInteger(index) || index < 0 || index >= current.length) return { found: false };
      current = current[index];
    } else if (isRecord(current) && Object.prototype.hasOwnProperty.call(current, segment)) {
      current = current[segment];
    } else {
      return { found: false };
    }
  }
  return { found: true, value: current };
}

/** Leaf paths of a nested value, for showing the oracle what a JSON entry contains. */
export function listLeafPaths(value: unknown, prefix = '', limit = 60): string[] {
  const out: string[] = [];
  const walk = (node: unknown, path: string): void => {
    if (out.length >= limit) return;
    if (Array.isArray(node)) {
      // The first element stands in for the rest.
      if (node.length > 0) walk(node[0], `${path}.0`);
      else if (path) out.push(path);
      return;
    }
    if (isRecord(node)) {
      for (const [key, child] of Object.entries(node)) {
        walk(child, path ? `${path}.${key}` : key);
      }
      return;
    }
    if (path) out.push(path);
  };
  walk(value, prefix);
  return out;
}
