/**
 * Safe dotted-path lookup shared by the expression evaluator and the
 * window manager (partition keys, value fields).
 *
 * Only own data properties of plain objects and integer indices of arrays
 * are followed. Accessors, inherited members and class instances are
 * never read.
 */

export type PathLookup =
  | { readonly found: true; readonly value: unknown }
  | { readonly found: false };

const NOT_FOUND: PathLookup = { found: false };

export function isPlainObject(value: unknown): value is object {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function readPath(root: unknown, segments: readonly string[]): PathLookup {
  let current: unknown = root;

  for (const segment of segments) {
    if (Array.isArray(current)) {
      if (!/^\d+$/.test(segment)) return NOT_FOUND;
    } else if (!isPlainObject(current)) {
      return NOT_FOUND;
    }
    const descriptor = Object.getOwnPropertyDescriptor(current, segment);
    if (descriptor === undefined || !('value' in descriptor)) return NOT_FOUND;
    current = descriptor.value;
  }

  return { found: true, value: current };
}

/** Splits `data.a.b` into `['a', 'b']`; returns null for anything outside `data.`. */
export function dataPathSegments(path: string): string[] | null {
  if (!path.startsWith('data.')) return null;
  const segments = path.slice('data.'.length).split('.');
  return segments.every((s) => /^[A-Za-z0-9_]+$/.test(s)) ? segments : null;
}
