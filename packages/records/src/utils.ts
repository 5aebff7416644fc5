// Field path helpers and small value utilities

/**
 * Append a collection index to a path
 * @example appendIndex('crew', 2) // 'crew[2]'
 */
export function appendIndex(path: string, index: number): string {
  return `${path}[${index}]`;
}

/**
 * Prefix a nested path with its parent path
 */
export function joinPath(parent: string, child: string): string {
  if (child === '') return parent;
  if (parent === '') return child;
  return child.startsWith('[') ? parent + child : `${parent}.${child}`;
}

/**
 * Get the actual JavaScript type of a value
 */
export function getType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Date) return 'date';
  return typeof value;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Short rendering of a value for the `actual` slot of a violation
 */
export function describeValue(value: unknown): string {
  if (typeof value === 'string') return `'${value}'`;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  if (Array.isArray(value)) return `array(${value.length})`;
  if (isPlainObject(value)) return 'object';
  return String(value);
}

/**
 * Length in characters (code points), not UTF-16 units
 */
export function characterLength(value: string): number {
  return [...value].length;
}

/**
 * Join tags as "'a', 'b' or 'c'"
 */
export function listTags(tags: readonly string[]): string {
  const quoted = tags.map((tag) => `'${tag}'`);
  if (quoted.length <= 1) return quoted.join('');
  return `${quoted.slice(0, -1).join(', ')} or ${quoted[quoted.length - 1]}`;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
