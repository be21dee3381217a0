/**
 * Canonical text form of a value, for hashing.
 *
 * Values that compare equal under `isDeepStrictEqual` encode to the same
 * text: object keys and Set/Map entries are sorted, so insertion order does
 * not matter. Unlike JSON, bigint, undefined, Map, Set and Date values keep
 * their content and their type.
 */
export function canonicalEncode(value: unknown): string {
  return encode(value, new Set<object>());
}

function encode(value: unknown, path: Set<object>): string {
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'number':
      return Object.is(value, -0) ? '-0' : String(value);
    case 'bigint':
      return `${value}n`;
    case 'boolean':
    case 'undefined':
      return String(value);
    case 'symbol':
    case 'function':
      return `<${typeof value}:${String(value)}>`;
  }

  if (typeof value !== 'object' || value === null) return 'null';
  if (path.has(value)) return '<circular>';

  path.add(value);
  try {
    if (Array.isArray(value)) {
      return `[${value.map((item) => encode(item, path)).join(',')}]`;
    }
    if (value instanceof Map) {
      const entries = [...value].map(([key, item]) => `${encode(key, path)}=>${encode(item, path)}`);
      return `Map{${entries.sort().join(',')}}`;
    }
    if (value instanceof Set) {
      const items = [...value].map((item) => encode(item, path));
      return `Set{${items.sort().join(',')}}`;
    }
    if (value instanceof Date) {
      return `Date(${value.getTime()})`;
    }
    const fields = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${encode(Reflect.get(value, key), path)}`);
    return `{${fields.join(',')}}`;
  } finally {
    path.delete(value);
  }
}
