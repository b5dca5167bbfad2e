import { toJsonData, type JsonValue } from './json-safe.js';

function normalizeNumber(value: number): number {
  if (Object.is(value, -0)) return 0;
  return value;
}

function isNumberArray(values: JsonValue[]): values is number[] {
  return values.every((item) => typeof item === 'number');
}

function canonicalizeParsed(
  value: JsonValue,
  indent: string,
  depth: number
): string {
  if (value === null) return 'null';
  if (typeof value === 'number') return JSON.stringify(normalizeNumber(value));
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'boolean') return value ? 'true' : 'false';

  const pad = indent ? `\n${indent.repeat(depth + 1)}` : '';
  const close = indent ? `\n${indent.repeat(depth)}` : '';

  if (Array.isArray(value)) {
    if (value.length === 0) return '[]';
    // integer vectors stay on one line
    if (isNumberArray(value)) {
      const nums = value.map((n) => JSON.stringify(normalizeNumber(n)));
      return `[${nums.join(indent ? ', ' : ',')}]`;
    }
    const items = value.map((item) =>
      canonicalizeParsed(item, indent, depth + 1)
    );
    return `[${pad}${items.join(`,${pad}`)}${close}]`;
  }

  const keys = Object.keys(value).sort();
  if (keys.length === 0) return '{}';
  const sep = indent ? ': ' : ':';
  const entries = keys.map(
    (key) =>
      `${JSON.stringify(key)}${sep}${canonicalizeParsed(value[key], indent, depth + 1)}`
  );
  return `{${pad}${entries.join(`,${pad}`)}${close}}`;
}

/**
 * Deterministic JSON text: sorted keys, -0 folded to 0.
 * With `indent`, nested containers go one per line; number arrays stay inline.
 */
export function canonicalJSON(value: unknown, indent = ''): string {
  return canonicalizeParsed(toJsonData(value), indent, 0);
}
