export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export function jsonSafeReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Detached JSON snapshot of a value, honoring `toJSON()` on value types.
 * `undefined` and other unserializable values become `null`.
 */
export function toJsonData(value: unknown): JsonValue {
  if (value === undefined) return null;
  const serialized = JSON.stringify(value, jsonSafeReplacer);
  if (serialized === undefined) return null;
  const parsed: JsonValue = JSON.parse(serialized);
  return parsed;
}

/** Escape one JSON pointer reference token (RFC 6901). */
export function escapePointerToken(token: string): string {
  return token.replace(/~/g, '~0').replace(/\//g, '~1');
}

export function joinPointer(
  base: string,
  ...tokens: Array<string | number>
): string {
  return tokens.reduce<string>(
    (acc, token) => `${acc}/${escapePointerToken(String(token))}`,
    base
  );
}
