/**
 * Replacer for values `JSON.stringify` cannot represent on its own.
 */
function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }

  if (value instanceof Map) {
    return Object.fromEntries(value);
  }

  if (value instanceof Set) {
    return [...value];
  }

  // Buffer#toJSON runs before the replacer sees the value
  if (isSerializedBuffer(value)) {
    return Buffer.from(value.data).toString('base64');
  }

  return value;
}

function isSerializedBuffer(
  value: unknown,
): value is { type: 'Buffer'; data: number[] } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    value.type === 'Buffer' &&
    'data' in value &&
    Array.isArray(value.data)
  );
}

export function encodeJson(value: unknown): string {
  return JSON.stringify(value, jsonReplacer);
}

export function formatJson(value: unknown, pretty: boolean): string {
  return pretty
    ? JSON.stringify(value, jsonReplacer, 2)
    : JSON.stringify(value, jsonReplacer);
}

export function isPlainObject(
  value: unknown,
): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}
