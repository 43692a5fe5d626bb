const ESCAPES: Record<string, string> = {
  '"': '\\"',
  '\\': '\\\\',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  '\b': '\\b',
  '\f': '\\f'
};

const toUnicodeEscape = (codeUnit: number) => `\\u${codeUnit.toString(16).padStart(4, '0')}`;

const quoteString = (value: string) => {
  let quoted = '"';
  for (let index = 0; index < value.length; index += 1) {
    const character = value.charAt(index);
    const escaped = ESCAPES[character];
    if (escaped !== undefined) {
      quoted += escaped;
      continue;
    }

    const codeUnit = value.charCodeAt(index);
    quoted += codeUnit < 0x20 || codeUnit > 0x7e ? toUnicodeEscape(codeUnit) : character;
  }

  return `${quoted}"`;
};

const hasToJson = (value: object): value is {toJSON: () => unknown} =>
  'toJSON' in value && typeof value.toJSON === 'function';

const serialize = (value: unknown, ancestors: Set<object>): string | undefined => {
  if (value === null) {
    return 'null';
  }

  switch (typeof value) {
    case 'string':
      return quoteString(value);
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
      if (!Number.isFinite(value)) {
        throw new TypeError(`Non-finite number ${String(value)} cannot be serialized`);
      }
      return JSON.stringify(value);
    case 'undefined':
    case 'function':
    case 'symbol':
      return undefined;
    case 'bigint':
      throw new TypeError('BigInt values cannot be serialized');
    default:
      break;
  }

  if (typeof value !== 'object') {
    return undefined;
  }

  if (hasToJson(value)) {
    return serialize(value.toJSON(), ancestors);
  }

  if (ancestors.has(value)) {
    throw new TypeError('Circular structure cannot be serialized');
  }

  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      const items: unknown[] = value;
      return `[${items.map(item => serialize(item, ancestors) ?? 'null').join(', ')}]`;
    }

    const members: string[] = [];
    for (const [key, entryValue] of Object.entries(value)) {
      const rendered = serialize(entryValue, ancestors);
      if (rendered !== undefined) {
        members.push(`${quoteString(key)}: ${rendered}`);
      }
    }

    return `{${members.join(', ')}}`;
  } finally {
    ancestors.delete(value);
  }
};

/**
 * Serializes a JSON value in the byte layout the validation endpoint verifies:
 * `": "` and `", "` separators, insertion-ordered keys and ASCII-only output
 * with lower-case `\uXXXX` escapes.
 */
export const toWireJson = (value: unknown): string => serialize(value, new Set<object>()) ?? 'null';
