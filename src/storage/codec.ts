import { EJSON } from 'bson';

// Relaxed Extended JSON: numbers stay plain, Dates and other BSON types
// survive the round trip as `{ "$date": ... }` style wrappers.
const OPTIONS = { relaxed: true } as const;

export function encodeValue(value: unknown): string {
  return EJSON.stringify(value, OPTIONS);
}

export function decodeValue(text: string): unknown {
  return EJSON.parse(text, OPTIONS);
}

function readsAsJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

/**
 * Hash field encoding: a plain string is stored as is, unless its raw form
 * would read back as JSON. Everything else is Extended JSON.
 */
export function encodeField(value: unknown): string {
  if (typeof value === 'string' && !readsAsJson(value)) return value;
  return encodeValue(value);
}

export function decodeField(text: string): unknown {
  try {
    return decodeValue(text);
  } catch (err) {
    if (err instanceof SyntaxError) return text;
    throw err;
  }
}

export function encodeFields(record: Record<string, unknown>): Record<string, string> {
  const encoded: Record<string, string> = {};
  for (const [field, value] of Object.entries(record)) {
    if (value === undefined) continue;
    encoded[field] = encodeField(value);
  }
  return encoded;
}

export function decodeFields(hash: Record<string, string>): Record<string, unknown> {
  const decoded: Record<string, unknown> = {};
  for (const [field, text] of Object.entries(hash)) {
    decoded[field] = decodeField(text);
  }
  return decoded;
}
