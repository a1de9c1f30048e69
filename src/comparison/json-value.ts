import type { JsonValue } from './types.js';

const isPlainObject = (value: object): boolean => {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

/**
 * Converts a value returned by an engine client into a JSON value.
 *
 * Clients hand back bigints, dates, byte buffers and their own wrapper
 * classes; each is reduced to the text or number it stands for so the
 * record can be written as NDJSON and compared structurally.
 */
export const toJsonValue = (value: unknown): JsonValue => {
  if (value === null || value === undefined) return null;

  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : String(value);
  }
  if (typeof value === 'bigint') {
    return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(value)
      : value.toString();
  }
  if (typeof value !== 'object') return String(value);

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString('base64');
  }
  if (Array.isArray(value)) {
    return value.map(item => toJsonValue(item));
  }
  // BigQueryDate, BigQueryTimestamp, BigQueryTime and friends
  if ('value' in value && typeof value.value === 'string' && !isPlainObject(value)) {
    return value.value;
  }
  if (isPlainObject(value)) {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = toJsonValue(item);
    }
    return result;
  }
  // Big.js numerics and other value classes print their exact value
  return String(value);
};
