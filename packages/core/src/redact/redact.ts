/**
 * Secret-filtering serializer
 */

import type { FieldEntry, FieldSchema, FieldValue } from './fields.js';

export type RedactedValue = FieldValue | RedactedMap | RedactedValue[];

export interface RedactedMap {
  [key: string]: RedactedValue;
}

/**
 * Render a configuration value into a plain map safe for logs.
 *
 * Secret fields are dropped whatever they hold, and `omitEmpty` fields are
 * dropped at their zero value. Absent references never show up as null.
 * Nested structs, present references and struct lists recurse. Arrays and
 * maps are copied, so the result shares nothing with `value`.
 */
export function redact<T>(value: T, schema: FieldSchema<T>): RedactedMap {
  return redactEntries(schema(value));
}

/**
 * JSON text of `redact(value, schema)`
 */
export function redactToString<T>(value: T, schema: FieldSchema<T>): string {
  return JSON.stringify(redact(value, schema));
}

function redactEntries(entries: FieldEntry[]): RedactedMap {
  const result: RedactedMap = {};
  const seen = new Set<string>();

  for (const entry of entries) {
    if (seen.has(entry.key)) {
      throw new Error(`Duplicate field key "${entry.key}" in field schema`);
    }
    seen.add(entry.key);

    if (entry.secret) {
      continue;
    }
    if (entry.omitEmpty && isZeroEntry(entry)) {
      continue;
    }

    switch (entry.kind) {
      case 'value':
        if (entry.value !== undefined) {
          result[entry.key] = copyValue(entry.value);
        }
        break;
      case 'struct':
        result[entry.key] = redactEntries(entry.fields);
        break;
      case 'ref':
        if (entry.fields !== undefined) {
          result[entry.key] = redactEntries(entry.fields);
        }
        break;
      case 'list':
        if (entry.items !== undefined) {
          result[entry.key] = entry.items.map((item) => redactEntries(item));
        }
        break;
      default: {
        const unreachable: never = entry;
        throw new Error(`Unhandled field entry ${JSON.stringify(unreachable)}`);
      }
    }
  }

  return result;
}

export function isZeroEntry(entry: FieldEntry): boolean {
  switch (entry.kind) {
    case 'value':
      return isZeroValue(entry.value);
    case 'struct':
      return entry.fields.every(isZeroEntry);
    case 'ref':
      return entry.fields === undefined || entry.fields.every(isZeroEntry);
    case 'list':
      return entry.items === undefined || entry.items.length === 0;
    default: {
      const unreachable: never = entry;
      throw new Error(`Unhandled field entry ${JSON.stringify(unreachable)}`);
    }
  }
}

function isZeroValue(value: FieldValue): boolean {
  if (value === undefined || value === null) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  switch (typeof value) {
    case 'string':
      return value === '';
    case 'number':
      return value === 0;
    case 'boolean':
      return value === false;
    default:
      return Object.keys(value).length === 0;
  }
}

function copyValue(value: FieldValue): FieldValue {
  if (value === null || typeof value !== 'object') {
    return value;
  }
  return structuredClone(value);
}
