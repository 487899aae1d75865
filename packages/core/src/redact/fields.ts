/**
 * Field Descriptors
 *
 * Every configuration type declares its serialized fields explicitly through
 * a FieldSchema. The redactor walks these descriptors instead of inspecting
 * the object, so secrecy and omission rules are checked at compile time
 * next to the type they describe.
 */

export type FieldValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | readonly FieldValue[]
  | { readonly [key: string]: FieldValue };

export interface FieldOptions {
  /** Never rendered in a redacted dump, whatever its value */
  secret?: boolean;
  /** Dropped when equal to the zero value of its type */
  omitEmpty?: boolean;
}

interface EntryBase {
  key: string;
  secret: boolean;
  omitEmpty: boolean;
}

export interface ValueEntry extends EntryBase {
  kind: 'value';
  value: FieldValue;
}

export interface StructEntry extends EntryBase {
  kind: 'struct';
  fields: FieldEntry[];
}

export interface RefEntry extends EntryBase {
  kind: 'ref';
  /** undefined when the reference is absent; zero when absent or all fields are zero */
  fields: FieldEntry[] | undefined;
}

export interface ListEntry extends EntryBase {
  kind: 'list';
  items: FieldEntry[][] | undefined;
}

export type FieldEntry = ValueEntry | StructEntry | RefEntry | ListEntry;

export type FieldSchema<T> = (value: T) => FieldEntry[];

function base(key: string, options: FieldOptions): EntryBase {
  return {
    key,
    secret: options.secret ?? false,
    omitEmpty: options.omitEmpty ?? false,
  };
}

export function field(key: string, value: FieldValue, options: FieldOptions = {}): ValueEntry {
  return { ...base(key, options), kind: 'value', value };
}

/** An embedded struct, always present */
export function struct<T>(
  key: string,
  value: T,
  schema: FieldSchema<T>,
  options: FieldOptions = {},
): StructEntry {
  return { ...base(key, options), kind: 'struct', fields: schema(value) };
}

/** An optional reference to a struct */
export function ref<T>(
  key: string,
  value: T | null | undefined,
  schema: FieldSchema<T>,
  options: FieldOptions = {},
): RefEntry {
  const fields = value === null || value === undefined ? undefined : schema(value);
  return { ...base(key, options), kind: 'ref', fields };
}

/** An ordered list of structs */
export function list<T>(
  key: string,
  items: readonly T[] | undefined,
  schema: FieldSchema<T>,
  options: FieldOptions = {},
): ListEntry {
  return { ...base(key, options), kind: 'list', items: items?.map((item) => schema(item)) };
}
