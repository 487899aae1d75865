import { SerializationError } from '@lazypull/core';

export function dumpJson(value: unknown): string {
  let encoded: string | undefined;
  try {
    encoded = JSON.stringify(value);
  } catch (error) {
    throw new SerializationError(error);
  }
  if (encoded === undefined) {
    throw new SerializationError(new TypeError('value has no JSON representation'));
  }
  return encoded;
}
