import type { z } from 'zod';
import { DSSResponseError } from './errors.js';
import { isJsonObject, type JsonObject, type JsonValue } from './types.js';

export function asObject(value: JsonValue, what: string): JsonObject {
  if (!isJsonObject(value)) {
    throw new DSSResponseError(`Expected an object for ${what}, got ${describe(value)}`);
  }
  return value;
}

export function asList(value: JsonValue, what: string): JsonValue[] {
  if (!Array.isArray(value)) {
    throw new DSSResponseError(`Expected a list for ${what}, got ${describe(value)}`);
  }
  return value;
}

export function asObjectList(value: JsonValue, what: string): JsonObject[] {
  return asList(value, what).map((item, i) => asObject(item, `${what}[${i}]`));
}

/** Validate the parts of a response the client depends on. */
export function parseResponse<S extends z.ZodTypeAny>(schema: S, value: JsonValue, what: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new DSSResponseError(`Unexpected ${what}: ${issues}`);
  }
  return result.data;
}

function describe(value: JsonValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'a list';
  return typeof value;
}

export function segment(value: string): string {
  return encodeURIComponent(value);
}
