import { z } from 'zod';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const zJsonValue: z.ZodType<JsonValue> = z.lazy(() => z.union([
  z.string(),
  z.number().finite(),
  z.boolean(),
  z.null(),
  z.array(zJsonValue),
  z.record(zJsonValue),
]));

export const zJsonObject: z.ZodType<JsonObject> = z.record(zJsonValue);

export function isJsonObject(v: unknown): v is JsonObject {
  return zJsonObject.safeParse(v).success;
}

/**
 * Narrow tool/prompt arguments at the boundary. `undefined`/`null` means "no
 * arguments"; anything that is not a JSON object is rejected with the zod issue list.
 */
export function parseArguments(raw: unknown): { ok: true; value: JsonObject } | { ok: false; issues: string[] } {
  if(raw === undefined || raw === null) return { ok: true, value: {} };
  const parsed = zJsonObject.safeParse(raw);
  if(parsed.success) return { ok: true, value: parsed.data };
  return { ok: false, issues: parsed.error.issues.map(i => `${i.path.length ? i.path.join('.') + ': ' : ''}${i.message}`) };
}
