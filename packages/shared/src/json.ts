/**
 * JSON Payload Helpers
 */

import type { JsonObject, JsonValue } from './types';

export type JsonParseResult = { ok: true; value: JsonValue } | { ok: false; error: string };

export function parseJson(text: string): JsonParseResult {
  try {
    const value: JsonValue = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
