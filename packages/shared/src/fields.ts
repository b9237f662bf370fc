/**
 * Payload Field Mapping
 *
 * Maps the keys of a JSON payload onto the field names of an intent schema.
 * Exact keys (case and camelCase insensitive) win, then known aliases, then the
 * first key whose tokens contain every token of the field (issue_date -> date).
 * Each payload key is used at most once and null values count as absent.
 * Unmapped keys are kept as they are, nulls included.
 */

import type { JsonObject, JsonValue } from './types';

const FIELD_ALIASES: Record<string, string[]> = {
  invoice_number: ['invoice_id', 'invoice_no'],
  vendor: ['supplier', 'seller'],
  rfq_number: ['rfq_id'],
  items: ['line_items'],
  contact: ['contact_person'],
};

export interface FieldMapping {
  /** Schema field name -> value. */
  mapped: JsonObject;
  /** Schema field name -> payload key it came from. */
  sources: Record<string, string>;
  /** Payload keys not mapped to any schema field. */
  unmapped: JsonObject;
}

export function normalizeKey(key: string): string {
  return key
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

function tokens(key: string): string[] {
  return normalizeKey(key).split('_').filter(Boolean);
}

function containsTokens(keyTokens: string[], fieldTokens: string[]): boolean {
  return fieldTokens.length > 0 && fieldTokens.every((token) => keyTokens.includes(token));
}

function matchesField(key: string, field: string): boolean {
  const normalized = normalizeKey(key);
  return (
    normalized === field ||
    (FIELD_ALIASES[field] ?? []).includes(normalized) ||
    containsTokens(tokens(key), tokens(field))
  );
}

export function mapPayloadFields(payload: JsonObject, fieldNames: string[]): FieldMapping {
  const keys = Object.keys(payload);
  const present = keys.filter((key) => payload[key] !== null);
  const consumed = new Set<string>();
  const sources: Record<string, string> = {};

  const take = (field: string, key: string) => {
    sources[field] = key;
    consumed.add(key);
  };

  for (const field of fieldNames) {
    const key = present.find((candidate) => !consumed.has(candidate) && normalizeKey(candidate) === field);
    if (key !== undefined) take(field, key);
  }

  for (const field of fieldNames) {
    if (field in sources) continue;
    const candidates = present.filter((candidate) => !consumed.has(candidate));
    const aliases = FIELD_ALIASES[field] ?? [];
    const key =
      candidates.find((candidate) => aliases.includes(normalizeKey(candidate))) ??
      candidates.find((candidate) => containsTokens(tokens(candidate), tokens(field)));
    if (key !== undefined) take(field, key);
  }

  // A null key that names a schema field is that field being absent
  const isAbsentField = (key: string) =>
    payload[key] === null && fieldNames.some((field) => matchesField(key, field));

  // fromEntries defines own properties, so keys such as "__proto__" survive
  const mapped: JsonObject = Object.fromEntries(
    Object.entries(sources).map(([field, key]): [string, JsonValue] => [field, payload[key]])
  );
  const unmapped: JsonObject = Object.fromEntries(
    keys
      .filter((key) => !consumed.has(key) && !isAbsentField(key))
      .map((key): [string, JsonValue] => [key, payload[key]])
  );

  return { mapped, sources, unmapped };
}
