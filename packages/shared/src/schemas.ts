/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for intent payloads and processing records.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { SchemaObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';
import type { Intent } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

const MONEY_PATTERN = /^-?\$?\s*(\d{1,3}(,\d{3})+|\d+)(\.\d+)?$/;

function isValidDay(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

/**
 * Accepts YYYY-MM-DD (optionally followed by HH:MM:SS), MM/DD/YYYY and DD/MM/YYYY.
 */
export function isLooseDate(value: string): boolean {
  const iso = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2}):(\d{2}))?$/.exec(value);
  if (iso) {
    const [, year, month, day, hours, minutes, seconds] = iso;
    if (!isValidDay(Number(year), Number(month), Number(day))) return false;
    if (hours === undefined) return true;
    return Number(hours) < 24 && Number(minutes) < 60 && Number(seconds) < 60;
  }

  const slashed = /^(\d{2})\/(\d{2})\/(\d{4})$/.exec(value);
  if (slashed) {
    const [, first, second, year] = slashed;
    return (
      isValidDay(Number(year), Number(first), Number(second)) ||
      isValidDay(Number(year), Number(second), Number(first))
    );
  }

  return false;
}

export function isMoneyString(value: string): boolean {
  return MONEY_PATTERN.test(value.trim());
}

ajv.addFormat('money', { type: 'string', validate: isMoneyString });
ajv.addFormat('loose-date', { type: 'string', validate: isLooseDate });

const INTENT_SCHEMA_FILES: Record<Intent, string> = {
  Invoice: 'intents/invoice.schema.json',
  RFQ: 'intents/rfq.schema.json',
  Complaint: 'intents/complaint.schema.json',
  Regulation: 'intents/regulation.schema.json',
  General: 'intents/general.schema.json',
  Unknown: 'intents/general.schema.json',
};

export interface IntentSchema {
  title?: string;
  required: string[];
  properties: Record<string, object>;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === 'string');
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toIntentSchema(schema: SchemaObject): IntentSchema {
  const declared: unknown = schema.properties;
  const required: unknown = schema.required;
  const title: unknown = schema.title;
  const properties: Record<string, object> = {};
  if (isSchemaObject(declared)) {
    for (const [name, definition] of Object.entries(declared)) {
      if (isSchemaObject(definition)) {
        properties[name] = definition;
      }
    }
  }
  return {
    title: typeof title === 'string' ? title : undefined,
    required: isStringArray(required) ? required : [],
    properties,
  };
}

function loadSchema(schemaName: string): SchemaObject {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to compiled output under dist/
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (!fs.existsSync(schemaPath)) continue;
    const parsed: unknown = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
    if (isSchemaObject(parsed)) {
      return parsed;
    }
    logger.warn(`Schema file is not a JSON object: ${schemaPath}`);
  }

  // Return a permissive schema if file not found
  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'object' };
}

// Compiled lazily, once per schema file (Ajv rejects a second compile of the same $id)
const validators = new Map<string, { schema: IntentSchema; validate: ValidateFunction }>();

function getValidator(schemaName: string): { schema: IntentSchema; validate: ValidateFunction } {
  const cached = validators.get(schemaName);
  if (cached) return cached;

  const raw = loadSchema(schemaName);
  const entry = { schema: toIntentSchema(raw), validate: ajv.compile(raw) };
  validators.set(schemaName, entry);
  return entry;
}

/**
 * Target schema applied to JSON payloads of the given intent.
 */
export function getIntentSchema(intent: Intent): IntentSchema {
  return getValidator(INTENT_SCHEMA_FILES[intent]).schema;
}

export interface FieldIssue {
  field: string;
  keyword: string;
  message: string;
}

/**
 * Validate a payload against its intent schema and report issues per top-level field.
 * The first issue for a field wins.
 */
export function validateIntentPayload(intent: Intent, data: unknown): FieldIssue[] {
  const { validate } = getValidator(INTENT_SCHEMA_FILES[intent]);
  if (validate(data)) return [];

  const issues: FieldIssue[] = [];
  const seen = new Set<string>();

  for (const error of validate.errors ?? []) {
    const missingProperty: unknown = error.params.missingProperty;
    const field =
      error.keyword === 'required' && typeof missingProperty === 'string'
        ? missingProperty
        : error.instancePath.split('/')[1] || '/';

    if (seen.has(field)) continue;
    seen.add(field);
    issues.push({ field, keyword: error.keyword, message: error.message ?? 'is invalid' });
  }

  return issues;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/**
 * Validate a ProcessingRecord against processing_record.schema.json
 */
export function validateRecord(data: unknown): ValidationResult {
  const { validate } = getValidator('processing_record.schema.json');
  const valid = validate(data);

  if (!valid) {
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`);
    logger.warn('ProcessingRecord validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}
