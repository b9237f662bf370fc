/**
 * JSON Agent
 *
 * Maps a JSON payload onto its intent schema and reports missing or malformed
 * fields. Fields that are present are always returned, valid or not.
 */

import { decodeText } from '../../input';
import { mapPayloadFields } from '../../fields';
import { isJsonObject, parseJson } from '../../json';
import { getIntentSchema, validateIntentPayload, type FieldIssue } from '../../schemas';
import type {
  Anomaly,
  ClassificationResult,
  InputDocument,
  Intent,
  JsonExtractionResult,
} from '../../types';
import { BaseAgent } from '../base-agent';

const MALFORMED_PENALTY = 0.1;

function targetSchemaFor(classification: ClassificationResult): Intent {
  return classification.intent === 'Unknown' ? 'General' : classification.intent;
}

function toAnomaly(issue: FieldIssue): Anomaly {
  if (issue.keyword === 'required') {
    return {
      field: issue.field,
      kind: 'missing',
      message: `Required field '${issue.field}' is missing`,
    };
  }
  return {
    field: issue.field,
    kind: 'malformed',
    message: `Field '${issue.field}' ${issue.message}`,
  };
}

export class JsonAgent extends BaseAgent<JsonExtractionResult> {
  readonly name = 'json_agent' as const;
  readonly description = 'Validates structured JSON payloads against the intent schema';

  protected async extractFields(
    input: InputDocument,
    classification: ClassificationResult
  ): Promise<JsonExtractionResult> {
    const targetSchema = targetSchemaFor(classification);
    const parsed = parseJson(decodeText(input.content).trim());

    if (!parsed.ok) {
      return this.failedResult(
        { field: 'content', kind: 'unreadable', message: `Payload is not valid JSON: ${parsed.error}` },
        classification
      );
    }
    if (!isJsonObject(parsed.value)) {
      const actual = Array.isArray(parsed.value) ? 'array' : typeof parsed.value;
      return this.failedResult(
        { field: 'content', kind: 'malformed', message: `Payload must be a JSON object, got ${actual}` },
        classification
      );
    }

    const schema = getIntentSchema(targetSchema);
    const { mapped, unmapped } = mapPayloadFields(parsed.value, Object.keys(schema.properties));
    const anomalies = validateIntentPayload(targetSchema, mapped).map(toAnomaly);

    const requiredPresent = schema.required.filter((field) => field in mapped).length;
    const coverage = schema.required.length > 0 ? requiredPresent / schema.required.length : 1;
    const malformed = anomalies.filter((anomaly) => anomaly.kind === 'malformed').length;

    return {
      agent: 'json_agent',
      fields: { ...mapped, ...unmapped },
      anomalies,
      confidence: coverage - MALFORMED_PENALTY * malformed,
      target_schema: targetSchema,
      schema_compliant: anomalies.length === 0,
    };
  }

  protected failedResult(anomaly: Anomaly, classification: ClassificationResult): JsonExtractionResult {
    return {
      agent: 'json_agent',
      fields: {},
      anomalies: [anomaly],
      confidence: 0,
      target_schema: targetSchemaFor(classification),
      schema_compliant: false,
    };
  }
}
