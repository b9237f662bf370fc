/**
 * Rule-Based Intent Classification
 *
 * JSON payloads are judged by their declared type or by which intent schema
 * their keys cover best; everything else by counting lexical cues.
 */

import { roundConfidence } from '../confidence';
import { mapPayloadFields, normalizeKey } from '../fields';
import { isJsonObject, parseJson } from '../json';
import { getIntentSchema } from '../schemas';
import { compileCues, countCueMatches } from '../text/cues';
import type { DocumentFormat, Intent, JsonObject } from '../types';
import { BaseClassifier } from './base-classifier';
import type { IntentDecision } from './types';

type ScoredIntent = Exclude<Intent, 'General' | 'Unknown'>;

/** Table order breaks ties. */
const INTENT_CUES: ReadonlyArray<readonly [ScoredIntent, readonly string[]]> = [
  ['Invoice', ['invoice', 'amount due', 'balance due', 'payment due', 'billing', 'remittance', 'receipt', 'total due']],
  ['RFQ', ['rfq', 'request for quote', 'request for quotation', 'quote', 'quotation', 'pricing', 'proposal', 'bid']],
  ['Complaint', ['complaint', 'defective', 'damaged', 'broken', 'refund', 'disappointed', 'unacceptable', 'dissatisfied']],
  ['Regulation', ['regulation', 'regulatory', 'compliance', 'policy', 'statute', 'mandatory', 'shall', 'effective date']],
];

const DECLARED_TYPE_KEYS = ['document_type', 'doc_type', 'type'];

const DECLARED_TYPE_ALIASES: Record<string, Intent> = {
  invoice: 'Invoice',
  bill: 'Invoice',
  rfq: 'RFQ',
  quote: 'RFQ',
  quotation: 'RFQ',
  request_for_quote: 'RFQ',
  request_for_quotation: 'RFQ',
  complaint: 'Complaint',
  regulation: 'Regulation',
  regulatory: 'Regulation',
  regulatory_notice: 'Regulation',
  general: 'General',
};

const DECLARED_TYPE_CONFIDENCE = 0.95;
const SHAPE_CONFIDENCE_SCALE = 0.9;
const MIN_SHAPE_COVERAGE = 0.5;
const NO_CUE_CONFIDENCE = 0.5;

const CUE_PATTERNS = INTENT_CUES.map(([intent, cues]) => [intent, compileCues(cues)] as const);

/**
 * Count cue occurrences per intent.
 */
export function scoreIntentCues(text: string): Map<ScoredIntent, number> {
  const scores = new Map<ScoredIntent, number>();
  for (const [intent, patterns] of CUE_PATTERNS) {
    scores.set(intent, countCueMatches(text, patterns));
  }
  return scores;
}

function classifyByCues(text: string): IntentDecision {
  const scores = scoreIntentCues(text);
  let best: ScoredIntent | null = null;
  let top = 0;
  let total = 0;

  for (const [intent, hits] of scores) {
    total += hits;
    if (hits > top) {
      best = intent;
      top = hits;
    }
  }

  if (best === null) {
    return {
      intent: 'General',
      confidence: NO_CUE_CONFIDENCE,
      method: 'rules',
      reasoning: 'No intent cues found',
    };
  }

  const strength = Math.min(1, 0.5 + 0.25 * (top - 1));
  return {
    intent: best,
    confidence: roundConfidence((top / total) * strength),
    method: 'rules',
    reasoning: `${top} of ${total} intent cues point to ${best}`,
  };
}

function declaredIntent(payload: JsonObject): Intent | undefined {
  for (const key of Object.keys(payload)) {
    if (!DECLARED_TYPE_KEYS.includes(normalizeKey(key))) continue;
    const value = payload[key];
    if (typeof value !== 'string') continue;
    const intent = DECLARED_TYPE_ALIASES[normalizeKey(value)];
    if (intent) return intent;
  }
  return undefined;
}

function classifyByShape(payload: JsonObject): IntentDecision | undefined {
  const declared = declaredIntent(payload);
  if (declared) {
    return {
      intent: declared,
      confidence: DECLARED_TYPE_CONFIDENCE,
      method: 'rules',
      reasoning: `Payload declares its type as ${declared}`,
    };
  }

  let best: ScoredIntent | null = null;
  let bestCoverage = 0;
  for (const [intent] of INTENT_CUES) {
    const { required } = getIntentSchema(intent);
    if (required.length === 0) continue;
    const { mapped } = mapPayloadFields(payload, required);
    const coverage = Object.keys(mapped).length / required.length;
    if (coverage > bestCoverage) {
      best = intent;
      bestCoverage = coverage;
    }
  }

  if (best === null || bestCoverage < MIN_SHAPE_COVERAGE) return undefined;

  return {
    intent: best,
    confidence: roundConfidence(bestCoverage * SHAPE_CONFIDENCE_SCALE),
    method: 'rules',
    reasoning: `Payload covers ${Math.round(bestCoverage * 100)}% of ${best} required fields`,
  };
}

export class RuleBasedClassifier extends BaseClassifier {
  readonly strategy = 'rules' as const;

  protected async classifyIntent(text: string, format: DocumentFormat): Promise<IntentDecision> {
    if (format === 'JSON') {
      const parsed = parseJson(text.trim());
      if (parsed.ok && isJsonObject(parsed.value)) {
        const byShape = classifyByShape(parsed.value);
        if (byShape) return byShape;
      }
    }
    return classifyByCues(text);
  }
}
