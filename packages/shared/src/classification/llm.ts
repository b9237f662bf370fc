/**
 * LLM Intent Classification
 *
 * Sends a text preview to an intent model under a timeout. Timeouts, transport
 * errors and answers outside the intent enumeration all throw here and are
 * downgraded to General by the base classifier.
 */

import { withTimeout } from '../timeout';
import type { DocumentTextReader } from '../text/reader';
import { INTENTS, type Intent } from '../types';
import { BaseClassifier } from './base-classifier';
import type { IntentDecision, IntentModel } from './types';

export interface LlmClassifierOptions {
  timeoutMs: number;
  previewChars: number;
}

function isIntent(value: string): value is Intent {
  return INTENTS.some((intent) => intent === value);
}

export class LlmClassifier extends BaseClassifier {
  readonly strategy = 'llm' as const;

  constructor(
    reader: DocumentTextReader,
    private readonly model: IntentModel,
    private readonly options: LlmClassifierOptions
  ) {
    super(reader);
  }

  protected async classifyIntent(text: string): Promise<IntentDecision> {
    const preview = text.slice(0, this.options.previewChars);
    const prediction = await withTimeout(
      (signal) => this.model.predictIntent(preview, { signal }),
      this.options.timeoutMs,
      'Intent classification'
    );

    if (!isIntent(prediction.intent)) {
      throw new Error(`Intent model returned unknown intent: ${prediction.intent}`);
    }
    if (!Number.isFinite(prediction.confidence) || prediction.confidence < 0 || prediction.confidence > 1) {
      throw new Error(`Intent model returned confidence out of range: ${prediction.confidence}`);
    }

    return {
      intent: prediction.intent,
      confidence: prediction.confidence,
      method: 'llm',
      reasoning: prediction.reasoning,
      model: this.model.name,
    };
  }
}
