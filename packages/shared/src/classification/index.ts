/**
 * Classification
 */

import { config, type ClassifierStrategy } from '../config';
import { logger } from '../logger';
import type { DocumentTextReader } from '../text/reader';
import { LlmClassifier } from './llm';
import { OpenAIIntentModel } from './openai-intent-model';
import { RuleBasedClassifier } from './rules';
import type { Classifier, IntentModel } from './types';

export interface ClassifierOptions {
  reader: DocumentTextReader;
  strategy?: ClassifierStrategy;
  /** Overrides the OpenAI model built from config. */
  intentModel?: IntentModel;
  timeoutMs?: number;
  previewChars?: number;
}

function createDefaultIntentModel(): IntentModel | undefined {
  if (!config.openaiApiKey) return undefined;
  return new OpenAIIntentModel({
    apiKey: config.openaiApiKey,
    model: config.llmModelClassification,
    baseUrl: config.llmBaseUrl,
    timeoutMs: config.classificationTimeoutMs,
  });
}

/**
 * Build the classifier for a strategy. The llm strategy without a model or API
 * key falls back to rules.
 */
export function createClassifier(options: ClassifierOptions): Classifier {
  const strategy = options.strategy ?? config.classifierStrategy;

  if (strategy === 'llm') {
    const model = options.intentModel ?? createDefaultIntentModel();
    if (model) {
      return new LlmClassifier(options.reader, model, {
        timeoutMs: options.timeoutMs ?? config.classificationTimeoutMs,
        previewChars: options.previewChars ?? config.classificationPreviewChars,
      });
    }
    logger.warn('LLM classification requested without OPENAI_API_KEY, using rule-based classification');
  }

  return new RuleBasedClassifier(options.reader);
}

export { BaseClassifier } from './base-classifier';
export { detectFormat, hasPdfMagic, looksLikeEmail } from './format';
export { LlmClassifier, type LlmClassifierOptions } from './llm';
export { OpenAIIntentModel, type OpenAIIntentModelOptions } from './openai-intent-model';
export { INTENT_CLASSIFICATION_SCHEMA, INTENT_SYSTEM_PROMPT, INTENT_USER_PROMPT_TEMPLATE } from './prompts';
export { RuleBasedClassifier, scoreIntentCues } from './rules';
export type { Classifier, IntentDecision, IntentModel, IntentPrediction } from './types';
