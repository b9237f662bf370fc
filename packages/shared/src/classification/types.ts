/**
 * Classifier Types
 */

import type { ClassifierStrategy } from '../config';
import type { ClassificationResult, InputDocument } from '../types';

/**
 * Produces the format and intent of an input. Implementations never reject:
 * failures downgrade the result instead.
 */
export interface Classifier {
  readonly strategy: ClassifierStrategy;
  classify(input: InputDocument): Promise<ClassificationResult>;
}

/** Intent fields of a classification; format is decided before any strategy runs. */
export type IntentDecision = Omit<ClassificationResult, 'format'>;

/**
 * Raw answer from an intent model. Values are untrusted until the classifier checks them.
 */
export interface IntentPrediction {
  intent: string;
  confidence: number;
  reasoning?: string;
}

/**
 * External text-classification capability, typically a hosted LLM.
 */
export interface IntentModel {
  readonly name: string;
  predictIntent(preview: string, options: { signal: AbortSignal }): Promise<IntentPrediction>;
}
