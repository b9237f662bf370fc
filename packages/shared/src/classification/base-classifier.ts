/**
 * Base Classifier
 *
 * Detects the format, reads the text and hands intent classification to a strategy.
 * A strategy that throws is downgraded to General with confidence 0.
 */

import type { ClassifierStrategy } from '../config';
import { roundConfidence } from '../confidence';
import { logger } from '../logger';
import { classificationsCounter } from '../metrics';
import type { DocumentTextReader } from '../text/reader';
import type { ClassificationResult, DocumentFormat, InputDocument } from '../types';
import { detectFormat } from './format';
import type { Classifier, IntentDecision } from './types';

export abstract class BaseClassifier implements Classifier {
  abstract readonly strategy: ClassifierStrategy;

  constructor(protected readonly reader: DocumentTextReader) {}

  /**
   * Decide the intent of readable text in a known format.
   */
  protected abstract classifyIntent(text: string, format: DocumentFormat): Promise<IntentDecision>;

  async classify(input: InputDocument): Promise<ClassificationResult> {
    const startTime = Date.now();
    const format = detectFormat(input);
    const { text } = await this.reader.read(input, format);

    let decision: IntentDecision;
    if (format === 'Unknown' || text.trim().length === 0) {
      decision = {
        intent: 'Unknown',
        confidence: 0,
        method: this.strategy,
        reasoning: 'No readable content',
      };
    } else {
      decision = await this.decideIntent(text, format);
    }

    const result: ClassificationResult = {
      format,
      ...decision,
      confidence: roundConfidence(decision.confidence),
    };
    classificationsCounter.inc({ strategy: this.strategy, method: result.method });

    logger.info('Classification complete', {
      strategy: this.strategy,
      format: result.format,
      intent: result.intent,
      confidence: result.confidence,
      method: result.method,
      duration_ms: Date.now() - startTime,
    });

    return Object.freeze(result);
  }

  private async decideIntent(text: string, format: DocumentFormat): Promise<IntentDecision> {
    try {
      return await this.classifyIntent(text, format);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('Intent classification failed, using General', {
        strategy: this.strategy,
        format,
        error: message,
      });
      return {
        intent: 'General',
        confidence: 0,
        method: 'fallback',
        reasoning: `Intent classification failed: ${message}`,
      };
    }
  }
}
