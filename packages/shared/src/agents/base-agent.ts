/**
 * Base Agent
 *
 * Timing, logging and metrics around an agent's extraction, plus the boundary
 * that turns unexpected errors into an unreadable-content anomaly.
 */

import { roundConfidence } from '../confidence';
import { logger } from '../logger';
import { anomaliesCounter, extractionDurationHistogram } from '../metrics';
import type {
  AgentName,
  Anomaly,
  ClassificationResult,
  ExtractionResult,
  InputDocument,
} from '../types';
import type { Agent } from './types';

export abstract class BaseAgent<R extends ExtractionResult> implements Agent<R> {
  abstract readonly name: AgentName;
  abstract readonly description: string;

  protected abstract extractFields(input: InputDocument, classification: ClassificationResult): Promise<R>;

  /**
   * Result returned when extraction could not run at all.
   */
  protected abstract failedResult(anomaly: Anomaly, classification: ClassificationResult): R;

  async extract(input: InputDocument, classification: ClassificationResult): Promise<R> {
    const startTime = Date.now();

    logger.info('Starting extraction', {
      agent: this.name,
      format: classification.format,
      intent: classification.intent,
      size_bytes: input.content.length,
    });

    let result: R;
    try {
      result = await this.extractFields(input, classification);
    } catch (error) {
      logger.error('Extraction failed', error, { agent: this.name });
      result = this.failedResult(
        {
          field: 'content',
          kind: 'unreadable',
          message: `Extraction failed: ${error instanceof Error ? error.message : String(error)}`,
        },
        classification
      );
    }

    const finished = { ...result, confidence: roundConfidence(result.confidence) };
    const durationMs = Date.now() - startTime;

    extractionDurationHistogram.observe({ agent: this.name }, durationMs / 1000);
    for (const anomaly of finished.anomalies) {
      anomaliesCounter.inc({ agent: this.name, kind: anomaly.kind });
    }

    logger.info('Extraction complete', {
      agent: this.name,
      field_count: Object.keys(finished.fields).length,
      anomaly_count: finished.anomalies.length,
      confidence: finished.confidence,
      duration_ms: durationMs,
    });

    Object.freeze(finished);
    return finished;
  }
}
