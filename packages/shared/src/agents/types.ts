/**
 * Agent Types
 */

import type {
  AgentName,
  ClassificationResult,
  ExtractionResult,
  InputDocument,
} from '../types';

/**
 * Extracts structured fields from one classified input. extract() never rejects:
 * problems with the input are reported as anomalies with lower confidence.
 */
export interface Agent<R extends ExtractionResult = ExtractionResult> {
  readonly name: AgentName;
  readonly description: string;
  extract(input: InputDocument, classification: ClassificationResult): Promise<R>;
}
