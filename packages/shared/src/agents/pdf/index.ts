/**
 * PDF Agent
 *
 * Text extraction in front of the Email/Text agent. There is no PDF-specific
 * field logic; results carry source "pdf" and the page count.
 */

import type { DocumentTextReader } from '../../text/reader';
import type {
  Anomaly,
  ClassificationResult,
  InputDocument,
  TextExtractionResult,
} from '../../types';
import { BaseAgent } from '../base-agent';
import type { EmailAgent } from '../email';

export class PdfAgent extends BaseAgent<TextExtractionResult> {
  readonly name = 'pdf_agent' as const;
  readonly description = 'Extracts PDF text, then applies the Email/Text agent';

  constructor(
    private readonly reader: DocumentTextReader,
    private readonly textAgent: EmailAgent
  ) {
    super();
  }

  protected async extractFields(
    input: InputDocument,
    classification: ClassificationResult
  ): Promise<TextExtractionResult> {
    const document = await this.reader.read(input, 'PDF');
    const anomalies: Anomaly[] = document.error
      ? [{ field: 'content', kind: 'unreadable', message: `PDF text could not be extracted: ${document.error}` }]
      : [];

    const result = this.textAgent.extractFromText(document.text, classification, 'pdf', anomalies);
    return { ...result, page_count: document.pageCount ?? 0 };
  }

  protected failedResult(anomaly: Anomaly): TextExtractionResult {
    return { ...this.textAgent.emptyResult('pdf', anomaly), page_count: 0 };
  }
}
