/**
 * Email/Text Agent
 *
 * Reads sender, subject and body from header-structured text, rates urgency and
 * sentiment, pulls key points and action items for complaints and regulations,
 * and shapes the result as a CRM entry. Plain text and PDF text go through the
 * same logic.
 */

import type { DocumentTextReader } from '../../text/reader';
import type {
  Anomaly,
  ClassificationResult,
  CrmRecord,
  DocumentFormat,
  InputDocument,
  JsonObject,
  TextExtractionResult,
  TextSource,
} from '../../types';
import { BaseAgent } from '../base-agent';
import { companyFromEmail, parseAddress, parseMessage } from './parse';
import {
  assessSentiment,
  assessUrgency,
  extractActionItems,
  extractKeyPoints,
  extractMoneyMentions,
} from './signals';

const PLAIN_TEXT_CONFIDENCE = 0.8;
const SUBJECT_FALLBACK_CHARS = 80;
const SUMMARY_CHARS = 200;

export function sourceForFormat(format: DocumentFormat): TextSource {
  if (format === 'Email') return 'email';
  if (format === 'PDF') return 'pdf';
  return 'text';
}

function truncate(value: string, maxChars: number): string {
  return value.length > maxChars ? `${value.slice(0, maxChars - 3).trimEnd()}...` : value;
}

function emptyCrm(): CrmRecord {
  return {
    contact_name: 'Unknown',
    company: 'Unknown',
    subject: '',
    priority: 'medium',
    category: 'neutral',
    summary: '',
    next_actions: [],
    status: 'new',
  };
}

export class EmailAgent extends BaseAgent<TextExtractionResult> {
  readonly name = 'email_agent' as const;
  readonly description = 'Extracts sender, subject, urgency and action items from email and plain text';

  constructor(private readonly reader: DocumentTextReader) {
    super();
  }

  protected async extractFields(
    input: InputDocument,
    classification: ClassificationResult
  ): Promise<TextExtractionResult> {
    const document = await this.reader.read(input, classification.format);
    return this.extractFromText(document.text, classification, sourceForFormat(classification.format));
  }

  /**
   * Extraction over already-readable text. Anomalies found before this step,
   * such as an unreadable PDF, are passed in and kept first.
   */
  extractFromText(
    text: string,
    classification: ClassificationResult,
    source: TextSource,
    priorAnomalies: Anomaly[] = []
  ): TextExtractionResult {
    const { headers, body } = parseMessage(text);
    const sender = headers.from ?? null;
    const subject = headers.subject ?? null;
    const address = sender ? parseAddress(sender) : { name: null, email: null };
    const company = companyFromEmail(address.email);

    const urgency = assessUrgency(`${subject ?? ''}\n${body}`);
    const sentiment = assessSentiment(body);
    const withActions = classification.intent === 'Complaint' || classification.intent === 'Regulation';
    const keyPoints = withActions ? extractKeyPoints(body) : [];
    const actionItems = withActions ? extractActionItems(body) : [];

    const fields: JsonObject = {};
    if (sender) fields.sender = sender;
    if (address.email) fields.sender_email = address.email;
    if (company) fields.sender_company = company;
    if (headers.to) fields.recipient = headers.to;
    if (subject) fields.subject = subject;
    if (headers.date) fields.sent_at = headers.date;
    fields.body = body;
    fields.urgency = urgency;
    fields.sentiment = sentiment;
    fields.amounts = extractMoneyMentions(body);
    if (withActions) {
      fields.key_points = keyPoints;
      fields.action_items = actionItems;
    }

    const anomalies: Anomaly[] = [...priorAnomalies];
    if (source === 'email' && !sender) {
      anomalies.push({ field: 'sender', kind: 'missing', message: 'Email has no From header' });
    }
    if (source === 'email' && !subject) {
      anomalies.push({ field: 'subject', kind: 'missing', message: 'Email has no Subject header' });
    }
    if (!body) {
      anomalies.push({ field: 'body', kind: 'missing', message: 'No body text found' });
    }

    const confidence =
      source === 'email'
        ? [sender, subject, body].filter(Boolean).length / 3
        : body
          ? PLAIN_TEXT_CONFIDENCE
          : 0;

    const crm: CrmRecord = {
      contact_name: address.name ?? address.email ?? 'Unknown',
      company: company ?? 'Unknown',
      subject: subject ?? truncate(body.split('\n')[0] ?? '', SUBJECT_FALLBACK_CHARS),
      priority: urgency,
      category: sentiment,
      summary: truncate(
        keyPoints.length > 0 ? keyPoints.slice(0, 3).join('; ') : body.replace(/\s+/g, ' '),
        SUMMARY_CHARS
      ),
      next_actions: actionItems.slice(0, 5),
      status: 'new',
    };

    return {
      agent: 'email_agent',
      fields,
      anomalies,
      confidence,
      source,
      urgency,
      crm,
    };
  }

  /**
   * Result for text that could not be processed at all.
   */
  emptyResult(source: TextSource, anomaly: Anomaly): TextExtractionResult {
    return {
      agent: 'email_agent',
      fields: {},
      anomalies: [anomaly],
      confidence: 0,
      source,
      urgency: 'medium',
      crm: emptyCrm(),
    };
  }

  protected failedResult(anomaly: Anomaly, classification: ClassificationResult): TextExtractionResult {
    return this.emptyResult(sourceForFormat(classification.format), anomaly);
  }
}
