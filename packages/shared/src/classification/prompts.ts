/**
 * Intent Classification Prompts
 *
 * Prompt and response schema for the hosted intent model.
 */

import { INTENTS } from '../types';

export const INTENT_SYSTEM_PROMPT = `You are a document intake classifier.
Identify the business intent of the document from the text preview provided.

Intents:
- Invoice: a bill or request for payment. Mentions amounts due, vendors, line items, invoice numbers.
- RFQ: a request for quotation. Asks for prices, quotes or proposals for goods or services, often with a deadline.
- Complaint: a customer complaint. Describes a problem, defect, damage or poor service and may ask for a refund.
- Regulation: a regulatory or policy notice. States rules, requirements, compliance obligations or effective dates.
- General: any other business correspondence.
- Unknown: the preview carries no readable content.

Return the most likely intent, your confidence (0-1) and a one-sentence reason.`;

/**
 * {{preview}} is replaced with the first characters of the document text.
 */
export const INTENT_USER_PROMPT_TEMPLATE = `Classify the intent of this document based on the preview:

DOCUMENT PREVIEW:
{{preview}}

Return the intent and confidence.`;

/**
 * JSON Schema for the classification response (OpenAI Structured Outputs)
 */
export const INTENT_CLASSIFICATION_SCHEMA = {
  name: 'intent_classification',
  strict: true,
  schema: {
    type: 'object',
    additionalProperties: false,
    required: ['intent', 'confidence', 'reasoning'],
    properties: {
      intent: {
        type: 'string',
        enum: INTENTS,
        description: 'The identified intent',
      },
      confidence: {
        type: 'number',
        description: 'Confidence score from 0 to 1',
      },
      reasoning: {
        type: 'string',
        description: 'Brief explanation for the classification',
      },
    },
  },
} as const;
