/**
 * OpenAI Intent Model
 *
 * Chat-completions client with a strict JSON schema response. Any
 * OpenAI-compatible endpoint works through baseUrl.
 */

import OpenAI from 'openai';
import { logger } from '../logger';
import { llmRequestDurationHistogram, llmRequestsCounter } from '../metrics';
import {
  INTENT_CLASSIFICATION_SCHEMA,
  INTENT_SYSTEM_PROMPT,
  INTENT_USER_PROMPT_TEMPLATE,
} from './prompts';
import type { IntentModel, IntentPrediction } from './types';

export interface OpenAIIntentModelOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  timeoutMs?: number;
}

function toPrediction(value: unknown): IntentPrediction {
  if (typeof value !== 'object' || value === null) {
    throw new Error('Classification response is not an object');
  }
  const intent: unknown = 'intent' in value ? value.intent : undefined;
  const confidence: unknown = 'confidence' in value ? value.confidence : undefined;
  const reasoning: unknown = 'reasoning' in value ? value.reasoning : undefined;

  if (typeof intent !== 'string' || typeof confidence !== 'number') {
    throw new Error('Classification response is missing intent or confidence');
  }
  return {
    intent,
    confidence,
    reasoning: typeof reasoning === 'string' ? reasoning : undefined,
  };
}

export class OpenAIIntentModel implements IntentModel {
  readonly name: string;
  private readonly client: OpenAI;

  constructor(options: OpenAIIntentModelOptions) {
    this.name = options.model;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl || undefined,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async predictIntent(preview: string, options: { signal: AbortSignal }): Promise<IntentPrediction> {
    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.name,
          temperature: 0,
          messages: [
            { role: 'system', content: INTENT_SYSTEM_PROMPT },
            { role: 'user', content: INTENT_USER_PROMPT_TEMPLATE.replace('{{preview}}', preview) },
          ],
          response_format: {
            type: 'json_schema',
            json_schema: INTENT_CLASSIFICATION_SCHEMA,
          },
        },
        { signal: options.signal }
      );

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new Error('Empty classification response');
      }

      const prediction = toPrediction(JSON.parse(content));
      llmRequestsCounter.inc({ model: this.name, status: 'success' });

      logger.debug('Intent model response', {
        model: this.name,
        intent: prediction.intent,
        confidence: prediction.confidence,
      });

      return prediction;
    } catch (error) {
      llmRequestsCounter.inc({ model: this.name, status: 'error' });
      throw error;
    } finally {
      llmRequestDurationHistogram.observe({ model: this.name }, (Date.now() - startTime) / 1000);
    }
  }
}
