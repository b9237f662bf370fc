/**
 * Text Signals
 *
 * Urgency, sentiment, key points, action items and money mentions read from
 * message text with fixed lexicons.
 */

import { compileCues, countCueMatches, hasCue } from '../../text/cues';
import type { Sentiment, UrgencyLevel } from '../../types';

/** Checked in order; the first level with a matching cue wins. */
const URGENCY_CUES: ReadonlyArray<readonly [UrgencyLevel, RegExp[]]> = [
  ['high', compileCues(['urgent', 'asap', 'immediately', 'emergency', 'critical', 'deadline'])],
  ['medium', compileCues(['soon', 'priority', 'important', 'needed', 'required'])],
  ['low', compileCues(['when possible', 'no rush', 'fyi', 'update'])],
];

const NEGATIVE_CUES = compileCues([
  'disappointed', 'unacceptable', 'frustrated', 'angry', 'terrible', 'poor',
  'defective', 'damaged', 'broken', 'problem', 'issue', 'complaint', 'delay', 'refund',
]);

const POSITIVE_CUES = compileCues([
  'thank', 'appreciate', 'great', 'excellent', 'pleased', 'happy', 'satisfied', 'glad',
]);

const REQUEST_CUES = compileCues(['please', 'need', 'must', 'require', 'required', 'expect', 'shall', 'should']);

const LIST_ITEM = /^\s*(?:[-*•]|\d+[.)]|[a-z][.)])\s+(.+)$/;
const MONEY_MENTION = /\$\s?\d{1,3}(?:,\d{3})+(?:\.\d+)?|\$\s?\d+(?:\.\d+)?/g;

const MAX_KEY_POINTS = 5;
const MAX_ACTION_ITEMS = 10;
const SUMMARY_SENTENCES = 3;
const MIN_KEY_POINT_WORDS = 4;

export function assessUrgency(text: string): UrgencyLevel {
  for (const [level, patterns] of URGENCY_CUES) {
    if (hasCue(text, patterns)) return level;
  }
  return 'medium';
}

export function assessSentiment(text: string): Sentiment {
  const negative = countCueMatches(text, NEGATIVE_CUES);
  const positive = countCueMatches(text, POSITIVE_CUES);
  if (negative > positive) return 'negative';
  if (positive > negative) return 'positive';
  return 'neutral';
}

export function extractListItems(body: string): string[] {
  const items: string[] = [];
  for (const line of body.split('\n')) {
    const match = LIST_ITEM.exec(line);
    if (match) items.push(match[1].trim());
  }
  return items;
}

/**
 * Sentences of the body outside list items. Lines of a paragraph are joined first.
 */
export function extractSentences(body: string): string[] {
  const sentences: string[] = [];
  for (const paragraph of body.split(/\n\s*\n/)) {
    const prose = paragraph
      .split('\n')
      .filter((line) => !LIST_ITEM.test(line))
      .join(' ')
      .replace(/\s+/g, ' ')
      .trim();
    if (!prose) continue;
    for (const sentence of prose.split(/(?<=[.!?])\s+/)) {
      if (sentence.trim()) sentences.push(sentence.trim());
    }
  }
  return sentences;
}

/**
 * List items when the body has any, else its first substantial sentences.
 */
export function extractKeyPoints(body: string): string[] {
  const listed = extractListItems(body);
  if (listed.length > 0) return listed.slice(0, MAX_KEY_POINTS);
  return extractSentences(body)
    .filter((sentence) => sentence.split(' ').length >= MIN_KEY_POINT_WORDS)
    .slice(0, SUMMARY_SENTENCES);
}

export function extractActionItems(body: string): string[] {
  const candidates = [...extractListItems(body), ...extractSentences(body)];
  const actions: string[] = [];
  for (const candidate of candidates) {
    if (hasCue(candidate, REQUEST_CUES) && !actions.includes(candidate)) {
      actions.push(candidate);
    }
  }
  return actions.slice(0, MAX_ACTION_ITEMS);
}

export function extractMoneyMentions(text: string): string[] {
  const mentions = text.match(MONEY_MENTION) ?? [];
  return Array.from(new Set(mentions.map((mention) => mention.replace(/\s+/g, ''))));
}
