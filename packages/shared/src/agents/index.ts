/**
 * Agents
 */

import type { DocumentTextReader } from '../text/reader';
import { EmailAgent } from './email';
import { JsonAgent } from './json';
import { PdfAgent } from './pdf';
import type { Agent } from './types';

/**
 * The standard agent set. The PDF agent reuses the Email/Text agent instance.
 */
export function createAgents(reader: DocumentTextReader): Agent[] {
  const emailAgent = new EmailAgent(reader);
  return [new JsonAgent(), emailAgent, new PdfAgent(reader, emailAgent)];
}

export { BaseAgent } from './base-agent';
export { EmailAgent, sourceForFormat } from './email';
export { companyFromEmail, parseAddress, parseMessage, type MailAddress, type ParsedMessage } from './email/parse';
export {
  assessSentiment,
  assessUrgency,
  extractActionItems,
  extractKeyPoints,
  extractListItems,
  extractMoneyMentions,
} from './email/signals';
export { JsonAgent } from './json';
export { PdfAgent } from './pdf';
export {
  AgentRegistry,
  DEFAULT_AGENT,
  DEFAULT_ROUTES,
  type AgentRegistryOptions,
  type RouteKey,
} from './registry';
export type { Agent } from './types';
