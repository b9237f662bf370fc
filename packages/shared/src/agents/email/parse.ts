/**
 * Message Parsing
 *
 * Splits a leading header block (From, To, Subject, Date...) from the body.
 * Text without recognised headers is all body.
 */

const HEADER_LINE = /^[ \t]*([A-Za-z][A-Za-z-]*):[ \t]*(.*)$/;
const KNOWN_HEADERS = ['from', 'to', 'cc', 'subject', 'date', 'reply-to'];

const FREE_MAIL_DOMAINS = ['gmail', 'googlemail', 'yahoo', 'outlook', 'hotmail', 'live', 'aol', 'icloud', 'proton', 'protonmail'];

export interface ParsedMessage {
  headers: Record<string, string>;
  body: string;
}

export interface MailAddress {
  name: string | null;
  email: string | null;
}

export function parseMessage(text: string): ParsedMessage {
  const lines = text.replace(/\r\n?/g, '\n').split('\n');
  const headers: Record<string, string> = {};

  let index = 0;
  while (index < lines.length && lines[index].trim() === '') index++;
  const bodyIfNoHeaders = lines.slice(index).join('\n').trim();

  for (; index < lines.length; index++) {
    const line = lines[index];
    if (line.trim() === '') {
      index++;
      break;
    }
    const match = HEADER_LINE.exec(line);
    if (!match) break;

    const name = match[1].toLowerCase();
    if (KNOWN_HEADERS.includes(name) && !(name in headers)) {
      headers[name] = match[2].trim();
    }
  }

  if (Object.keys(headers).length === 0) {
    return { headers, body: bodyIfNoHeaders };
  }
  return { headers, body: lines.slice(index).join('\n').trim() };
}

/**
 * Parse "Name <user@host>", "user@host" or a bare name.
 */
export function parseAddress(value: string): MailAddress {
  const angled = /^\s*"?([^"<]*?)"?\s*<([^>]+)>\s*$/.exec(value);
  if (angled) {
    return { name: angled[1].trim() || null, email: angled[2].trim().toLowerCase() };
  }
  const bare = value.trim();
  if (/^[^\s@]+@[^\s@]+$/.test(bare)) {
    return { name: null, email: bare.toLowerCase() };
  }
  return { name: bare || null, email: null };
}

/**
 * Organisation name guessed from the mail domain: "dana@mail.northwind.com" -> "Northwind".
 */
export function companyFromEmail(email: string | null): string | null {
  const domain = email?.split('@')[1];
  if (!domain) return null;
  const labels = domain.split('.').filter(Boolean);
  if (labels.length < 2) return null;
  const label = labels[labels.length - 2];
  if (FREE_MAIL_DOMAINS.includes(label)) return null;
  return label.charAt(0).toUpperCase() + label.slice(1);
}
