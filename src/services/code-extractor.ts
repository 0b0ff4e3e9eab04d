import { MailMessage } from '../types/email';

// Panel codes are usually 5 digits; 4-8 is the fallback range
const PREFERRED_CODE = /\b(\d{5,6})\b/;
const FALLBACK_CODE = /\b(\d{4,8})\b/;

export function extractCode(text: string): string | null {
  if (!text) return null;

  const preferred = PREFERRED_CODE.exec(text);
  if (preferred) return preferred[1];

  const fallback = FALLBACK_CODE.exec(text);
  return fallback ? fallback[1] : null;
}

/**
 * Subject, sender and body joined into the single surface the extractor scans.
 */
export function buildSearchSurface(message: Pick<MailMessage, 'subject' | 'from' | 'text'>): string {
  return `SUBJECT:\n${message.subject}\n\nFROM:\n${message.from}\n\nBODY:\n${message.text}`;
}
