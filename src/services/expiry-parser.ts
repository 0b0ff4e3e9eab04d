import { IsoDate } from '../types/renewal';

const JAPANESE_DATE = /(\d{4})年(\d{1,2})月(\d{1,2})日/;

/**
 * Finds the "利用期限" (expiry) row of the server detail table and returns its
 * date as YYYY-MM-DD. The "利用開始" (start) row is ignored.
 */
export function parseExpiryDate(visibleText: string): IsoDate | null {
  for (const line of visibleText.split(/\r?\n/)) {
    if (!line.includes('利用期限') || line.includes('利用開始')) continue;

    const match = JAPANESE_DATE.exec(line);
    if (match) {
      return `${match[1]}-${match[2].padStart(2, '0')}-${match[3].padStart(2, '0')}`;
    }
  }
  return null;
}

export function summarizeText(text: string, maxLength: number = 350): string {
  return text.replace(/\s+/g, ' ').trim().slice(0, maxLength);
}
