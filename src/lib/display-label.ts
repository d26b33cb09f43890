import { decodeHTML } from 'entities';
import stripTags from 'striptags';

import { SOURCE_LOCALE } from './locale.js';

/**
 * Strip HTML tags and decode entities, collapsing whitespace.
 *
 * Example: `<b>Azure</b> &amp; Co` → `Azure & Co`
 */
export const toPlainText = (value: string): string =>
  stripTags(decodeHTML(value)).replace(/\s+/g, ' ').trim();

/**
 * Pick a string out of an Odoo jsonb translation map (`{"en_US": "Chair"}`).
 */
export const pickTranslation = (
  value: Record<string, unknown>,
  locales: readonly string[]
): string | null => {
  for (const locale of [...locales, SOURCE_LOCALE]) {
    const candidate = value[locale];
    if (typeof candidate === 'string' && candidate.length > 0) {
      return candidate;
    }
  }
  const first = Object.values(value).find(
    (candidate): candidate is string => typeof candidate === 'string' && candidate.length > 0
  );
  return first ?? null;
};

/**
 * Display label for a related record: its record-name value as plain text,
 * or the raw identifier when there is nothing usable.
 */
export function displayLabel(raw: unknown, id: unknown, locales: readonly string[]): string {
  let text: string | null = null;

  if (typeof raw === 'string') {
    text = raw;
  } else if (typeof raw === 'number' || typeof raw === 'bigint') {
    text = String(raw);
  } else if (raw && typeof raw === 'object' && !Array.isArray(raw) && !(raw instanceof Date)) {
    text = pickTranslation(Object.fromEntries(Object.entries(raw)), locales);
  }

  const plain = text === null ? '' : toPlainText(text);
  return plain.length > 0 ? plain : String(id);
}
