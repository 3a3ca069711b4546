/**
 * Text cleanup for STIX free-text fields.
 *
 * ATT&CK descriptions carry HTML entities, inline markup such as `<code>`
 * and hard line breaks. Layer comments and console output want a single
 * plain line.
 */

import * as cheerio from 'cheerio';

/**
 * Decode entities, drop inline markup and collapse all whitespace runs
 * (including CR/LF) to single spaces.
 */
export function cleanText(text: string | undefined | null): string {
  if (!text) return '';

  const decoded = text.includes('&') || text.includes('<')
    ? cheerio.load(text, null, false).text()
    : text;

  return decoded.replace(/\s+/g, ' ').trim();
}

/**
 * Cut `text` to `maxLength` characters, appending "..." when anything was cut.
 */
export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

/**
 * Upper-case the first letter of each hyphen- or space-separated word.
 *
 * @example titleCase('command-and-control') => 'Command And Control'
 */
export function titleCase(value: string): string {
  return value
    .split(/[-\s]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}
