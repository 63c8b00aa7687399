/**
 * Text helpers for map listings. Pure: no browser access.
 */

import { normalizeText } from '../utils';

const MAPS_SEARCH_URL = 'https://www.google.com/maps/search/';

// Headings the results pane shows when it is a list, not a single place
export const RESULTS_HEADINGS = new Set(['結果', 'Results']);

/**
 * Search URL for `"{region} {suffix}"`
 */
export function buildSearchUrl(region: string, suffix: string): string {
  const query = `${region.trim()} ${suffix.trim()}`.trim();
  return `${MAPS_SEARCH_URL}${encodeURIComponent(query)}`;
}

/**
 * First phone-number-like run of digits and hyphens, or ''
 */
export function parsePhone(text: string | null | undefined): string {
  if (!text) return '';
  const match = text.normalize('NFKC').match(/\+?\d[\d-]*\d/);
  return match ? match[0] : '';
}

/**
 * Star rating from a label such as "4.5つ星" or "4.5 stars"
 */
export function parseRating(label: string | null | undefined): number | null {
  if (!label) return null;
  const match = label.normalize('NFKC').match(/(\d+(?:\.\d+)?)/);
  if (!match) return null;
  const rating = parseFloat(match[1]);
  return rating >= 0 && rating <= 5 ? rating : null;
}

/**
 * Review count from "1,234 件のクチコミ" or "(120)"
 */
export function parseReviewCount(label: string | null | undefined): number | null {
  if (!label) return null;
  const match = label.normalize('NFKC').match(/(\d[\d,]*)/);
  if (!match) return null;
  return parseInt(match[1].replace(/,/g, ''), 10);
}

const PREFECTURE_PREFIX = /^(?:東京都|北海道|(?:京都|大阪)府|\S{2,3}県)/;

/**
 * Ward (…区) from an address, else city (…市), else ''
 */
export function extractArea(address: string | null | undefined): string {
  if (!address) return '';

  const body = address
    .replace(/^日本、?/, '')
    .replace(/〒?\s*\d{3}-?\d{4}/, '')
    .trim()
    .replace(PREFECTURE_PREFIX, '');

  const ward = body.match(/[^\s市区町村]+区/);
  if (ward) return ward[0];

  const city = body.match(/[^\s市区町村]+市/);
  if (city) return city[0];

  return '';
}

/**
 * Tolerant comparison of the details-panel heading against the listing label.
 * The two often differ in spacing, width or trailing branch text.
 */
export function namesMatch(heading: string, label: string): boolean {
  if (!heading || !label) return false;
  if (heading === label) return true;

  const a = normalizeText(heading);
  const b = normalizeText(label);
  if (!a || !b) return false;
  if (a === b) return true;
  if (a.includes(b) || b.includes(a)) return true;

  // Same clinic, different branch suffix: long shared prefix covering most of the shorter name
  let prefix = 0;
  while (prefix < a.length && prefix < b.length && a[prefix] === b[prefix]) prefix++;
  return prefix >= 5 && prefix >= Math.min(a.length, b.length) * 0.8;
}

const SPONSORED_MARKER = /^(広告|スポンサー|ad|sponsored)$/i;

/**
 * Whether a result card's text carries the paid-placement marker as a segment of its own
 */
export function isSponsoredText(text: string | null | undefined): boolean {
  if (!text) return false;
  return text
    .split(/\n|·/)
    .map((part) => part.trim())
    .some((part) => SPONSORED_MARKER.test(part));
}

/**
 * Playwright reports a closed page, context or browser with these messages
 */
export function isBrowserClosedError(error: unknown): boolean {
  const message = error instanceof Error ? error.message : String(error);
  return (
    message.includes('browser has been closed') ||
    message.includes('Target page, context or browser has been closed') ||
    message.includes('page has been closed') ||
    message.includes('Target closed') ||
    message.includes('Browser closed')
  );
}
