/**
 * Address Normalizer
 *
 * Canonicalizes free-text place names (cities, states/provinces, countries)
 * before they are compared against reverse-geocoded addresses.
 *
 * PHILOSOPHY:
 * - Deterministic normalization (same input → same output)
 * - Idempotent: normalizeName(normalizeName(x)) === normalizeName(x)
 * - Country context only affects abbreviation expansion
 */

import { expandRegionAbbreviation } from './regions.js';

// =============================================================================
// Normalization Tables (Immutable)
// =============================================================================

/**
 * Characters removed outright ("St. Louis" -> "st louis")
 */
const STRIPPED_PUNCTUATION = /[.,]/g;

/**
 * Filler prefixes that precede the real name ("City of Boston")
 */
const FILLER_TOKENS = /\b(?:city|town) of /g;

/**
 * Country long forms -> comparison codes. Longest form first so
 * "united states of america" is not left as "us of america".
 */
const COUNTRY_CODES: ReadonlyArray<readonly [RegExp, string]> = [
  [/\bunited states of america\b/g, 'us'],
  [/\bunited states\b/g, 'us'],
  [/\busa\b/g, 'us'],
  [/\bcanada\b/g, 'ca'],
];

// =============================================================================
// Public API
// =============================================================================

/**
 * Normalize a place name for comparison
 *
 * @param rawName - City, state/province or country as written in the dataset or geocoder response
 * @param countryCode - Claimed country; enables state/province abbreviation expansion
 *
 * @example
 * ```typescript
 * normalizeName('  City of St. Louis ');   // 'st louis'
 * normalizeName('IL', 'US');               // 'illinois'
 * normalizeName('United States');          // 'us'
 * ```
 */
export function normalizeName(rawName: string | null | undefined, countryCode?: string): string {
  if (typeof rawName !== 'string' || rawName.trim().length === 0) {
    return '';
  }

  let name = rawName.trim();

  if (countryCode) {
    const expanded = expandRegionAbbreviation(name, countryCode);
    if (expanded !== undefined) {
      name = expanded;
    }
  }

  // Fillers are matched with single spaces, so collapse first
  name = collapseWhitespace(name.toLowerCase().replace(STRIPPED_PUNCTUATION, ''));
  name = collapseWhitespace(stripFillers(name));

  for (const [pattern, code] of COUNTRY_CODES) {
    name = name.replace(pattern, code);
  }

  return name;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Remove filler tokens until none remain
 *
 * A single pass can expose a new token ("city city of of x" -> "city of x").
 */
function stripFillers(name: string): string {
  let previous: string;
  let current = name;
  do {
    previous = current;
    current = current.replace(FILLER_TOKENS, '');
  } while (current !== previous);
  return current;
}

function collapseWhitespace(name: string): string {
  return name.replace(/\s+/g, ' ').trim();
}
