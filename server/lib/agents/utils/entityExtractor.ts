/**
 * Entity Extractor
 * Pulls structured entities out of a normalized (lowercased, trimmed) question.
 * Matching is plain substring containment against the lexicon, first entry wins.
 */

import {
  AGGREGATION_KEYWORDS,
  type AggregationVerb,
  MONTH_NAMES,
  PARAMETER_ALIASES,
  SEASON_NAMES,
  type Season,
} from '../lexicon.js';

export interface YearRange {
  start: number;
  end: number;
}

export interface SiteId {
  value: number;
  isDecimal: boolean;
}

const YEAR_RANGE_PATTERNS: readonly RegExp[] = [
  /from\s+(\d{4})\s+to\s+(\d{4})/,
  /between\s+(\d{4})\s+and\s+(\d{4})/,
  /(\d{4})\s*[-–—]\s*(\d{4})/,
  /(\d{4})\s+to\s+(\d{4})/,
];

const SINGLE_YEAR_PATTERN = /\b(19\d{2}|20\d{2})\b/;
const SITE_PATTERN = /site\s+(\d+\.?\d*)/;

export function normalizeQuestion(question: string): string {
  return question.toLowerCase().trim();
}

export function extractParameter(text: string): string | null {
  const textLower = text.toLowerCase();
  for (const [alias, column] of PARAMETER_ALIASES) {
    if (textLower.includes(alias)) {
      return column;
    }
  }
  return null;
}

/**
 * All distinct canonical columns whose aliases occur in the text, in lexicon order
 */
export function extractParameters(text: string): string[] {
  const textLower = text.toLowerCase();
  const found: string[] = [];
  for (const [alias, column] of PARAMETER_ALIASES) {
    if (textLower.includes(alias) && !found.includes(column)) {
      found.push(column);
    }
  }
  return found;
}

export function extractMonth(text: string): number | null {
  const textLower = text.toLowerCase();
  for (const [name, month] of MONTH_NAMES) {
    if (textLower.includes(name)) {
      return month;
    }
  }
  return null;
}

/**
 * Exact month-name lookup ("jan" or "january"), no substring matching
 */
export function lookupMonth(word: string): number | null {
  const wordLower = word.toLowerCase();
  const entry = MONTH_NAMES.find(([name]) => name === wordLower);
  return entry ? entry[1] : null;
}

/**
 * Display name of a month: the first lexicon name for it, capitalized
 */
export function monthName(month: number): string {
  const entry = MONTH_NAMES.find(([, num]) => num === month);
  if (!entry) return String(month);
  return capitalize(entry[0]);
}

export function extractYearRange(text: string): YearRange | null {
  for (const pattern of YEAR_RANGE_PATTERNS) {
    const match = text.match(pattern);
    if (match) {
      return { start: parseInt(match[1], 10), end: parseInt(match[2], 10) };
    }
  }

  const single = text.match(SINGLE_YEAR_PATTERN);
  if (single) {
    const year = parseInt(single[1], 10);
    return { start: year, end: year };
  }

  return null;
}

export function extractSite(text: string): SiteId | null {
  const match = text.toLowerCase().match(SITE_PATTERN);
  if (!match) return null;
  const siteStr = match[1];
  const isDecimal = siteStr.includes('.');
  return {
    value: isDecimal ? parseFloat(siteStr) : parseInt(siteStr, 10),
    isDecimal,
  };
}

/**
 * Render a site id the way it was typed: decimals keep at least one fractional digit
 */
export function formatSiteId(site: SiteId): string {
  if (site.isDecimal && Number.isInteger(site.value)) {
    return site.value.toFixed(1);
  }
  return String(site.value);
}

export function extractAggregation(text: string): AggregationVerb {
  const textLower = text.toLowerCase();
  for (const [keyword, verb] of AGGREGATION_KEYWORDS) {
    if (textLower.includes(keyword)) {
      return verb;
    }
  }
  return 'mean';
}

/**
 * True when any aggregation keyword occurs in the text
 */
export function hasAggregationKeyword(text: string): boolean {
  const textLower = text.toLowerCase();
  return AGGREGATION_KEYWORDS.some(([keyword]) => textLower.includes(keyword));
}

/**
 * First keyword whose verb is min or max ("coldest", "highest", ...)
 */
export function extractExtremeDirection(text: string): 'min' | 'max' | null {
  const textLower = text.toLowerCase();
  for (const [keyword, verb] of AGGREGATION_KEYWORDS) {
    if (textLower.includes(keyword) && (verb === 'min' || verb === 'max')) {
      return verb;
    }
  }
  return null;
}

export function toSeason(name: string): Season | null {
  switch (name.toLowerCase()) {
    case 'winter':
      return 'Winter';
    case 'spring':
      return 'Spring';
    case 'summer':
      return 'Summer';
    case 'fall':
    case 'autumn':
      return 'Fall';
    default:
      return null;
  }
}

export function extractSeason(text: string): Season | null {
  const textLower = text.toLowerCase();
  for (const name of SEASON_NAMES) {
    if (textLower.includes(name)) {
      return toSeason(name);
    }
  }
  return null;
}

/**
 * Every season name present, in lexicon order ("fall" and "autumn" both map to Fall)
 */
export function extractSeasons(text: string): Season[] {
  const textLower = text.toLowerCase();
  const seasons: Season[] = [];
  for (const name of SEASON_NAMES) {
    const season = textLower.includes(name) ? toSeason(name) : null;
    if (season) seasons.push(season);
  }
  return seasons;
}

export function capitalize(word: string): string {
  if (word.length === 0) return word;
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}
