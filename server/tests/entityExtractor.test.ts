import { describe, it, expect } from 'vitest';
import {
  extractAggregation,
  extractExtremeDirection,
  extractMonth,
  extractParameter,
  extractParameters,
  extractSeason,
  extractSeasons,
  extractSite,
  extractYearRange,
  formatSiteId,
  hasAggregationKeyword,
  lookupMonth,
  monthName,
  normalizeQuestion,
} from '../lib/agents/utils/entityExtractor.js';
import {
  AIR_TEMPERATURE,
  DISSOLVED_OXYGEN,
  ECOLI,
  MONTH_NAMES,
  PARAMETER_ALIASES,
  PH,
  WATER_TEMPERATURE,
} from '../lib/agents/lexicon.js';

describe('extractParameter', () => {
  it('resolves every alias on its own to its own column', () => {
    for (const [alias, column] of PARAMETER_ALIASES) {
      expect(extractParameter(alias), alias).toBe(column);
    }
  });

  it('prefers the longer phrase over a shorter one it contains', () => {
    expect(extractParameter('coldest january water temperature')).toBe(WATER_TEMPERATURE);
    expect(extractParameter('average air temperature')).toBe(AIR_TEMPERATURE);
    expect(extractParameter('chlorophyll by year')).toBe('chlorophyll_a.RFU_tot');
  });

  it('matches case-insensitively', () => {
    expect(extractParameter('Highest E. Coli reading')).toBe(ECOLI);
  });

  it('returns null when no alias is present', () => {
    expect(extractParameter('how many samples')).toBeNull();
  });

  it('lists every distinct parameter in lexicon order', () => {
    expect(extractParameters('relationship between ph and temperature')).toEqual([WATER_TEMPERATURE, PH]);
    expect(extractParameters('oxygen and dissolved oxygen')).toEqual([DISSOLVED_OXYGEN]);
  });
});

describe('months', () => {
  it('maps every month name and abbreviation to its number', () => {
    for (const [name, month] of MONTH_NAMES) {
      expect(extractMonth(`samples in ${name}`), name).toBe(month);
    }
  });

  it('returns null when no month is named', () => {
    expect(extractMonth('how long is the record')).toBeNull();
  });

  it('looks up whole words only', () => {
    expect(lookupMonth('November')).toBe(11);
    expect(lookupMonth('sept')).toBe(9);
    expect(lookupMonth('compare')).toBeNull();
  });

  it('names months by their full name', () => {
    expect(monthName(1)).toBe('January');
    expect(monthName(5)).toBe('May');
    expect(monthName(9)).toBe('September');
  });
});

describe('extractYearRange', () => {
  it('reads "from A to B"', () => {
    expect(extractYearRange('from 1981 to 1995')).toEqual({ start: 1981, end: 1995 });
  });

  it('reads "between A and B"', () => {
    expect(extractYearRange('between 2000 and 2005')).toEqual({ start: 2000, end: 2005 });
  });

  it('reads dashed ranges with hyphen, en dash or em dash', () => {
    expect(extractYearRange('data 1990-1992')).toEqual({ start: 1990, end: 1992 });
    expect(extractYearRange('data 1990 – 1992')).toEqual({ start: 1990, end: 1992 });
    expect(extractYearRange('data 1990—1992')).toEqual({ start: 1990, end: 1992 });
  });

  it('reads "A to B" without "from"', () => {
    expect(extractYearRange('coldest temperature 1990 to 1992')).toEqual({ start: 1990, end: 1992 });
  });

  it('treats a single year as a one-year range', () => {
    expect(extractYearRange('data in 2020')).toEqual({ start: 2020, end: 2020 });
  });

  it('ignores four-digit numbers outside 1900-2099', () => {
    expect(extractYearRange('code 1234')).toBeNull();
    expect(extractYearRange('no years here')).toBeNull();
  });
});

describe('extractSite', () => {
  it('reads integer and decimal site ids', () => {
    expect(extractSite('show data for site 2')).toEqual({ value: 2, isDecimal: false });
    expect(extractSite('site 3.5 readings')).toEqual({ value: 3.5, isDecimal: true });
  });

  it('needs a number after "site"', () => {
    expect(extractSite('list all sites')).toBeNull();
  });

  it('formats decimal ids with a fractional digit', () => {
    expect(formatSiteId({ value: 2, isDecimal: true })).toBe('2.0');
    expect(formatSiteId({ value: 2, isDecimal: false })).toBe('2');
    expect(formatSiteId({ value: 3.5, isDecimal: true })).toBe('3.5');
  });
});

describe('aggregation keywords', () => {
  it('takes the first keyword in lexicon order', () => {
    expect(extractAggregation('highest average temperature')).toBe('mean');
    expect(extractAggregation('total rainfall')).toBe('sum');
  });

  it('defaults to mean', () => {
    expect(extractAggregation('temperature by year')).toBe('mean');
    expect(hasAggregationKeyword('temperature by year')).toBe(false);
  });

  it('finds the extreme direction past non-extreme keywords', () => {
    expect(extractExtremeDirection('highest average temperature')).toBe('max');
    expect(extractExtremeDirection('coldest january')).toBe('min');
    expect(extractExtremeDirection('average temperature')).toBeNull();
  });
});

describe('seasons', () => {
  it('maps autumn to Fall', () => {
    expect(extractSeason('autumn oxygen')).toBe('Fall');
  });

  it('lists seasons in lexicon order', () => {
    expect(extractSeasons('compare summer vs winter')).toEqual(['Winter', 'Summer']);
  });
});

describe('normalizeQuestion', () => {
  it('lowercases and trims', () => {
    expect(normalizeQuestion('  Show Data For Site 2 ')).toBe('show data for site 2');
  });
});
