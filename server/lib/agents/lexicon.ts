/**
 * Query Lexicon
 * Fixed vocabulary the extractors scan. Every table is an ordered list of pairs:
 * the first entry contained in the question wins, so longer or more specific
 * phrases are declared before the shorter phrases they contain.
 */

export type AggregationVerb = 'mean' | 'max' | 'min' | 'sum' | 'count';
export type Season = 'Winter' | 'Spring' | 'Summer' | 'Fall';

export type AliasEntry = readonly [alias: string, column: string];
export type MonthEntry = readonly [name: string, month: number];
export type KeywordEntry = readonly [keyword: string, verb: AggregationVerb];

export const WATER_TEMPERATURE = 'water_temp.C';
export const AIR_TEMPERATURE = 'air_temp.C';
export const DISSOLVED_OXYGEN = 'dissolved_oxygen.mg_per_L';
export const ECOLI = 'ecoli.CFU_per_100mL';
export const ENTEROCOCCUS = 'entero.CFU_per_100mL';
export const TOTAL_COLIFORMS = 'total_coliforms.CFU_per_100mL';
export const FECAL_COLIFORM = 'fecal_coliform.MFT_per_100mL';
export const PH = 'ph';
export const TURBIDITY = 'turbidity.ntu';
export const CONDUCTIVITY = 'compensated_conductivity.uS_per_cm';
export const CHLOROPHYLL = 'chlorophyll_a.RFU_tot';
export const RAINFALL = 'rain7.in';

export const PARAMETER_ALIASES: readonly AliasEntry[] = Object.freeze([
  // Temperature
  ['air temperature', AIR_TEMPERATURE],
  ['air temp', AIR_TEMPERATURE],
  ['water temperature', WATER_TEMPERATURE],
  ['water temp', WATER_TEMPERATURE],
  ['temperature', WATER_TEMPERATURE],
  ['temp', WATER_TEMPERATURE],

  // Dissolved oxygen
  ['dissolved oxygen', DISSOLVED_OXYGEN],
  ['oxygen', DISSOLVED_OXYGEN],
  ['do', DISSOLVED_OXYGEN],

  // Bacteria
  ['fecal coliform', FECAL_COLIFORM],
  ['total coliform', TOTAL_COLIFORMS],
  ['coliform', TOTAL_COLIFORMS],
  ['e. coli', ECOLI],
  ['e coli', ECOLI],
  ['ecoli', ECOLI],
  ['enterococcus', ENTEROCOCCUS],
  ['entero', ENTEROCOCCUS],
  ['bacteria', ECOLI],

  // Other parameters ("chlorophyll" contains "ph")
  ['chlorophyll', CHLOROPHYLL],
  ['ph', PH],
  ['turbidity', TURBIDITY],
  ['conductivity', CONDUCTIVITY],
  ['rainfall', RAINFALL],
  ['rain', RAINFALL],
] as const);

export const MONTH_NAMES: readonly MonthEntry[] = Object.freeze([
  ['january', 1], ['jan', 1],
  ['february', 2], ['feb', 2],
  ['march', 3], ['mar', 3],
  ['april', 4], ['apr', 4],
  ['may', 5],
  ['june', 6], ['jun', 6],
  ['july', 7], ['jul', 7],
  ['august', 8], ['aug', 8],
  ['september', 9], ['sep', 9], ['sept', 9],
  ['october', 10], ['oct', 10],
  ['november', 11], ['nov', 11],
  ['december', 12], ['dec', 12],
] as const);

export const SEASON_NAMES: readonly string[] = Object.freeze(['winter', 'spring', 'summer', 'fall', 'autumn']);

export const AGGREGATION_KEYWORDS: readonly KeywordEntry[] = Object.freeze([
  ['average', 'mean'],
  ['avg', 'mean'],
  ['mean', 'mean'],
  ['maximum', 'max'],
  ['max', 'max'],
  ['highest', 'max'],
  ['minimum', 'min'],
  ['min', 'min'],
  ['lowest', 'min'],
  ['coldest', 'min'],
  ['warmest', 'max'],
  ['hottest', 'max'],
  ['total', 'sum'],
  ['sum', 'sum'],
  ['count', 'count'],
] as const);

/**
 * Columns shown when a question names no pair to correlate
 */
export const DEFAULT_CORRELATION_PAIR: readonly [string, string] = [WATER_TEMPERATURE, DISSOLVED_OXYGEN];

/**
 * Parameters summarized when a summary question names none
 */
export const KEY_PARAMETERS: readonly string[] = Object.freeze([
  WATER_TEMPERATURE,
  DISSOLVED_OXYGEN,
  PH,
  TURBIDITY,
  ECOLI,
]);
