import type { DataTable } from '../../lib/dataTable.js';
import { normalizeRecords } from '../../lib/fileParser.js';
import { DISSOLVED_OXYGEN, ECOLI, PH, TURBIDITY, WATER_TEMPERATURE } from '../../lib/agents/lexicon.js';

export interface SampleInput {
  date: string;
  site: string;
  temp?: number | null;
  oxygen?: number | null;
  ph?: number | null;
  turbidity?: number | null;
  ecoli?: number | null;
}

/**
 * Build a sample table the way a loaded file would look; year, month and
 * season are derived from the date.
 */
export function buildSamples(samples: SampleInput[]): DataTable {
  return normalizeRecords(
    samples.map(sample => ({
      sample_date: new Date(sample.date),
      site: sample.site,
      [WATER_TEMPERATURE]: sample.temp ?? null,
      [DISSOLVED_OXYGEN]: sample.oxygen ?? null,
      [PH]: sample.ph ?? null,
      [TURBIDITY]: sample.turbidity ?? null,
      [ECOLI]: sample.ecoli ?? null,
    }))
  );
}

/**
 * Five samples across two sites, winters (January) and summers (July) of 1990-1992.
 * Yearly mean temperature: 1990 = 5, 1991 = 2, 1992 = 8.
 */
export function sampleTable(): DataTable {
  return buildSamples([
    { date: '1990-01-15', site: '1', temp: 4, oxygen: 10, ph: 7.0, turbidity: 2, ecoli: 10 },
    { date: '1990-07-15', site: '2', temp: 6, oxygen: 8, ph: 7.2, turbidity: 3, ecoli: 20 },
    { date: '1991-01-15', site: '1', temp: 1, oxygen: 12, ph: 7.4, turbidity: 4, ecoli: 30 },
    { date: '1991-07-15', site: '2', temp: 3, oxygen: 11, ph: 7.6, turbidity: 5, ecoli: 40 },
    { date: '1992-07-15', site: '1', temp: 8, oxygen: 6, ph: 7.8, turbidity: 6, ecoli: 50 },
  ]);
}
