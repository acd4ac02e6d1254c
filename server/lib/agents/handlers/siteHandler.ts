import { BaseHandler, type HandlerContext, type HandlerResult } from './baseHandler.js';
import { extractSite, extractYearRange, formatSiteId } from '../utils/entityExtractor.js';
import { projectColumns } from '../utils/resultFormatter.js';
import { toNumber } from '../../dataTable.js';
import { DISSOLVED_OXYGEN, ECOLI, PH, TURBIDITY, WATER_TEMPERATURE } from '../lexicon.js';

const SITE_DISPLAY_COLUMNS = ['sample_date', 'site', WATER_TEMPERATURE, DISSOLVED_OXYGEN, PH, TURBIDITY, ECOLI];
const MAX_ROWS = 20;

/**
 * Site Handler
 * Handles queries like "show data for site 2" or "data for site 4 in 2020"
 */
export class SiteHandler extends BaseHandler {
  readonly name = 'site';

  canHandle(question: string): boolean {
    return question.includes('site');
  }

  handle(context: HandlerContext): HandlerResult {
    const { question, table } = context;
    const site = extractSite(question);
    if (!site) return this.abstain();

    table.requireColumn('site');
    // Site ids are stored as text; "2" and "2.0" both name site 2
    let siteRows = table.filter(row => toNumber(row['site']) === site.value);

    const yearRange = extractYearRange(question);
    if (yearRange) {
      siteRows = siteRows.whereBetween('year', yearRange.start, yearRange.end);
    }

    const label = formatSiteId(site);
    if (siteRows.length === 0) {
      return this.noData(`No data found for site ${label}.`);
    }

    const result = projectColumns(siteRows, SITE_DISPLAY_COLUMNS).tail(MAX_ROWS);
    return this.matched(
      `Data for site ${label} (${siteRows.length} total samples, showing last ${MAX_ROWS}):`,
      result
    );
  }
}
