import { promises as fs } from 'fs';
import { Parser } from 'json2csv';
import { Lead, LeadSink } from '../core/types';
import { log } from '../utils/logger';

export const DEFAULT_OUTPUT_FILE = 'google_maps_leads.csv';

export const CSV_FIELDS = ['Restaurant Name', 'Address', 'Approximate Rating', 'Number of Ratings', 'Source URL'] as const;

export type CsvField = (typeof CSV_FIELDS)[number];

export type LeadRow = Record<CsvField, string | number>;

const orNA = (value: string | number | null | undefined): string | number =>
  value === null || value === undefined || value === '' || value === 'unknown' ? 'N/A' : value;

export const toRow = (lead: Lead): LeadRow => ({
  'Restaurant Name': orNA(lead.name),
  Address: orNA(lead.address),
  'Approximate Rating': orNA(lead.rating),
  'Number of Ratings': orNA(lead.ratingCount),
  'Source URL': orNA(lead.sourceUrl),
});

export const leadsToCsv = (leads: Lead[]): string => {
  const parser = new Parser<LeadRow>({ fields: [...CSV_FIELDS], eol: '\n' });
  return parser.parse(leads.map(toRow));
};

export class CsvLeadSink implements LeadSink {
  constructor(readonly filename = DEFAULT_OUTPUT_FILE) {}

  async save(leads: Lead[]): Promise<void> {
    if (leads.length === 0) {
      log('INFO', 'No leads to save.');
      return;
    }
    await fs.writeFile(this.filename, `${leadsToCsv(leads)}\n`, 'utf8');
    log('INFO', `Successfully saved ${leads.length} leads to ${this.filename}`);
  }
}
