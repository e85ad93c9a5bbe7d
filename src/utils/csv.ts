import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { JobListing } from '../types.js';
import { compactDateStamp } from './dates.js';

export const LISTINGS_CSV_HEADER = [
  'title',
  'company',
  'location',
  'description',
  'link',
  'contract_type',
  'is_alternance',
  'cover_letter_path',
] as const;

const UTF8_BOM = '\uFEFF';

function escapeCell(value: string): string {
  const needsQuote = /[",\n\r]/.test(value);
  const escaped = value.replace(/"/g, '""');
  return needsQuote ? `"${escaped}"` : escaped;
}

function toRow(listing: JobListing, letterPath: string): string {
  return [
    listing.title,
    listing.company,
    listing.location,
    listing.description,
    listing.link,
    listing.contract_type,
    String(listing.is_alternance),
    letterPath,
  ]
    .map((cell) => escapeCell(cell))
    .join(',');
}

export function renderListingsCsv(listings: JobListing[], letterPaths: Map<number, string> = new Map()): string {
  const lines = [
    LISTINGS_CSV_HEADER.join(','),
    ...listings.map((listing, index) => toRow(listing, letterPaths.get(index) ?? '')),
  ];
  return `${UTF8_BOM}${lines.join('\n')}\n`;
}

export function defaultCsvFileName(listings: JobListing[], date = new Date()): string {
  const title = (listings[0]?.title ?? 'hellowork').replace(/ /g, '_');
  return `offres_${title}_${compactDateStamp(date)}.csv`;
}

export async function writeListingsCsv(
  filePath: string,
  listings: JobListing[],
  letterPaths: Map<number, string> = new Map(),
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, renderListingsCsv(listings, letterPaths), 'utf8');
}
