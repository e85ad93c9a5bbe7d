import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { JobListing, SearchParams, SessionState } from '../types.js';
import { fileTimestamp } from '../utils/dates.js';
import type { Logger } from '../utils/logger.js';

const SAVE_PREFIX = 'scraping_state_';

const jobListingSchema = z.object({
  title: z.string(),
  company: z.string(),
  location: z.string(),
  description: z.string(),
  link: z.string(),
  contract_type: z.string(),
  is_alternance: z.boolean(),
  job_details_text: z.string().optional(),
});

const searchParamsSchema = z.object({
  job_title: z.string(),
  location: z.string().default(''),
  contract_type: z.string().default(''),
  max_pages: z.number().int().positive().default(1),
  use_proxies: z.boolean().default(false),
});

export const sessionStateSchema = z.object({
  job_listings: z.array(jobListingSchema),
  search_params: searchParamsSchema,
  timestamp: z.string(),
});

export interface SavedSessionSummary {
  filePath: string;
  timestamp: string;
  jobTitle: string;
  location: string;
  listingCount: number;
}

export async function saveScrapingState(
  listings: JobListing[],
  searchParams: SearchParams,
  savesDir: string,
  logger: Logger,
  date = new Date(),
): Promise<string | null> {
  const timestamp = fileTimestamp(date);
  const filePath = join(savesDir, `${SAVE_PREFIX}${timestamp}.json`);
  const state: SessionState = {
    job_listings: listings,
    search_params: searchParams,
    timestamp,
  };

  try {
    await mkdir(savesDir, { recursive: true });
    await writeFile(filePath, `${JSON.stringify(state, null, 2)}\n`, 'utf8');
    await logger.info(`Scraping state saved to ${filePath}`);
    return filePath;
  } catch (error) {
    await logger.error(`Could not save scraping state: ${String(error)}`);
    return null;
  }
}

export async function loadScrapingState(filePath: string, logger: Logger): Promise<SessionState | null> {
  try {
    const content = await readFile(filePath, 'utf8');
    const state = sessionStateSchema.parse(JSON.parse(content));
    await logger.info(`Loaded ${state.job_listings.length} listings from ${filePath}`);
    return state;
  } catch (error) {
    await logger.error(`Could not load scraping state from ${filePath}: ${String(error)}`);
    return null;
  }
}

/** Saved sessions, oldest first. Unreadable files are listed with zero listings. */
export async function listSavedSessions(savesDir: string): Promise<SavedSessionSummary[]> {
  let entries: string[];
  try {
    entries = await readdir(savesDir);
  } catch {
    return [];
  }

  const files = entries.filter((name) => name.startsWith(SAVE_PREFIX) && name.endsWith('.json')).sort();
  const summaries: SavedSessionSummary[] = [];
  for (const name of files) {
    const filePath = join(savesDir, name);
    const timestamp = name.slice(SAVE_PREFIX.length, -'.json'.length);
    try {
      const state = sessionStateSchema.parse(JSON.parse(await readFile(filePath, 'utf8')));
      summaries.push({
        filePath,
        timestamp,
        jobTitle: state.search_params.job_title,
        location: state.search_params.location,
        listingCount: state.job_listings.length,
      });
    } catch {
      summaries.push({ filePath, timestamp, jobTitle: '', location: '', listingCount: 0 });
    }
  }
  return summaries;
}
