import { join } from 'node:path';
import { DEFAULT_PATHS, TO_BE_DETERMINED, UNSPECIFIED } from '../config.js';
import { generateAndSaveAllCoverLetters } from '../letters/save.js';
import type { LetterInputPaths } from '../letters/inputs.js';
import { scrapeJobListings } from '../scraper/search.js';
import { appendListingsToSheet } from '../sheets/append.js';
import { listSavedSessions, loadScrapingState, saveScrapingState } from '../storage/session.js';
import type { JobListing, SearchParams } from '../types.js';
import { defaultCsvFileName, writeListingsCsv } from '../utils/csv.js';
import { dateStamp } from '../utils/dates.js';
import { HttpClient } from '../utils/http.js';
import type { PageFetcher } from '../utils/http.js';
import type { Logger } from '../utils/logger.js';
import { RunLogger } from '../utils/logger.js';
import { loadProxies } from '../utils/proxies.js';

export interface RunOptions {
  search?: SearchParams;
  resumeFrom?: string;
  proxiesFile?: string;
  generateLetters: boolean;
  letterInputs: LetterInputPaths;
  lettersDir: string;
  savesDir: string;
  csv?: { filePath?: string };
  sheet?: {
    tabName: string;
    spreadsheetId?: string;
    serviceAccountJson?: string;
    credentialsPath?: string;
  };
  debugDir?: string;
  delayMs?: number;
}

export interface RunSummary {
  listings: JobListing[];
  searchParams: SearchParams | null;
  statePath: string | null;
  letterPaths: Map<number, string>;
  csvPath: string | null;
  sheetAppended: boolean | null;
}

export interface RunDependencies {
  logger: Logger;
  http?: PageFetcher;
}

function describeListing(listing: JobListing, position: number): string {
  let contract = '';
  if (listing.is_alternance) {
    contract = ' [Alternance]';
  } else if (listing.contract_type !== UNSPECIFIED && listing.contract_type !== TO_BE_DETERMINED) {
    contract = ` [${listing.contract_type}]`;
  }
  return `${position}. ${listing.title} - ${listing.company} - ${listing.location}${contract} ${listing.link}`;
}

async function resolveResumePath(resumeFrom: string, savesDir: string): Promise<string | null> {
  if (resumeFrom !== 'latest') {
    return resumeFrom;
  }
  const saves = await listSavedSessions(savesDir);
  return saves[saves.length - 1]?.filePath ?? null;
}

async function collectListings(
  options: RunOptions,
  http: PageFetcher,
  logger: Logger,
): Promise<{ listings: JobListing[]; searchParams: SearchParams | null; statePath: string | null }> {
  if (options.resumeFrom) {
    const filePath = await resolveResumePath(options.resumeFrom, options.savesDir);
    if (!filePath) {
      await logger.warn(`No saved session found in ${options.savesDir}`);
      return { listings: [], searchParams: null, statePath: null };
    }
    const state = await loadScrapingState(filePath, logger);
    return {
      listings: state?.job_listings ?? [],
      searchParams: state?.search_params ?? null,
      statePath: state ? filePath : null,
    };
  }

  if (!options.search) {
    return { listings: [], searchParams: null, statePath: null };
  }

  const listings = await scrapeJobListings(
    {
      jobTitle: options.search.job_title,
      location: options.search.location,
      maxPages: options.search.max_pages,
      contractType: options.search.contract_type,
      delayMs: options.delayMs,
      debugDir: options.debugDir,
    },
    http,
    logger,
  );
  const statePath =
    listings.length > 0 ? await saveScrapingState(listings, options.search, options.savesDir, logger) : null;
  return { listings, searchParams: options.search, statePath };
}

/**
 * One full session: scrape (or resume a saved one), then the optional letter,
 * spreadsheet and CSV outputs. Each output step fails on its own.
 */
export async function runScrapeSession(options: RunOptions, deps: RunDependencies): Promise<RunSummary> {
  const { logger } = deps;
  let ownedClient: HttpClient | null = null;
  let http = deps.http;
  if (!http) {
    const proxies = options.proxiesFile ? await loadProxies(options.proxiesFile, logger) : [];
    ownedClient = new HttpClient({ proxies, logger });
    http = ownedClient;
  }

  try {
    const { listings, searchParams, statePath } = await collectListings(options, http, logger);
    const summary: RunSummary = {
      listings,
      searchParams,
      statePath,
      letterPaths: new Map(),
      csvPath: null,
      sheetAppended: null,
    };

    if (listings.length === 0) {
      await logger.warn('No listings match the search');
      return summary;
    }

    for (const [index, listing] of listings.entries()) {
      await logger.info(describeListing(listing, index + 1));
    }

    if (options.generateLetters) {
      summary.letterPaths = await generateAndSaveAllCoverLetters(
        listings,
        { ...options.letterInputs, lettersDir: options.lettersDir },
        http,
        logger,
      );
    }

    if (options.sheet) {
      summary.sheetAppended = await appendListingsToSheet(
        {
          ...options.sheet,
          listings,
          letterPaths: summary.letterPaths,
        },
        logger,
      );
    }

    if (options.csv) {
      const csvPath = options.csv.filePath ?? defaultCsvFileName(listings);
      try {
        await writeListingsCsv(csvPath, listings, summary.letterPaths);
        await logger.info(`Listings written to ${csvPath}`);
        summary.csvPath = csvPath;
      } catch (error) {
        await logger.error(`CSV export failed: ${String(error)}`);
      }
    }

    return summary;
  } finally {
    await ownedClient?.close();
  }
}

export function defaultLogPath(date = new Date()): string {
  return join(DEFAULT_PATHS.logs, `scrape_run_${dateStamp(date)}.log`);
}

export async function withRunLogger<T>(filePath: string, task: (logger: RunLogger) => Promise<T>): Promise<T> {
  const logger = new RunLogger(filePath);
  await logger.init();
  try {
    return await task(logger);
  } finally {
    await logger.close();
  }
}
