import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { PAGE_DELAY_MS, SEARCH_URL } from '../config.js';
import { fetchJobDetails } from '../extract/detail.js';
import { extractListings } from '../extract/searchPage.js';
import type { JobListing } from '../types.js';
import { sleep } from '../utils/delay.js';
import type { PageFetcher } from '../utils/http.js';
import type { Logger } from '../utils/logger.js';
import { buildSearchUrl, pageUrl } from '../utils/url.js';
import { filterByContractType } from './contractFilter.js';

export interface ScrapeOptions {
  jobTitle: string;
  location?: string;
  maxPages?: number;
  contractType?: string;
  delayMs?: number;
  debugDir?: string;
}

async function saveDebugPage(debugDir: string, page: number, html: string, logger: Logger): Promise<void> {
  try {
    await mkdir(debugDir, { recursive: true });
    await writeFile(join(debugDir, `debug_page_${page}.html`), html, 'utf8');
  } catch (error) {
    await logger.warn(`Could not save debug copy of page ${page}: ${String(error)}`);
  }
}

/**
 * Walks the search result pages for one query. Stops at the first page that
 * does not answer 200. Links are deduplicated across all pages of the call.
 * A contract filter is applied while extracting; listings kept only for their
 * title are then confirmed against their detail page.
 */
export async function scrapeJobListings(
  options: ScrapeOptions,
  http: PageFetcher,
  logger: Logger,
): Promise<JobListing[]> {
  const location = options.location ?? '';
  const maxPages = Math.max(1, options.maxPages ?? 1);
  const delayMs = options.delayMs ?? PAGE_DELAY_MS;
  const searchUrl = buildSearchUrl(SEARCH_URL, options.jobTitle, location);
  const seenLinks = new Set<string>();
  let listings: JobListing[] = [];

  await logger.info(`Searching listings for: ${options.jobTitle}`);
  await logger.info(`Search URL: ${searchUrl}`);

  for (let page = 1; page <= maxPages; page += 1) {
    try {
      await logger.info(`Scraping page ${page}/${maxPages}`);
      const response = await http.get(pageUrl(searchUrl, page));
      if (!response || response.status !== 200) {
        await logger.error(`Search page ${page} failed: ${response ? response.status : 'no response'}`);
        break;
      }

      if (options.debugDir) {
        await saveDebugPage(options.debugDir, page, response.body, logger);
      }

      const result = extractListings(response.body, location, {
        seenLinks,
        contractFilter: options.contractType,
      });
      if (result.mode === 'links') {
        await logger.warn(`No job cards on page ${page}, fell back to ${result.candidateCount} job links`);
      } else {
        await logger.info(`Found ${result.candidateCount} job cards on page ${page}`);
      }
      for (const cardError of result.cardErrors) {
        await logger.error(`Listing extraction failed on page ${page}, ${cardError}`);
      }
      listings.push(...result.listings);

      if (page < maxPages && delayMs > 0) {
        await sleep(delayMs);
      }
    } catch (error) {
      await logger.error(`Scraping page ${page} failed: ${String(error)}`);
    }
  }

  await logger.info(`Total listings found: ${listings.length}`);

  if (options.contractType) {
    listings = await filterByContractType(
      listings,
      options.contractType,
      (url) => fetchJobDetails(url, http, logger),
      logger,
    );
  }

  return listings;
}
