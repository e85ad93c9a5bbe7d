import { matchesContractLabel } from '../classify/contractMatch.js';
import { applyDetails } from '../extract/detail.js';
import type { JobListing } from '../types.js';
import type { Logger } from '../utils/logger.js';

export type DetailFetcher = (url: string) => Promise<string>;

/**
 * Second pass over listings that survived extraction. Listings whose label
 * matches are kept as they are; the others (title-only matches from bare
 * links) must name the wanted type in their detail page text, which is kept
 * on the listing.
 */
export async function filterByContractType(
  listings: JobListing[],
  contractFilter: string,
  fetchDetails: DetailFetcher,
  logger: Logger,
): Promise<JobListing[]> {
  const wanted = contractFilter.trim().toLowerCase();
  if (!wanted || listings.length === 0) {
    return listings;
  }

  await logger.info(`Checking ${listings.length} listings for contract type '${contractFilter}'`);
  const kept: JobListing[] = [];

  for (const listing of listings) {
    if (matchesContractLabel(listing, wanted)) {
      kept.push(listing);
      continue;
    }

    const details = listing.job_details_text ?? (await fetchDetails(listing.link));
    if (details.toLowerCase().includes(wanted)) {
      kept.push(applyDetails(listing, details));
    }
  }

  await logger.info(`${kept.length} listings match contract type '${contractFilter}'`);
  return kept;
}
