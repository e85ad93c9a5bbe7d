import type { JobListing } from '../types.js';

function normalizeFilter(contractFilter: string): string {
  return contractFilter.trim().toLowerCase();
}

/** Label match used for cards: the label names the wanted type, or apprenticeship is wanted and flagged. */
export function matchesContractLabel(listing: JobListing, contractFilter: string): boolean {
  const wanted = normalizeFilter(contractFilter);
  if (!wanted) {
    return true;
  }
  if (wanted.includes('alternance') && listing.is_alternance) {
    return true;
  }
  return listing.contract_type.toLowerCase().includes(wanted);
}

// Bare links carry no contract label of their own, so the title counts too.
export function mentionsWantedContract(listing: JobListing, contractFilter: string): boolean {
  const wanted = normalizeFilter(contractFilter);
  if (!wanted) {
    return true;
  }
  return listing.title.toLowerCase().includes(wanted) || listing.contract_type.toLowerCase().includes(wanted);
}
