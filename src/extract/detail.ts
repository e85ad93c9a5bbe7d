import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { identifyContractType } from '../classify/contractType.js';
import { TO_BE_DETERMINED, UNSPECIFIED } from '../config.js';
import type { JobListing } from '../types.js';
import type { PageFetcher } from '../utils/http.js';
import type { Logger } from '../utils/logger.js';
import { normalizeWhitespace } from '../utils/text.js';
import { firstMatch } from './fallback.js';
import type { Matcher } from './fallback.js';
import {
  DETAIL_DESCRIPTION_SELECTORS,
  DETAIL_MAIN_CONTENT_SELECTORS,
  MIN_PARAGRAPH_CHARS,
  MIN_PARAGRAPH_COUNT,
} from './selectors.js';

export const DETAILS_UNAVAILABLE = "Impossible de récupérer les détails de l'offre.";
export const DESCRIPTION_NOT_FOUND = "Description non trouvée sur la page de l'offre.";
export const DETAIL_ERROR_PREFIX = 'Erreur: ';

function documentSelector(selector: string): Matcher<CheerioAPI, string> {
  return ($) => {
    const element = $(selector).first();
    if (element.length === 0) {
      return undefined;
    }
    return normalizeWhitespace(element.text()) || undefined;
  };
}

function longParagraphs($: CheerioAPI): string | undefined {
  const paragraphs = $('p');
  if (paragraphs.length < MIN_PARAGRAPH_COUNT) {
    return undefined;
  }
  const content = paragraphs
    .toArray()
    .map((paragraph) => normalizeWhitespace($(paragraph).text()))
    .filter((text) => text.length > MIN_PARAGRAPH_CHARS)
    .join('\n');
  return content || undefined;
}

export const DETAIL_MATCHERS: ReadonlyArray<Matcher<CheerioAPI, string>> = [
  ...DETAIL_DESCRIPTION_SELECTORS.map((selector) => documentSelector(selector)),
  ...DETAIL_MAIN_CONTENT_SELECTORS.map((selector) => documentSelector(selector)),
  longParagraphs,
];

export function extractDescription(html: string): string {
  const $ = cheerio.load(html);
  return firstMatch($, DETAIL_MATCHERS) ?? DESCRIPTION_NOT_FOUND;
}

export function isDetailFailure(text: string): boolean {
  return text === DETAILS_UNAVAILABLE || text === DESCRIPTION_NOT_FOUND || text.startsWith(DETAIL_ERROR_PREFIX);
}

/** Best-effort plain-text description of a listing's detail page. Never rejects. */
export async function fetchJobDetails(url: string, http: PageFetcher, logger: Logger): Promise<string> {
  try {
    await logger.info(`Fetching listing details: ${url}`);
    const response = await http.get(url);
    if (!response) {
      return `${DETAIL_ERROR_PREFIX}no response from ${url}`;
    }
    if (response.status !== 200) {
      await logger.error(`Detail page returned status ${response.status}: ${url}`);
      return DETAILS_UNAVAILABLE;
    }
    return extractDescription(response.body);
  } catch (error) {
    await logger.error(`Detail extraction failed for ${url}: ${String(error)}`);
    return `${DETAIL_ERROR_PREFIX}${String(error)}`;
  }
}

/**
 * Stores detail text on the listing. A listing whose contract label is still
 * unknown takes the label the classifier finds in title plus details.
 */
export function applyDetails(listing: JobListing, details: string): JobListing {
  listing.job_details_text = details;

  if (listing.contract_type !== UNSPECIFIED && listing.contract_type !== TO_BE_DETERMINED) {
    return listing;
  }

  const classification = identifyContractType(listing.title, details);
  if (classification.contract_type !== UNSPECIFIED) {
    listing.contract_type = classification.contract_type;
  }
  listing.is_alternance = listing.is_alternance || classification.is_alternance;
  return listing;
}
