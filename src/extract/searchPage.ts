import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { matchesContractLabel, mentionsWantedContract } from '../classify/contractMatch.js';
import { ALTERNANCE_LABEL, BASE_URL, TO_BE_DETERMINED, UNSPECIFIED, UNTITLED } from '../config.js';
import type { ExtractionResult, JobListing } from '../types.js';
import { containsAny, normalizeWhitespace } from '../utils/text.js';
import { isAbsoluteHttpUrl, toAbsoluteUrl } from '../utils/url.js';
import { firstMatch, selectorElementMatcher, textFromSelectors } from './fallback.js';
import {
  ANCHOR_TITLE_SELECTORS,
  APPRENTICESHIP_MARKERS,
  CARD_COMPANY_SELECTORS,
  CARD_CONTRACT_SELECTORS,
  CARD_DATE_SELECTORS,
  CARD_LINK_SELECTORS,
  CARD_LOCATION_SELECTORS,
  CARD_TITLE_SELECTORS,
  JOB_CARD_SELECTOR,
  JOB_LINK_PATH,
  NON_JOB_LINK_MARKERS,
} from './selectors.js';

const COMPANY_IN_LABEL = /chez\s+([\p{L}\p{N}_]+)/u;
const LOCATION_IN_LABEL = /à\s+([^,]+)/u;

export function mentionsApprenticeship(text: string): boolean {
  return containsAny(text, APPRENTICESHIP_MARKERS);
}

function resolveLink(href: string, baseUrl: string): string {
  return isAbsoluteHttpUrl(href) ? href : toAbsoluteUrl(href, baseUrl);
}

export function isJobHref(href: string): boolean {
  return href.includes(JOB_LINK_PATH) && !NON_JOB_LINK_MARKERS.some((marker) => href.includes(marker));
}

/** Builds a listing from one search-result card, or `undefined` when the card has no link or title. */
export function listingFromCard(
  card: Cheerio<Element>,
  locationHint: string,
  baseUrl = BASE_URL,
): JobListing | undefined {
  const anchor = firstMatch(
    card,
    CARD_LINK_SELECTORS.map((selector) => selectorElementMatcher(selector)),
  );
  const href = normalizeWhitespace(anchor?.attr('href') ?? '');
  if (!href) {
    return undefined;
  }

  const title = textFromSelectors(card, CARD_TITLE_SELECTORS);
  if (!title) {
    return undefined;
  }

  const company = textFromSelectors(card, CARD_COMPANY_SELECTORS) ?? UNSPECIFIED;
  const location = textFromSelectors(card, CARD_LOCATION_SELECTORS) ?? (locationHint || UNSPECIFIED);
  const contractLabel = textFromSelectors(card, CARD_CONTRACT_SELECTORS);
  const publishedAt = textFromSelectors(card, CARD_DATE_SELECTORS);

  const contractSignals = contractLabel !== undefined && mentionsApprenticeship(contractLabel);
  const titleSignals = mentionsApprenticeship(title);
  const contractType = contractLabel ?? (titleSignals ? ALTERNANCE_LABEL : UNSPECIFIED);

  let description = `Type de contrat: ${contractType}`;
  if (contractSignals) {
    description += ' (Alternance)';
  } else if (titleSignals) {
    description += ' (Alternance mentionnée dans le titre)';
  }
  if (publishedAt) {
    description += ` | Publié: ${publishedAt}`;
  }

  return {
    title,
    company,
    location,
    description,
    link: resolveLink(href, baseUrl),
    contract_type: contractType,
    is_alternance: contractSignals || titleSignals,
  };
}

/** Builds a listing from a bare job anchor; company and location come from its aria-label. */
export function listingFromAnchor(
  anchor: Cheerio<Element>,
  locationHint: string,
  baseUrl = BASE_URL,
): JobListing {
  const href = normalizeWhitespace(anchor.attr('href') ?? '');
  const title =
    normalizeWhitespace(anchor.text()) || textFromSelectors(anchor, ANCHOR_TITLE_SELECTORS) || UNTITLED;

  let company = UNSPECIFIED;
  let location = locationHint || UNSPECIFIED;
  const ariaLabel = anchor.attr('aria-label');
  if (ariaLabel) {
    company = ariaLabel.match(COMPANY_IN_LABEL)?.[1] ?? company;
    const locationMatch = ariaLabel.match(LOCATION_IN_LABEL)?.[1];
    if (locationMatch && normalizeWhitespace(locationMatch)) {
      location = normalizeWhitespace(locationMatch);
    }
  }

  const isAlternance = mentionsApprenticeship(title);
  const contractType = isAlternance ? ALTERNANCE_LABEL : TO_BE_DETERMINED;

  return {
    title,
    company,
    location,
    description: `Type de contrat: ${contractType}`,
    link: resolveLink(href, baseUrl),
    contract_type: contractType,
    is_alternance: isAlternance,
  };
}

export interface ExtractOptions {
  /** Links already emitted earlier in the same scrape; new links are added to it. */
  seenLinks?: Set<string>;
  baseUrl?: string;
  /** Wanted contract type; listings that cannot match it are dropped here. */
  contractFilter?: string;
}

type ResolvedOptions = Required<ExtractOptions>;

function extractFromCards(
  $: CheerioAPI,
  cards: Cheerio<Element>,
  locationHint: string,
  { seenLinks, baseUrl, contractFilter }: ResolvedOptions,
): ExtractionResult {
  const listings: JobListing[] = [];
  const cardErrors: string[] = [];

  cards.each((index, card) => {
    try {
      const listing = listingFromCard($(card), locationHint, baseUrl);
      if (!listing || !matchesContractLabel(listing, contractFilter) || seenLinks.has(listing.link)) {
        return;
      }
      seenLinks.add(listing.link);
      listings.push(listing);
    } catch (error) {
      cardErrors.push(`card ${index + 1}: ${String(error)}`);
    }
  });

  return { mode: 'cards', candidateCount: cards.length, listings, cardErrors };
}

function extractFromLinks(
  $: CheerioAPI,
  locationHint: string,
  { seenLinks, baseUrl, contractFilter }: ResolvedOptions,
): ExtractionResult {
  const anchors = $('a[href]').filter((_, anchor) => isJobHref($(anchor).attr('href') ?? ''));
  const listings: JobListing[] = [];
  const cardErrors: string[] = [];

  anchors.each((index, anchor) => {
    try {
      const listing = listingFromAnchor($(anchor), locationHint, baseUrl);
      if (!mentionsWantedContract(listing, contractFilter) || seenLinks.has(listing.link)) {
        return;
      }
      seenLinks.add(listing.link);
      listings.push(listing);
    } catch (error) {
      cardErrors.push(`link ${index + 1}: ${String(error)}`);
    }
  });

  return { mode: 'links', candidateCount: anchors.length, listings, cardErrors };
}

/**
 * Extracts listings from a search-results page. Cards are preferred; when the
 * page has none, every job anchor is used instead. With a contract filter,
 * cards must match by label and bare links by title or label.
 */
export function extractListings(html: string, locationHint: string, options: ExtractOptions = {}): ExtractionResult {
  const resolved: ResolvedOptions = {
    seenLinks: options.seenLinks ?? new Set<string>(),
    baseUrl: options.baseUrl ?? BASE_URL,
    contractFilter: options.contractFilter ?? '',
  };
  const $ = cheerio.load(html);
  const cards = $(JOB_CARD_SELECTOR);
  if (cards.length === 0) {
    return extractFromLinks($, locationHint, resolved);
  }
  return extractFromCards($, cards, locationHint, resolved);
}
