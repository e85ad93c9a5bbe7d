import { describe, it, expect } from 'vitest';
import { SEARCH_URL } from '../config.js';
import { matchesContractLabel, mentionsWantedContract } from '../classify/contractMatch.js';
import { filterByContractType } from '../scraper/contractFilter.js';
import { scrapeJobListings } from '../scraper/search.js';
import { createPageFetcher, createTestLogger, htmlResponse, makeListing, serpCard } from './helpers.js';

const FIRST_PAGE_URL = `${SEARCH_URL}?k=data+engineer&l=Lyon`;
const SECOND_PAGE_URL = `${FIRST_PAGE_URL}&page=2`;

function card(id: number, title: string, contract?: string): string {
  return serpCard(`
    <a href="/fr-fr/emplois/${id}.html"><p class="tw-typo-l">${title}</p></a>
    <p class="tw-typo-s">Entreprise ${id}</p>
    ${contract ? `<div data-cy="contractCard">${contract}</div>` : ''}
  `);
}

function jobUrl(id: number): string {
  return `https://www.hellowork.com/fr-fr/emplois/${id}.html`;
}

describe('scrapeJobListings', () => {
  it('returns nothing when the first page does not answer 200', async () => {
    const http = createPageFetcher({ [FIRST_PAGE_URL]: htmlResponse('', 503) });
    const logger = createTestLogger();

    const listings = await scrapeJobListings(
      { jobTitle: 'data engineer', location: 'Lyon', maxPages: 3, delayMs: 0 },
      http,
      logger,
    );

    expect(listings).toEqual([]);
    expect(http.get).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith('Search page 1 failed: 503');
  });

  it('deduplicates links across pages', async () => {
    const http = createPageFetcher({
      [FIRST_PAGE_URL]: htmlResponse(card(1, 'Data Engineer', 'CDI') + card(2, 'Data Engineer junior', 'CDD')),
      [SECOND_PAGE_URL]: htmlResponse(card(2, 'Data Engineer junior', 'CDD') + card(3, 'Lead Data', 'CDI')),
    });

    const listings = await scrapeJobListings(
      { jobTitle: 'data engineer', location: 'Lyon', maxPages: 2, delayMs: 0 },
      http,
      createTestLogger(),
    );

    expect(listings.map((listing) => listing.link)).toEqual([jobUrl(1), jobUrl(2), jobUrl(3)]);
    expect(http.get.mock.calls.map(([url]) => url)).toEqual([FIRST_PAGE_URL, SECOND_PAGE_URL]);
  });

  it('keeps the listings of earlier pages when a later page fails', async () => {
    const http = createPageFetcher({
      [FIRST_PAGE_URL]: htmlResponse(card(1, 'Data Engineer', 'CDI')),
      [SECOND_PAGE_URL]: htmlResponse('', 500),
    });

    const listings = await scrapeJobListings(
      { jobTitle: 'data engineer', location: 'Lyon', maxPages: 3, delayMs: 0 },
      http,
      createTestLogger(),
    );

    expect(listings.map((listing) => listing.link)).toEqual([jobUrl(1)]);
    expect(http.get).toHaveBeenCalledTimes(2);
  });

  it('drops cards whose label does not match the wanted contract without fetching details', async () => {
    const http = createPageFetcher({
      [FIRST_PAGE_URL]: htmlResponse(
        card(1, 'Data Engineer', 'CDI') + card(2, 'Data Engineer', 'CDD') + card(3, 'Data Engineer', 'Stage'),
      ),
      [jobUrl(2)]: htmlResponse('<div class="tw-prose">Contrat CDD, évolution en CDI possible.</div>'),
    });

    const listings = await scrapeJobListings(
      { jobTitle: 'data engineer', location: 'Lyon', contractType: 'CDI', delayMs: 0 },
      http,
      createTestLogger(),
    );

    expect(listings.map((listing) => listing.link)).toEqual([jobUrl(1)]);
    expect(http.get.mock.calls.map(([url]) => url)).toEqual([FIRST_PAGE_URL]);
  });

  it('confirms links kept for their title against the detail page', async () => {
    const http = createPageFetcher({
      [FIRST_PAGE_URL]: htmlResponse(`
        <a href="/fr-fr/emplois/7.html">Data Engineer CDI</a>
        <a href="/fr-fr/emplois/8.html">Data Engineer CDI junior</a>
        <a href="/fr-fr/emplois/9.html">Data Engineer</a>
      `),
      [jobUrl(7)]: htmlResponse('<div class="tw-prose">Poste en CDI, temps plein.</div>'),
      [jobUrl(8)]: htmlResponse('<div class="tw-prose">Contrat CDD de six mois.</div>'),
    });

    const listings = await scrapeJobListings(
      { jobTitle: 'data engineer', location: 'Lyon', contractType: 'cdi', delayMs: 0 },
      http,
      createTestLogger(),
    );

    expect(listings.map((listing) => listing.link)).toEqual([jobUrl(7)]);
    expect(listings[0].contract_type).toBe('CDI');
    expect(listings[0].job_details_text).toBe('Poste en CDI, temps plein.');
    expect(http.get.mock.calls.map(([url]) => url)).toEqual([FIRST_PAGE_URL, jobUrl(7), jobUrl(8)]);
  });

  it('uses the link fallback when the page has no cards', async () => {
    const http = createPageFetcher({
      [FIRST_PAGE_URL]: htmlResponse('<a href="/fr-fr/emplois/7.html">Data Engineer</a>'),
    });
    const logger = createTestLogger();

    const listings = await scrapeJobListings({ jobTitle: 'data engineer', location: 'Lyon' }, http, logger);

    expect(listings).toHaveLength(1);
    expect(listings[0].location).toBe('Lyon');
    expect(logger.warn).toHaveBeenCalledWith('No job cards on page 1, fell back to 1 job links');
  });
});

describe('contract filter', () => {
  it('matches apprenticeship by flag and other types by label', () => {
    expect(matchesContractLabel(makeListing({ contract_type: 'Non spécifié', is_alternance: true }), 'alternance')).toBe(
      true,
    );
    expect(matchesContractLabel(makeListing({ contract_type: 'CDI' }), 'cdi')).toBe(true);
    expect(matchesContractLabel(makeListing({ contract_type: 'CDD' }), 'cdi')).toBe(false);
    expect(matchesContractLabel(makeListing({ contract_type: 'CDD' }), '  ')).toBe(true);
  });

  it('lets bare links match by title', () => {
    const listing = makeListing({ title: 'Comptable CDI', contract_type: 'À déterminer' });

    expect(mentionsWantedContract(listing, 'CDI')).toBe(true);
    expect(matchesContractLabel(listing, 'CDI')).toBe(false);
    expect(mentionsWantedContract(makeListing({ contract_type: 'À déterminer' }), 'cdd')).toBe(false);
  });

  it('reuses details already stored on the listing', async () => {
    const listing = makeListing({ contract_type: 'À déterminer', job_details_text: 'Stage de fin études' });
    const fetchDetails = async (_url: string) => 'unused';

    const kept = await filterByContractType([listing], 'stage', fetchDetails, createTestLogger());

    expect(kept).toEqual([listing]);
    expect(listing.contract_type).toBe('Stage');
  });
});
