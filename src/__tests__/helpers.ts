import { vi } from 'vitest';
import type { FetchResult, JobListing } from '../types.js';

export function createTestLogger() {
  return {
    info: vi.fn(async (_message: string) => {}),
    warn: vi.fn(async (_message: string) => {}),
    error: vi.fn(async (_message: string) => {}),
  };
}

export function htmlResponse(body: string, status = 200, url = ''): FetchResult {
  return { status, url, body, contentType: 'text/html; charset=utf-8' };
}

/** Page fetcher answering from a URL map; unknown URLs resolve to `null`. */
export function createPageFetcher(pages: Record<string, FetchResult | null>) {
  return {
    get: vi.fn(async (url: string) => pages[url] ?? null),
  };
}

export function makeListing(overrides: Partial<JobListing> = {}): JobListing {
  return {
    title: 'Data Engineer',
    company: 'Acme',
    location: 'Lyon',
    description: 'Type de contrat: CDI',
    link: 'https://www.hellowork.com/fr-fr/emplois/1.html',
    contract_type: 'CDI',
    is_alternance: false,
    ...overrides,
  };
}

export function serpCard(inner: string): string {
  return `<div data-cy="serpCard">${inner}</div>`;
}
