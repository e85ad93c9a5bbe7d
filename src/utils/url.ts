import { URL } from 'node:url';

export function toAbsoluteUrl(value: string, base: string): string {
  try {
    return new URL(value, base).toString();
  } catch {
    return value;
  }
}

export function isAbsoluteHttpUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

export function buildSearchUrl(baseSearchUrl: string, jobTitle: string, location = ''): string {
  const encode = (value: string): string => encodeURIComponent(value.trim()).replace(/%20/g, '+');
  return `${baseSearchUrl}?k=${encode(jobTitle)}&l=${encode(location)}`;
}

export function pageUrl(searchUrl: string, page: number): string {
  return page > 1 ? `${searchUrl}&page=${page}` : searchUrl;
}
