// Ordered selector candidates for HelloWork markup. Earlier entries win.

export const JOB_CARD_SELECTOR = 'div[data-cy="serpCard"]';

export const JOB_LINK_PATH = '/emplois/';
export const NON_JOB_LINK_MARKERS = ['recherche', 'page='] as const;

export const CARD_LINK_SELECTORS = [`a[href*="${JOB_LINK_PATH}"]`, 'a'] as const;

export const CARD_TITLE_SELECTORS = ['p.tw-typo-l', 'p.tw-typo-xl', 'h3 p', 'h3', 'h2'] as const;
export const CARD_COMPANY_SELECTORS = ['p.tw-inline', 'p.tw-typo-s'] as const;
export const CARD_LOCATION_SELECTORS = [
  'div[data-cy="localisationCard"]',
  '[data-cy="localisationCard"]',
] as const;
export const CARD_CONTRACT_SELECTORS = ['div[data-cy="contractCard"]', '[data-cy="contractCard"]'] as const;
export const CARD_DATE_SELECTORS = ['div.tw-typo-s.tw-text-grey'] as const;

export const ANCHOR_TITLE_SELECTORS = ['h2', 'h3', 'p'] as const;

export const DETAIL_DESCRIPTION_SELECTORS = [
  'div.job-description',
  'div.description',
  "div[data-testid='job-description']",
  "div[data-cy='jobDescription']",
  'section.job-description',
  'div.offer-description',
  'div.tw-prose',
] as const;

export const DETAIL_MAIN_CONTENT_SELECTORS = ['main', 'article', 'div.main-content'] as const;

export const MIN_PARAGRAPH_CHARS = 50;
export const MIN_PARAGRAPH_COUNT = 6;

export const APPRENTICESHIP_MARKERS = ['altern', 'apprentissage'] as const;
