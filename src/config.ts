export const BASE_URL = 'https://www.hellowork.com';
export const SEARCH_URL = `${BASE_URL}/fr-fr/emploi/recherche.html`;

export const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/107.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/114.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/16.5.1 Safari/605.1.15',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/114.0.0.0 Safari/537.36',
] as const;

export const ACCEPT_LANGUAGE = 'fr-FR,fr;q=0.9,en-US;q=0.8,en;q=0.7';
export const ACCEPT_HTML =
  'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8';

export const REQUEST_TIMEOUT_MS = 10_000;
export const PAGE_DELAY_MS = 2_000;

export const UNSPECIFIED = 'Non spécifié';
export const TO_BE_DETERMINED = 'À déterminer';
export const ALTERNANCE_LABEL = 'Alternance';
export const UNTITLED = 'Titre non disponible';

export const DEFAULT_PATHS = {
  cv: 'cv.txt',
  career: 'parcours.txt',
  personalInfo: 'infos_perso.json',
  letters: 'lettres',
  saves: 'saves',
  credentials: 'credentials.json',
  logs: 'logs',
} as const;

export const DEFAULT_SHEET_TAB = 'Offres HelloWork';

export interface SheetCredentials {
  serviceAccountJson?: string;
  spreadsheetId?: string;
}

export function readSheetCredentials(env: NodeJS.ProcessEnv = process.env): SheetCredentials {
  return {
    serviceAccountJson: env.GOOGLE_SERVICE_ACCOUNT_JSON || undefined,
    spreadsheetId: env.GOOGLE_SHEET_ID || undefined,
  };
}
