import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { google } from 'googleapis';
import type { JobListing } from '../types.js';
import { dateStamp } from '../utils/dates.js';
import type { Logger } from '../utils/logger.js';

const HEADER = [
  'Date',
  'Titre',
  'Entreprise',
  'Localisation',
  'Type de contrat',
  'Description',
  "Lien vers l'offre",
  'Lien vers la lettre de motivation',
] as const;

export interface SheetAppendParams {
  serviceAccountJson?: string;
  credentialsPath?: string;
  spreadsheetId?: string;
  tabName: string;
  listings: JobListing[];
  letterPaths?: Map<number, string>;
  date?: Date;
}

type SheetsClient = ReturnType<typeof google.sheets>;

function asString(value: unknown): string {
  return value === undefined || value === null ? '' : String(value);
}

export function buildSheetRows(
  listings: JobListing[],
  letterPaths: Map<number, string> = new Map(),
  date = new Date(),
): string[][] {
  const day = dateStamp(date);
  return listings.map((listing, index) => {
    const letterPath = letterPaths.get(index);
    return [
      day,
      listing.title,
      listing.company,
      listing.location,
      listing.contract_type,
      listing.description,
      listing.link,
      letterPath ? resolve(letterPath) : '',
    ];
  });
}

async function readServiceAccountJson(params: SheetAppendParams, logger: Logger): Promise<string | undefined> {
  if (params.serviceAccountJson) {
    return params.serviceAccountJson;
  }
  if (!params.credentialsPath) {
    return undefined;
  }
  try {
    return await readFile(params.credentialsPath, 'utf8');
  } catch (error) {
    await logger.warn(`Credentials file ${params.credentialsPath} not readable: ${String(error)}`);
    return undefined;
  }
}

function getSheetsClient(serviceAccountJson: string): SheetsClient {
  const credentials = JSON.parse(serviceAccountJson);
  const auth = new google.auth.GoogleAuth({
    credentials,
    scopes: ['https://www.googleapis.com/auth/spreadsheets'],
  });
  return google.sheets({
    version: 'v4',
    auth,
  });
}

async function ensureTab(sheets: SheetsClient, spreadsheetId: string, tabName: string): Promise<void> {
  const metadata = await sheets.spreadsheets.get({ spreadsheetId });
  const sheet = metadata.data.sheets?.find((entry) => entry.properties?.title === tabName);
  if (sheet) {
    return;
  }

  await sheets.spreadsheets.batchUpdate({
    spreadsheetId,
    requestBody: {
      requests: [
        {
          addSheet: {
            properties: {
              title: tabName,
            },
          },
        },
      ],
    },
  });
}

async function ensureHeaderRow(sheets: SheetsClient, spreadsheetId: string, tabName: string): Promise<void> {
  const range = `'${tabName}'!A1:H1`;
  const response = await sheets.spreadsheets.values.get({ spreadsheetId, range });

  const current = response.data.values?.[0]?.map((value) => asString(value)) ?? [];
  const matches = current.length === HEADER.length && current.every((value, index) => value === HEADER[index]);
  if (matches) {
    return;
  }

  await sheets.spreadsheets.values.update({
    spreadsheetId,
    range,
    valueInputOption: 'RAW',
    requestBody: {
      values: [[...HEADER]],
    },
  });
}

/**
 * Appends one row per listing to the tab, creating the tab and header when
 * missing. Resolves to `false` when credentials are missing or the API fails.
 */
export async function appendListingsToSheet(params: SheetAppendParams, logger: Logger): Promise<boolean> {
  const serviceAccountJson = await readServiceAccountJson(params, logger);
  if (!serviceAccountJson || !params.spreadsheetId) {
    await logger.error('Google Sheets credentials or spreadsheet id missing, nothing appended');
    return false;
  }

  const rows = buildSheetRows(params.listings, params.letterPaths, params.date);
  try {
    const sheets = getSheetsClient(serviceAccountJson);
    await ensureTab(sheets, params.spreadsheetId, params.tabName);
    await ensureHeaderRow(sheets, params.spreadsheetId, params.tabName);

    if (rows.length > 0) {
      await sheets.spreadsheets.values.append({
        spreadsheetId: params.spreadsheetId,
        range: `'${params.tabName}'!A:H`,
        valueInputOption: 'RAW',
        insertDataOption: 'INSERT_ROWS',
        requestBody: {
          values: rows,
        },
      });
    }

    await logger.info(
      `${rows.length} listings appended to https://docs.google.com/spreadsheets/d/${params.spreadsheetId}`,
    );
    return true;
  } catch (error) {
    await logger.error(`Google Sheets append failed: ${String(error)}`);
    return false;
  }
}
