import { DEFAULT_PATHS, DEFAULT_SHEET_TAB, readSheetCredentials } from './config.js';
import type { RunOptions } from './pipeline/run.js';

export interface CliArgs {
  job?: string;
  location: string;
  contract: string;
  pages: number;
  proxiesFile?: string;
  generateLetters: boolean;
  cvPath: string;
  careerPath: string;
  personalInfoPath: string;
  lettersDir: string;
  savesDir: string;
  csv: boolean;
  csvFile?: string;
  sheet: boolean;
  sheetTab?: string;
  sheetId?: string;
  resume?: string;
  listSaves: boolean;
  debugDir?: string;
  logFile?: string;
}

export const USAGE = [
  'Usage: hellowork-scrape --job <title> [options]',
  '       hellowork-scrape --resume <file|latest> [options]',
  '       hellowork-scrape --list-saves',
  '',
  'Options:',
  '  --location <text>       search location',
  '  --contrat <type>        keep only this contract type (alternance, cdi, cdd, stage...)',
  '  --pages <n>             number of result pages to scrape (default 1)',
  '  --proxies <file>        rotate through the ip:port proxies listed in <file>',
  '  --generate-letters      write one cover letter per listing',
  '  --cv <file>             CV text (default cv.txt)',
  '  --parcours <file>       career history text (default parcours.txt)',
  '  --infos <file>          personal info JSON (default infos_perso.json)',
  '  --letters-dir <dir>     where letters are written (default lettres)',
  '  --csv [file]            export listings as CSV',
  '  --sheet [tab]           append listings to a Google Sheets tab (default "Offres HelloWork")',
  '  --sheet-id <id>         spreadsheet id (default $GOOGLE_SHEET_ID)',
  '  --saves-dir <dir>       session snapshots directory (default saves)',
  '  --debug-dir <dir>       keep a copy of every fetched search page',
  '  --log-file <file>       run log path (default logs/scrape_run_<date>.log)',
].join('\n');

function isValue(value: string | undefined): value is string {
  return value !== undefined && !value.startsWith('--');
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    location: '',
    contract: '',
    pages: 1,
    generateLetters: false,
    cvPath: DEFAULT_PATHS.cv,
    careerPath: DEFAULT_PATHS.career,
    personalInfoPath: DEFAULT_PATHS.personalInfo,
    lettersDir: DEFAULT_PATHS.letters,
    savesDir: DEFAULT_PATHS.saves,
    csv: false,
    sheet: false,
    listSaves: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = argv[i + 1];

    if (arg === '--generate-letters') {
      args.generateLetters = true;
      continue;
    }
    if (arg === '--list-saves') {
      args.listSaves = true;
      continue;
    }
    if (arg === '--csv') {
      args.csv = true;
      if (isValue(next)) {
        args.csvFile = next;
        i += 1;
      }
      continue;
    }
    if (arg === '--sheet') {
      args.sheet = true;
      if (isValue(next)) {
        args.sheetTab = next;
        i += 1;
      }
      continue;
    }
    if (!isValue(next)) {
      continue;
    }

    switch (arg) {
      case '--job':
        args.job = next;
        break;
      case '--location':
        args.location = next;
        break;
      case '--contrat':
        args.contract = next;
        break;
      case '--pages': {
        const parsed = Number(next);
        if (Number.isFinite(parsed) && parsed > 0) {
          args.pages = Math.floor(parsed);
        }
        break;
      }
      case '--proxies':
        args.proxiesFile = next;
        break;
      case '--cv':
        args.cvPath = next;
        break;
      case '--parcours':
        args.careerPath = next;
        break;
      case '--infos':
        args.personalInfoPath = next;
        break;
      case '--letters-dir':
        args.lettersDir = next;
        break;
      case '--sheet-id':
        args.sheetId = next;
        break;
      case '--saves-dir':
        args.savesDir = next;
        break;
      case '--resume':
        args.resume = next;
        break;
      case '--debug-dir':
        args.debugDir = next;
        break;
      case '--log-file':
        args.logFile = next;
        break;
      default:
        continue;
    }
    i += 1;
  }

  return args;
}

export function toRunOptions(args: CliArgs, env: NodeJS.ProcessEnv = process.env): RunOptions {
  const credentials = readSheetCredentials(env);
  return {
    search: args.job
      ? {
          job_title: args.job,
          location: args.location,
          contract_type: args.contract,
          max_pages: args.pages,
          use_proxies: Boolean(args.proxiesFile),
        }
      : undefined,
    resumeFrom: args.resume,
    proxiesFile: args.proxiesFile,
    generateLetters: args.generateLetters,
    letterInputs: {
      cvPath: args.cvPath,
      careerPath: args.careerPath,
      personalInfoPath: args.personalInfoPath,
    },
    lettersDir: args.lettersDir,
    savesDir: args.savesDir,
    csv: args.csv ? { filePath: args.csvFile } : undefined,
    sheet: args.sheet
      ? {
          tabName: args.sheetTab ?? DEFAULT_SHEET_TAB,
          spreadsheetId: args.sheetId ?? credentials.spreadsheetId,
          serviceAccountJson: credentials.serviceAccountJson,
          credentialsPath: DEFAULT_PATHS.credentials,
        }
      : undefined,
    debugDir: args.debugDir,
  };
}
