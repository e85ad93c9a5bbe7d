import { describe, it, expect } from 'vitest';
import { parseArgs, toRunOptions } from '../cli.js';

describe('parseArgs', () => {
  it('reads search flags and optional values', () => {
    const args = parseArgs(['--job', 'data engineer', '--pages', '3', '--csv', '--generate-letters', '--sheet']);

    expect(args.job).toBe('data engineer');
    expect(args.pages).toBe(3);
    expect(args.csv).toBe(true);
    expect(args.csvFile).toBeUndefined();
    expect(args.generateLetters).toBe(true);
    expect(args.sheet).toBe(true);
    expect(args.sheetTab).toBeUndefined();
  });

  it('takes a value after --csv and --sheet when one is given', () => {
    const args = parseArgs(['--csv', 'out/offres.csv', '--sheet', 'Veille', '--resume', 'latest']);

    expect(args.csvFile).toBe('out/offres.csv');
    expect(args.sheetTab).toBe('Veille');
    expect(args.resume).toBe('latest');
  });

  it('ignores invalid page counts and missing values', () => {
    const args = parseArgs(['--pages', 'abc', '--location', '--contrat', 'alternance']);

    expect(args.pages).toBe(1);
    expect(args.location).toBe('');
    expect(args.contract).toBe('alternance');
  });

  it('uses the default input and output paths', () => {
    const args = parseArgs([]);

    expect(args.cvPath).toBe('cv.txt');
    expect(args.careerPath).toBe('parcours.txt');
    expect(args.personalInfoPath).toBe('infos_perso.json');
    expect(args.lettersDir).toBe('lettres');
    expect(args.savesDir).toBe('saves');
  });
});

describe('toRunOptions', () => {
  it('builds the search parameters and sheet target', () => {
    const args = parseArgs(['--job', 'comptable', '--location', 'Nantes', '--pages', '2', '--sheet']);

    const options = toRunOptions(args, { GOOGLE_SHEET_ID: 'sheet-123' });

    expect(options.search).toEqual({
      job_title: 'comptable',
      location: 'Nantes',
      contract_type: '',
      max_pages: 2,
      use_proxies: false,
    });
    expect(options.sheet).toEqual({
      tabName: 'Offres HelloWork',
      spreadsheetId: 'sheet-123',
      serviceAccountJson: undefined,
      credentialsPath: 'credentials.json',
    });
    expect(options.csv).toBeUndefined();
  });

  it('enables proxies only when a proxy file is given', () => {
    const options = toRunOptions(parseArgs(['--job', 'comptable', '--proxies', 'proxies.txt']), {});

    expect(options.proxiesFile).toBe('proxies.txt');
    expect(options.search?.use_proxies).toBe(true);
  });

  it('has no search when resuming', () => {
    expect(toRunOptions(parseArgs(['--resume', 'latest']), {}).search).toBeUndefined();
  });
});
