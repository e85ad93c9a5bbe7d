#!/usr/bin/env node
import { parseArgs, toRunOptions, USAGE } from './cli.js';
import { defaultLogPath, runScrapeSession, withRunLogger } from './pipeline/run.js';
import { listSavedSessions } from './storage/session.js';

async function printSavedSessions(savesDir: string): Promise<void> {
  const saves = await listSavedSessions(savesDir);
  if (saves.length === 0) {
    console.log(`No saved sessions in ${savesDir}`);
    return;
  }
  for (const save of saves) {
    const search = `${save.jobTitle || '?'} (${save.location || 'any location'})`;
    console.log(`${save.timestamp}  ${search}, ${save.listingCount} listings  ${save.filePath}`);
  }
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.listSaves) {
    await printSavedSessions(args.savesDir);
    return;
  }

  if (!args.job && !args.resume) {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  await withRunLogger(args.logFile ?? defaultLogPath(), (logger) =>
    runScrapeSession(toRunOptions(args), { logger }),
  );
}

main().catch((error) => {
  console.error(`Scrape run failed: ${String(error)}`);
  process.exitCode = 1;
});
