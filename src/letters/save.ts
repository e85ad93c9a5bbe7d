import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fetchJobDetails, applyDetails, isDetailFailure } from '../extract/detail.js';
import type { JobListing } from '../types.js';
import { compactDateStamp } from '../utils/dates.js';
import type { PageFetcher } from '../utils/http.js';
import type { Logger } from '../utils/logger.js';
import { sanitizeFileComponent } from '../utils/text.js';
import { generateCoverLetter } from './coverLetter.js';
import { loadLetterInputs } from './inputs.js';
import type { LetterInputPaths } from './inputs.js';

export function letterFileName(job: JobListing, date = new Date()): string {
  return `${compactDateStamp(date)}_${sanitizeFileComponent(job.company)}_${sanitizeFileComponent(job.title)}.txt`;
}

export async function saveCoverLetter(
  job: JobListing,
  letterText: string,
  lettersDir: string,
  logger: Logger,
  date = new Date(),
): Promise<string | null> {
  const filePath = join(lettersDir, letterFileName(job, date));
  try {
    await mkdir(lettersDir, { recursive: true });
    await writeFile(filePath, letterText, 'utf8');
    return filePath;
  } catch (error) {
    await logger.error(`Could not save letter for ${job.title}: ${String(error)}`);
    return null;
  }
}

export interface LetterBatchOptions extends LetterInputPaths {
  lettersDir: string;
  date?: Date;
}

/**
 * Generates and saves one letter per listing. Detail text is fetched once per
 * listing and kept on it. Returns the saved path by listing index.
 */
export async function generateAndSaveAllCoverLetters(
  listings: JobListing[],
  options: LetterBatchOptions,
  http: PageFetcher,
  logger: Logger,
): Promise<Map<number, string>> {
  const letterPaths = new Map<number, string>();
  if (listings.length === 0) {
    await logger.warn('No listings to write letters for');
    return letterPaths;
  }

  await logger.info(`Generating cover letters for ${listings.length} listings`);
  const inputs = await loadLetterInputs(options, logger);

  for (const [index, job] of listings.entries()) {
    try {
      let description = job.job_details_text;
      if (description === undefined) {
        description = await fetchJobDetails(job.link, http, logger);
        if (!isDetailFailure(description)) {
          applyDetails(job, description);
        }
      }

      const letter = generateCoverLetter(job, description, inputs);
      const filePath = await saveCoverLetter(job, letter, options.lettersDir, logger, options.date);
      if (filePath) {
        letterPaths.set(index, filePath);
      }
    } catch (error) {
      await logger.error(`Letter generation failed for ${job.title}: ${String(error)}`);
    }
  }

  await logger.info(`${letterPaths.size} cover letters written to ${options.lettersDir}`);
  return letterPaths;
}
