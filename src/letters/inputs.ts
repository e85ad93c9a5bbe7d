import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { PersonalInfo } from '../types.js';
import type { Logger } from '../utils/logger.js';

export const personalInfoSchema = z
  .object({
    texte_motivation: z.string().optional(),
    entreprise_cible: z.string().optional(),
    signature: z.string().optional(),
    nom: z.string().optional(),
    coordonnees: z.string().optional(),
  })
  .passthrough();

export interface LetterInputPaths {
  cvPath: string;
  careerPath: string;
  personalInfoPath: string;
}

export interface LetterInputs {
  cvText: string;
  careerText: string;
  personalInfo: PersonalInfo | null;
}

async function readOptionalText(filePath: string, label: string, logger: Logger): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    await logger.warn(`${label} file ${filePath} not readable, continuing without it: ${String(error)}`);
    return null;
  }
}

export async function loadPersonalInfo(filePath: string, logger: Logger): Promise<PersonalInfo | null> {
  const raw = await readOptionalText(filePath, 'Personal info', logger);
  if (raw === null) {
    await logger.info('Letters will be signed with the [Votre nom] and [Vos coordonnées] placeholders');
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    await logger.warn(`Personal info file ${filePath} is not valid JSON: ${String(error)}`);
    return null;
  }

  const result = personalInfoSchema.safeParse(parsed);
  if (!result.success) {
    await logger.warn(`Personal info file ${filePath} has unexpected fields: ${result.error.message}`);
    return null;
  }

  await logger.info(`Personal info loaded from ${filePath}`);
  return result.data;
}

export async function loadLetterInputs(paths: LetterInputPaths, logger: Logger): Promise<LetterInputs> {
  const cvText = (await readOptionalText(paths.cvPath, 'CV', logger)) ?? '';
  const careerText = (await readOptionalText(paths.careerPath, 'Career history', logger)) ?? '';
  const personalInfo = await loadPersonalInfo(paths.personalInfoPath, logger);
  return { cvText, careerText, personalInfo };
}
