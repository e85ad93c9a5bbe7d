import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { escapeRegExp } from '../utils/text.js';

export const TECH_SKILLS: readonly string[] = z
  .array(z.string())
  .parse(JSON.parse(readFileSync(new URL('./techSkills.json', import.meta.url), 'utf8')));

// Whole-word on letters and digits so that "C++", "C#" and "Node.js" still match.
function skillPattern(skill: string): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(skill)}(?![\\p{L}\\p{N}_])`, 'iu');
}

const PATTERNS = new Map(TECH_SKILLS.map((skill) => [skill, skillPattern(skill)]));

export function extractSkills(text: string, vocabulary: readonly string[] = TECH_SKILLS): string[] {
  if (!text) {
    return [];
  }
  return vocabulary.filter((skill) => (PATTERNS.get(skill) ?? skillPattern(skill)).test(text));
}

/** Skills found in the CV that the job description also names, in vocabulary order. */
export function commonSkills(jobDescription: string, cvText: string): string[] {
  const wanted = new Set(extractSkills(jobDescription));
  return extractSkills(cvText).filter((skill) => wanted.has(skill));
}
