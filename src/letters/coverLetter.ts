import { UNSPECIFIED } from '../config.js';
import type { JobListing, PersonalInfo } from '../types.js';
import { joinFrenchList, leadingExcerpt } from '../utils/text.js';
import type { LetterInputs } from './inputs.js';
import { commonSkills } from './skills.js';

export const DEFAULT_EMPLOYER_TOKEN = 'EDF';
export const NAME_PLACEHOLDER = '[Votre nom]';
export const CONTACT_PLACEHOLDER = '[Vos coordonnées]';

const SALUTATION = 'Madame, Monsieur,';
const MEETING_REQUEST =
  "Je serais heureux(se) d'échanger avec vous lors d'un entretien afin de vous exposer plus en détail ma motivation.";
const FORMAL_CLOSING =
  "Je vous prie d'agréer, Madame, Monsieur, l'expression de mes salutations distinguées.";

function isApprenticeship(job: JobListing): boolean {
  return job.is_alternance || job.contract_type.toLowerCase().includes('alternance');
}

export function skillsSentence(skills: readonly string[]): string {
  if (skills.length === 0) {
    return 'Mon parcours répond aux qualifications que vous recherchez, comme le détaille mon CV joint.';
  }
  return `Mon parcours répond aux qualifications que vous recherchez, en particulier sur ${joinFrenchList(
    skills,
  )}, comme le détaille mon CV joint.`;
}

function introduction(job: JobListing): string {
  const subject = [
    job.title,
    isApprenticeship(job) ? 'en alternance' : '',
    job.location && job.location !== UNSPECIFIED ? `à ${job.location}` : '',
  ]
    .filter(Boolean)
    .join(' ');
  return `Votre offre pour le poste de ${subject} a retenu toute mon attention et je vous adresse ma candidature.`;
}

function companyParagraph(job: JobListing): string {
  const employer = job.company && job.company !== UNSPECIFIED ? job.company : 'votre entreprise';
  return `Rejoindre ${employer} me permettrait de mettre mon expérience au service de vos projets, et le poste de ${job.title} s'inscrit dans la continuité de mon parcours.`;
}

export function signatureBlock(info: PersonalInfo | null): string {
  if (info?.signature !== undefined) {
    return info.signature;
  }
  if (info?.nom !== undefined) {
    return `${info.nom}\n${info.coordonnees ?? CONTACT_PLACEHOLDER}`;
  }
  return `${NAME_PLACEHOLDER}\n${CONTACT_PLACEHOLDER}`;
}

function fallbackBody(job: JobListing, jobDescription: string, inputs: LetterInputs): string[] {
  const paragraphs = [introduction(job), skillsSentence(commonSkills(jobDescription, inputs.cvText))];
  if (inputs.cvText) {
    paragraphs.push(leadingExcerpt(inputs.cvText));
  }
  if (inputs.careerText) {
    paragraphs.push(leadingExcerpt(inputs.careerText));
  }
  paragraphs.push(companyParagraph(job), MEETING_REQUEST, FORMAL_CLOSING);
  return paragraphs;
}

/**
 * Fills the letter template for one listing. A custom motivation text from the
 * personal info replaces the generated body, with its employer name swapped
 * for the listing's company.
 */
export function generateCoverLetter(job: JobListing, jobDescription: string, inputs: LetterInputs): string {
  const motivation = inputs.personalInfo?.texte_motivation;
  const body =
    motivation !== undefined
      ? [motivation.replaceAll(inputs.personalInfo?.entreprise_cible || DEFAULT_EMPLOYER_TOKEN, job.company)]
      : fallbackBody(job, jobDescription, inputs);

  return [SALUTATION, ...body, signatureBlock(inputs.personalInfo)].join('\n\n');
}
