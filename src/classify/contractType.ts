import { UNSPECIFIED } from '../config.js';
import type { ContractClassification, ContractLabel } from '../types.js';

export interface ContractRule {
  label: ContractLabel;
  keywords: readonly string[];
}

// Declaration order is the priority order.
export const CONTRACT_RULES: readonly ContractRule[] = [
  { label: 'CDI', keywords: ['cdi', 'contrat à durée indéterminée', 'permanent', 'indéterminée'] },
  { label: 'CDD', keywords: ['cdd', 'contrat à durée déterminée', 'déterminée', 'temporaire'] },
  {
    label: 'Alternance',
    keywords: ['altern', 'apprentissage', 'apprenti', 'contrat pro', 'professionnalisation'],
  },
  { label: 'Stage', keywords: ['stage', 'stagiaire', 'internship', 'intern'] },
  {
    label: 'Freelance',
    keywords: ['freelance', 'indépendant', 'consultant externe', 'auto-entrepreneur'],
  },
  { label: 'Intérim', keywords: ['intérim', 'mission temporaire', "mission d'intérim"] },
  { label: 'Temps partiel', keywords: ['temps partiel', 'mi-temps', 'part-time'] },
  { label: 'Temps plein', keywords: ['temps plein', 'temps complet', 'full-time'] },
];

/** Position of the earliest keyword occurrence, or -1. */
function earliestKeyword(text: string, keywords: readonly string[]): number {
  let earliest = -1;
  for (const keyword of keywords) {
    const position = text.indexOf(keyword);
    if (position >= 0 && (earliest < 0 || position < earliest)) {
      earliest = position;
    }
  }
  return earliest;
}

function keywordsFor(label: ContractLabel): readonly string[] {
  return CONTRACT_RULES.find((rule) => rule.label === label)?.keywords ?? [];
}

export function identifyContractType(title: string, description: string): ContractClassification {
  const text = `${title} ${description}`.toLowerCase();

  const detected = CONTRACT_RULES.filter((rule) => rule.keywords.some((keyword) => text.includes(keyword))).map(
    (rule) => rule.label,
  );

  let primary: ContractClassification['contract_type'] = UNSPECIFIED;
  if (detected.includes('CDI') && detected.includes('CDD')) {
    const cdi = earliestKeyword(text, keywordsFor('CDI'));
    const cdd = earliestKeyword(text, keywordsFor('CDD'));
    primary = cdi <= cdd ? 'CDI' : 'CDD';
  } else if (detected.length > 0) {
    primary = detected[0];
  }

  return {
    contract_type: primary,
    is_alternance: detected.includes('Alternance'),
    is_cdi: detected.includes('CDI'),
    is_cdd: detected.includes('CDD'),
    is_stage: detected.includes('Stage'),
    is_freelance: detected.includes('Freelance'),
    is_interim: detected.includes('Intérim'),
    is_part_time: detected.includes('Temps partiel'),
    is_full_time: detected.includes('Temps plein'),
    all_detected_types: detected,
  };
}
