export type ContractLabel =
  | 'CDI'
  | 'CDD'
  | 'Alternance'
  | 'Stage'
  | 'Freelance'
  | 'Intérim'
  | 'Temps partiel'
  | 'Temps plein';

export interface JobListing {
  title: string;
  company: string;
  location: string;
  description: string;
  link: string;
  contract_type: string;
  is_alternance: boolean;
  job_details_text?: string;
}

export interface SearchParams {
  job_title: string;
  location: string;
  contract_type: string;
  max_pages: number;
  use_proxies: boolean;
}

export interface PersonalInfo {
  texte_motivation?: string;
  entreprise_cible?: string;
  signature?: string;
  nom?: string;
  coordonnees?: string;
}

export interface SessionState {
  job_listings: JobListing[];
  search_params: SearchParams;
  timestamp: string;
}

export interface ContractClassification {
  contract_type: ContractLabel | 'Non spécifié';
  is_alternance: boolean;
  is_cdi: boolean;
  is_cdd: boolean;
  is_stage: boolean;
  is_freelance: boolean;
  is_interim: boolean;
  is_part_time: boolean;
  is_full_time: boolean;
  all_detected_types: ContractLabel[];
}

export type ExtractionMode = 'cards' | 'links';

export interface ExtractionResult {
  mode: ExtractionMode;
  candidateCount: number;
  listings: JobListing[];
  cardErrors: string[];
}

export interface FetchResult {
  status: number;
  url: string;
  body: string;
  contentType: string;
}
