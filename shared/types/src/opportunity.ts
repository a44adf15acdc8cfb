// Opportunity records as produced by the ingestion/deduplication stage.

/** Coarse priority bucket assigned by scoring (1 = highest). */
export type Tier = 1 | 2 | 3;

export type OpportunityType =
  | 'job'
  | 'scholarship'
  | 'fellowship'
  | 'accelerator'
  | 'grant'
  | 'research'
  | 'event'
  | 'competition'
  | 'other';

/**
 * Raw listing handed to the store by an upstream scraper or manual entry.
 * Only `source`, `title`, `organization` and one of `url` / `description`
 * are required; everything else is best effort.
 */
export interface RawOpportunity {
  source: string;
  title: string;
  organization: string;
  url?: string;
  description?: string;
  opportunityType?: OpportunityType;
  /** Epoch ms */
  deadline?: number;
  tags?: string[];
  requiredSkills?: string[];
  experienceYears?: number;
  compensationMax?: number;
  /** Submission platform the listing is applied through (e.g. 'email', 'greenhouse') */
  platform?: string;
  location?: string;
  /** Epoch ms the scraper saw the listing; defaults to ingestion time */
  discoveredAt?: number;
}

/** Canonicalized fields kept on a stored opportunity. */
export interface OpportunityFields {
  title: string;
  organization: string;
  url?: string;
  description?: string;
  opportunityType: OpportunityType;
  deadline?: number;
  tags: string[];
  requiredSkills: string[];
  experienceYears?: number;
  compensationMax?: number;
  platform?: string;
  location?: string;
  /** Every source this opportunity was seen on, in first-seen order */
  sources: string[];
}

export interface Opportunity {
  readonly id: string;
  readonly fingerprint: string;
  /** Source of the first ingestion */
  readonly source: string;
  readonly rawFields: Readonly<OpportunityFields>;
  readonly tier?: Tier;
  readonly score?: number;
  readonly discoveredAt: number;
  readonly updatedAt: number;
  readonly archivedAt?: number;
}

export interface IngestResult {
  opportunity: Opportunity;
  isNew: boolean;
}
