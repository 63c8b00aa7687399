// ─── Enums ─────────────────────────────────────────────────

export const RunStatus = {
  IDLE: 'IDLE',
  RUNNING: 'RUNNING',
  COMPLETED: 'COMPLETED',
  COMPLETED_WITH_ERRORS: 'COMPLETED_WITH_ERRORS',
  FAILED: 'FAILED',
  CANCELLED: 'CANCELLED',
  TIMED_OUT: 'TIMED_OUT',
} as const;
export type RunStatus = (typeof RunStatus)[keyof typeof RunStatus];

export const RegionStatus = {
  QUEUED: 'QUEUED',
  SCRAPING: 'SCRAPING',
  FILTERING: 'FILTERING',
  VERIFYING: 'VERIFYING',
  PUBLISHING: 'PUBLISHING',
  DONE: 'DONE',
  FAILED: 'FAILED',
  CANCELLED: 'CANCELLED',
} as const;
export type RegionStatus = (typeof RegionStatus)[keyof typeof RegionStatus];

export const PipelineStage = {
  SCRAPING: 'SCRAPING',
  FILTERING: 'FILTERING',
  VERIFYING: 'VERIFYING',
  PUBLISHING: 'PUBLISHING',
} as const;
export type PipelineStage = (typeof PipelineStage)[keyof typeof PipelineStage];

export const ErrorKind = {
  SOURCE_UNAVAILABLE: 'SourceUnavailable',
  RULE_SET_INVALID: 'RuleSetInvalid',
  VERIFICATION_FAILED: 'VerificationFailed',
  PUBLISH_UNAUTHORIZED: 'PublishUnauthorized',
  PUBLISH_UNAVAILABLE: 'PublishUnavailable',
  RUN_CANCELLED: 'RunCancelled',
  RUN_TIMED_OUT: 'RunTimedOut',
  CONFIGURATION: 'Configuration',
  INVALID_REQUEST: 'InvalidRequest',
} as const;
export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

export const ExclusionRule = {
  SPONSORED: 'SPONSORED',
  AFFILIATE_DOMAIN: 'AFFILIATE_DOMAIN',
  CHAIN_KEYWORD: 'CHAIN_KEYWORD',
} as const;
export type ExclusionRule = (typeof ExclusionRule)[keyof typeof ExclusionRule];

// ─── Candidates ────────────────────────────────────────────

/** One listing as scraped from the map source. Missing text fields are empty strings. */
export interface RawCandidate {
  name: string;
  address: string;
  phone: string;
  website: string;
  categories: string[];
  region: string;
  sourceUrl: string;
  sponsored: boolean;
  rating: number | null;
  reviewCount: number | null;
  area: string;
}

export interface ExclusionRuleSet {
  readonly chainKeywords: readonly string[];
  readonly affiliateDomains: readonly string[];
  readonly excludeSponsored: boolean;
}

export interface ExclusionReason {
  rule: ExclusionRule;
  pattern: string;
}

export interface ExcludedCandidate {
  candidate: RawCandidate;
  reason: ExclusionReason;
}

export interface FilterResult {
  kept: RawCandidate[];
  excluded: ExcludedCandidate[];
}

export interface Verdict {
  qualifies: boolean;
  normalizedName: string;
  rationale: string;
}

export interface VerifiedCandidate extends RawCandidate {
  verdict: Verdict;
  attempts: number;
}

/** Row shape written to the outreach spreadsheet, in column order. */
export interface PublishedRow {
  name: string;
  address: string;
  phone: string;
  website: string;
  region: string;
  sourceUrl: string;
  publishedAt: string;
  /** Ward or city, rating and review count as sheet cells; empty when unknown */
  area: string;
  rating: string;
  reviewCount: string;
}

// ─── Settings ──────────────────────────────────────────────

export interface SettingsSnapshot {
  searchSuffix: string;
  ruleSet: ExclusionRuleSet;
}

// ─── Progress ──────────────────────────────────────────────

export type ProgressEventType =
  | 'run:started'
  | 'stage:started'
  | 'candidate:found'
  | 'candidate:excluded'
  | 'candidate:verified'
  | 'candidate:duplicate'
  | 'rows:published'
  | 'region:complete'
  | 'run:complete'
  | 'error';

export type ProgressLevel = 'info' | 'success' | 'warning' | 'error' | 'progress';

export interface ProgressEvent {
  type: ProgressEventType;
  level: ProgressLevel;
  runId: string;
  timestamp: Date;
  region?: string;
  stage?: PipelineStage;
  message: string;
  details?: Record<string, unknown>;
}

// ─── Runs ──────────────────────────────────────────────────

export interface RunRequest {
  regions: string[];
  previewMode: boolean;
}

export interface ErrorRecord {
  kind: ErrorKind;
  message: string;
  region?: string;
  stage?: PipelineStage;
  candidate?: string;
}

export interface RegionCounts {
  found: number;
  excluded: number;
  verified: number;
  qualified: number;
  rejected: number;
  verificationFailed: number;
  duplicates: number;
  published: number;
}

export interface RegionResult {
  region: string;
  status: RegionStatus;
  failedStage?: PipelineStage;
  error?: ErrorRecord;
  /** Every error raised while processing the region, candidate-level ones included */
  errors: ErrorRecord[];
  counts: RegionCounts;
  qualified: VerifiedCandidate[];
  published: PublishedRow[];
}

export interface RunTotals {
  found: number;
  excluded: number;
  verifiedQualified: number;
  published: number;
  duplicates: number;
  verificationFailed: number;
  errors: number;
}

export interface RunSummary {
  runId: string;
  status: RunStatus;
  previewMode: boolean;
  regionsProcessed: number;
  totals: RunTotals;
  regions: RegionResult[];
  errors: ErrorRecord[];
  startedAt: Date;
  completedAt: Date;
}
