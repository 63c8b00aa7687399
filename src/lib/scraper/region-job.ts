/**
 * Region Job
 *
 * Runs one region through SCRAPING → FILTERING → VERIFYING → PUBLISHING.
 * Stage boundaries are the cancellation checkpoints. A failure fails this
 * region only; the returned result always describes where it stopped.
 */

import {
  ErrorKind,
  PipelineStage,
  RegionStatus,
  type ErrorRecord,
  type RawCandidate,
  type RegionCounts,
  type RegionResult,
  type SettingsSnapshot,
  type VerifiedCandidate,
} from '@/types';
import { verifyCandidates, type ClassificationService, type RetryPolicy } from '../ai/clinic-verifier';
import { errorMessage, PipelineError, RunCancelledError, SourceUnavailableError } from '../errors';
import type { ResultPublisher } from '../sheets/result-publisher';
import type { CancellationToken } from './cancellation';
import { filterCandidates } from './exclusion-filter';
import type { ListingSource } from './google-maps';
import type { ProgressStream } from './progress-stream';

export interface RegionJobContext {
  region: string;
  previewMode: boolean;
  settings: SettingsSnapshot;
  token: CancellationToken;
  stream: ProgressStream;
}

export interface RegionJobDeps {
  source: ListingSource;
  classifier: ClassificationService;
  /** Absent in preview mode */
  publisher: ResultPublisher | null;
  maxResults: number;
  verifyConcurrency: number;
  retryPolicy?: RetryPolicy;
}

const STAGE_STATUS: Record<PipelineStage, RegionStatus> = {
  [PipelineStage.SCRAPING]: RegionStatus.SCRAPING,
  [PipelineStage.FILTERING]: RegionStatus.FILTERING,
  [PipelineStage.VERIFYING]: RegionStatus.VERIFYING,
  [PipelineStage.PUBLISHING]: RegionStatus.PUBLISHING,
};

export function emptyCounts(): RegionCounts {
  return {
    found: 0,
    excluded: 0,
    verified: 0,
    qualified: 0,
    rejected: 0,
    verificationFailed: 0,
    duplicates: 0,
    published: 0,
  };
}

export function createRegionResult(region: string, status: RegionStatus = RegionStatus.QUEUED): RegionResult {
  return { region, status, errors: [], counts: emptyCounts(), qualified: [], published: [] };
}

function fallbackKind(stage?: PipelineStage): ErrorKind {
  if (stage === PipelineStage.PUBLISHING) return ErrorKind.PUBLISH_UNAVAILABLE;
  if (stage === PipelineStage.VERIFYING) return ErrorKind.VERIFICATION_FAILED;
  return ErrorKind.SOURCE_UNAVAILABLE;
}

export function toErrorRecord(error: unknown, region?: string, stage?: PipelineStage): ErrorRecord {
  return {
    kind: error instanceof PipelineError ? error.kind : fallbackKind(stage),
    message: errorMessage(error),
    region,
    stage,
  };
}

export async function runRegionJob(ctx: RegionJobContext, deps: RegionJobDeps): Promise<RegionResult> {
  const { region, stream, token } = ctx;
  const result = createRegionResult(region);
  const { counts } = result;
  let stage: PipelineStage = PipelineStage.SCRAPING;

  const enterStage = (next: PipelineStage, message: string) => {
    // Checkpoint: a cancelled run stops here, between stages
    token.throwIfCancelled();
    stage = next;
    result.status = STAGE_STATUS[next];
    stream.emit({ type: 'stage:started', level: 'progress', region, stage: next, message });
  };

  try {
    // ── Scraping ──
    enterStage(PipelineStage.SCRAPING, `🔍 Searching "${region} ${ctx.settings.searchSuffix}"`);
    const candidates = await scrapeRegion(ctx, deps, counts);

    // ── Filtering ──
    enterStage(PipelineStage.FILTERING, `Filtering ${candidates.length} listing(s)`);
    const { kept, excluded } = filterCandidates(candidates, ctx.settings.ruleSet);
    counts.excluded = excluded.length;
    for (const { candidate, reason } of excluded) {
      stream.emit({
        type: 'candidate:excluded',
        region,
        stage,
        message: `Excluded ${candidate.name} (${reason.rule}: ${reason.pattern})`,
        details: { name: candidate.name, rule: reason.rule, pattern: reason.pattern },
      });
    }

    // ── Verifying ──
    enterStage(PipelineStage.VERIFYING, `🧠 Verifying ${kept.length} candidate(s)`);
    const outcomes = await verifyCandidates(kept, deps.classifier, {
      concurrency: deps.verifyConcurrency,
      policy: deps.retryPolicy,
      token,
      onOutcome: (outcome) => {
        if (outcome.status === 'failed') {
          counts.verificationFailed++;
          const record: ErrorRecord = {
            ...toErrorRecord(outcome.error, region, PipelineStage.VERIFYING),
            candidate: outcome.candidate.name,
          };
          result.errors.push(record);
          stream.emit({
            type: 'error',
            level: 'warning',
            region,
            stage: PipelineStage.VERIFYING,
            message: outcome.error.message,
            details: { kind: record.kind, candidate: record.candidate, attempts: outcome.attempts },
          });
          return;
        }

        const { candidate } = outcome;
        counts.verified++;
        if (candidate.verdict.qualifies) counts.qualified++;
        else counts.rejected++;
        stream.emit({
          type: 'candidate:verified',
          level: candidate.verdict.qualifies ? 'success' : 'info',
          region,
          stage: PipelineStage.VERIFYING,
          message: `${candidate.verdict.qualifies ? '✅' : '❌'} ${candidate.name}: ${candidate.verdict.rationale}`,
          details: {
            name: candidate.name,
            qualifies: candidate.verdict.qualifies,
            normalizedName: candidate.verdict.normalizedName,
            attempts: candidate.attempts,
          },
        });
      },
    });

    const qualified: VerifiedCandidate[] = [];
    for (const outcome of outcomes) {
      if (outcome.status === 'verified' && outcome.candidate.verdict.qualifies) {
        qualified.push(outcome.candidate);
      }
    }
    result.qualified = qualified;

    // ── Publishing ──
    if (!ctx.previewMode && deps.publisher) {
      enterStage(PipelineStage.PUBLISHING, `📤 Publishing ${qualified.length} row(s)`);
      const { published, duplicates } = await deps.publisher.publishRegion(region, qualified, {
        previewMode: ctx.previewMode,
        token,
      });

      counts.duplicates = duplicates.length;
      for (const duplicate of duplicates) {
        stream.emit({
          type: 'candidate:duplicate',
          region,
          stage,
          message: `Already in sheet: ${duplicate.name}`,
          details: { name: duplicate.name, address: duplicate.address },
        });
      }

      counts.published = published.length;
      result.published = published;
      stream.emit({
        type: 'rows:published',
        level: 'success',
        region,
        stage,
        message: `Published ${published.length} row(s)`,
        details: { published: published.length, duplicates: duplicates.length },
      });
    } else {
      token.throwIfCancelled();
    }

    result.status = RegionStatus.DONE;
    stream.emit({
      type: 'region:complete',
      level: 'success',
      region,
      message: `✅ ${region}: ${counts.found} found, ${counts.excluded} excluded, ${counts.qualified} qualified, ${counts.published} published`,
      details: { status: result.status, counts: { ...counts } },
    });
  } catch (error) {
    if (error instanceof RunCancelledError) {
      result.status = RegionStatus.CANCELLED;
      stream.emit({
        type: 'region:complete',
        level: 'warning',
        region,
        message: `🛑 ${region}: cancelled before ${stage}`,
        details: { status: result.status, counts: { ...counts } },
      });
      return result;
    }

    const record = toErrorRecord(error, region, stage);
    result.status = RegionStatus.FAILED;
    result.failedStage = stage;
    result.error = record;
    result.errors.push(record);

    stream.emit({
      type: 'error',
      level: 'error',
      region,
      stage,
      message: record.message,
      details: { kind: record.kind },
    });
    stream.emit({
      type: 'region:complete',
      level: 'error',
      region,
      message: `❌ ${region}: failed during ${stage} (${record.kind})`,
      details: { status: result.status, failedStage: stage, counts: { ...counts } },
    });
  }

  return result;
}

/**
 * Drain the listing source for the region. A browser crash gets exactly one
 * more attempt with a fresh browser.
 */
async function scrapeRegion(
  ctx: RegionJobContext,
  deps: RegionJobDeps,
  counts: RegionCounts
): Promise<RawCandidate[]> {
  const { region, stream, token } = ctx;
  const query = { region, suffix: ctx.settings.searchSuffix, maxResults: deps.maxResults };

  for (let attempt = 1; ; attempt++) {
    const found: RawCandidate[] = [];
    counts.found = 0;

    try {
      for await (const candidate of deps.source.search(query, token)) {
        found.push(candidate);
        counts.found++;
        stream.emit({
          type: 'candidate:found',
          region,
          stage: PipelineStage.SCRAPING,
          message: `Found ${candidate.name}${candidate.sponsored ? ' (sponsored)' : ''}`,
          details: { name: candidate.name, area: candidate.area, index: found.length },
        });
      }
      return found;
    } catch (error) {
      if (error instanceof SourceUnavailableError && error.reason === 'browser-crashed' && attempt === 1) {
        stream.emit({
          type: 'stage:started',
          level: 'warning',
          region,
          stage: PipelineStage.SCRAPING,
          message: `Browser crashed, retrying "${region}" with a fresh browser`,
          details: { attempt: attempt + 1 },
        });
        continue;
      }
      throw error;
    }
  }
}
