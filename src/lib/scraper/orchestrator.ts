/**
 * Pipeline Orchestrator
 *
 * Starts runs, fans regions out over a bounded pool, merges their progress
 * into one stream and folds region results into the run summary. Keeps a
 * registry of active runs for readiness checks and external cancellation.
 */

import {
  ErrorKind,
  RegionStatus,
  RunStatus,
  type ErrorRecord,
  type ProgressEvent,
  type RegionResult,
  type RunRequest,
  type RunSummary,
  type RunTotals,
  type SettingsSnapshot,
} from '@/types';
import { randomUUID } from 'node:crypto';
import type { ClassificationService, RetryPolicy } from '../ai/clinic-verifier';
import { errorMessage, PipelineError } from '../errors';
import type { RunEvents } from '../events';
import type { ResultPublisher } from '../sheets/result-publisher';
import type { SettingsStore } from '../settings';
import { runWithConcurrency } from '../utils';
import { CancellationToken } from './cancellation';
import type { ListingSource } from './google-maps';
import { ProgressStream } from './progress-stream';
import { createRegionResult, runRegionJob, toErrorRecord } from './region-job';
import { parseRunRequest } from './run-request';

export interface OrchestratorOptions {
  maxParallelRegions: number;
  maxRegionsPerRun: number;
  timeoutMs: number;
  maxResults: number;
  verifyConcurrency: number;
  retryPolicy?: RetryPolicy;
  /** Echo progress events to the console */
  echo?: boolean;
}

export interface OrchestratorDeps {
  source: ListingSource;
  classifier: ClassificationService;
  settingsStore: SettingsStore;
  /** Called once per non-preview run */
  createPublisher: () => ResultPublisher;
  events?: RunEvents;
  options: OrchestratorOptions;
}

/**
 * Handle to a started run
 */
export interface PipelineRun {
  readonly id: string;
  readonly status: RunStatus;
  /** Replays from the start, then follows live until the run ends */
  readonly events: AsyncIterable<ProgressEvent>;
  readonly stream: ProgressStream;
  readonly summary: Promise<RunSummary>;
  cancel(): void;
}

interface ActiveRun {
  token: CancellationToken;
  stream: ProgressStream;
  status: RunStatus;
}

export function computeRunStatus(
  regions: readonly RegionResult[],
  token: CancellationToken,
  runFailed: boolean
): RunStatus {
  if (token.reason === 'cancelled') return RunStatus.CANCELLED;
  if (token.reason === 'timed-out') return RunStatus.TIMED_OUT;
  if (runFailed) return RunStatus.FAILED;

  const done = regions.filter((r) => r.status === RegionStatus.DONE).length;
  const failed = regions.filter((r) => r.status === RegionStatus.FAILED).length;
  if (done === 0) return RunStatus.FAILED;
  if (failed > 0) return RunStatus.COMPLETED_WITH_ERRORS;
  return RunStatus.COMPLETED;
}

export function computeTotals(regions: readonly RegionResult[], errors: readonly ErrorRecord[]): RunTotals {
  const totals: RunTotals = {
    found: 0,
    excluded: 0,
    verifiedQualified: 0,
    published: 0,
    duplicates: 0,
    verificationFailed: 0,
    errors: errors.length,
  };
  for (const { counts } of regions) {
    totals.found += counts.found;
    totals.excluded += counts.excluded;
    totals.verifiedQualified += counts.qualified;
    totals.published += counts.published;
    totals.duplicates += counts.duplicates;
    totals.verificationFailed += counts.verificationFailed;
  }
  return totals;
}

export class PipelineOrchestrator {
  private readonly deps: OrchestratorDeps;
  private readonly activeRuns = new Map<string, ActiveRun>();

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
  }

  isProcessing(): boolean {
    return this.activeRuns.size > 0;
  }

  getActiveRunCount(): number {
    return this.activeRuns.size;
  }

  /**
   * Request cancellation of an active run. False when the run is unknown or finished.
   */
  cancelRun(runId: string): boolean {
    const run = this.activeRuns.get(runId);
    if (!run) return false;
    run.token.cancel();
    return true;
  }

  /**
   * Validate the request and start the run. Invalid requests throw; every
   * later failure ends up in the summary instead.
   */
  startRun(input: unknown): PipelineRun {
    const { options } = this.deps;
    const request = parseRunRequest(input, options.maxRegionsPerRun);
    const runId = randomUUID();
    const token = new CancellationToken(runId, options.timeoutMs);
    const stream = new ProgressStream(runId, { echo: options.echo });
    const active: ActiveRun = { token, stream, status: RunStatus.IDLE };

    this.activeRuns.set(runId, active);

    const summary = this.execute(runId, request, active).finally(() => {
      this.activeRuns.delete(runId);
      stream.close();
    });

    return {
      id: runId,
      get status() {
        return active.status;
      },
      events: stream,
      stream,
      summary,
      cancel: () => token.cancel(),
    };
  }

  private async execute(runId: string, request: RunRequest, active: ActiveRun): Promise<RunSummary> {
    const { options, events } = this.deps;
    const { token, stream } = active;
    const startedAt = new Date();
    const regions = request.regions.map((region) => createRegionResult(region));
    const runErrors: ErrorRecord[] = [];
    let runFailed = false;
    active.status = RunStatus.RUNNING;

    console.log(`\n🔍 [Run ${runId}] Starting pipeline run`);
    console.log(`   Regions: ${request.regions.join(', ')}`);
    console.log(`   Preview: ${request.previewMode ? 'yes' : 'no'}\n`);

    stream.emit({
      type: 'run:started',
      level: 'info',
      message: `🚀 Run started for ${request.regions.length} region(s)${request.previewMode ? ' (preview)' : ''}`,
      details: { regions: request.regions, previewMode: request.previewMode },
    });
    void events?.runStarted({ runId, regions: request.regions, previewMode: request.previewMode });

    const deadline = setTimeout(() => token.expire(), options.timeoutMs);

    try {
      const settings = await this.loadSettings(runId, stream, runErrors);
      if (!settings) {
        runFailed = true;
      } else {
        const publisher = request.previewMode ? null : this.deps.createPublisher();

        await runWithConcurrency(request.regions, options.maxParallelRegions, async (region, index) => {
          // Queued regions are never launched once the run is stopping
          if (token.isCancelled) return;
          regions[index] = await runRegionJob(
            { region, previewMode: request.previewMode, settings, token, stream },
            {
              source: this.deps.source,
              classifier: this.deps.classifier,
              publisher,
              maxResults: options.maxResults,
              verifyConcurrency: options.verifyConcurrency,
              retryPolicy: options.retryPolicy,
            }
          );
        });
      }
    } catch (error) {
      runFailed = true;
      const record = toErrorRecord(error);
      runErrors.push(record);
      stream.emit({ type: 'error', level: 'error', message: record.message, details: { kind: record.kind } });
    } finally {
      clearTimeout(deadline);
    }

    // Regions the run never got to
    for (const region of regions) {
      if (region.status === RegionStatus.QUEUED) region.status = RegionStatus.CANCELLED;
    }

    const stopError = token.toError();
    if (stopError) {
      runErrors.push(toErrorRecord(stopError));
      stream.emit({ type: 'error', level: 'warning', message: stopError.message, details: { kind: stopError.kind } });
    }

    const status = computeRunStatus(regions, token, runFailed);
    const errors = [...runErrors, ...regions.flatMap((r) => r.errors)];
    const summary: RunSummary = {
      runId,
      status,
      previewMode: request.previewMode,
      regionsProcessed: regions.filter((r) => r.status === RegionStatus.DONE || r.status === RegionStatus.FAILED)
        .length,
      totals: computeTotals(regions, errors),
      regions,
      errors,
      startedAt,
      completedAt: new Date(),
    };
    active.status = status;

    const level = status === RunStatus.COMPLETED ? 'success' : status === RunStatus.COMPLETED_WITH_ERRORS ? 'warning' : 'error';
    stream.emit({
      type: 'run:complete',
      level,
      message: `🏁 Run ${status}: ${summary.totals.found} found, ${summary.totals.excluded} excluded, ${summary.totals.verifiedQualified} qualified, ${summary.totals.published} published`,
      details: { status, totals: summary.totals },
    });

    if (status === RunStatus.FAILED || status === RunStatus.TIMED_OUT) {
      void events?.runError({ runId, status, totals: summary.totals, error: errors[0]?.message });
    } else {
      void events?.runCompleted({ runId, status, totals: summary.totals });
    }

    return summary;
  }

  /**
   * Frozen settings for the run, or null after recording why they could not be read
   */
  private async loadSettings(
    runId: string,
    stream: ProgressStream,
    runErrors: ErrorRecord[]
  ): Promise<SettingsSnapshot | null> {
    try {
      return await this.deps.settingsStore.getSnapshot();
    } catch (error) {
      const record: ErrorRecord = {
        kind: error instanceof PipelineError ? error.kind : ErrorKind.CONFIGURATION,
        message: errorMessage(error),
      };
      runErrors.push(record);
      console.error(`[Run ${runId}] Settings unavailable:`, record.message);
      stream.emit({ type: 'error', level: 'error', message: record.message, details: { kind: record.kind } });
      return null;
    }
  }
}
