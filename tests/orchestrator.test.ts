import { describe, it, expect } from 'vitest';
import { ClassificationServiceError, InvalidRunRequestError, RuleSetInvalidError, SourceUnavailableError } from '@/lib/errors';
import type { RunEvent, RunEvents } from '@/lib/events';
import type { CancellationToken } from '@/lib/scraper/cancellation';
import type { ListingQuery, ListingSource } from '@/lib/scraper/google-maps';
import { PipelineOrchestrator, type OrchestratorOptions } from '@/lib/scraper/orchestrator';
import { MemorySettingsStore, type SettingsStore } from '@/lib/settings';
import { ResultPublisher } from '@/lib/sheets/result-publisher';
import { sleep } from '@/lib/utils';
import {
  ErrorKind,
  PipelineStage,
  RegionStatus,
  RunStatus,
  type ProgressEvent,
  type RawCandidate,
  type SettingsSnapshot,
} from '@/types';
import {
  FAST_RETRY,
  FakeClassifier,
  FakeListingSource,
  FakeSpreadsheet,
  HangingSpreadsheet,
  makeCandidate,
  TEST_RULES,
} from './helpers';

const SETTINGS: SettingsSnapshot = { searchSuffix: 'AGAクリニック', ruleSet: TEST_RULES };

const OPTIONS: OrchestratorOptions = {
  maxParallelRegions: 2,
  maxRegionsPerRun: 5,
  timeoutMs: 5000,
  maxResults: 50,
  verifyConcurrency: 2,
  retryPolicy: FAST_RETRY,
  echo: false,
};

const REJECTED = new Set(['美容サロンF', 'エステG']);

function shibuyaListings(): RawCandidate[] {
  const clinics = ['A皮膚科', 'B内科', 'Cクリニック', 'D医院', 'E皮膚科', '美容サロンF', 'エステG'].map((name, i) =>
    makeCandidate({ name, address: `東京都渋谷区道玄坂1-${i + 1}` })
  );
  return [
    ...clinics,
    makeCandidate({ name: 'スポンサー皮膚科', address: '東京都渋谷区神南1-1', sponsored: true }),
    makeCandidate({ name: 'ポータル掲載医院', address: '東京都渋谷区神南1-2', website: 'https://www.epark.jp/clinic/9' }),
    makeCandidate({ name: 'TCB渋谷院', address: '東京都渋谷区神南1-3' }),
  ];
}

function shinjukuListings(): RawCandidate[] {
  return [
    makeCandidate({ name: '新宿皮膚科', address: '東京都新宿区西新宿1-1', region: '新宿' }),
    makeCandidate({ name: '西口内科', address: '東京都新宿区西新宿1-2', region: '新宿' }),
  ];
}

function recordingEvents() {
  const calls: Array<[string, RunEvent]> = [];
  const events: RunEvents = {
    runStarted: async (event) => {
      calls.push(['run:started', event]);
    },
    runCompleted: async (event) => {
      calls.push(['run:completed', event]);
    },
    runError: async (event) => {
      calls.push(['run:error', event]);
    },
  };
  return { events, calls };
}

interface Setup {
  source?: ListingSource;
  classifier?: FakeClassifier;
  settingsStore?: SettingsStore;
  sheet?: FakeSpreadsheet;
  options?: Partial<OrchestratorOptions>;
}

function setup(overrides: Setup = {}) {
  const source =
    overrides.source ??
    new FakeListingSource({
      渋谷: shibuyaListings(),
      大阪: new SourceUnavailableError('大阪', 'navigation-failed', 'net::ERR_NAME_NOT_RESOLVED'),
      新宿: shinjukuListings(),
    });
  const classifier =
    overrides.classifier ??
    new FakeClassifier((name) => ({
      qualifies: !REJECTED.has(name),
      normalizedName: name,
      rationale: REJECTED.has(name) ? 'not a clinic' : 'independent clinic',
    }));
  const settingsStore = overrides.settingsStore ?? new MemorySettingsStore(SETTINGS);
  const sheet = overrides.sheet ?? new FakeSpreadsheet();
  const counter = { publishers: 0 };
  const { events, calls } = recordingEvents();

  const orchestrator = new PipelineOrchestrator({
    source,
    classifier,
    settingsStore,
    createPublisher: () => {
      counter.publishers++;
      return new ResultPublisher(sheet, 'test-sheet');
    },
    events,
    options: { ...OPTIONS, ...overrides.options },
  });

  return { orchestrator, source, classifier, settingsStore, sheet, counter, eventCalls: calls };
}

function eventsOf(events: ProgressEvent[], type: ProgressEvent['type']): ProgressEvent[] {
  return events.filter((event) => event.type === type);
}

describe('PipelineOrchestrator', () => {
  describe('mixed outcome', () => {
    it('publishes the healthy region and reports the failed one', async () => {
      const { orchestrator, sheet, eventCalls } = setup();

      const run = orchestrator.startRun({ regions: '渋谷, 大阪' });
      const summary = await run.summary;

      expect(summary.status).toBe(RunStatus.COMPLETED_WITH_ERRORS);
      expect(run.status).toBe(RunStatus.COMPLETED_WITH_ERRORS);
      expect(summary.previewMode).toBe(false);
      expect(summary.regionsProcessed).toBe(2);
      expect(summary.totals).toEqual({
        found: 10,
        excluded: 3,
        verifiedQualified: 5,
        published: 5,
        duplicates: 0,
        verificationFailed: 0,
        errors: 1,
      });

      const [shibuya, osaka] = summary.regions;
      expect(shibuya.status).toBe(RegionStatus.DONE);
      expect(shibuya.counts.rejected).toBe(2);
      expect(shibuya.published.map((row) => row.name)).toEqual(['A皮膚科', 'B内科', 'Cクリニック', 'D医院', 'E皮膚科']);

      expect(osaka.status).toBe(RegionStatus.FAILED);
      expect(osaka.failedStage).toBe(PipelineStage.SCRAPING);
      expect(osaka.error?.kind).toBe(ErrorKind.SOURCE_UNAVAILABLE);
      expect(summary.errors).toHaveLength(1);
      expect(summary.errors[0]).toMatchObject({
        kind: ErrorKind.SOURCE_UNAVAILABLE,
        region: '大阪',
        stage: PipelineStage.SCRAPING,
      });

      expect(sheet.rows).toHaveLength(5);
      expect(sheet.appendCalls).toBe(1);
      expect(eventCalls.map(([type]) => type)).toEqual(['run:started', 'run:completed']);
    });

    it('searches every region with the configured suffix', async () => {
      const source = new FakeListingSource({ 渋谷: shibuyaListings(), 新宿: shinjukuListings() });
      const { orchestrator } = setup({ source });

      await orchestrator.startRun({ regions: ['渋谷', '新宿'] }).summary;

      expect(source.queries.map((q) => `${q.region} ${q.suffix}`).sort()).toEqual([
        '新宿 AGAクリニック',
        '渋谷 AGAクリニック',
      ]);
    });

    it('emits region-tagged progress from start to finish', async () => {
      const { orchestrator } = setup();

      const run = orchestrator.startRun({ regions: '渋谷,大阪' });
      await run.summary;
      const events: ProgressEvent[] = [];
      for await (const event of run.events) events.push(event);

      expect(events[0].type).toBe('run:started');
      expect(events[events.length - 1].type).toBe('run:complete');
      expect(eventsOf(events, 'candidate:found')).toHaveLength(10);
      expect(eventsOf(events, 'candidate:excluded')).toHaveLength(3);
      expect(eventsOf(events, 'region:complete').map((e) => e.region).sort()).toEqual(['大阪', '渋谷']);

      const [failure] = eventsOf(events, 'error');
      expect(failure.region).toBe('大阪');
      expect(failure.stage).toBe(PipelineStage.SCRAPING);
      expect(failure.details?.kind).toBe(ErrorKind.SOURCE_UNAVAILABLE);
    });
  });

  describe('publishing', () => {
    it('does not republish rows on a second run', async () => {
      const sheet = new FakeSpreadsheet();
      const first = setup({ sheet });
      await first.orchestrator.startRun({ regions: '渋谷' }).summary;

      const second = setup({ sheet });
      const summary = await second.orchestrator.startRun({ regions: '渋谷' }).summary;

      expect(summary.status).toBe(RunStatus.COMPLETED);
      expect(summary.totals.published).toBe(0);
      expect(summary.totals.duplicates).toBe(5);
      expect(sheet.rows).toHaveLength(5);
    });

    it('never creates a publisher in preview mode', async () => {
      const { orchestrator, sheet, counter } = setup();

      const run = orchestrator.startRun({ regions: '渋谷', previewMode: true });
      const summary = await run.summary;

      expect(counter.publishers).toBe(0);
      expect(sheet.fetchCalls).toBe(0);
      expect(summary.status).toBe(RunStatus.COMPLETED);
      expect(summary.previewMode).toBe(true);
      expect(summary.totals.published).toBe(0);
      expect(summary.regions[0].qualified.map((c) => c.name)).toEqual([
        'A皮膚科',
        'B内科',
        'Cクリニック',
        'D医院',
        'E皮膚科',
      ]);
      expect(eventsOf(run.stream.getEvents(), 'rows:published')).toEqual([]);
    });

    it('fails only the region whose append is rejected', async () => {
      const sheet = new FakeSpreadsheet();
      sheet.failNextAppend = Object.assign(new Error('The caller does not have permission'), { status: 403 });
      const { orchestrator } = setup({ sheet, options: { maxParallelRegions: 1 } });

      const summary = await orchestrator.startRun({ regions: '新宿,渋谷' }).summary;

      expect(summary.status).toBe(RunStatus.COMPLETED_WITH_ERRORS);
      expect(summary.regions[0]).toMatchObject({ region: '新宿', status: RegionStatus.FAILED, failedStage: PipelineStage.PUBLISHING });
      expect(summary.regions[0].error?.kind).toBe(ErrorKind.PUBLISH_UNAUTHORIZED);
      expect(summary.regions[1].status).toBe(RegionStatus.DONE);
      expect(sheet.rows.map((row) => row.region)).toEqual(['渋谷', '渋谷', '渋谷', '渋谷', '渋谷']);
    });
  });

  describe('verification failures', () => {
    it('drops the candidate and keeps the region going', async () => {
      const classifier = new FakeClassifier((name) =>
        name === 'B内科'
          ? new ClassificationServiceError('unavailable', 'upstream 502')
          : { qualifies: !REJECTED.has(name), normalizedName: name, rationale: '' }
      );
      const { orchestrator } = setup({ classifier });

      const summary = await orchestrator.startRun({ regions: '渋谷' }).summary;

      expect(summary.status).toBe(RunStatus.COMPLETED);
      expect(summary.totals.verificationFailed).toBe(1);
      expect(summary.totals.published).toBe(4);
      expect(summary.errors).toEqual([
        {
          kind: ErrorKind.VERIFICATION_FAILED,
          message: 'Verification failed for "B内科" after 3 attempt(s): unavailable: upstream 502',
          region: '渋谷',
          stage: PipelineStage.VERIFYING,
          candidate: 'B内科',
        },
      ]);
      expect(classifier.calls.filter((name) => name === 'B内科')).toHaveLength(3);
    });
  });

  describe('source failures', () => {
    it('retries a crashed browser once', async () => {
      let searches = 0;
      const source = new FakeListingSource({
        渋谷: () => (++searches === 1 ? new SourceUnavailableError('渋谷', 'browser-crashed') : shibuyaListings()),
      });
      const { orchestrator } = setup({ source });

      const run = orchestrator.startRun({ regions: '渋谷' });
      const summary = await run.summary;

      expect(source.queries).toHaveLength(2);
      expect(summary.regions[0].status).toBe(RegionStatus.DONE);
      expect(summary.regions[0].counts.found).toBe(10);
      const warnings = run.stream.getEvents().filter((e) => e.level === 'warning' && e.type === 'stage:started');
      expect(warnings.map((e) => e.message)).toEqual(['Browser crashed, retrying "渋谷" with a fresh browser']);
    });

    it('fails the region when the browser crashes twice', async () => {
      const source = new FakeListingSource({ 渋谷: () => new SourceUnavailableError('渋谷', 'browser-crashed') });
      const { orchestrator } = setup({ source });

      const summary = await orchestrator.startRun({ regions: '渋谷' }).summary;

      expect(source.queries).toHaveLength(2);
      expect(summary.status).toBe(RunStatus.FAILED);
      expect(summary.regions[0].error?.kind).toBe(ErrorKind.SOURCE_UNAVAILABLE);
    });

    it('does not retry navigation failures', async () => {
      const { orchestrator, source } = setup();

      await orchestrator.startRun({ regions: '大阪' }).summary;

      expect(source).toBeInstanceOf(FakeListingSource);
      if (source instanceof FakeListingSource) expect(source.queries).toHaveLength(1);
    });
  });

  describe('concurrency', () => {
    it('runs at most maxParallelRegions regions at once', async () => {
      let inFlight = 0;
      let peak = 0;
      const source: ListingSource = {
        async *search(query: ListingQuery) {
          inFlight++;
          peak = Math.max(peak, inFlight);
          await sleep(20);
          inFlight--;
          yield makeCandidate({ name: `${query.region}皮膚科`, address: `${query.region}1-1`, region: query.region });
        },
      };
      const { orchestrator } = setup({ source, options: { maxParallelRegions: 2 } });

      const summary = await orchestrator.startRun({ regions: 'A,B,C,D' }).summary;

      expect(peak).toBe(2);
      expect(summary.status).toBe(RunStatus.COMPLETED);
      expect(summary.regions.map((r) => r.region)).toEqual(['A', 'B', 'C', 'D']);
    });

    it('tracks active runs', async () => {
      const { orchestrator } = setup();

      const run = orchestrator.startRun({ regions: '渋谷' });
      expect(run.status).toBe(RunStatus.RUNNING);
      expect(orchestrator.isProcessing()).toBe(true);
      expect(orchestrator.getActiveRunCount()).toBe(1);

      await run.summary;
      expect(run.status).toBe(RunStatus.COMPLETED);
      expect(orchestrator.isProcessing()).toBe(false);
      expect(orchestrator.cancelRun(run.id)).toBe(false);
    });
  });

  describe('settings', () => {
    it('uses the snapshot taken at run start', async () => {
      const settingsStore = new MemorySettingsStore(SETTINGS);
      let edit: Promise<SettingsSnapshot> | undefined;
      const source = new FakeListingSource({
        渋谷: () => {
          edit = settingsStore.addChainKeyword('A皮膚科');
          return shibuyaListings();
        },
      });
      const { orchestrator } = setup({ source, settingsStore });

      const first = await orchestrator.startRun({ regions: '渋谷' }).summary;
      await edit;
      const second = await orchestrator.startRun({ regions: '渋谷' }).summary;

      expect(first.totals.excluded).toBe(3);
      expect(second.totals.excluded).toBe(4);
    });

    it('fails the run when the rule set is invalid', async () => {
      class BrokenSettingsStore extends MemorySettingsStore {
        getSnapshot(): Promise<SettingsSnapshot> {
          return Promise.reject(new RuleSetInvalidError('Invalid exclusion rule set: affiliateDomains.0: Malformed domain'));
        }
      }
      const { orchestrator, source, counter, eventCalls } = setup({ settingsStore: new BrokenSettingsStore() });

      const summary = await orchestrator.startRun({ regions: '渋谷,新宿' }).summary;

      expect(summary.status).toBe(RunStatus.FAILED);
      expect(summary.errors[0].kind).toBe(ErrorKind.RULE_SET_INVALID);
      expect(summary.regions.map((r) => r.status)).toEqual([RegionStatus.CANCELLED, RegionStatus.CANCELLED]);
      expect(summary.regionsProcessed).toBe(0);
      expect(counter.publishers).toBe(0);
      if (source instanceof FakeListingSource) expect(source.queries).toEqual([]);
      expect(eventCalls.map(([type]) => type)).toEqual(['run:started', 'run:error']);
    });
  });

  describe('run requests', () => {
    it('rejects an empty region list', () => {
      const { orchestrator } = setup();
      expect(() => orchestrator.startRun({ regions: ' , 、' })).toThrow(InvalidRunRequestError);
      expect(orchestrator.isProcessing()).toBe(false);
    });

    it('rejects more regions than allowed', () => {
      const { orchestrator } = setup();
      expect(() => orchestrator.startRun({ regions: 'a,b,c,d,e,f' })).toThrow('At most 5 regions per run');
    });
  });

  describe('cancellation', () => {
    it('stops at the next stage boundary and never launches queued regions', async () => {
      let runId = '';
      let accepted = false;
      const holder: { orchestrator?: PipelineOrchestrator } = {};
      const source = new FakeListingSource({
        A: () => {
          accepted = holder.orchestrator?.cancelRun(runId) ?? false;
          return [makeCandidate()];
        },
        B: [makeCandidate()],
      });
      const { orchestrator, classifier, counter, eventCalls } = setup({ source, options: { maxParallelRegions: 1 } });
      holder.orchestrator = orchestrator;

      const run = orchestrator.startRun({ regions: 'A,B,C' });
      runId = run.id;
      const summary = await run.summary;

      expect(accepted).toBe(true);
      expect(summary.status).toBe(RunStatus.CANCELLED);
      expect(summary.regions.map((r) => r.status)).toEqual([
        RegionStatus.CANCELLED,
        RegionStatus.CANCELLED,
        RegionStatus.CANCELLED,
      ]);
      expect(summary.regions[0].counts.found).toBe(1);
      expect(source.queries.map((q) => q.region)).toEqual(['A']);
      expect(classifier.calls).toEqual([]);
      expect(counter.publishers).toBe(1);
      expect(summary.errors.map((e) => e.kind)).toEqual([ErrorKind.RUN_CANCELLED]);
      expect(summary.regionsProcessed).toBe(0);
      expect(eventCalls.map(([type, event]) => [type, event.status])).toEqual([
        ['run:started', undefined],
        ['run:completed', RunStatus.CANCELLED],
      ]);
    });
  });

  describe('deadline', () => {
    it('fails in-flight regions and skips queued ones', async () => {
      const source: ListingSource = {
        async *search(_query: ListingQuery, token?: CancellationToken) {
          await new Promise<void>((resolve) => token?.signal.addEventListener('abort', () => resolve(), { once: true }));
          throw token?.toError() ?? new Error('search ended without a stop signal');
        },
      };
      const { orchestrator, eventCalls } = setup({ source, options: { maxParallelRegions: 1, timeoutMs: 50 } });

      const summary = await orchestrator.startRun({ regions: 'A,B' }).summary;

      expect(summary.status).toBe(RunStatus.TIMED_OUT);
      expect(summary.regions[0]).toMatchObject({ status: RegionStatus.FAILED, failedStage: PipelineStage.SCRAPING });
      expect(summary.regions[0].error?.kind).toBe(ErrorKind.RUN_TIMED_OUT);
      expect(summary.regions[1].status).toBe(RegionStatus.CANCELLED);
      expect(summary.errors.map((e) => [e.kind, e.region])).toEqual([
        [ErrorKind.RUN_TIMED_OUT, undefined],
        [ErrorKind.RUN_TIMED_OUT, 'A'],
      ]);
      expect(eventCalls.map(([type]) => type)).toEqual(['run:started', 'run:error']);
    });

    it('ends a run stuck on the sheet', async () => {
      const sheet = new HangingSpreadsheet();
      const { orchestrator } = setup({ sheet, options: { timeoutMs: 50 } });

      const summary = await orchestrator.startRun({ regions: '新宿' }).summary;

      expect(summary.status).toBe(RunStatus.TIMED_OUT);
      expect(summary.regions[0]).toMatchObject({ status: RegionStatus.FAILED, failedStage: PipelineStage.PUBLISHING });
      expect(summary.regions[0].error?.kind).toBe(ErrorKind.RUN_TIMED_OUT);
      expect(summary.regions[0].counts.qualified).toBe(2);
      expect(summary.totals.published).toBe(0);
      expect(sheet.appendCalls).toBe(1);
      expect(orchestrator.isProcessing()).toBe(false);
    });
  });
});
