/**
 * Composition root: wires the production adapters into an orchestrator.
 */

import { createAiClassificationService } from './ai/clinic-verifier';
import { getLanguageModel } from './ai/providers';
import { assertSheetsConfigured, type AppConfig } from './config';
import { createRunEvents, EventPublisher } from './events';
import { createGoogleMapsSource } from './scraper/google-maps';
import { PipelineOrchestrator } from './scraper/orchestrator';
import { FileSettingsStore, type SettingsStore } from './settings';
import { ResultPublisher } from './sheets/result-publisher';
import { createSheetsClient } from './sheets/sheets-client';

export interface Pipeline {
  orchestrator: PipelineOrchestrator;
  settingsStore: SettingsStore;
  /** Release long-lived connections (Redis) */
  shutdown(): Promise<void>;
}

export interface CreatePipelineOptions {
  /** Fail fast on missing sheet configuration when runs will publish */
  publishing?: boolean;
  settingsStore?: SettingsStore;
}

export function createPipeline(config: AppConfig, options: CreatePipelineOptions = {}): Pipeline {
  const publishing = options.publishing ?? true;
  if (publishing) {
    assertSheetsConfigured(config);
  }

  const classifier = createAiClassificationService(getLanguageModel(config.ai));
  const settingsStore = options.settingsStore ?? new FileSettingsStore(config.settingsPath);
  const eventPublisher = new EventPublisher(config.redisUrl);

  const orchestrator = new PipelineOrchestrator({
    source: createGoogleMapsSource({
      headless: config.scraper.headless,
      locale: config.scraper.locale,
      navigationTimeoutMs: config.scraper.navigationTimeoutMs,
    }),
    classifier,
    settingsStore,
    createPublisher: () => {
      assertSheetsConfigured(config);
      return new ResultPublisher(createSheetsClient(config.sheets), config.sheets.spreadsheetId);
    },
    events: createRunEvents(eventPublisher),
    options: {
      maxParallelRegions: config.run.maxParallelRegions,
      maxRegionsPerRun: config.run.maxRegionsPerRun,
      timeoutMs: config.run.timeoutMs,
      maxResults: config.scraper.maxResults,
      verifyConcurrency: config.verifier.concurrency,
      retryPolicy: {
        maxRetries: config.verifier.maxRetries,
        baseDelayMs: 1000,
        maxDelayMs: 8000,
        timeoutMs: config.verifier.timeoutMs,
      },
    },
  });

  return {
    orchestrator,
    settingsStore,
    shutdown: () => eventPublisher.close(),
  };
}
