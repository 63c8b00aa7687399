/**
 * Settings store: the exclusion rule set and the search suffix.
 *
 * A run reads one frozen snapshot at start; edits made while it runs apply
 * to the next run only.
 */

import type { ExclusionRuleSet, SettingsSnapshot } from '@/types';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import defaultSettings from '../../config/default-settings.json';
import { ConfigurationError, errorMessage } from './errors';
import { validateRuleSet } from './scraper/exclusion-filter';

const settingsFileSchema = z.object({
  searchSuffix: z.string().trim().min(1, 'Search suffix must not be blank'),
  ruleSet: z.unknown(),
});

/**
 * Validate raw settings content into a frozen snapshot.
 * Throws RuleSetInvalid for a bad rule set, Configuration for anything else.
 */
export function parseSettings(input: unknown): SettingsSnapshot {
  const result = settingsFileSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError('Invalid settings', {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return freezeSnapshot({
    searchSuffix: result.data.searchSuffix,
    ruleSet: validateRuleSet(result.data.ruleSet),
  });
}

export function freezeSnapshot(snapshot: SettingsSnapshot): SettingsSnapshot {
  const ruleSet: ExclusionRuleSet = Object.freeze({
    chainKeywords: Object.freeze([...snapshot.ruleSet.chainKeywords]),
    affiliateDomains: Object.freeze([...snapshot.ruleSet.affiliateDomains]),
    excludeSponsored: snapshot.ruleSet.excludeSponsored,
  });
  return Object.freeze({ searchSuffix: snapshot.searchSuffix, ruleSet });
}

export function getDefaultSettings(): SettingsSnapshot {
  return parseSettings(defaultSettings);
}

export interface SettingsStore {
  getSnapshot(): Promise<SettingsSnapshot>;
  setRuleSet(ruleSet: unknown): Promise<SettingsSnapshot>;
  setSearchSuffix(suffix: string): Promise<SettingsSnapshot>;
  addChainKeyword(keyword: string): Promise<SettingsSnapshot>;
  removeChainKeyword(keyword: string): Promise<SettingsSnapshot>;
  addAffiliateDomain(domain: string): Promise<SettingsSnapshot>;
  removeAffiliateDomain(domain: string): Promise<SettingsSnapshot>;
}

/**
 * Edit helpers shared by every store. Updates are serialized so concurrent
 * edits do not overwrite each other.
 */
abstract class BaseSettingsStore implements SettingsStore {
  private queue: Promise<unknown> = Promise.resolve();

  protected abstract read(): Promise<SettingsSnapshot>;
  protected abstract write(snapshot: SettingsSnapshot): Promise<void>;

  getSnapshot(): Promise<SettingsSnapshot> {
    return this.read();
  }

  private update(edit: (current: SettingsSnapshot) => unknown): Promise<SettingsSnapshot> {
    const next = this.queue.then(async () => {
      const current = await this.read();
      const snapshot = parseSettings(edit(current));
      await this.write(snapshot);
      return snapshot;
    });
    this.queue = next.catch(() => undefined);
    return next;
  }

  setRuleSet(ruleSet: unknown): Promise<SettingsSnapshot> {
    return this.update((current) => ({ searchSuffix: current.searchSuffix, ruleSet }));
  }

  setSearchSuffix(suffix: string): Promise<SettingsSnapshot> {
    return this.update((current) => ({ searchSuffix: suffix, ruleSet: current.ruleSet }));
  }

  addChainKeyword(keyword: string): Promise<SettingsSnapshot> {
    const value = keyword.trim();
    return this.update((current) => ({
      searchSuffix: current.searchSuffix,
      ruleSet: {
        ...current.ruleSet,
        chainKeywords: current.ruleSet.chainKeywords.includes(value)
          ? current.ruleSet.chainKeywords
          : [...current.ruleSet.chainKeywords, value],
      },
    }));
  }

  removeChainKeyword(keyword: string): Promise<SettingsSnapshot> {
    const value = keyword.trim();
    return this.update((current) => ({
      searchSuffix: current.searchSuffix,
      ruleSet: {
        ...current.ruleSet,
        chainKeywords: current.ruleSet.chainKeywords.filter((k) => k !== value),
      },
    }));
  }

  addAffiliateDomain(domain: string): Promise<SettingsSnapshot> {
    const value = domain.trim().toLowerCase();
    return this.update((current) => ({
      searchSuffix: current.searchSuffix,
      ruleSet: {
        ...current.ruleSet,
        affiliateDomains: current.ruleSet.affiliateDomains.includes(value)
          ? current.ruleSet.affiliateDomains
          : [...current.ruleSet.affiliateDomains, value],
      },
    }));
  }

  removeAffiliateDomain(domain: string): Promise<SettingsSnapshot> {
    const value = domain.trim().toLowerCase();
    return this.update((current) => ({
      searchSuffix: current.searchSuffix,
      ruleSet: {
        ...current.ruleSet,
        affiliateDomains: current.ruleSet.affiliateDomains.filter((d) => d !== value),
      },
    }));
  }
}

/**
 * Settings kept in a JSON file. A missing file means the defaults.
 */
export class FileSettingsStore extends BaseSettingsStore {
  private readonly filePath: string;

  constructor(filePath: string) {
    super();
    this.filePath = filePath;
  }

  protected async read(): Promise<SettingsSnapshot> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return getDefaultSettings();
      throw new ConfigurationError(`Cannot read settings file ${this.filePath}`, { cause: errorMessage(error) });
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(`Settings file ${this.filePath} is not valid JSON`, { cause: errorMessage(error) });
    }
    return parseSettings(json);
  }

  protected async write(snapshot: SettingsSnapshot): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tempPath, `${JSON.stringify(snapshot, null, 2)}\n`, 'utf8');
    await rename(tempPath, this.filePath);
    console.log(`[Settings] Saved ${this.filePath}`);
  }
}

/**
 * Settings held in memory, for tests and one-off runs
 */
export class MemorySettingsStore extends BaseSettingsStore {
  private current: SettingsSnapshot;

  constructor(initial: SettingsSnapshot = getDefaultSettings()) {
    super();
    this.current = freezeSnapshot(initial);
  }

  protected async read(): Promise<SettingsSnapshot> {
    return this.current;
  }

  protected async write(snapshot: SettingsSnapshot): Promise<void> {
    this.current = snapshot;
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
