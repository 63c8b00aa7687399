import type { ClassificationRequest, ClassificationService, RetryPolicy } from '@/lib/ai/clinic-verifier';
import type { ListingQuery, ListingSource } from '@/lib/scraper/google-maps';
import type { ConnectionStatus, RequestOptions, SpreadsheetClient } from '@/lib/sheets/sheets-client';
import type { ExclusionRuleSet, PublishedRow, RawCandidate, Verdict, VerifiedCandidate } from '@/types';

export const FAST_RETRY: RetryPolicy = { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 4, timeoutMs: 1000 };

export const TEST_RULES: ExclusionRuleSet = {
  chainKeywords: ['AGAスキンクリニック', 'TCB', 'ゴリラクリニック'],
  affiliateDomains: ['epark.jp', 'hotpepper.jp'],
  excludeSponsored: true,
};

export function makeCandidate(overrides: Partial<RawCandidate> = {}): RawCandidate {
  return {
    name: '山田クリニック',
    address: '東京都渋谷区道玄坂1-2-3',
    phone: '03-1234-5678',
    website: 'https://yamada-clinic.example',
    categories: ['皮膚科'],
    region: '渋谷',
    sourceUrl: 'https://www.google.com/maps/place/yamada',
    sponsored: false,
    rating: 4.2,
    reviewCount: 31,
    area: '渋谷区',
    ...overrides,
  };
}

export function makeVerified(overrides: Partial<RawCandidate> = {}, verdict: Partial<Verdict> = {}): VerifiedCandidate {
  const candidate = makeCandidate(overrides);
  return {
    ...candidate,
    verdict: { qualifies: true, normalizedName: candidate.name, rationale: 'independent clinic', ...verdict },
    attempts: 1,
  };
}

/**
 * Name line the verifier puts at the top of every prompt
 */
export function promptName(request: ClassificationRequest): string {
  const match = request.prompt.match(/クリニック名: (.+)/);
  return match ? match[1] : '';
}

type ClassifyBehaviour = (name: string, call: number) => Verdict | Error | Promise<Verdict>;

/**
 * Classification stand-in driven by candidate name. `call` counts from 1 per name.
 */
export class FakeClassifier implements ClassificationService {
  readonly calls: string[] = [];
  private readonly behaviour: ClassifyBehaviour;

  constructor(behaviour: ClassifyBehaviour = (name) => ({ qualifies: true, normalizedName: name, rationale: 'ok' })) {
    this.behaviour = behaviour;
  }

  async classify(request: ClassificationRequest): Promise<Verdict> {
    const name = promptName(request);
    this.calls.push(name);
    const call = this.calls.filter((n) => n === name).length;
    const result = await this.behaviour(name, call);
    if (result instanceof Error) throw result;
    return result;
  }
}

/**
 * Listing source stand-in keyed by region. An Error entry is thrown after nothing is yielded.
 */
export class FakeListingSource implements ListingSource {
  readonly queries: ListingQuery[] = [];
  private readonly results: Record<string, RawCandidate[] | Error | (() => RawCandidate[] | Error)>;

  constructor(results: Record<string, RawCandidate[] | Error | (() => RawCandidate[] | Error)>) {
    this.results = results;
  }

  async *search(query: ListingQuery): AsyncGenerator<RawCandidate> {
    this.queries.push(query);
    const entry = this.results[query.region] ?? [];
    const result = typeof entry === 'function' ? entry() : entry;
    if (result instanceof Error) throw result;
    for (const candidate of result.slice(0, query.maxResults)) {
      yield candidate;
    }
  }
}

/**
 * In-memory sheet
 */
export class FakeSpreadsheet implements SpreadsheetClient {
  rows: PublishedRow[];
  appendCalls = 0;
  fetchCalls = 0;
  failNextAppend: Error | null = null;
  failNextFetch: Error | null = null;

  constructor(rows: PublishedRow[] = []) {
    this.rows = [...rows];
  }

  async fetchExistingRows(): Promise<PublishedRow[]> {
    this.fetchCalls++;
    if (this.failNextFetch) {
      const error = this.failNextFetch;
      this.failNextFetch = null;
      throw error;
    }
    return [...this.rows];
  }

  async appendRows(_spreadsheetId: string, rows: PublishedRow[]): Promise<void> {
    this.appendCalls++;
    if (this.failNextAppend) {
      const error = this.failNextAppend;
      this.failNextAppend = null;
      throw error;
    }
    this.rows.push(...rows);
  }

  async testConnection(): Promise<ConnectionStatus> {
    return { ok: true, sheetName: 'test', rowCount: this.rows.length };
  }
}

/**
 * Sheet whose appends never settle. Records the signal each append was given.
 */
export class HangingSpreadsheet extends FakeSpreadsheet {
  readonly signals: Array<AbortSignal | undefined> = [];

  appendRows(_spreadsheetId: string, _rows: PublishedRow[], options?: RequestOptions): Promise<void> {
    this.appendCalls++;
    this.signals.push(options?.signal);
    return new Promise<void>(() => undefined);
  }
}
