/**
 * Result Publisher
 *
 * Appends qualified candidates to the outreach sheet, one append per region.
 * Rows already in the sheet, or appended earlier in the run, are skipped as
 * duplicates. Regions publish one at a time so a batch is only ever checked
 * against appends that went through.
 */

import type { PublishedRow, VerifiedCandidate } from '@/types';
import { PipelineError } from '../errors';
import { withDeadline, type CancellationToken } from '../scraper/cancellation';
import { digitsOnly, normalizeText } from '../utils';
import { toPublishError, type SpreadsheetClient } from './sheets-client';

export interface PublishOutcome {
  published: PublishedRow[];
  duplicates: VerifiedCandidate[];
}

export interface PublishOptions {
  previewMode: boolean;
  /** The run deadline aborts sheet requests and ends a publish stuck behind one */
  token?: CancellationToken;
}

/**
 * Normalized name plus normalized address; phone digits stand in for a missing address.
 */
export function dedupKey(row: { name: string; address: string; phone: string }): string {
  const name = normalizeText(row.name);
  const address = normalizeText(row.address);
  if (address) return `${name}|${address}`;
  return `${name}|tel:${digitsOnly(row.phone)}`;
}

export function toPublishedRow(candidate: VerifiedCandidate, publishedAt: Date): PublishedRow {
  return {
    name: candidate.name,
    address: candidate.address,
    phone: candidate.phone,
    website: candidate.website,
    region: candidate.region,
    sourceUrl: candidate.sourceUrl,
    publishedAt: publishedAt.toISOString(),
    area: candidate.area,
    rating: candidate.rating === null ? '' : String(candidate.rating),
    reviewCount: candidate.reviewCount === null ? '' : String(candidate.reviewCount),
  };
}

export class ResultPublisher {
  private readonly client: SpreadsheetClient;
  private readonly spreadsheetId: string;
  private readonly now: () => Date;
  private snapshot: Promise<Set<string>> | null = null;
  private readonly appended = new Set<string>();
  private queue: Promise<unknown> = Promise.resolve();

  constructor(client: SpreadsheetClient, spreadsheetId: string, now: () => Date = () => new Date()) {
    this.client = client;
    this.spreadsheetId = spreadsheetId;
    this.now = now;
  }

  /**
   * Read the sheet once per run. A failed read is not cached, so the next region tries again.
   */
  loadSnapshot(signal?: AbortSignal): Promise<Set<string>> {
    if (!this.snapshot) {
      this.snapshot = this.client
        .fetchExistingRows(this.spreadsheetId, { signal })
        .then((rows) => {
          console.log(`[Sheets] Loaded ${rows.length} existing row(s) for dedup`);
          return new Set(rows.map(dedupKey));
        })
        .catch((error: unknown) => {
          this.snapshot = null;
          throw toPublishError(error, 'read');
        });
    }
    return this.snapshot;
  }

  /**
   * Publish a region's qualified candidates in a single append.
   * On failure nothing is written and none of the region's rows count as published.
   */
  async publishRegion(
    region: string,
    qualified: readonly VerifiedCandidate[],
    options: PublishOptions
  ): Promise<PublishOutcome> {
    if (options.previewMode) {
      throw new Error(`Refusing to publish "${region}": run is in preview mode`);
    }

    const next = this.queue.then(() => this.appendBatch(qualified, options.token));
    this.queue = next.catch(() => undefined);
    return withDeadline(next, options.token);
  }

  private async appendBatch(
    qualified: readonly VerifiedCandidate[],
    token?: CancellationToken
  ): Promise<PublishOutcome> {
    token?.throwIfExpired();

    const existing = await this.loadSnapshot(token?.signal);
    const publishedAt = this.now();
    const rows: PublishedRow[] = [];
    const duplicates: VerifiedCandidate[] = [];
    const batch = new Set<string>();

    for (const candidate of qualified) {
      const key = dedupKey(candidate);
      if (existing.has(key) || this.appended.has(key) || batch.has(key)) {
        duplicates.push(candidate);
        continue;
      }
      batch.add(key);
      rows.push(toPublishedRow(candidate, publishedAt));
    }

    if (rows.length === 0) {
      return { published: [], duplicates };
    }

    try {
      await this.client.appendRows(this.spreadsheetId, rows, { signal: token?.signal });
    } catch (error) {
      throw error instanceof PipelineError ? error : toPublishError(error, 'append');
    }

    batch.forEach((key) => this.appended.add(key));
    return { published: rows, duplicates };
  }
}
