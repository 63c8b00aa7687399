import type { RawCandidate } from '@/types';
import { chromium, errors, type Browser, type Locator, type Page } from 'playwright';
import { errorMessage, PipelineError, SourceUnavailableError } from '../errors';
import { sleepWithCancellation, type CancellationToken } from './cancellation';
import {
  buildSearchUrl,
  extractArea,
  isBrowserClosedError,
  isSponsoredText,
  namesMatch,
  parsePhone,
  parseRating,
  parseReviewCount,
  RESULTS_HEADINGS,
} from './listing-parser';

export interface ListingQuery {
  region: string;
  suffix: string;
  maxResults: number;
}

/**
 * Source of raw listings for one region. The sequence is lazy and finite;
 * stopping iteration early releases whatever the source holds.
 */
export interface ListingSource {
  search(query: ListingQuery, token?: CancellationToken): AsyncGenerator<RawCandidate>;
}

export interface GoogleMapsSourceConfig {
  headless: boolean;
  slowMo: number;
  locale: string;
  navigationTimeoutMs: number;
  feedTimeoutMs: number;
  panelTimeoutMs: number;
  scrollSettleMs: number;
  maxScrolls: number;
}

const DEFAULT_CONFIG: GoogleMapsSourceConfig = {
  headless: true,
  slowMo: 50,
  locale: 'ja-JP',
  navigationTimeoutMs: 60000,
  feedTimeoutMs: 10000,
  panelTimeoutMs: 3000,
  scrollSettleMs: 1500,
  maxScrolls: 30,
};

const LISTING_SELECTOR = 'a[href*="/maps/place/"]';
const FEED_SELECTOR = '[role="feed"]';
const PANEL_HEADING_SELECTOR = 'h1.DUwDvf';
const END_OF_LIST = /リストの最後に到達しました|reached the end of the list/;
const CHROME_ARGS = ['--disable-dev-shm-usage', '--disable-blink-features=AutomationControlled'];

export class GoogleMapsSource implements ListingSource {
  private config: GoogleMapsSourceConfig;

  constructor(config: Partial<GoogleMapsSourceConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async *search(query: ListingQuery, token?: CancellationToken): AsyncGenerator<RawCandidate> {
    const { region } = query;
    token?.throwIfExpired();

    const browser = await this.launch(region);
    // Hard stop: closing the browser makes every pending page call reject
    const onExpire = () => {
      browser.close().catch((e) => console.error('[GoogleMaps] Close on deadline failed:', e));
    };
    token?.signal.addEventListener('abort', onExpire, { once: true });

    try {
      const page = await this.openPage(browser);
      const searchUrl = buildSearchUrl(region, query.suffix);

      console.log(`[GoogleMaps] Navigating to: ${searchUrl}`);
      await this.navigate(page, searchUrl, region);
      await this.dismissConsent(page);
      token?.throwIfExpired();

      const feed = await page
        .waitForSelector(FEED_SELECTOR, { timeout: this.config.feedTimeoutMs })
        .catch((e: unknown) => {
          if (isBrowserClosedError(e)) throw e;
          return null;
        });

      if (!feed) {
        const heading = await this.readText(page, PANEL_HEADING_SELECTOR) ?? await this.readText(page, 'h1');
        if (heading && !RESULTS_HEADINGS.has(heading)) {
          console.log(`[GoogleMaps] Single place page for "${region}": ${heading}`);
          yield await this.readPlace(page, heading, region, false);
        } else {
          console.log(`[GoogleMaps] No results for "${region}"`);
        }
        return;
      }

      const listings = await this.loadListings(page, query.maxResults, token);
      console.log(`[GoogleMaps] Found ${listings.length} listings for "${region}"`);

      for (const [index, listing] of listings.entries()) {
        token?.throwIfExpired();

        try {
          const candidate = await this.extractListing(page, listing, region, index, token);
          if (candidate) yield candidate;
        } catch (error) {
          if (error instanceof PipelineError || isBrowserClosedError(error)) throw error;
          console.error(`[GoogleMaps] Error extracting listing ${index} in "${region}":`, error);
        }
      }
    } catch (error) {
      throw this.toSourceError(error, region, token);
    } finally {
      token?.signal.removeEventListener('abort', onExpire);
      try {
        await browser.close();
      } catch (e) {
        console.log(`[GoogleMaps] Browser close for "${region}" failed:`, e);
      }
    }
  }

  private async launch(region: string): Promise<Browser> {
    console.log(`[GoogleMaps] Launching browser for "${region}"...`);
    try {
      return await chromium.launch({
        headless: this.config.headless,
        slowMo: this.config.slowMo,
        args: CHROME_ARGS,
      });
    } catch (error) {
      throw new SourceUnavailableError(region, 'browser-crashed', errorMessage(error));
    }
  }

  private async openPage(browser: Browser): Promise<Page> {
    const context = await browser.newContext({
      viewport: { width: 1920, height: 1080 },
      userAgent:
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
      locale: this.config.locale,
    });

    const page = await context.newPage();
    page.setDefaultTimeout(this.config.navigationTimeoutMs);
    return page;
  }

  private async navigate(page: Page, url: string, region: string): Promise<void> {
    try {
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.config.navigationTimeoutMs });
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new SourceUnavailableError(region, 'navigation-timeout', error.message);
      }
      if (isBrowserClosedError(error)) {
        throw new SourceUnavailableError(region, 'browser-crashed', errorMessage(error));
      }
      throw new SourceUnavailableError(region, 'navigation-failed', errorMessage(error));
    }
  }

  private async dismissConsent(page: Page): Promise<void> {
    const button = page.locator('button:has-text("同意する"), button:has-text("Accept all")').first();
    try {
      if (await button.isVisible({ timeout: 2000 })) {
        await button.click();
        await page.waitForLoadState('domcontentloaded');
      }
    } catch (e) {
      if (isBrowserClosedError(e)) throw e;
      console.log('[GoogleMaps] Consent dialog not handled:', errorMessage(e));
    }
  }

  /**
   * Scroll the feed until `maxResults` listings are loaded, the end marker
   * shows, or three scrolls in a row add nothing.
   */
  private async loadListings(page: Page, maxResults: number, token?: CancellationToken): Promise<Locator[]> {
    const listings = page.locator(LISTING_SELECTOR);
    let unchanged = 0;

    for (let scroll = 0; scroll < this.config.maxScrolls; scroll++) {
      token?.throwIfExpired();

      const count = await listings.count();
      if (count >= maxResults) break;
      if (await page.getByText(END_OF_LIST).count() > 0) break;

      await page.locator(FEED_SELECTOR).evaluate((feed) => {
        feed.scrollTop = feed.scrollHeight;
      });

      const grew = await page
        .waitForFunction(
          ({ selector, previous }) => document.querySelectorAll(selector).length > previous,
          { selector: LISTING_SELECTOR, previous: count },
          { timeout: this.config.scrollSettleMs }
        )
        .then(() => true)
        .catch((e: unknown) => {
          if (isBrowserClosedError(e)) throw e;
          return false;
        });

      unchanged = grew ? 0 : unchanged + 1;
      if (unchanged >= 3) break;
    }

    const all = await listings.all();
    return all.slice(0, maxResults);
  }

  private async extractListing(
    page: Page,
    listing: Locator,
    region: string,
    index: number,
    token?: CancellationToken
  ): Promise<RawCandidate | null> {
    const label = (await listing.getAttribute('aria-label'))?.trim();
    if (!label) {
      console.log(`[GoogleMaps]    [${index}] No label, skipping`);
      return null;
    }

    const cardText = await listing.evaluate(
      (el) => el.closest('[role="article"]')?.textContent ?? el.parentElement?.textContent ?? ''
    );
    const sponsored = isSponsoredText(cardText);

    await listing.scrollIntoViewIfNeeded();
    await listing.click({ timeout: 5000 }).catch((e: unknown) => {
      if (isBrowserClosedError(e)) throw e;
      return listing.click({ force: true, timeout: 5000 });
    });

    const heading = await this.waitForPanel(page, label, token);
    if (heading === null) {
      console.log(`[GoogleMaps]    [${index}] Panel did not show "${label}", skipping`);
      return null;
    }

    return this.readPlace(page, label, region, sponsored);
  }

  /**
   * Poll the details heading until it names the clicked listing.
   * Returns the heading, or null when a different place stays open.
   */
  private async waitForPanel(page: Page, label: string, token?: CancellationToken): Promise<string | null> {
    const deadline = Date.now() + this.config.panelTimeoutMs;
    let heading: string | null = null;

    while (Date.now() < deadline) {
      heading = await this.readText(page, PANEL_HEADING_SELECTOR);
      if (heading && namesMatch(heading, label)) return heading;
      await sleepWithCancellation(200, token);
    }

    // Nothing rendered at all: read what is there rather than drop the listing
    return heading ? null : '';
  }

  private async readPlace(page: Page, name: string, region: string, sponsored: boolean): Promise<RawCandidate> {
    const address =
      (await this.readText(page, '[data-item-id="address"] .fontBodyMedium')) ??
      (await this.readText(page, 'button[data-item-id="address"]')) ??
      '';
    const phone = parsePhone(await this.readText(page, '[data-item-id^="phone"]'));
    const website =
      (await this.readAttribute(page, 'a[data-item-id="authority"]', 'href')) ??
      (await this.readAttribute(page, 'a[data-value="ウェブサイト"]', 'href')) ??
      '';
    const category = await this.readText(page, 'button[jsaction*="category"]');
    const rating = parseRating(
      (await this.readAttribute(page, '[role="img"][aria-label*="つ星"]', 'aria-label')) ??
        (await this.readAttribute(page, '[role="img"][aria-label*="star"]', 'aria-label'))
    );
    const reviewCount = parseReviewCount(
      (await this.readAttribute(page, '[aria-label*="件のクチコミ"]', 'aria-label')) ??
        (await this.readAttribute(page, '[aria-label*="review"]', 'aria-label'))
    );

    console.log(`[GoogleMaps]    Found: ${name} (${rating ?? 'N/A'}⭐, ${reviewCount ?? 0} reviews)`);

    return {
      name,
      address,
      phone,
      website,
      categories: category ? [category] : [],
      region,
      sourceUrl: page.url(),
      sponsored,
      rating,
      reviewCount,
      area: extractArea(address),
    };
  }

  private async readText(page: Page, selector: string): Promise<string | null> {
    const element = page.locator(selector).first();
    try {
      if ((await element.count()) === 0) return null;
      const text = (await element.innerText({ timeout: 1000 })).trim();
      return text || null;
    } catch (e) {
      if (isBrowserClosedError(e)) throw e;
      return null;
    }
  }

  private async readAttribute(page: Page, selector: string, attribute: string): Promise<string | null> {
    const element = page.locator(selector).first();
    try {
      if ((await element.count()) === 0) return null;
      const value = (await element.getAttribute(attribute, { timeout: 1000 }))?.trim();
      return value || null;
    } catch (e) {
      if (isBrowserClosedError(e)) throw e;
      return null;
    }
  }

  private toSourceError(error: unknown, region: string, token?: CancellationToken): Error {
    if (token?.isExpired) {
      return token.toError() ?? new SourceUnavailableError(region, 'browser-crashed', errorMessage(error));
    }
    if (error instanceof PipelineError) return error;
    if (isBrowserClosedError(error)) {
      return new SourceUnavailableError(region, 'browser-crashed', errorMessage(error));
    }
    return new SourceUnavailableError(region, 'navigation-failed', errorMessage(error));
  }
}

export function createGoogleMapsSource(config?: Partial<GoogleMapsSourceConfig>): GoogleMapsSource {
  return new GoogleMapsSource(config);
}
