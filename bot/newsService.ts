import { BrowserProvider, BrowserSession } from './browser.js';
import { Headline, HeadlineTone, MaybeNumber, NewsDigest } from './types.js';
import { NEWS_PAGE } from './selectors.js';
import { toScrapeFailure } from './marketDataService.js';
import { normalizePercent } from './utils/normalizer.js';
import {
  startPerformanceTimer,
  endPerformanceTimer,
  logBrowserAction,
  logFunctionEntry,
  logFunctionExit,
  log
} from './utils/logger.js';

export interface NewsOptions {
  browser: BrowserProvider;
  maxHeadlines: number;
  maxWords: number;
  timeoutMs: number;
  signal?: AbortSignal;
  now?: () => Date;
  /** Upper bound on "Load More" clicks. */
  maxLoadMoreClicks?: number;
  /** Delay after each "Load More" click, for the feed to render. */
  loadMoreDelayMs?: number;
}

const DEFAULT_LOAD_MORE_CLICKS = 5;
const DEFAULT_LOAD_MORE_DELAY_MS = 1500;

const BULLISH_KEYWORDS = [
  'surge', 'rally', 'bull', 'rise', 'gain', 'up', 'high', 'record', 'breakthrough',
  'adoption', 'institutional', 'etf', 'approval', 'positive', 'growth', 'increase',
  'soar', 'jump', 'climb', 'boost', 'optimistic', 'bullish', 'moon', 'pump'
];

const BEARISH_KEYWORDS = [
  'crash', 'fall', 'drop', 'decline', 'bear', 'down', 'low', 'plunge', 'dump',
  'sell-off', 'correction', 'negative', 'loss', 'decrease', 'regulatory', 'ban',
  'hack', 'security', 'concern', 'warning', 'risk', 'bearish', 'fear', 'panic'
];

// Keyword vote over the headline text
export function classifyHeadline(title: string): HeadlineTone {
  const text = title.toLowerCase();

  let bullishScore = 0;
  let bearishScore = 0;

  BULLISH_KEYWORDS.forEach(keyword => {
    if (text.includes(keyword)) bullishScore++;
  });

  BEARISH_KEYWORDS.forEach(keyword => {
    if (text.includes(keyword)) bearishScore++;
  });

  if (bullishScore > bearishScore) return 'bullish';
  if (bearishScore > bullishScore) return 'bearish';
  return 'neutral';
}

export function truncateWords(text: string, maxWords: number): string {
  const words = text.split(/\s+/).filter(word => word !== '');
  return words.slice(0, Math.max(0, maxWords)).join(' ');
}

/**
 * Community indicator as a score in [-1, 1]. A missing bearish share is
 * taken as the complement of the bullish one and vice versa.
 */
export function sentimentFromShares(bullishPct: MaybeNumber, bearishPct: MaybeNumber): MaybeNumber {
  if (bullishPct === null && bearishPct === null) {
    return null;
  }
  const bullish = bullishPct ?? 100 - (bearishPct ?? 0);
  const bearish = bearishPct ?? 100 - bullish;
  const score = (bullish - bearish) / 100;
  return Math.min(1, Math.max(-1, score));
}

async function readShare(session: BrowserSession, selector: string): Promise<MaybeNumber> {
  const element = session.locate(selector);
  if (await element.count() === 0) {
    return null;
  }
  return normalizePercent(await element.text());
}

async function expandFeed(session: BrowserSession, options: NewsOptions): Promise<void> {
  const maxClicks = options.maxLoadMoreClicks ?? DEFAULT_LOAD_MORE_CLICKS;
  const delayMs = options.loadMoreDelayMs ?? DEFAULT_LOAD_MORE_DELAY_MS;

  for (let clicks = 0; clicks < maxClicks; clicks++) {
    if (await session.locate(NEWS_PAGE.feedItem).count() >= options.maxHeadlines) {
      return;
    }
    const button = session.locate(NEWS_PAGE.loadMore);
    if (await button.count() === 0 || !(await button.isVisible())) {
      return;
    }
    logBrowserAction('CLICK', { selector: NEWS_PAGE.loadMore, message: `load more #${clicks + 1}` });
    await button.click();
    await session.pause(delayMs);
  }
}

async function readHeadlines(session: BrowserSession, maxHeadlines: number, maxWords: number): Promise<Headline[]> {
  const items = await session.locate(NEWS_PAGE.feedItem).all();
  const headlines: Headline[] = [];

  for (const item of items) {
    if (headlines.length >= maxHeadlines) {
      break;
    }
    const body = item.locate(NEWS_PAGE.feedText);
    const raw = await body.count() > 0 ? await body.text() : await item.text();
    const title = truncateWords(raw, maxWords);
    if (title === '') {
      continue;
    }
    headlines.push({ title, tone: classifyHeadline(title) });
  }

  return headlines;
}

export async function extractNewsDigest(
  session: BrowserSession,
  coin: string,
  options: NewsOptions,
  capturedAt: Date
): Promise<NewsDigest> {
  await session.goto(NEWS_PAGE.url(coin), { waitUntil: 'domcontentloaded', timeoutMs: options.timeoutMs });

  let headlines: Headline[] = [];
  if (await session.waitFor(NEWS_PAGE.feedItem, options.timeoutMs)) {
    await expandFeed(session, options);
    headlines = await readHeadlines(session, options.maxHeadlines, options.maxWords);
  } else {
    log('WARN', `No feed items rendered for ${coin}`);
  }

  const sentiment = sentimentFromShares(
    await readShare(session, NEWS_PAGE.bullishPercent),
    await readShare(session, NEWS_PAGE.bearishPercent)
  );

  return {
    coin,
    headlines,
    text: truncateWords(headlines.map(headline => headline.title).join(' '), options.maxWords),
    sentiment,
    capturedAt: capturedAt.toISOString()
  };
}

/**
 * Collects community headlines and the bullish/bearish indicator for a coin.
 * An empty feed is a valid digest; only navigation and page failures throw.
 */
export async function fetchNewsDigest(coin: string, options: NewsOptions): Promise<NewsDigest> {
  const timerId = startPerformanceTimer('fetchNewsDigest');
  logFunctionEntry('fetchNewsDigest', { coin, maxHeadlines: options.maxHeadlines });

  try {
    const capturedAt = (options.now ?? (() => new Date()))();
    const digest = await options.browser.withSession(
      session => extractNewsDigest(session, coin, options, capturedAt),
      { signal: options.signal }
    );

    const tones = digest.headlines.reduce<Record<HeadlineTone, number>>(
      (counts, headline) => ({ ...counts, [headline.tone]: counts[headline.tone] + 1 }),
      { bullish: 0, bearish: 0, neutral: 0 }
    );
    log('INFO', `Collected ${digest.headlines.length} headlines for ${coin}`, { sentiment: digest.sentiment, tones });
    logFunctionExit('fetchNewsDigest', { coin, headlines: digest.headlines.length });
    return digest;
  } catch (error) {
    const failure = toScrapeFailure(error, coin, 'News digest');
    log('ERROR', `Failed to collect news for ${coin}`, failure.message);
    logFunctionExit('fetchNewsDigest', null);
    throw failure;
  } finally {
    endPerformanceTimer(timerId);
  }
}

/** Digest used when the news stage failed: no headlines, unknown sentiment. */
export function unavailableDigest(coin: string, capturedAt: Date): NewsDigest {
  return { coin, headlines: [], text: '', sentiment: null, capturedAt: capturedAt.toISOString() };
}
