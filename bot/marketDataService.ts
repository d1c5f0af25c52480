import { BrowserProvider, BrowserSession, BrowserTimeout, NavigationError } from './browser.js';
import { CoinSnapshot, MaybeNumber } from './types.js';
import { MARKET_PAGE, METRIC_LABELS, MetricKey } from './selectors.js';
import { ScrapeFailure, describeError } from './errors.js';
import { normalizeLabel, normalizePercent, normalizeValue } from './utils/normalizer.js';
import {
  startPerformanceTimer,
  endPerformanceTimer,
  logFunctionEntry,
  logFunctionExit,
  log
} from './utils/logger.js';

export interface SnapshotOptions {
  browser: BrowserProvider;
  timeoutMs: number;
  signal?: AbortSignal;
  now?: () => Date;
}

type Metrics = Record<MetricKey, MaybeNumber>;

function emptyMetrics(): Metrics {
  return {
    marketCap: null,
    volume24h: null,
    fullyDilutedValuation: null,
    volumeToMarketCap24h: null,
    totalSupply: null,
    maxSupply: null,
    circulatingSupply: null
  };
}

/**
 * Maps browser-layer errors onto the scrape failure taxonomy.
 */
export function toScrapeFailure(error: unknown, coin: string, what: string): ScrapeFailure {
  if (error instanceof ScrapeFailure) {
    return error;
  }
  if (error instanceof BrowserTimeout) {
    return new ScrapeFailure('timeout', coin, `${what}: ${error.message}`, { cause: error });
  }
  if (error instanceof NavigationError) {
    return new ScrapeFailure('navigation_error', coin, `${what}: ${error.message}`, { cause: error });
  }
  return new ScrapeFailure('parse_error', coin, `${what}: ${describeError(error)}`, { cause: error });
}

async function readOptionalText(session: BrowserSession, selector: string): Promise<string | null> {
  const element = session.locate(selector);
  if (await element.count() === 0) {
    return null;
  }
  return element.text();
}

async function readPrice(session: BrowserSession, coin: string): Promise<number> {
  const text = await readOptionalText(session, MARKET_PAGE.price);
  if (text === null || text === '') {
    throw new ScrapeFailure('parse_error', coin, 'Price element is missing or empty');
  }
  const price = normalizeValue(text);
  if (price === null) {
    throw new ScrapeFailure('parse_error', coin, `Price text "${text}" is not a number`);
  }
  return price;
}

/**
 * 24h change. The direction attribute decides the sign whenever the page
 * provides one; the text only supplies the magnitude in that case.
 */
async function readChange24h(session: BrowserSession): Promise<MaybeNumber> {
  const element = session.locate(MARKET_PAGE.change24h);
  if (await element.count() === 0) {
    return null;
  }

  const value = normalizePercent(await element.text());
  if (value === null) {
    return null;
  }

  const direction = await element.attribute(MARKET_PAGE.change24hDirectionAttribute);
  if (direction === 'down') {
    return -Math.abs(value);
  }
  if (direction === 'up') {
    return Math.abs(value);
  }
  return value;
}

async function readMetrics(session: BrowserSession): Promise<Metrics> {
  const metrics = emptyMetrics();
  const items = await session.locate(MARKET_PAGE.metricsPanel).locate(MARKET_PAGE.metricItem).all();

  for (const item of items) {
    const labelElement = item.locate(MARKET_PAGE.metricLabel);
    if (await labelElement.count() === 0) {
      continue;
    }
    const label = normalizeLabel(await labelElement.text());

    const match = METRIC_LABELS.find(entry => label.includes(normalizeLabel(entry.label)));
    if (!match || metrics[match.key] !== null) {
      continue;
    }

    const valueElement = item.locate(MARKET_PAGE.metricValue);
    if (await valueElement.count() === 0) {
      continue;
    }
    const text = await valueElement.text();
    metrics[match.key] = match.percent ? normalizePercent(text) : normalizeValue(text);
  }

  return metrics;
}

/**
 * Reads one snapshot from an already opened session. Split out from
 * fetchCoinSnapshot so a caller holding a session can reuse it.
 */
export async function extractCoinSnapshot(
  session: BrowserSession,
  coin: string,
  timeoutMs: number,
  capturedAt: Date
): Promise<CoinSnapshot> {
  await session.goto(MARKET_PAGE.url(coin), { waitUntil: 'networkidle', timeoutMs });

  if (!(await session.waitFor(MARKET_PAGE.price, timeoutMs))) {
    throw new ScrapeFailure('timeout', coin, `Price element did not appear within ${timeoutMs}ms`);
  }

  const price = await readPrice(session, coin);
  const priceChange24hPercent = await readChange24h(session);

  let low24h: MaybeNumber = null;
  let high24h: MaybeNumber = null;
  if (await session.waitFor(MARKET_PAGE.pricePerformance, timeoutMs)) {
    low24h = normalizeValue(await readOptionalText(session, MARKET_PAGE.low24h));
    high24h = normalizeValue(await readOptionalText(session, MARKET_PAGE.high24h));
  } else {
    log('WARN', `Price performance panel missing for ${coin}, low/high left unknown`);
  }

  let metrics = emptyMetrics();
  if (await session.waitFor(MARKET_PAGE.metricsPanel, timeoutMs)) {
    metrics = await readMetrics(session);
  } else {
    log('WARN', `Metrics panel missing for ${coin}, market metrics left unknown`);
  }

  return {
    coin,
    price,
    priceChange24hPercent,
    low24h,
    high24h,
    ...metrics,
    capturedAt: capturedAt.toISOString()
  };
}

/**
 * Scrapes the coin's market page. Only the price is mandatory; every other
 * field falls back to null. Failures surface as ScrapeFailure and are not
 * retried here.
 */
export async function fetchCoinSnapshot(coin: string, options: SnapshotOptions): Promise<CoinSnapshot> {
  const timerId = startPerformanceTimer('fetchCoinSnapshot');
  logFunctionEntry('fetchCoinSnapshot', { coin });

  try {
    const capturedAt = (options.now ?? (() => new Date()))();
    const snapshot = await options.browser.withSession(
      session => extractCoinSnapshot(session, coin, options.timeoutMs, capturedAt),
      { signal: options.signal }
    );

    log('INFO', `Captured snapshot for ${coin}`, {
      price: snapshot.price,
      change24h: snapshot.priceChange24hPercent,
      marketCap: snapshot.marketCap
    });
    logFunctionExit('fetchCoinSnapshot', { coin, price: snapshot.price });
    return snapshot;
  } catch (error) {
    const failure = toScrapeFailure(error, coin, 'Market snapshot');
    log('ERROR', `Failed to capture snapshot for ${coin}`, failure.message);
    logFunctionExit('fetchCoinSnapshot', null);
    throw failure;
  } finally {
    endPerformanceTimer(timerId);
  }
}
