import fs from 'node:fs/promises';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { BrowserProvider, BrowserSession } from './browser.js';
import { HistoryBar, MaybeNumber } from './types.js';
import { HISTORY_PAGE } from './selectors.js';
import { ScrapeFailure, describeError } from './errors.js';
import { toScrapeFailure } from './marketDataService.js';
import { normalizeValue } from './utils/normalizer.js';
import {
  startPerformanceTimer,
  endPerformanceTimer,
  logBrowserAction,
  logFunctionEntry,
  logFunctionExit,
  log
} from './utils/logger.js';

export interface HistoryOptions {
  browser: BrowserProvider;
  dataDir: string;
  timeoutMs: number;
  signal?: AbortSignal;
  now?: () => Date;
  maxLoadMoreClicks?: number;
  loadMoreDelayMs?: number;
}

const DEFAULT_LOAD_MORE_CLICKS = 50;
const DEFAULT_LOAD_MORE_DELAY_MS = 1000;

export function historyDir(dataDir: string, coin: string): string {
  return path.join(dataDir, 'historical', coin);
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** `YYYYMMDD_HHMMSS` in UTC. */
export function formatFileTimestamp(date: Date): string {
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Newest `<coin>_YYYYMMDD_HHMMSS.csv` in the coin's history directory, chosen
 * by the timestamp in the name. Null when the directory or a match is missing.
 */
export async function getLatestHistoryFile(coin: string, dataDir: string): Promise<string | null> {
  const dir = historyDir(dataDir, coin);

  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  const pattern = new RegExp(`^${escapeRegExp(coin)}_(\\d{8}_\\d{6})\\.csv$`);
  const byStamp = new Map<string, string>();
  for (const name of names) {
    const match = pattern.exec(name);
    if (match && !byStamp.has(match[1])) {
      byStamp.set(match[1], name);
    }
  }

  // fixed-width stamps sort lexicographically in time order
  const latest = [...byStamp.keys()].sort().pop();
  if (latest === undefined) {
    return null;
  }
  const name = byStamp.get(latest);
  return name === undefined ? null : path.join(dir, name);
}

async function expandTable(session: BrowserSession, options: HistoryOptions): Promise<number> {
  const maxClicks = options.maxLoadMoreClicks ?? DEFAULT_LOAD_MORE_CLICKS;
  const delayMs = options.loadMoreDelayMs ?? DEFAULT_LOAD_MORE_DELAY_MS;

  let clicks = 0;
  while (clicks < maxClicks) {
    const button = session.locate(HISTORY_PAGE.loadMore);
    if (await button.count() === 0 || !(await button.isVisible())) {
      break;
    }
    await button.click();
    clicks++;
    logBrowserAction('CLICK', { selector: HISTORY_PAGE.loadMore, message: `load more #${clicks}` });
    await session.pause(delayMs);
  }
  return clicks;
}

/**
 * Downloads the full daily history CSV and stores it under a timestamped name.
 * Returns the saved path.
 */
export async function downloadHistory(coin: string, options: HistoryOptions): Promise<string> {
  const timerId = startPerformanceTimer('downloadHistory');
  logFunctionEntry('downloadHistory', { coin });

  try {
    const dir = historyDir(options.dataDir, coin);
    await fs.mkdir(dir, { recursive: true });
    const stamp = formatFileTimestamp((options.now ?? (() => new Date()))());
    const filePath = path.join(dir, `${coin}_${stamp}.csv`);

    await options.browser.withSession(async session => {
      await session.goto(HISTORY_PAGE.url(coin), { waitUntil: 'networkidle', timeoutMs: options.timeoutMs });
      const clicks = await expandTable(session, options);
      log('INFO', `History table expanded with ${clicks} clicks for ${coin}`);

      const button = session.locate(HISTORY_PAGE.downloadCsv);
      if (await button.count() === 0) {
        throw new ScrapeFailure('parse_error', coin, 'No "Download CSV" control on the history page');
      }
      const download = await session.expectDownload(() => button.click(), options.timeoutMs);
      await download.saveAs(filePath);
    }, { acceptDownloads: true, signal: options.signal });

    log('INFO', `History for ${coin} saved to ${filePath}`);
    logFunctionExit('downloadHistory', filePath);
    return filePath;
  } catch (error) {
    const failure = toScrapeFailure(error, coin, 'History download');
    log('ERROR', `Failed to download history for ${coin}`, failure.message);
    logFunctionExit('downloadHistory', null);
    throw failure;
  } finally {
    endPerformanceTimer(timerId);
  }
}

/**
 * Cached history file unless `forceDownload`; otherwise a fresh download.
 * A failed forced download falls back to the cached file when one exists.
 */
export async function loadHistory(
  coin: string,
  options: HistoryOptions & { forceDownload?: boolean }
): Promise<string> {
  const cached = await getLatestHistoryFile(coin, options.dataDir);
  if (cached !== null && !options.forceDownload) {
    log('INFO', `Using cached history for ${coin}: ${cached}`);
    return cached;
  }

  try {
    return await downloadHistory(coin, options);
  } catch (error) {
    if (cached !== null) {
      log('WARN', `Download failed for ${coin}, using cached history`, describeError(error));
      return cached;
    }
    throw error;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberField(row: Record<string, unknown>, key: string): MaybeNumber {
  const value = row[key];
  return typeof value === 'string' ? normalizeValue(value) : null;
}

/**
 * Parses a semicolon-separated daily history export into bars, oldest first.
 * Rows without a timestamp or a full OHLC set are dropped.
 */
export async function readHistoryBars(filePath: string): Promise<HistoryBar[]> {
  const raw = await fs.readFile(filePath, 'utf-8');
  const rows: unknown = parse(raw, {
    columns: true,
    delimiter: ';',
    skip_empty_lines: true,
    trim: true,
    bom: true
  });
  if (!Array.isArray(rows)) {
    return [];
  }

  const bars: HistoryBar[] = [];
  for (const row of rows) {
    if (!isRecord(row)) continue;

    const timestamp = row.timestamp;
    if (typeof timestamp !== 'string' || Number.isNaN(Date.parse(timestamp))) continue;

    const open = numberField(row, 'open');
    const high = numberField(row, 'high');
    const low = numberField(row, 'low');
    const close = numberField(row, 'close');
    if (open === null || high === null || low === null || close === null) continue;

    bars.push({
      timestamp,
      open,
      high,
      low,
      close,
      volume: numberField(row, 'volume'),
      marketCap: numberField(row, 'marketCap')
    });
  }

  return bars.sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
}
