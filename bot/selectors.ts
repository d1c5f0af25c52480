// Page addresses, selectors and labels for every scraped page.
// Layout drift on the source site should only ever need edits here.

import { CoinSnapshot } from './types.js';

export const SOURCE_BASE_URL = 'https://coinmarketcap.com';

export type MetricKey = Extract<keyof CoinSnapshot,
  | 'marketCap'
  | 'volume24h'
  | 'fullyDilutedValuation'
  | 'volumeToMarketCap24h'
  | 'totalSupply'
  | 'maxSupply'
  | 'circulatingSupply'>;

export const MARKET_PAGE = {
  url: (coin: string) => `${SOURCE_BASE_URL}/currencies/${coin}/`,
  price: 'span[data-test="text-cdp-price-display"]',
  change24h: 'div[data-role="el"] p[data-change]',
  change24hDirectionAttribute: 'data-change',
  pricePerformance: 'div.coin-price-performance',
  low24h: 'text="Low" >> xpath=following-sibling::span',
  high24h: 'text="High" >> xpath=following-sibling::span',
  metricsPanel: 'div.coin-metrics-table',
  metricItem: 'div[data-role="group-item"]',
  metricLabel: 'div.LongTextDisplay_content-wrapper__2ho_9',
  metricValue: 'div.CoinMetrics_overflow-content__tlFu7 span'
} as const;

// Checked in order; the first label contained in the panel label wins.
export const METRIC_LABELS: ReadonlyArray<{ label: string; key: MetricKey; percent?: boolean }> = [
  { label: 'Vol/Mkt Cap (24h)', key: 'volumeToMarketCap24h', percent: true },
  { label: 'Market Cap', key: 'marketCap' },
  { label: 'Volume (24h)', key: 'volume24h' },
  { label: 'FDV', key: 'fullyDilutedValuation' },
  { label: 'Total Supply', key: 'totalSupply' },
  { label: 'Max. Supply', key: 'maxSupply' },
  { label: 'Circulating Supply', key: 'circulatingSupply' }
];

export const NEWS_PAGE = {
  url: (coin: string) => `${SOURCE_BASE_URL}/community/coins/${coin}/top/`,
  feedItem: '[data-test="feed-item"]',
  feedText: '.text-content',
  loadMore: 'button:has-text("Load More")',
  bullishPercent: '[data-test="sentiment-bullish-percent"]',
  bearishPercent: '[data-test="sentiment-bearish-percent"]'
} as const;

export const HISTORY_PAGE = {
  url: (coin: string) => `${SOURCE_BASE_URL}/currencies/${coin}/historical-data/`,
  loadMore: 'button:has-text("Load More")',
  downloadCsv: 'button:has-text("Download CSV")'
} as const;
