import { HistoryBar, MaybeNumber } from './types.js';

export function calculateEMA(prices: number[], period: number): number {
  if (prices.length < period) return prices[prices.length - 1];

  const multiplier = 2 / (period + 1);
  let ema = prices.slice(0, period).reduce((sum, price) => sum + price, 0) / period;

  for (let i = period; i < prices.length; i++) {
    ema = (prices[i] * multiplier) + (ema * (1 - multiplier));
  }

  return ema;
}

/** Least-squares line through (0, y0) .. (n-1, yn-1), evaluated at x = n. */
export function projectLinearTrend(values: number[]): number {
  const n = values.length;
  const meanX = (n - 1) / 2;
  const meanY = values.reduce((sum, value) => sum + value, 0) / n;

  let covariance = 0;
  let variance = 0;
  values.forEach((value, x) => {
    covariance += (x - meanX) * (value - meanY);
    variance += (x - meanX) ** 2;
  });

  const slope = variance === 0 ? 0 : covariance / variance;
  return meanY + slope * (n - meanX);
}

/**
 * Next-close baseline: mean of the linear-trend projection and the EMA over
 * the last `window` closes. Null with fewer than two bars.
 */
export function predictNextClose(bars: HistoryBar[], window: number): MaybeNumber {
  const closes = bars.slice(-Math.max(2, window)).map(bar => bar.close);
  if (closes.length < 2) {
    return null;
  }

  const trend = projectLinearTrend(closes);
  const ema = calculateEMA(closes, Math.min(window, closes.length));
  const prediction = (trend + ema) / 2;

  return Number.isFinite(prediction) && prediction > 0 ? prediction : Math.max(0, ema);
}
