import { CoinSnapshot, Decision, LedgerAction, MaybeNumber, NewsDigest } from './types.js';
import { CompletionClient } from './completionClient.js';
import { DecisionParseFailure } from './errors.js';
import { formatMaybe } from './utils/normalizer.js';
import {
  startPerformanceTimer,
  endPerformanceTimer,
  logFunctionEntry,
  logFunctionExit,
  log
} from './utils/logger.js';

export interface DecisionInput {
  snapshot: CoinSnapshot;
  digest: NewsDigest;
  predictedClose: MaybeNumber;
}

export interface DecisionSettings {
  client: CompletionClient;
  temperature: number;
  timeoutMs: number;
}

export interface DecisionOutcome {
  decision: Decision;
  report: string;
  prompt: string;
  rawResponse: string;
}

const DECISIONS: readonly Decision[] = ['BUY', 'SELL', 'HOLD'];

// Prices under a dollar keep significant digits instead of collapsing to 0.00
export function formatUsd(value: number): string {
  return Math.abs(value) >= 1 || value === 0 ? `$${value.toFixed(2)}` : `$${value.toPrecision(4)}`;
}

export function formatUsdGrouped(value: number): string {
  return `$${value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}

export function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`;
}

export function sentimentLabel(sentiment: MaybeNumber): string {
  if (sentiment === null) return 'unknown';
  if (sentiment > 0) return 'positive';
  if (sentiment < 0) return 'negative';
  return 'neutral';
}

function formatSentiment(sentiment: MaybeNumber): string {
  return sentiment === null ? 'N/A' : `${sentiment.toFixed(2)} (${sentimentLabel(sentiment)})`;
}

/**
 * Fixed-shape report handed to the model. Unknown inputs are written as
 * "N/A" so the model never sees a fabricated zero.
 */
export function buildDecisionReport(input: DecisionInput): string {
  const { snapshot, digest, predictedClose } = input;

  return [
    `Report for ${snapshot.coin.toUpperCase()}:`,
    `- Current Price: ${formatUsd(snapshot.price)}`,
    `- 24h Price Change: ${formatMaybe(snapshot.priceChange24hPercent, formatPercent)}`,
    `- 24h Low: ${formatMaybe(snapshot.low24h, formatUsd)}`,
    `- 24h High: ${formatMaybe(snapshot.high24h, formatUsd)}`,
    `- 24h Volume: ${formatMaybe(snapshot.volume24h, formatUsdGrouped)}`,
    `- Market Cap: ${formatMaybe(snapshot.marketCap, formatUsdGrouped)}`,
    `- Predicted Close: ${formatMaybe(predictedClose, formatUsd)}`,
    `- News Sentiment: ${formatSentiment(digest.sentiment)}`,
    `- News Text: ${digest.text === '' ? 'N/A' : digest.text}`
  ].join('\n');
}

export function buildDecisionPrompt(report: string): string {
  return `Given the following daily report:
${report}

Based on this information, provide a single-word trading recommendation: Buy, Sell, or Hold. Do not provide explanations.`;
}

/**
 * Accepts exactly one of BUY, SELL or HOLD in any letter case, surrounded by
 * whitespace at most. Anything else throws DecisionParseFailure.
 */
export function parseDecision(text: string): Decision {
  const candidate = text.trim().toUpperCase();
  const decision = DECISIONS.find(value => value === candidate);
  if (decision === undefined) {
    throw new DecisionParseFailure(text);
  }
  return decision;
}

/**
 * One completion call, no retries. Completion failures and parse failures
 * propagate to the caller, which owns the fallback policy.
 */
export async function decide(input: DecisionInput, settings: DecisionSettings): Promise<DecisionOutcome> {
  const timerId = startPerformanceTimer('decide');
  logFunctionEntry('decide', { coin: input.snapshot.coin, client: settings.client.name });

  try {
    const report = buildDecisionReport(input);
    const prompt = buildDecisionPrompt(report);

    log('INFO', `Requesting decision for ${input.snapshot.coin} from ${settings.client.name}...`);
    const rawResponse = await settings.client.complete(prompt, {
      temperature: settings.temperature,
      timeoutMs: settings.timeoutMs
    });

    const decision = parseDecision(rawResponse);
    log('INFO', `Model decided ${decision} for ${input.snapshot.coin}`);
    logFunctionExit('decide', { decision });
    return { decision, report, prompt, rawResponse };
  } catch (error) {
    logFunctionExit('decide', null);
    throw error;
  } finally {
    endPerformanceTimer(timerId);
  }
}

export function describeTrade(action: LedgerAction): string {
  const base = `${action.userId}: ${action.action}`;
  switch (action.action) {
    case 'BUY':
      return `${base} ${action.quantity.toFixed(8)} @ ${formatUsd(action.price)} ` +
        `(spent ${formatUsd(-action.cashDelta)}, capital ${formatUsd(action.capitalAfter)})`;
    case 'SELL':
      return `${base} ${action.quantity.toFixed(8)} @ ${formatUsd(action.price)}` +
        `${action.stopLoss ? ' [stop-loss]' : ''} ` +
        `(proceeds ${formatUsd(action.cashDelta)}, realized ${formatUsd(action.realizedDelta)}, capital ${formatUsd(action.capitalAfter)})`;
    default:
      return `${base} (${action.reason})`;
  }
}

/** Full report text followed by the per-user trade lines. */
export function buildExplanation(report: string, decision: Decision, trades: LedgerAction[]): string {
  const lines = [report, `- Recommendation: ${decision}`];
  if (trades.length > 0) {
    lines.push('Trade Details:', ...trades.map(describeTrade));
  }
  return lines.join('\n');
}

/** One-line report without the news text. */
export function buildSummaryLine(input: DecisionInput, decision: Decision, trades: LedgerAction[]): string {
  const { snapshot, digest, predictedClose } = input;
  const executed = trades.filter(trade => trade.action === 'BUY' || trade.action === 'SELL').length;

  return [
    snapshot.coin.toUpperCase(),
    `Price: ${formatUsd(snapshot.price)}`,
    `24h Change: ${formatMaybe(snapshot.priceChange24hPercent, formatPercent)}`,
    `Predicted Close: ${formatMaybe(predictedClose, formatUsd)}`,
    `News Sentiment: ${formatMaybe(digest.sentiment, value => value.toFixed(2))}`,
    `Recommendation: ${decision}`,
    `Trades: ${executed}/${trades.length}`
  ].join(' | ');
}
