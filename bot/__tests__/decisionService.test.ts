import { describe, it, expect } from 'vitest';
import {
  buildDecisionPrompt,
  buildDecisionReport,
  buildExplanation,
  buildSummaryLine,
  decide,
  DecisionInput,
  formatUsd,
  parseDecision,
  sentimentLabel
} from '../decisionService.js';
import { CompletionTimeout, DecisionParseFailure } from '../errors.js';
import { LedgerAction, NewsDigest } from '../types.js';
import { FIXED_NOW, FakeCompletionClient, makeSnapshot } from './fakes.js';

function digest(overrides: Partial<NewsDigest> = {}): NewsDigest {
  return {
    coin: 'bitcoin',
    headlines: [],
    text: 'ETF inflows continue',
    sentiment: 0.4,
    capturedAt: FIXED_NOW.toISOString(),
    ...overrides
  };
}

const input: DecisionInput = {
  snapshot: makeSnapshot({
    price: 64250.5,
    priceChange24hPercent: -1.25,
    low24h: 63100,
    high24h: 65000,
    volume24h: 35123456789,
    marketCap: 1270000000000
  }),
  digest: digest(),
  predictedClose: 65000.123
};

function trade(action: LedgerAction['action'], overrides: Partial<LedgerAction> = {}): LedgerAction {
  return {
    userId: 'alice',
    coin: 'bitcoin',
    decision: 'BUY',
    action,
    reason: 'no capital to invest',
    fraction: 0,
    tier: null,
    stopLoss: false,
    quantity: 0,
    price: 64250.5,
    cashDelta: 0,
    realizedDelta: 0,
    capitalAfter: 0,
    positionAfter: 0,
    ...overrides
  };
}

describe('parseDecision', () => {
  it.each([
    ['BUY', 'BUY'],
    ['Buy', 'BUY'],
    [' buy\n', 'BUY'],
    ['sell', 'SELL'],
    ['Hold', 'HOLD']
  ])('reads %j as %s', (text, expected) => {
    expect(parseDecision(text)).toBe(expected);
  });

  it.each(['maybe', 'Buy.', 'BUY SELL', '', 'I would buy'])('rejects %j', text => {
    expect(() => parseDecision(text)).toThrow(DecisionParseFailure);
  });

  it('keeps the raw response on the failure', () => {
    try {
      parseDecision('Strong buy!');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(DecisionParseFailure);
      expect(error instanceof DecisionParseFailure && error.rawResponse).toBe('Strong buy!');
    }
  });
});

describe('buildDecisionReport', () => {
  it('writes every field on its own line', () => {
    expect(buildDecisionReport(input).split('\n')).toEqual([
      'Report for BITCOIN:',
      '- Current Price: $64250.50',
      '- 24h Price Change: -1.25%',
      '- 24h Low: $63100.00',
      '- 24h High: $65000.00',
      '- 24h Volume: $35,123,456,789.00',
      '- Market Cap: $1,270,000,000,000.00',
      '- Predicted Close: $65000.12',
      '- News Sentiment: 0.40 (positive)',
      '- News Text: ETF inflows continue'
    ]);
  });

  it('writes N/A for unknown values instead of zero', () => {
    const report = buildDecisionReport({
      snapshot: makeSnapshot({
        price: 0.5234,
        priceChange24hPercent: null,
        low24h: null,
        high24h: null,
        volume24h: null,
        marketCap: null
      }),
      digest: digest({ sentiment: null, text: '' }),
      predictedClose: null
    });

    expect(report.split('\n')).toEqual([
      'Report for BITCOIN:',
      '- Current Price: $0.5234',
      '- 24h Price Change: N/A',
      '- 24h Low: N/A',
      '- 24h High: N/A',
      '- 24h Volume: N/A',
      '- Market Cap: N/A',
      '- Predicted Close: N/A',
      '- News Sentiment: N/A',
      '- News Text: N/A'
    ]);
  });
});

describe('formatting helpers', () => {
  it('keeps significant digits below one dollar', () => {
    expect(formatUsd(0.5234)).toBe('$0.5234');
    expect(formatUsd(0)).toBe('$0.00');
    expect(formatUsd(1234.5)).toBe('$1234.50');
  });

  it('labels sentiment by sign', () => {
    expect(sentimentLabel(0.4)).toBe('positive');
    expect(sentimentLabel(-0.1)).toBe('negative');
    expect(sentimentLabel(0)).toBe('neutral');
    expect(sentimentLabel(null)).toBe('unknown');
  });
});

describe('decide', () => {
  it('asks the model once and parses the answer', async () => {
    const client = new FakeCompletionClient(() => 'Sell');

    const outcome = await decide(input, { client, temperature: 0.1, timeoutMs: 5000 });

    expect(outcome.decision).toBe('SELL');
    expect(outcome.rawResponse).toBe('Sell');
    expect(client.prompts).toEqual([buildDecisionPrompt(buildDecisionReport(input))]);
    expect(client.calls).toEqual([{ temperature: 0.1, timeoutMs: 5000 }]);
  });

  it('frames the report with the single-word instruction', () => {
    const prompt = buildDecisionPrompt('Report for BITCOIN:');
    expect(prompt).toBe(
      'Given the following daily report:\nReport for BITCOIN:\n\n' +
      'Based on this information, provide a single-word trading recommendation: Buy, Sell, or Hold. Do not provide explanations.'
    );
  });

  it('propagates completion timeouts without retrying', async () => {
    const client = new FakeCompletionClient(() => {
      throw new CompletionTimeout(5000);
    });

    await expect(decide(input, { client, temperature: 0.1, timeoutMs: 5000 })).rejects.toBeInstanceOf(CompletionTimeout);
    expect(client.prompts).toHaveLength(1);
  });

  it('fails on an unrecognized answer', async () => {
    const client = new FakeCompletionClient(() => 'Accumulate');

    await expect(decide(input, { client, temperature: 0.1, timeoutMs: 5000 })).rejects.toBeInstanceOf(DecisionParseFailure);
  });
});

describe('run output', () => {
  it('summarizes the run on one line', () => {
    const trades = [
      trade('BUY', { quantity: 0.1, cashDelta: -200, capitalAfter: 800 }),
      trade('SKIPPED', { userId: 'bob' })
    ];

    expect(buildSummaryLine(input, 'BUY', trades)).toBe(
      'BITCOIN | Price: $64250.50 | 24h Change: -1.25% | Predicted Close: $65000.12 | News Sentiment: 0.40 | Recommendation: BUY | Trades: 1/2'
    );
  });

  it('appends the recommendation and trade details to the report', () => {
    const trades = [trade('SKIPPED', { userId: 'bob' })];

    expect(buildExplanation('Report for BITCOIN:', 'BUY', trades)).toBe(
      'Report for BITCOIN:\n- Recommendation: BUY\nTrade Details:\nbob: SKIPPED (no capital to invest)'
    );
    expect(buildExplanation('Report for BITCOIN:', 'HOLD', [])).toBe('Report for BITCOIN:\n- Recommendation: HOLD');
  });
});
