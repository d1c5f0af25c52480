import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PipelineService, PipelineStages } from '../pipelineService.js';
import { LedgerService } from '../ledgerService.js';
import { DecisionFallback } from '../config.js';
import { ScrapeFailure } from '../errors.js';
import { NewsDigest } from '../types.js';
import {
  FIXED_NOW,
  FakeBrowserProvider,
  FakeCompletionClient,
  InMemoryGateway,
  TEST_POLICY,
  makeLedger,
  makeSnapshot
} from './fakes.js';

let dataDir: string;

beforeEach(async () => {
  dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pipeline-'));
});

afterEach(async () => {
  await fs.rm(dataDir, { recursive: true, force: true });
});

function digestFor(coin: string): NewsDigest {
  return {
    coin,
    headlines: [{ title: 'Bitcoin ETF approval sparks rally', tone: 'bullish' }],
    text: 'Bitcoin ETF approval sparks rally',
    sentiment: 0.4,
    capturedAt: FIXED_NOW.toISOString()
  };
}

interface SetupOptions {
  answer?: string;
  fallback?: DecisionFallback;
  price?: number;
  stages?: Partial<PipelineStages>;
}

function setup(options: SetupOptions = {}) {
  const gateway = new InMemoryGateway();
  const ledger = new LedgerService({ gateway, policy: TEST_POLICY, now: () => FIXED_NOW });
  const completion = new FakeCompletionClient(() => options.answer ?? 'BUY');
  const snapshot = vi.fn(async (coin: string) => makeSnapshot({ coin, price: options.price ?? 100 }));

  const pipeline = new PipelineService({
    browser: new FakeBrowserProvider(),
    completion,
    gateway,
    ledger,
    settings: {
      dataDir,
      browserTimeoutMs: 1000,
      chatTemperature: 0.1,
      chatTimeoutMs: 5000,
      newsMaxHeadlines: 5,
      newsMaxWords: 50,
      baselineWindow: 14,
      decisionFallback: options.fallback ?? 'abort'
    },
    stages: {
      snapshot,
      news: async coin => digestFor(coin),
      baseline: async () => 105,
      ...options.stages
    },
    now: () => FIXED_NOW
  });

  return { pipeline, gateway, completion, snapshot };
}

describe('PipelineService.runForCoin', () => {
  it('decides, trades for funded users and stores the report', async () => {
    const { pipeline, gateway, completion } = setup();
    gateway.seed(makeLedger({ userId: 'alice' }));
    gateway.seed(makeLedger({ userId: 'carol', currentCapital: 0 }));

    const result = await pipeline.runForCoin('bitcoin');

    expect(result.status).toBe('success');
    expect(result.stageErrors).toEqual([]);
    expect(result.report?.decision).toBe('BUY');
    expect(result.report?.decisionSource).toBe('model');
    expect(result.report?.predictedClose).toBe(105);
    expect(result.report?.trades.map(trade => [trade.userId, trade.action])).toEqual([['alice', 'BUY']]);
    expect(result.report?.summary).toBe(
      'BITCOIN | Price: $100.00 | 24h Change: 1.50% | Predicted Close: $105.00 | News Sentiment: 0.40 | Recommendation: BUY | Trades: 1/1'
    );
    expect((await gateway.getLedger('alice', 'bitcoin'))?.currentCapital).toBe(800);
    expect(completion.prompts).toHaveLength(1);
    expect(gateway.snapshots).toHaveLength(1);
    expect(gateway.digests).toHaveLength(1);
    expect(gateway.reports).toHaveLength(1);
  });

  it('appends the snapshot to the local stats log', async () => {
    const { pipeline } = setup();

    await pipeline.runForCoin('bitcoin');

    const log = await fs.readFile(path.join(dataDir, 'realtime', 'bitcoin', 'stats', 'bitcoin_stats.csv'), 'utf-8');
    expect(log.split('\n')).toHaveLength(3);
  });

  it('continues without news and marks the run partial', async () => {
    const { pipeline, gateway, completion } = setup({
      stages: {
        news: async coin => {
          throw new ScrapeFailure('timeout', coin, 'feed did not load');
        }
      }
    });

    const result = await pipeline.runForCoin('bitcoin');

    expect(result.status).toBe('partial');
    expect(result.stageErrors).toEqual([
      { stage: 'news', code: 'SCRAPE_FAILURE', message: '[timeout] bitcoin: feed did not load' }
    ]);
    expect(result.report?.newsAvailable).toBe(false);
    expect(result.report?.digest.sentiment).toBeNull();
    expect(completion.prompts[0]).toContain('\n- News Sentiment: N/A\n- News Text: N/A\n');
    expect(gateway.digests).toHaveLength(0);
  });

  it('decides without a baseline when history fails', async () => {
    const { pipeline, completion } = setup({
      stages: {
        baseline: async coin => {
          throw new ScrapeFailure('parse_error', coin, 'no download control');
        }
      }
    });

    const result = await pipeline.runForCoin('bitcoin');

    expect(result.status).toBe('partial');
    expect(result.stageErrors.map(error => error.stage)).toEqual(['history']);
    expect(result.report?.predictedClose).toBeNull();
    expect(completion.prompts[0]).toContain('\n- Predicted Close: N/A\n');
  });

  it('fails the run on an unrecognized answer by default', async () => {
    const { pipeline, gateway } = setup({ answer: 'Maybe later' });
    gateway.seed(makeLedger({ userId: 'alice' }));

    const result = await pipeline.runForCoin('bitcoin');

    expect(result.status).toBe('failure');
    expect(result.report).toBeUndefined();
    expect(result.error?.stage).toBe('decision');
    expect(result.error?.code).toBe('DECISION_PARSE_FAILURE');
    expect(gateway.putCount).toBe(0);
    expect(gateway.reports).toHaveLength(0);
  });

  it('holds on an unrecognized answer when configured to', async () => {
    const { pipeline, gateway } = setup({ answer: 'Maybe later', fallback: 'hold' });
    gateway.seed(makeLedger({ userId: 'alice' }));

    const result = await pipeline.runForCoin('bitcoin');

    expect(result.status).toBe('partial');
    expect(result.report?.decision).toBe('HOLD');
    expect(result.report?.decisionSource).toBe('fallback');
    expect(result.stageErrors.map(error => error.code)).toEqual(['DECISION_PARSE_FAILURE']);
    expect(result.report?.trades.map(trade => trade.action)).toEqual(['HOLD']);
    expect(gateway.putCount).toBe(0);
  });

  it('forces a sale when the stop-loss triggers', async () => {
    const { pipeline, gateway } = setup({ answer: 'HOLD', price: 90 });
    gateway.seed(makeLedger({ userId: 'alice', currentCapital: 800, positionQuantity: 1.998, costBasis: 200 }));
    gateway.seed(makeLedger({ userId: 'bob' }));

    const result = await pipeline.runForCoin('bitcoin');
    const trades = result.report?.trades ?? [];

    expect(result.report?.decision).toBe('HOLD');
    expect(trades.map(trade => [trade.userId, trade.action, trade.stopLoss])).toEqual([
      ['alice', 'SELL', true],
      ['bob', 'HOLD', false]
    ]);
    expect((await gateway.getLedger('alice', 'bitcoin'))?.positionQuantity).toBe(0);
  });

  it('records a failed ledger write against the user and carries on', async () => {
    const { pipeline, gateway } = setup();
    gateway.seed(makeLedger({ userId: 'alice' }));
    gateway.seed(makeLedger({ userId: 'bob' }));
    gateway.failPutFor.add('bob');

    const result = await pipeline.runForCoin('bitcoin');

    expect(result.status).toBe('partial');
    expect(result.report?.trades.map(trade => trade.userId)).toEqual(['alice']);
    expect(result.stageErrors).toEqual([{
      stage: 'ledger',
      code: 'PERSISTENCE_ERROR',
      message: 'Persistence UPSERT on user_ledgers failed: write rejected',
      userId: 'bob'
    }]);
    expect((await gateway.getLedger('bob', 'bitcoin'))?.currentCapital).toBe(1000);
  });

  it('marks the run partial when the report cannot be stored', async () => {
    const { pipeline, gateway } = setup();
    gateway.failAppendReport = true;

    const result = await pipeline.runForCoin('bitcoin');

    expect(result.status).toBe('partial');
    expect(result.stageErrors.map(error => [error.stage, error.code])).toEqual([['persist', 'PERSISTENCE_ERROR']]);
    expect(result.report?.stageErrors).toEqual(result.stageErrors);
  });

  it('does not start a cancelled run', async () => {
    const { pipeline, snapshot } = setup();
    const controller = new AbortController();
    controller.abort();

    const result = await pipeline.runForCoin('bitcoin', { signal: controller.signal });

    expect(result.status).toBe('failure');
    expect(result.error).toEqual({ stage: 'snapshot', code: 'RUN_CANCELLED', message: 'Run for bitcoin was cancelled' });
    expect(snapshot).not.toHaveBeenCalled();
  });

  it('treats a stage failure after cancellation as the cancellation', async () => {
    const controller = new AbortController();
    const { pipeline, completion } = setup({
      stages: {
        news: async coin => {
          controller.abort();
          throw new ScrapeFailure('navigation_error', coin, 'browser closed');
        }
      }
    });

    const result = await pipeline.runForCoin('bitcoin', { signal: controller.signal });

    expect(result.error).toEqual({ stage: 'news', code: 'RUN_CANCELLED', message: 'Run for bitcoin was cancelled' });
    expect(completion.prompts).toHaveLength(0);
  });

  it('treats a snapshot failure after cancellation as the cancellation', async () => {
    const controller = new AbortController();
    const { pipeline, gateway, completion } = setup({
      stages: {
        snapshot: async coin => {
          controller.abort();
          throw new ScrapeFailure('parse_error', coin, 'page closed');
        }
      }
    });

    const result = await pipeline.runForCoin('bitcoin', { signal: controller.signal });

    expect(result.status).toBe('failure');
    expect(result.error).toEqual({ stage: 'snapshot', code: 'RUN_CANCELLED', message: 'Run for bitcoin was cancelled' });
    expect(gateway.snapshots).toHaveLength(0);
    expect(completion.prompts).toHaveLength(0);
  });
});

describe('PipelineService.runBatch', () => {
  it('isolates a failed coin and keeps input order', async () => {
    const { pipeline, completion } = setup({
      stages: {
        snapshot: async coin => {
          if (coin === 'bitcoin') {
            throw new ScrapeFailure('timeout', coin, 'price did not render');
          }
          return makeSnapshot({ coin, price: 3000 });
        }
      }
    });

    const results = await pipeline.runBatch(['bitcoin', 'ethereum'], { concurrency: 2 });

    expect(results.map(result => [result.coin, result.status])).toEqual([
      ['bitcoin', 'failure'],
      ['ethereum', 'success']
    ]);
    expect(results[0].error).toEqual({
      stage: 'snapshot',
      code: 'SCRAPE_FAILURE',
      message: '[timeout] bitcoin: price did not render'
    });
    expect(completion.prompts).toHaveLength(1);
    expect(completion.prompts[0]).toContain('Report for ETHEREUM:');
  });
});
