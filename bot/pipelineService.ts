import { BrowserProvider } from './browser.js';
import { CompletionClient } from './completionClient.js';
import { PersistenceGateway } from './persistence.js';
import { LedgerService, isFunded, isStopLossTriggered } from './ledgerService.js';
import { fetchCoinSnapshot, SnapshotOptions } from './marketDataService.js';
import { fetchNewsDigest, NewsOptions, unavailableDigest } from './newsService.js';
import { loadHistory, readHistoryBars, HistoryOptions } from './historyService.js';
import { predictNextClose } from './forecastService.js';
import { appendSnapshotRow } from './snapshotLog.js';
import {
  buildDecisionReport,
  buildExplanation,
  buildSummaryLine,
  decide,
  DecisionInput
} from './decisionService.js';
import { DecisionParseFailure, PipelineError, describeError, throwIfAborted } from './errors.js';
import {
  CoinSnapshot,
  Decision,
  DecisionReport,
  LedgerAction,
  MaybeNumber,
  NewsDigest,
  PipelineResult,
  PipelineStage,
  StageError,
  UserLedger
} from './types.js';
import { DecisionFallback } from './config.js';
import {
  startPerformanceTimer,
  endPerformanceTimer,
  logFunctionEntry,
  logFunctionExit,
  log
} from './utils/logger.js';

export interface PipelineSettings {
  dataDir: string;
  browserTimeoutMs: number;
  chatTemperature: number;
  chatTimeoutMs: number;
  newsMaxHeadlines: number;
  newsMaxWords: number;
  baselineWindow: number;
  decisionFallback: DecisionFallback;
  forceHistoryDownload?: boolean;
}

/** The capture steps, replaceable so runs can be driven without a browser. */
export interface PipelineStages {
  snapshot(coin: string, options: SnapshotOptions): Promise<CoinSnapshot>;
  news(coin: string, options: NewsOptions): Promise<NewsDigest>;
  baseline(coin: string, options: HistoryOptions & { forceDownload?: boolean }, window: number): Promise<MaybeNumber>;
}

export async function loadBaseline(
  coin: string,
  options: HistoryOptions & { forceDownload?: boolean },
  window: number
): Promise<MaybeNumber> {
  const filePath = await loadHistory(coin, options);
  const bars = await readHistoryBars(filePath);
  return predictNextClose(bars, window);
}

export const DEFAULT_STAGES: PipelineStages = {
  snapshot: fetchCoinSnapshot,
  news: fetchNewsDigest,
  baseline: loadBaseline
};

export interface PipelineDependencies {
  browser: BrowserProvider;
  completion: CompletionClient;
  gateway: PersistenceGateway;
  ledger: LedgerService;
  settings: PipelineSettings;
  stages?: Partial<PipelineStages>;
  now?: () => Date;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface BatchOptions extends RunOptions {
  concurrency?: number;
}

function stageError(stage: PipelineStage, error: unknown, userId?: string): StageError {
  const code = error instanceof PipelineError ? error.code : 'UNEXPECTED_ERROR';
  return userId === undefined
    ? { stage, code, message: describeError(error) }
    : { stage, code, message: describeError(error), userId };
}

/**
 * Runs the per-coin pipeline: snapshot, news, baseline, decision, ledger
 * updates, report. Only the snapshot and the decision are mandatory; every
 * other stage degrades and marks the run partial.
 */
export class PipelineService {
  private readonly stages: PipelineStages;
  private readonly now: () => Date;

  constructor(private readonly deps: PipelineDependencies) {
    this.stages = { ...DEFAULT_STAGES, ...deps.stages };
    this.now = deps.now ?? (() => new Date());
  }

  async runForCoin(coin: string, options: RunOptions = {}): Promise<PipelineResult> {
    const timerId = startPerformanceTimer(`runForCoin:${coin}`);
    logFunctionEntry('runForCoin', { coin });

    const stageErrors: StageError[] = [];
    let stage: PipelineStage = 'snapshot';

    try {
      const report = await this.execute(coin, options.signal, stageErrors, current => {
        stage = current;
      });
      const result: PipelineResult = {
        coin,
        status: stageErrors.length > 0 ? 'partial' : 'success',
        report,
        stageErrors
      };
      log('INFO', `Run for ${coin} finished: ${result.status}`, report.summary);
      logFunctionExit('runForCoin', { coin, status: result.status, decision: report.decision });
      return result;
    } catch (error) {
      const failure = stageError(stage, error);
      log('ERROR', `Run for ${coin} failed at ${stage}`, failure.message);
      logFunctionExit('runForCoin', { coin, status: 'failure', stage });
      return { coin, status: 'failure', error: failure, stageErrors };
    } finally {
      endPerformanceTimer(timerId);
    }
  }

  /**
   * Runs every coin, `concurrency` at a time (one by default). Results come
   * back in input order and one coin's failure never stops the others.
   */
  async runBatch(coins: string[], options: BatchOptions = {}): Promise<PipelineResult[]> {
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    const results: PipelineResult[] = new Array(coins.length);
    let nextIndex = 0;

    const worker = async (): Promise<void> => {
      while (nextIndex < coins.length) {
        const index = nextIndex++;
        results[index] = await this.runForCoin(coins[index], { signal: options.signal });
      }
    };

    await Promise.all(Array.from({ length: Math.min(concurrency, coins.length) }, () => worker()));

    const failed = results.filter(result => result.status === 'failure').length;
    log('INFO', `Batch finished for ${coins.length} coins`, { failed });
    return results;
  }

  private async execute(
    coin: string,
    signal: AbortSignal | undefined,
    stageErrors: StageError[],
    enter: (stage: PipelineStage) => void
  ): Promise<DecisionReport> {
    const { settings, gateway } = this.deps;
    const browser = this.deps.browser;

    enter('snapshot');
    throwIfAborted(signal, coin);
    let snapshot: CoinSnapshot;
    try {
      snapshot = await this.stages.snapshot(coin, { browser, timeoutMs: settings.browserTimeoutMs, signal, now: this.now });
    } catch (error) {
      throwIfAborted(signal, coin);
      throw error;
    }

    enter('persist');
    await this.bestEffort('persist', stageErrors, async () => {
      await appendSnapshotRow(settings.dataDir, snapshot);
      await gateway.appendSnapshot(snapshot);
    });

    enter('news');
    throwIfAborted(signal, coin);
    let newsAvailable = true;
    let digest: NewsDigest = unavailableDigest(coin, this.now());
    try {
      digest = await this.stages.news(coin, {
        browser,
        maxHeadlines: settings.newsMaxHeadlines,
        maxWords: settings.newsMaxWords,
        timeoutMs: settings.browserTimeoutMs,
        signal,
        now: this.now
      });
    } catch (error) {
      throwIfAborted(signal, coin);
      newsAvailable = false;
      stageErrors.push(stageError('news', error));
      log('WARN', `News unavailable for ${coin}, continuing with unknown sentiment`, describeError(error));
    }
    if (newsAvailable) {
      const captured = digest;
      await this.bestEffort('persist', stageErrors, () => gateway.appendDigest(captured));
    }

    enter('history');
    throwIfAborted(signal, coin);
    let predictedClose: MaybeNumber = null;
    try {
      predictedClose = await this.stages.baseline(coin, {
        browser,
        dataDir: settings.dataDir,
        timeoutMs: settings.browserTimeoutMs,
        signal,
        now: this.now,
        forceDownload: settings.forceHistoryDownload
      }, settings.baselineWindow);
    } catch (error) {
      throwIfAborted(signal, coin);
      stageErrors.push(stageError('history', error));
      log('WARN', `No close baseline for ${coin}`, describeError(error));
    }

    enter('decision');
    throwIfAborted(signal, coin);
    const input: DecisionInput = { snapshot, digest, predictedClose };
    const { decision, source, reportText } = await this.decideWithPolicy(input, stageErrors);

    enter('ledger');
    throwIfAborted(signal, coin);
    const trades = await this.applyToUsers(coin, decision, snapshot, stageErrors);

    const report: DecisionReport = {
      coin,
      snapshot,
      digest,
      newsAvailable,
      predictedClose,
      decision,
      decisionSource: source,
      explanation: buildExplanation(reportText, decision, trades),
      summary: buildSummaryLine(input, decision, trades),
      trades,
      stageErrors: [],
      createdAt: this.now().toISOString()
    };

    enter('persist');
    await this.bestEffort('persist', stageErrors, () => gateway.appendReport({ ...report, stageErrors: [...stageErrors] }));

    return { ...report, stageErrors: [...stageErrors] };
  }

  private async decideWithPolicy(
    input: DecisionInput,
    stageErrors: StageError[]
  ): Promise<{ decision: Decision; source: 'model' | 'fallback'; reportText: string }> {
    const { settings } = this.deps;
    try {
      const outcome = await decide(input, {
        client: this.deps.completion,
        temperature: settings.chatTemperature,
        timeoutMs: settings.chatTimeoutMs
      });
      return { decision: outcome.decision, source: 'model', reportText: outcome.report };
    } catch (error) {
      if (error instanceof DecisionParseFailure && settings.decisionFallback === 'hold') {
        stageErrors.push(stageError('decision', error));
        log('WARN', `Unrecognized decision for ${input.snapshot.coin}, holding`, error.rawResponse);
        return { decision: 'HOLD', source: 'fallback', reportText: buildDecisionReport(input) };
      }
      throw error;
    }
  }

  private async applyToUsers(
    coin: string,
    decision: Decision,
    snapshot: CoinSnapshot,
    stageErrors: StageError[]
  ): Promise<LedgerAction[]> {
    const { ledger } = this.deps;

    let users: UserLedger[];
    try {
      users = (await ledger.listLedgers(coin)).filter(isFunded);
    } catch (error) {
      stageErrors.push(stageError('ledger', error));
      log('ERROR', `Could not list ledgers for ${coin}`, describeError(error));
      return [];
    }

    const trades: LedgerAction[] = [];
    for (const user of users) {
      const stopLoss = isStopLossTriggered(user, snapshot.price, ledger.policy);
      const effective: Decision = stopLoss ? 'SELL' : decision;
      if (stopLoss && decision !== 'SELL') {
        log('WARN', `Stop-loss overrides ${decision} for ${user.userId}/${coin}`);
      }

      try {
        trades.push(await ledger.applyDecision(user.userId, coin, effective, snapshot));
      } catch (error) {
        stageErrors.push(stageError('ledger', error, user.userId));
        log('ERROR', `Ledger update failed for ${user.userId}/${coin}`, describeError(error));
      }
    }
    return trades;
  }

  private async bestEffort(stage: PipelineStage, stageErrors: StageError[], task: () => Promise<void>): Promise<void> {
    try {
      await task();
    } catch (error) {
      stageErrors.push(stageError(stage, error));
      log('WARN', `Best-effort ${stage} step failed`, describeError(error));
    }
  }
}
