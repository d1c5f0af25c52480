import fs from 'node:fs/promises';
import {
  BrowserProvider,
  BrowserSession,
  DownloadHandle,
  PageElement,
  SessionOptions,
  WaitUntil
} from '../browser.js';
import { CompletionClient, CompletionOptions } from '../completionClient.js';
import { PersistenceGateway } from '../persistence.js';
import { PersistenceError } from '../errors.js';
import { CoinSnapshot, DecisionReport, NewsDigest, TradingPolicy, UserLedger } from '../types.js';

// ── Browser ───────────────────────────────────────────────────

export interface FakeNode {
  text?: string;
  attrs?: Record<string, string>;
  visible?: boolean;
  children?: Record<string, FakeNode[]>;
  onClick?: () => void;
}

export interface FakePage {
  nodes: Record<string, FakeNode[]>;
  gotoError?: Error;
  download?: { filename: string; content: string };
}

class FakeElement implements PageElement {
  constructor(private readonly nodes: FakeNode[]) {}

  async count(): Promise<number> {
    return this.nodes.length;
  }

  async text(): Promise<string> {
    const first = this.nodes[0];
    if (!first) {
      throw new Error('No element to read text from');
    }
    return (first.text ?? '').trim();
  }

  async attribute(name: string): Promise<string | null> {
    return this.nodes[0]?.attrs?.[name] ?? null;
  }

  async click(): Promise<void> {
    const first = this.nodes[0];
    if (!first) {
      throw new Error('No element to click');
    }
    first.onClick?.();
  }

  async isVisible(): Promise<boolean> {
    const first = this.nodes[0];
    return first ? first.visible ?? true : false;
  }

  async all(): Promise<PageElement[]> {
    return this.nodes.map(node => new FakeElement([node]));
  }

  locate(selector: string): PageElement {
    return new FakeElement(this.nodes.flatMap(node => node.children?.[selector] ?? []));
  }
}

class FakeSession implements BrowserSession {
  private page: FakePage = { nodes: {} };
  readonly visited: Array<{ url: string; waitUntil: WaitUntil }> = [];

  constructor(private readonly pages: Record<string, FakePage>) {}

  async goto(url: string, options: { waitUntil: WaitUntil; timeoutMs: number }): Promise<void> {
    this.visited.push({ url, waitUntil: options.waitUntil });
    const page = this.pages[url];
    if (!page) {
      throw new Error(`No fake page registered for ${url}`);
    }
    if (page.gotoError) {
      throw page.gotoError;
    }
    this.page = page;
  }

  locate(selector: string): PageElement {
    return new FakeElement(this.page.nodes[selector] ?? []);
  }

  async waitFor(selector: string): Promise<boolean> {
    return (this.page.nodes[selector]?.length ?? 0) > 0;
  }

  async pause(): Promise<void> {}

  async expectDownload(trigger: () => Promise<void>): Promise<DownloadHandle> {
    await trigger();
    const download = this.page.download;
    if (!download) {
      throw new Error('No download configured for this page');
    }
    return {
      suggestedFilename: () => download.filename,
      saveAs: (filePath: string) => fs.writeFile(filePath, download.content, 'utf-8')
    };
  }
}

/** Serves canned pages keyed by URL and counts opened and closed sessions. */
export class FakeBrowserProvider implements BrowserProvider {
  opened = 0;
  closed = 0;
  readonly sessionOptions: SessionOptions[] = [];
  readonly sessions: FakeSession[] = [];

  constructor(readonly pages: Record<string, FakePage> = {}) {}

  async withSession<T>(fn: (session: BrowserSession) => Promise<T>, options: SessionOptions = {}): Promise<T> {
    this.opened++;
    this.sessionOptions.push(options);
    const session = new FakeSession(this.pages);
    this.sessions.push(session);
    try {
      return await fn(session);
    } finally {
      this.closed++;
    }
  }
}

// ── Completion ────────────────────────────────────────────────

export class FakeCompletionClient implements CompletionClient {
  readonly name = 'fake';
  readonly prompts: string[] = [];
  readonly calls: CompletionOptions[] = [];

  constructor(private readonly respond: (prompt: string) => Promise<string> | string) {}

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    this.prompts.push(prompt);
    this.calls.push(options);
    return this.respond(prompt);
  }
}

// ── Persistence ───────────────────────────────────────────────

function tick(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

/**
 * Map-backed gateway. Every call yields to the event loop so concurrent
 * callers interleave the way they would against a real database.
 */
export class InMemoryGateway implements PersistenceGateway {
  private readonly ledgers = new Map<string, UserLedger>();
  readonly snapshots: CoinSnapshot[] = [];
  readonly digests: NewsDigest[] = [];
  readonly reports: DecisionReport[] = [];

  putCount = 0;
  failNextPut = false;
  readonly failPutFor = new Set<string>();
  failAppendReport = false;
  failAppendSnapshot = false;

  private key(userId: string, coin: string): string {
    return `${userId}/${coin}`;
  }

  seed(ledger: UserLedger): void {
    this.ledgers.set(this.key(ledger.userId, ledger.coin), { ...ledger });
  }

  async getLedger(userId: string, coin: string): Promise<UserLedger | null> {
    await tick();
    const stored = this.ledgers.get(this.key(userId, coin));
    return stored ? { ...stored } : null;
  }

  async putLedger(ledger: UserLedger): Promise<void> {
    await tick();
    if (this.failNextPut || this.failPutFor.has(ledger.userId)) {
      this.failNextPut = false;
      throw new PersistenceError('UPSERT', 'user_ledgers', { cause: new Error('write rejected') });
    }
    this.putCount++;
    this.ledgers.set(this.key(ledger.userId, ledger.coin), { ...ledger });
  }

  async listLedgers(coin: string): Promise<UserLedger[]> {
    await tick();
    return [...this.ledgers.values()]
      .filter(ledger => ledger.coin === coin)
      .sort((a, b) => a.userId.localeCompare(b.userId))
      .map(ledger => ({ ...ledger }));
  }

  async appendSnapshot(snapshot: CoinSnapshot): Promise<void> {
    await tick();
    if (this.failAppendSnapshot) {
      throw new PersistenceError('INSERT', 'coin_snapshots', { cause: new Error('insert rejected') });
    }
    this.snapshots.push(snapshot);
  }

  async appendDigest(digest: NewsDigest): Promise<void> {
    await tick();
    this.digests.push(digest);
  }

  async appendReport(report: DecisionReport): Promise<void> {
    await tick();
    if (this.failAppendReport) {
      throw new PersistenceError('INSERT', 'decision_reports', { cause: new Error('insert rejected') });
    }
    this.reports.push(report);
  }
}

// ── Fixtures ──────────────────────────────────────────────────

export const TEST_POLICY: TradingPolicy = {
  tradingFee: 0.001,
  buyFraction: 0.2,
  minCapitalThreshold: 10,
  stopLossPct: 5,
  profitTiers: [
    { thresholdPct: 0, fraction: 0.25 },
    { thresholdPct: 5, fraction: 0.5 },
    { thresholdPct: 10, fraction: 1 }
  ]
};

export const FIXED_NOW = new Date('2024-05-06T07:08:09.000Z');

export function makeSnapshot(overrides: Partial<CoinSnapshot> = {}): CoinSnapshot {
  return {
    coin: 'bitcoin',
    price: 100,
    priceChange24hPercent: 1.5,
    low24h: 95,
    high24h: 105,
    volume24h: 35120000000,
    marketCap: 1270000000000,
    fullyDilutedValuation: 1350000000000,
    volumeToMarketCap24h: 2.76,
    totalSupply: 19700000,
    maxSupply: 21000000,
    circulatingSupply: 19700000,
    capturedAt: FIXED_NOW.toISOString(),
    ...overrides
  };
}

export function makeLedger(overrides: Partial<UserLedger> = {}): UserLedger {
  return {
    userId: 'user-1',
    coin: 'bitcoin',
    originalInvestment: 1000,
    totalDeposits: 1000,
    totalWithdrawals: 0,
    currentCapital: 1000,
    positionQuantity: 0,
    costBasis: 0,
    realizedGains: 0,
    createdAt: FIXED_NOW.toISOString(),
    updatedAt: FIXED_NOW.toISOString(),
    ...overrides
  };
}

/** The value a promise rejects with; fails the test when it resolves. */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}
