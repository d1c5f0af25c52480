import type { SupabaseClient } from '@supabase/supabase-js';
import { CoinSnapshot, DecisionReport, NewsDigest, UserLedger } from './types.js';
import { PersistenceError } from './errors.js';
import { logDatabaseOperation, logDatabaseError } from './utils/logger.js';

/**
 * Storage used by the ledger and the pipeline. Ledger rows are keyed by
 * (userId, coin); snapshots, digests and reports are append-only.
 */
export interface PersistenceGateway {
  getLedger(userId: string, coin: string): Promise<UserLedger | null>;
  putLedger(ledger: UserLedger): Promise<void>;
  listLedgers(coin: string): Promise<UserLedger[]>;
  appendSnapshot(snapshot: CoinSnapshot): Promise<void>;
  appendDigest(digest: NewsDigest): Promise<void>;
  appendReport(report: DecisionReport): Promise<void>;
}

export const TABLES = {
  ledgers: 'user_ledgers',
  snapshots: 'coin_snapshots',
  digests: 'news_digests',
  reports: 'decision_reports'
} as const;

export interface LedgerRow {
  user_id: string;
  coin: string;
  original_investment: number;
  total_deposits: number;
  total_withdrawals: number;
  current_capital: number;
  position_quantity: number;
  cost_basis: number;
  realized_gains: number;
  created_at: string;
  updated_at: string;
}

export function ledgerToRow(ledger: UserLedger): LedgerRow {
  return {
    user_id: ledger.userId,
    coin: ledger.coin,
    original_investment: ledger.originalInvestment,
    total_deposits: ledger.totalDeposits,
    total_withdrawals: ledger.totalWithdrawals,
    current_capital: ledger.currentCapital,
    position_quantity: ledger.positionQuantity,
    cost_basis: ledger.costBasis,
    realized_gains: ledger.realizedGains,
    created_at: ledger.createdAt,
    updated_at: ledger.updatedAt
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(row: Record<string, unknown>, key: string): number {
  const value = row[key];
  // numeric columns may come back as strings
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
    throw new Error(`Column ${key} is not a number`);
  }
  return parsed;
}

function readString(row: Record<string, unknown>, key: string): string {
  const value = row[key];
  if (typeof value !== 'string') {
    throw new Error(`Column ${key} is not a string`);
  }
  return value;
}

export function ledgerFromRow(row: unknown): UserLedger {
  if (!isRecord(row)) {
    throw new Error('Ledger row is not an object');
  }
  return {
    userId: readString(row, 'user_id'),
    coin: readString(row, 'coin'),
    originalInvestment: readNumber(row, 'original_investment'),
    totalDeposits: readNumber(row, 'total_deposits'),
    totalWithdrawals: readNumber(row, 'total_withdrawals'),
    currentCapital: readNumber(row, 'current_capital'),
    positionQuantity: readNumber(row, 'position_quantity'),
    costBasis: readNumber(row, 'cost_basis'),
    realizedGains: readNumber(row, 'realized_gains'),
    createdAt: readString(row, 'created_at'),
    updatedAt: readString(row, 'updated_at')
  };
}

export class SupabaseGateway implements PersistenceGateway {
  constructor(private readonly supabase: SupabaseClient) {}

  async getLedger(userId: string, coin: string): Promise<UserLedger | null> {
    logDatabaseOperation({ operation: 'SELECT', table: TABLES.ledgers, params: { userId, coin } });

    const { data, error } = await this.supabase
      .from(TABLES.ledgers)
      .select('*')
      .eq('user_id', userId)
      .eq('coin', coin)
      .maybeSingle();

    if (error) {
      logDatabaseError('SELECT', TABLES.ledgers, error);
      throw new PersistenceError('SELECT', TABLES.ledgers, { cause: error });
    }

    const row: unknown = data;
    logDatabaseOperation({ operation: 'SELECT', table: TABLES.ledgers, resultCount: row ? 1 : 0 });
    return row ? this.decode(row, 'SELECT') : null;
  }

  async putLedger(ledger: UserLedger): Promise<void> {
    const row = ledgerToRow(ledger);
    logDatabaseOperation({ operation: 'UPSERT', table: TABLES.ledgers, params: row });

    const { error } = await this.supabase
      .from(TABLES.ledgers)
      .upsert(row, { onConflict: 'user_id,coin' });

    if (error) {
      logDatabaseError('UPSERT', TABLES.ledgers, error);
      throw new PersistenceError('UPSERT', TABLES.ledgers, { cause: error });
    }
    logDatabaseOperation({ operation: 'UPSERT', table: TABLES.ledgers, affectedRows: 1 });
  }

  async listLedgers(coin: string): Promise<UserLedger[]> {
    logDatabaseOperation({ operation: 'SELECT', table: TABLES.ledgers, params: { coin } });

    const { data, error } = await this.supabase
      .from(TABLES.ledgers)
      .select('*')
      .eq('coin', coin)
      .order('user_id', { ascending: true });

    if (error) {
      logDatabaseError('SELECT', TABLES.ledgers, error);
      throw new PersistenceError('SELECT', TABLES.ledgers, { cause: error });
    }

    const rows: unknown[] = data ?? [];
    logDatabaseOperation({ operation: 'SELECT', table: TABLES.ledgers, resultCount: rows.length });
    return rows.map(row => this.decode(row, 'SELECT'));
  }

  async appendSnapshot(snapshot: CoinSnapshot): Promise<void> {
    await this.insert(TABLES.snapshots, {
      coin: snapshot.coin,
      price: snapshot.price,
      price_change_24h_percent: snapshot.priceChange24hPercent,
      low_24h: snapshot.low24h,
      high_24h: snapshot.high24h,
      volume_24h: snapshot.volume24h,
      market_cap: snapshot.marketCap,
      fully_diluted_valuation: snapshot.fullyDilutedValuation,
      volume_to_market_cap_24h: snapshot.volumeToMarketCap24h,
      total_supply: snapshot.totalSupply,
      max_supply: snapshot.maxSupply,
      circulating_supply: snapshot.circulatingSupply,
      captured_at: snapshot.capturedAt
    });
  }

  async appendDigest(digest: NewsDigest): Promise<void> {
    await this.insert(TABLES.digests, {
      coin: digest.coin,
      headlines: digest.headlines,
      text: digest.text,
      sentiment: digest.sentiment,
      captured_at: digest.capturedAt
    });
  }

  async appendReport(report: DecisionReport): Promise<void> {
    await this.insert(TABLES.reports, {
      coin: report.coin,
      decision: report.decision,
      decision_source: report.decisionSource,
      predicted_close: report.predictedClose,
      price: report.snapshot.price,
      sentiment: report.digest.sentiment,
      news_available: report.newsAvailable,
      summary: report.summary,
      explanation: report.explanation,
      trades: report.trades,
      stage_errors: report.stageErrors,
      created_at: report.createdAt
    });
  }

  private async insert(table: string, row: Record<string, unknown>): Promise<void> {
    logDatabaseOperation({ operation: 'INSERT', table, params: row });

    const { error } = await this.supabase.from(table).insert(row);

    if (error) {
      logDatabaseError('INSERT', table, error);
      throw new PersistenceError('INSERT', table, { cause: error });
    }
    logDatabaseOperation({ operation: 'INSERT', table, affectedRows: 1 });
  }

  private decode(row: unknown, operation: string): UserLedger {
    try {
      return ledgerFromRow(row);
    } catch (error) {
      logDatabaseError(operation, TABLES.ledgers, error);
      throw new PersistenceError(operation, TABLES.ledgers, { cause: error });
    }
  }
}
