import {
  Decision,
  GlobalLedger,
  LedgerAction,
  MaybeNumber,
  ProfitTier,
  TradingPolicy,
  UserLedger,
  UserShare
} from './types.js';
import { PersistenceGateway } from './persistence.js';
import { InsufficientFunds, InvalidAmount } from './errors.js';
import { KeyedLock } from './utils/keyedLock.js';
import { logLedgerOperation, log } from './utils/logger.js';

export function netInvestment(ledger: UserLedger): number {
  return ledger.totalDeposits - ledger.totalWithdrawals;
}

export function isFunded(ledger: UserLedger): boolean {
  return ledger.currentCapital > 0 || ledger.positionQuantity > 0;
}

export function averageCost(ledger: UserLedger): MaybeNumber {
  return ledger.positionQuantity > 0 ? ledger.costBasis / ledger.positionQuantity : null;
}

/** Percent gain of selling one unit at `price` after fees, against the average cost. */
export function marginPct(ledger: UserLedger, price: number, fee: number): MaybeNumber {
  const cost = averageCost(ledger);
  if (cost === null || cost <= 0) {
    return null;
  }
  return ((price * (1 - fee) - cost) / cost) * 100;
}

export function isStopLossTriggered(ledger: UserLedger, price: number, policy: TradingPolicy): boolean {
  const margin = marginPct(ledger, price, policy.tradingFee);
  return margin !== null && margin <= -policy.stopLossPct;
}

/** Highest tier whose threshold the margin reaches, or null below the lowest tier. */
export function selectTier(tiers: ProfitTier[], margin: number): ProfitTier | null {
  let selected: ProfitTier | null = null;
  for (const tier of tiers) {
    if (tier.thresholdPct <= margin && (selected === null || tier.thresholdPct > selected.thresholdPct)) {
      selected = tier;
    }
  }
  return selected;
}

interface Plan {
  action: LedgerAction;
  next: UserLedger | null;
}

function baseAction(ledger: UserLedger | null, userId: string, coin: string, decision: Decision, price: number): LedgerAction {
  return {
    userId,
    coin,
    decision,
    action: 'SKIPPED',
    reason: '',
    fraction: 0,
    tier: null,
    stopLoss: false,
    quantity: 0,
    price,
    cashDelta: 0,
    realizedDelta: 0,
    capitalAfter: ledger?.currentCapital ?? 0,
    positionAfter: ledger?.positionQuantity ?? 0
  };
}

function skip(action: LedgerAction, reason: string): Plan {
  return { action: { ...action, action: 'SKIPPED', reason }, next: null };
}

/**
 * Pure decision step: the action taken and the ledger that results, or a null
 * ledger when nothing changes.
 */
export function planDecision(
  ledger: UserLedger | null,
  userId: string,
  coin: string,
  decision: Decision,
  price: number,
  policy: TradingPolicy,
  now: string
): Plan {
  const action = baseAction(ledger, userId, coin, decision, price);

  if (decision === 'HOLD') {
    return { action: { ...action, action: 'HOLD', reason: 'hold' }, next: null };
  }
  if (ledger === null) {
    return skip(action, 'no ledger for this user and coin');
  }
  if (!Number.isFinite(price) || price <= 0) {
    return skip(action, `invalid price ${price}`);
  }

  if (decision === 'BUY') {
    if (ledger.currentCapital <= 0) {
      return skip(action, 'no capital to invest');
    }

    const fraction = ledger.currentCapital <= policy.minCapitalThreshold ? 1 : policy.buyFraction;
    const spend = fraction === 1 ? ledger.currentCapital : ledger.currentCapital * fraction;
    const quantity = (spend * (1 - policy.tradingFee)) / price;
    const next: UserLedger = {
      ...ledger,
      currentCapital: fraction === 1 ? 0 : ledger.currentCapital - spend,
      positionQuantity: ledger.positionQuantity + quantity,
      costBasis: ledger.costBasis + spend,
      updatedAt: now
    };

    return {
      action: {
        ...action,
        action: 'BUY',
        reason: fraction === 1 ? 'capital at or below threshold, investing all' : `investing ${fraction * 100}% of capital`,
        fraction,
        quantity,
        cashDelta: -spend,
        capitalAfter: next.currentCapital,
        positionAfter: next.positionQuantity
      },
      next
    };
  }

  if (ledger.positionQuantity <= 0) {
    return skip(action, 'no position to sell');
  }

  const margin = marginPct(ledger, price, policy.tradingFee);
  if (margin === null) {
    return skip(action, 'position has no cost basis');
  }

  const stopLoss = margin <= -policy.stopLossPct;
  const tier = stopLoss ? null : selectTier(policy.profitTiers, margin);
  if (!stopLoss && tier === null) {
    return skip(action, `margin ${margin.toFixed(2)}% is below the lowest profit tier`);
  }

  const fraction = tier === null ? 1 : tier.fraction;
  const fullExit = fraction >= 1;
  const quantity = fullExit ? ledger.positionQuantity : ledger.positionQuantity * fraction;
  const costRemoved = fullExit ? ledger.costBasis : ledger.costBasis * fraction;
  const proceeds = quantity * price * (1 - policy.tradingFee);
  const realized = proceeds - costRemoved;

  const next: UserLedger = {
    ...ledger,
    currentCapital: ledger.currentCapital + proceeds,
    positionQuantity: fullExit ? 0 : ledger.positionQuantity - quantity,
    costBasis: fullExit ? 0 : ledger.costBasis - costRemoved,
    realizedGains: ledger.realizedGains + realized,
    updatedAt: now
  };

  return {
    action: {
      ...action,
      action: 'SELL',
      reason: stopLoss
        ? `stop-loss at margin ${margin.toFixed(2)}%`
        : `margin ${margin.toFixed(2)}% reached the ${tier?.thresholdPct}% tier`,
      fraction,
      tier,
      stopLoss,
      quantity,
      cashDelta: proceeds,
      realizedDelta: realized,
      capitalAfter: next.currentCapital,
      positionAfter: next.positionQuantity
    },
    next
  };
}

export interface LedgerServiceOptions {
  gateway: PersistenceGateway;
  policy: TradingPolicy;
  now?: () => Date;
}

/**
 * Simulated capital and position per (user, coin). Every mutation runs under
 * a per-key lock and is written with a single putLedger call, so a failed
 * write leaves the stored row as it was.
 */
export class LedgerService {
  private readonly gateway: PersistenceGateway;
  private readonly lock = new KeyedLock();
  private readonly now: () => Date;

  constructor(private readonly options: LedgerServiceOptions) {
    this.gateway = options.gateway;
    this.now = options.now ?? (() => new Date());
  }

  get policy(): TradingPolicy {
    return this.options.policy;
  }

  private key(userId: string, coin: string): string {
    return `${userId}\u0000${coin}`;
  }

  async deposit(userId: string, coin: string, amount: number): Promise<number> {
    if (!Number.isFinite(amount) || amount <= 0) {
      logLedgerOperation('REJECTED', { userId, coin, amount, message: 'invalid deposit amount' });
      throw new InvalidAmount(amount);
    }

    return this.lock.run(this.key(userId, coin), async () => {
      const current = await this.gateway.getLedger(userId, coin);
      const timestamp = this.now().toISOString();

      const next: UserLedger = current === null
        ? {
            userId,
            coin,
            originalInvestment: amount,
            totalDeposits: amount,
            totalWithdrawals: 0,
            currentCapital: amount,
            positionQuantity: 0,
            costBasis: 0,
            realizedGains: 0,
            createdAt: timestamp,
            updatedAt: timestamp
          }
        : {
            ...current,
            totalDeposits: current.totalDeposits + amount,
            currentCapital: current.currentCapital + amount,
            updatedAt: timestamp
          };

      await this.gateway.putLedger(next);
      logLedgerOperation('DEPOSIT', { userId, coin, amount, capitalAfter: next.currentCapital });
      return next.currentCapital;
    });
  }

  async withdraw(userId: string, coin: string, amount: number): Promise<number> {
    if (!Number.isFinite(amount) || amount <= 0) {
      logLedgerOperation('REJECTED', { userId, coin, amount, message: 'invalid withdrawal amount' });
      throw new InvalidAmount(amount);
    }

    return this.lock.run(this.key(userId, coin), async () => {
      const current = await this.gateway.getLedger(userId, coin);
      const available = current?.currentCapital ?? 0;
      if (current === null || amount > available) {
        logLedgerOperation('REJECTED', { userId, coin, amount, capitalAfter: available, message: 'insufficient funds' });
        throw new InsufficientFunds(userId, coin, amount, available);
      }

      const next: UserLedger = {
        ...current,
        totalWithdrawals: current.totalWithdrawals + amount,
        currentCapital: amount === current.currentCapital ? 0 : current.currentCapital - amount,
        updatedAt: this.now().toISOString()
      };

      await this.gateway.putLedger(next);
      logLedgerOperation('WITHDRAW', { userId, coin, amount, capitalAfter: next.currentCapital });
      return next.currentCapital;
    });
  }

  /**
   * Applies one decision at the snapshot price. HOLD never touches storage;
   * BUY and SELL either commit a full new ledger or change nothing.
   */
  async applyDecision(userId: string, coin: string, decision: Decision, snapshot: { price: number }): Promise<LedgerAction> {
    if (decision === 'HOLD') {
      const ledger = await this.gateway.getLedger(userId, coin);
      const { action } = planDecision(ledger, userId, coin, decision, snapshot.price, this.policy, '');
      logLedgerOperation('HOLD', { userId, coin, capitalAfter: action.capitalAfter, positionAfter: action.positionAfter });
      return action;
    }

    return this.lock.run(this.key(userId, coin), async () => {
      const ledger = await this.gateway.getLedger(userId, coin);
      const { action, next } = planDecision(
        ledger, userId, coin, decision, snapshot.price, this.policy, this.now().toISOString()
      );

      if (next === null) {
        logLedgerOperation('SKIP', { userId, coin, message: action.reason });
        return action;
      }

      await this.gateway.putLedger(next);
      logLedgerOperation(action.action === 'BUY' ? 'BUY' : 'SELL', {
        userId,
        coin,
        amount: action.quantity,
        capitalAfter: action.capitalAfter,
        positionAfter: action.positionAfter,
        message: action.reason
      });
      return action;
    });
  }

  getLedger(userId: string, coin: string): Promise<UserLedger | null> {
    return this.gateway.getLedger(userId, coin);
  }

  listLedgers(coin: string): Promise<UserLedger[]> {
    return this.gateway.listLedgers(coin);
  }

  /** Pool view of a coin, valued at `price` when one is known. */
  async summarizeCoin(coin: string, price: MaybeNumber): Promise<GlobalLedger> {
    const ledgers = await this.gateway.listLedgers(coin);
    const summary = summarizeLedgers(coin, ledgers, price);
    log('INFO', `Summarized ${summary.userCount} ledgers for ${coin}`, {
      netInvestment: summary.netInvestment,
      portfolioValue: summary.portfolioValue
    });
    return summary;
  }
}

export function summarizeLedgers(coin: string, ledgers: UserLedger[], price: MaybeNumber): GlobalLedger {
  const sum = (pick: (ledger: UserLedger) => number) => ledgers.reduce((total, ledger) => total + pick(ledger), 0);

  const totalDeposits = sum(ledger => ledger.totalDeposits);
  const totalWithdrawals = sum(ledger => ledger.totalWithdrawals);
  const totalNet = totalDeposits - totalWithdrawals;
  const totalCapital = sum(ledger => ledger.currentCapital);
  const totalPosition = sum(ledger => ledger.positionQuantity);
  const totalCostBasis = sum(ledger => ledger.costBasis);
  const positionValue = price === null ? null : totalPosition * price;
  const portfolioValue = positionValue === null ? null : totalCapital + positionValue;

  const users: UserShare[] = ledgers.map(ledger => {
    const net = netInvestment(ledger);
    const value = price === null ? null : ledger.positionQuantity * price;
    return {
      userId: ledger.userId,
      netInvestment: net,
      ownershipPct: totalNet > 0 ? (net / totalNet) * 100 : 0,
      currentCapital: ledger.currentCapital,
      positionQuantity: ledger.positionQuantity,
      positionValue: value,
      unrealizedGains: value === null ? null : value - ledger.costBasis,
      realizedGains: ledger.realizedGains
    };
  });

  return {
    coin,
    price,
    userCount: ledgers.length,
    totalDeposits,
    totalWithdrawals,
    netInvestment: totalNet,
    totalCapital,
    totalPosition,
    totalCostBasis,
    realizedGains: sum(ledger => ledger.realizedGains),
    positionValue,
    unrealizedGains: positionValue === null ? null : positionValue - totalCostBasis,
    portfolioValue,
    performancePct: portfolioValue !== null && totalNet > 0 ? ((portfolioValue - totalNet) / totalNet) * 100 : null,
    users
  };
}
