// Domain types shared by the extractors, the decision engine and the ledger

/** A scraped number, or null when the page showed no usable value. */
export type MaybeNumber = number | null;

export type Decision = 'BUY' | 'SELL' | 'HOLD';

export interface CoinSnapshot {
  coin: string;
  price: number;
  priceChange24hPercent: MaybeNumber;
  low24h: MaybeNumber;
  high24h: MaybeNumber;
  volume24h: MaybeNumber;
  marketCap: MaybeNumber;
  fullyDilutedValuation: MaybeNumber;
  volumeToMarketCap24h: MaybeNumber;
  totalSupply: MaybeNumber;
  maxSupply: MaybeNumber;
  circulatingSupply: MaybeNumber;
  capturedAt: string;
}

export type HeadlineTone = 'bullish' | 'bearish' | 'neutral';

export interface Headline {
  title: string;
  tone: HeadlineTone;
}

export interface NewsDigest {
  coin: string;
  headlines: Headline[];
  text: string;
  /** Community sentiment in [-1, 1]; null when the page showed no indicator. */
  sentiment: MaybeNumber;
  capturedAt: string;
}

export interface HistoryBar {
  timestamp: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: MaybeNumber;
  marketCap: MaybeNumber;
}

export interface UserLedger {
  userId: string;
  coin: string;
  originalInvestment: number;
  totalDeposits: number;
  totalWithdrawals: number;
  currentCapital: number;
  positionQuantity: number;
  /** Total cost paid for the units still held. */
  costBasis: number;
  realizedGains: number;
  createdAt: string;
  updatedAt: string;
}

export interface ProfitTier {
  thresholdPct: number;
  fraction: number;
}

export interface TradingPolicy {
  tradingFee: number;
  buyFraction: number;
  minCapitalThreshold: number;
  stopLossPct: number;
  profitTiers: ProfitTier[];
}

export type LedgerActionKind = 'BUY' | 'SELL' | 'HOLD' | 'SKIPPED';

export interface LedgerAction {
  userId: string;
  coin: string;
  decision: Decision;
  action: LedgerActionKind;
  reason: string;
  fraction: number;
  tier: ProfitTier | null;
  stopLoss: boolean;
  quantity: number;
  price: number;
  cashDelta: number;
  realizedDelta: number;
  capitalAfter: number;
  positionAfter: number;
}

export interface UserShare {
  userId: string;
  netInvestment: number;
  ownershipPct: number;
  currentCapital: number;
  positionQuantity: number;
  positionValue: MaybeNumber;
  unrealizedGains: MaybeNumber;
  realizedGains: number;
}

export interface GlobalLedger {
  coin: string;
  price: MaybeNumber;
  userCount: number;
  totalDeposits: number;
  totalWithdrawals: number;
  netInvestment: number;
  totalCapital: number;
  totalPosition: number;
  totalCostBasis: number;
  realizedGains: number;
  positionValue: MaybeNumber;
  unrealizedGains: MaybeNumber;
  portfolioValue: MaybeNumber;
  performancePct: MaybeNumber;
  users: UserShare[];
}

export type PipelineStage = 'snapshot' | 'news' | 'history' | 'decision' | 'ledger' | 'persist';

export interface StageError {
  stage: PipelineStage;
  code: string;
  message: string;
  userId?: string;
}

export interface DecisionReport {
  coin: string;
  snapshot: CoinSnapshot;
  digest: NewsDigest;
  newsAvailable: boolean;
  predictedClose: MaybeNumber;
  decision: Decision;
  decisionSource: 'model' | 'fallback';
  explanation: string;
  summary: string;
  trades: LedgerAction[];
  stageErrors: StageError[];
  createdAt: string;
}

export type PipelineStatus = 'success' | 'partial' | 'failure';

export interface PipelineResult {
  coin: string;
  status: PipelineStatus;
  report?: DecisionReport;
  error?: StageError;
  stageErrors: StageError[];
}
