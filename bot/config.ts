import dotenv from 'dotenv';
import { ProfitTier, TradingPolicy } from './types.js';
import { ConfigError } from './errors.js';

export type ChatProvider = 'gemini' | 'ollama';
export type DecisionFallback = 'abort' | 'hold';

export interface AppConfig {
  supabase: {
    url: string;
    serviceRoleKey: string;
  };
  chat: {
    provider: ChatProvider;
    model: string;
    apiKey?: string;
    endpoint?: string;
    temperature: number;
    timeoutMs: number;
  };
  browser: {
    timeoutMs: number;
    headless: boolean;
    executablePath?: string;
  };
  pipeline: {
    dataDir: string;
    trackedCoins: string[];
    decisionFallback: DecisionFallback;
    newsMaxHeadlines: number;
    newsMaxWords: number;
    baselineWindow: number;
    scheduleUtcHours: number[];
  };
  trading: TradingPolicy;
  discord: {
    token?: string;
    clientId?: string;
    guildId?: string;
  };
}

type Env = Record<string, string | undefined>;

function optional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function required(env: Env, name: string): string {
  const value = optional(env, name);
  if (value === undefined) {
    throw new ConfigError(`Missing required environment variable ${name}`);
  }
  return value;
}

function numberVar(env: Env, name: string, fallback: number, check: (value: number) => boolean, rule: string): number {
  const raw = optional(env, name);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || !check(value)) {
    throw new ConfigError(`${name} must be ${rule}, got "${raw}"`);
  }
  return value;
}

function booleanVar(env: Env, name: string, fallback: boolean): boolean {
  const raw = optional(env, name)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (raw === 'true' || raw === '1' || raw === 'yes') return true;
  if (raw === 'false' || raw === '0' || raw === 'no') return false;
  throw new ConfigError(`${name} must be true or false, got "${raw}"`);
}

function listVar(env: Env, name: string, fallback: string): string[] {
  return (optional(env, name) ?? fallback)
    .split(',')
    .map(item => item.trim())
    .filter(item => item !== '');
}

/**
 * Parses "threshold:fraction" pairs such as "0:0.25,5:0.5,10:1" into tiers
 * sorted by threshold. At least one tier with a fraction in (0, 1] is required.
 */
export function parseProfitTiers(raw: string): ProfitTier[] {
  const tiers: ProfitTier[] = [];

  for (const entry of raw.split(',').map(part => part.trim()).filter(part => part !== '')) {
    const [thresholdText, fractionText, ...rest] = entry.split(':');
    const thresholdPct = Number(thresholdText);
    const fraction = Number(fractionText);
    if (rest.length > 0 || fractionText === undefined || thresholdText.trim() === '' ||
        !Number.isFinite(thresholdPct) || !Number.isFinite(fraction)) {
      throw new ConfigError(`Invalid profit tier "${entry}", expected threshold:fraction`);
    }
    if (fraction <= 0 || fraction > 1) {
      throw new ConfigError(`Profit tier "${entry}" must sell a fraction in (0, 1]`);
    }
    if (tiers.some(tier => tier.thresholdPct === thresholdPct)) {
      throw new ConfigError(`Duplicate profit tier threshold ${thresholdPct}`);
    }
    tiers.push({ thresholdPct, fraction });
  }

  if (tiers.length === 0) {
    throw new ConfigError('At least one profit tier is required');
  }
  return tiers.sort((a, b) => a.thresholdPct - b.thresholdPct);
}

function parseScheduleHours(hours: string[]): number[] {
  const parsed = hours.map(hour => {
    const value = Number(hour);
    if (!Number.isInteger(value) || value < 0 || value > 23) {
      throw new ConfigError(`SCHEDULE_UTC_HOURS entries must be hours 0-23, got "${hour}"`);
    }
    return value;
  });
  return [...new Set(parsed)].sort((a, b) => a - b);
}

export function loadConfig(env: Env): AppConfig {
  const providerRaw = (optional(env, 'CHAT_PROVIDER') ?? 'gemini').toLowerCase();
  if (providerRaw !== 'gemini' && providerRaw !== 'ollama') {
    throw new ConfigError(`CHAT_PROVIDER must be gemini or ollama, got "${providerRaw}"`);
  }
  const provider: ChatProvider = providerRaw;

  const fallbackRaw = (optional(env, 'DECISION_FALLBACK') ?? 'abort').toLowerCase();
  if (fallbackRaw !== 'abort' && fallbackRaw !== 'hold') {
    throw new ConfigError(`DECISION_FALLBACK must be abort or hold, got "${fallbackRaw}"`);
  }
  const decisionFallback: DecisionFallback = fallbackRaw;

  const positive = (value: number) => value > 0;
  const positiveInt = (value: number) => Number.isInteger(value) && value > 0;

  return {
    supabase: {
      url: required(env, 'SUPABASE_URL'),
      serviceRoleKey: required(env, 'SUPABASE_SERVICE_ROLE_KEY')
    },
    chat: {
      provider,
      model: optional(env, 'CHAT_MODEL') ?? (provider === 'gemini' ? 'gemini-1.5-flash' : 'llama3'),
      apiKey: provider === 'gemini' ? required(env, 'GEMINI_API_KEY') : optional(env, 'GEMINI_API_KEY'),
      endpoint: optional(env, 'CHAT_ENDPOINT') ?? (provider === 'ollama' ? 'http://localhost:11434' : undefined),
      temperature: numberVar(env, 'CHAT_TEMPERATURE', 0.1, value => value >= 0 && value <= 2, 'between 0 and 2'),
      timeoutMs: numberVar(env, 'CHAT_TIMEOUT_MS', 60000, positiveInt, 'a positive integer')
    },
    browser: {
      timeoutMs: numberVar(env, 'BROWSER_TIMEOUT_MS', 60000, positiveInt, 'a positive integer'),
      headless: booleanVar(env, 'BROWSER_HEADLESS', true),
      executablePath: optional(env, 'BROWSER_EXECUTABLE_PATH')
    },
    pipeline: {
      dataDir: optional(env, 'DATA_DIR') ?? 'data',
      trackedCoins: listVar(env, 'TRACKED_COINS', 'bitcoin,ethereum').map(coin => coin.toLowerCase()),
      decisionFallback,
      newsMaxHeadlines: numberVar(env, 'NEWS_MAX_HEADLINES', 20, positiveInt, 'a positive integer'),
      newsMaxWords: numberVar(env, 'NEWS_MAX_WORDS', 50, positiveInt, 'a positive integer'),
      baselineWindow: numberVar(env, 'BASELINE_WINDOW', 14, value => Number.isInteger(value) && value >= 2, 'an integer of at least 2'),
      scheduleUtcHours: parseScheduleHours(listVar(env, 'SCHEDULE_UTC_HOURS', '0,4,8,12,16,20'))
    },
    trading: {
      tradingFee: numberVar(env, 'TRADING_FEE', 0.001, value => value >= 0 && value < 1, 'in [0, 1)'),
      buyFraction: numberVar(env, 'BUY_FRACTION', 0.2, value => value > 0 && value <= 1, 'in (0, 1]'),
      minCapitalThreshold: numberVar(env, 'MIN_CAPITAL_THRESHOLD', 10, value => value >= 0, 'zero or more'),
      stopLossPct: numberVar(env, 'STOP_LOSS_PCT', 5, positive, 'a positive number'),
      profitTiers: parseProfitTiers(optional(env, 'PROFIT_TIERS') ?? '0:0.25,5:0.5,10:1')
    },
    discord: {
      token: optional(env, 'DISCORD_BOT_TOKEN'),
      clientId: optional(env, 'DISCORD_CLIENT_ID'),
      guildId: optional(env, 'DISCORD_GUILD_ID')
    }
  };
}

/** Reads `.env` into process.env, then validates it. */
export function loadEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
