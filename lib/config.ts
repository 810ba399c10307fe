import { ConfigError } from './errors';

/**
 * Tunables for the edge engine, stat cache and parlay recommendations.
 */
export interface EngineConfig {
  /** Fewest observations the edge engine will evaluate. */
  minObservations: number;
  /** Games in the rolling average (newest first). */
  rollingWindow: number;
  /** Minimum |average - line| gap that counts as an edge. */
  edgeThreshold: number;
  /** Floor for the standard deviation used by the probability transform. */
  minStdDev: number;
  cacheTtlSeconds: number;
  /** Entries older than this are purged regardless of TTL. */
  cacheMaxRetentionSeconds: number;
  /** Games requested from the stat source per player. */
  lookbackGames: number;
  minStreak: number;
  /** Legs below this probability are left out of parlay recommendations. */
  parlayMinProbability: number;
  defaultLegOdds: number;
  cacheDir?: string;
}

// Cache TTL and edge defaults
// 1 hour TTL balances freshness against the stats API quota
export const DEFAULT_CONFIG: EngineConfig = {
  minObservations: 5,
  rollingWindow: 5,
  edgeThreshold: 2.0,
  minStdDev: 1.0,
  cacheTtlSeconds: 3600,
  cacheMaxRetentionSeconds: 7 * 24 * 60 * 60,
  lookbackGames: 10,
  minStreak: 2,
  parlayMinProbability: 70,
  defaultLegOdds: -110,
};

type NumericKey = {
  [K in keyof EngineConfig]-?: EngineConfig[K] extends number ? K : never;
}[keyof EngineConfig];

interface NumericSetting {
  env: string;
  key: NumericKey;
  min: number;
  integer?: boolean;
}

const NUMERIC_SETTINGS: NumericSetting[] = [
  { env: 'EDGE_MIN_OBSERVATIONS', key: 'minObservations', min: 1, integer: true },
  { env: 'EDGE_ROLLING_WINDOW', key: 'rollingWindow', min: 1, integer: true },
  { env: 'EDGE_THRESHOLD', key: 'edgeThreshold', min: 0 },
  { env: 'EDGE_MIN_STD_DEV', key: 'minStdDev', min: 0.01 },
  { env: 'CACHE_TTL_SECONDS', key: 'cacheTtlSeconds', min: 0 },
  { env: 'CACHE_MAX_RETENTION_SECONDS', key: 'cacheMaxRetentionSeconds', min: 0 },
  { env: 'STAT_LOOKBACK_GAMES', key: 'lookbackGames', min: 1, integer: true },
  { env: 'EDGE_MIN_STREAK', key: 'minStreak', min: 1, integer: true },
  { env: 'PARLAY_MIN_PROBABILITY', key: 'parlayMinProbability', min: 0 },
];

/**
 * Build the engine configuration from environment variables, falling back to defaults.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: Partial<NodeJS.ProcessEnv> = process.env, overrides: Partial<EngineConfig> = {}): EngineConfig {
  const config: EngineConfig = { ...DEFAULT_CONFIG };
  const invalid: string[] = [];

  for (const setting of NUMERIC_SETTINGS) {
    const raw = env[setting.env];
    if (raw === undefined || raw.trim() === '') continue;

    const value = Number(raw);
    if (!Number.isFinite(value) || value < setting.min || (setting.integer && !Number.isInteger(value))) {
      invalid.push(`${setting.env}=${raw} (expected ${setting.integer ? 'an integer' : 'a number'} >= ${setting.min})`);
      continue;
    }
    config[setting.key] = value;
  }

  const legOdds = env.PARLAY_DEFAULT_LEG_ODDS;
  if (legOdds !== undefined && legOdds.trim() !== '') {
    const value = Number(legOdds);
    if (!Number.isInteger(value) || Math.abs(value) < 100) {
      invalid.push(`PARLAY_DEFAULT_LEG_ODDS=${legOdds} (expected American odds such as -110 or +150)`);
    } else {
      config.defaultLegOdds = value;
    }
  }

  if (env.STAT_CACHE_DIR) {
    config.cacheDir = env.STAT_CACHE_DIR;
  }

  if (invalid.length > 0) {
    throw new ConfigError(invalid);
  }

  return { ...config, ...overrides };
}
