/**
 * Composition root for the route layer
 * Wires config, stores, cache, stat source, trackers and edge service once per process.
 * The core modules take their collaborators as arguments and hold no module-level state.
 */

import { BetTracker } from './bets/tracker';
import { TtlCache } from './cache';
import { FileCacheStore, isNumberArray, MemoryCacheStore, type CacheStore } from './cacheStores';
import { loadConfig, type EngineConfig } from './config';
import { BallDontLieStatSource } from './edge-engine/data-pipeline/bdl-fetcher';
import { createEdgeService, type EdgeService } from './edge-engine/runEdgeScan';
import { getEnvStatus, hasEnv } from './env';
import type { StatSource } from './edge-engine/statSource';
import { LineHistoryTracker } from './line-history/tracker';
import { createLogger } from './logger';
import { getSupabaseAdmin } from './supabaseAdmin';
import { SupabaseBetStore, SupabaseCacheStore, SupabaseHistoryStore, SupabaseWatchlistStore } from './supabaseStores';

const log = createLogger('Services');

export interface Services {
  config: EngineConfig;
  cache: TtlCache<number[]>;
  tracker: LineHistoryTracker;
  bets: BetTracker;
  edgeService: EdgeService;
}

export interface BuildServicesOptions {
  config?: EngineConfig;
  source?: StatSource;
}

export function buildServices(options: BuildServicesOptions = {}): Services {
  const config = options.config ?? loadConfig();
  log.debug('Environment', getEnvStatus());
  const supabase = getSupabaseAdmin();

  let cacheStore: CacheStore<number[]>;
  if (supabase) {
    cacheStore = new SupabaseCacheStore(supabase, isNumberArray);
  } else if (config.cacheDir) {
    cacheStore = new FileCacheStore(config.cacheDir, isNumberArray);
  } else {
    cacheStore = new MemoryCacheStore<number[]>();
  }

  const cache = new TtlCache<number[]>({
    store: cacheStore,
    maxRetentionSeconds: config.cacheMaxRetentionSeconds,
  });

  const tracker = supabase
    ? new LineHistoryTracker({
        history: new SupabaseHistoryStore(supabase),
        watchlist: new SupabaseWatchlistStore(supabase),
      })
    : new LineHistoryTracker();
  const bets = new BetTracker(supabase ? { store: new SupabaseBetStore(supabase) } : {});

  if (!options.source && !hasEnv('BALLDONTLIE_API_KEY')) {
    log.warn('BALLDONTLIE_API_KEY is not set; stat requests will be unauthenticated');
  }
  const source = options.source ?? new BallDontLieStatSource();
  const edgeService = createEdgeService({ cache, source, tracker, config });

  log.info(`Services ready (storage: ${supabase ? 'supabase' : config.cacheDir ? 'file cache + memory' : 'memory'})`);
  return { config, cache, tracker, bets, edgeService };
}

// Use globalThis to persist across hot reloads in development
const globalForServices = globalThis as unknown as {
  edgeServices: Services | undefined;
};

export function getServices(): Services {
  if (!globalForServices.edgeServices) {
    globalForServices.edgeServices = buildServices();
  }
  return globalForServices.edgeServices;
}

/**
 * Replace the process-wide services (tests use this to inject fakes).
 */
export function setServices(services: Services | undefined): void {
  globalForServices.edgeServices = services;
}
