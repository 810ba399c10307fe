// Environment variable access
// Nothing is strictly required: without Supabase credentials every store runs in memory

/**
 * Optional environment variables and what they enable
 */
const OPTIONAL_ENV_VARS = {
  // Supabase (persistent cache, line history and watch-list)
  NEXT_PUBLIC_SUPABASE_URL: 'Supabase project URL',
  SUPABASE_SERVICE_ROLE_KEY: 'Supabase service role key',

  // Ball Don't Lie API (player game logs)
  BALLDONTLIE_API_KEY: 'Ball Don\'t Lie API key',

  // Cron endpoint protection
  CRON_SECRET: 'Shared secret for the refresh cron endpoint',

  // On-disk stat cache (used when Supabase is not configured)
  STAT_CACHE_DIR: 'Directory for the file-backed stat cache',
} as const;

export type OptionalEnvKey = keyof typeof OPTIONAL_ENV_VARS;

/**
 * Get optional environment variable
 * Returns undefined if not present or empty
 */
export function getOptionalEnv(key: OptionalEnvKey): string | undefined {
  const value = process.env[key];
  return value ? value : undefined;
}

/**
 * Check if an optional environment variable is configured
 */
export function hasEnv(key: OptionalEnvKey): boolean {
  return Boolean(process.env[key]);
}

/**
 * Which variables are configured (for debugging)
 * Never exposes actual values, just which ones are set
 */
export function getEnvStatus(): Record<string, boolean> {
  const status: Record<string, boolean> = {};
  for (const key of Object.keys(OPTIONAL_ENV_VARS)) {
    status[key] = Boolean(process.env[key]);
  }
  return status;
}
