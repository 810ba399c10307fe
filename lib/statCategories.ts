// Supported prop stat types, individual and combined
import rawCategories from './data/stat-categories.json';

export const STAT_FIELDS = ['pts', 'reb', 'ast', 'stl', 'blk', 'fg3m'] as const;
export type StatField = (typeof STAT_FIELDS)[number];

/** One game's box score, restricted to the fields props are written on. */
export type GameStatLine = Record<StatField, number>;

export interface StatCategory {
  code: string;
  name: string;
  abbreviation: string;
  description: string;
  commonLines: number[];
  fields: StatField[];
  isCombination: boolean;
}

function isStatField(value: string): value is StatField {
  return STAT_FIELDS.some(field => field === value);
}

function buildCategories(): Map<string, StatCategory> {
  const out = new Map<string, StatCategory>();
  for (const [code, raw] of Object.entries(rawCategories)) {
    const fields = raw.fields.filter(isStatField);
    if (fields.length !== raw.fields.length) {
      throw new Error(`Stat category ${code} references an unknown stat field`);
    }
    out.set(code, {
      code,
      name: raw.name,
      abbreviation: raw.abbreviation,
      description: raw.description,
      commonLines: raw.commonLines,
      fields,
      isCombination: fields.length > 1,
    });
  }
  return out;
}

const STAT_CATEGORIES = buildCategories();

// Alternate spellings seen from prop feeds
const ALIASES: Record<string, string> = {
  THREES: '3PM',
  FG3M: '3PM',
  'PTS+REB+AST': 'PRA',
  PR: 'PTS+REB',
  PA: 'PTS+AST',
  RA: 'REB+AST',
};

export function normalizeStatType(statType: string): string {
  const upper = statType.trim().toUpperCase();
  return ALIASES[upper] ?? upper;
}

export function getStatCategory(statType: string): StatCategory | null {
  return STAT_CATEGORIES.get(normalizeStatType(statType)) ?? null;
}

export function isValidStatType(statType: string): boolean {
  return getStatCategory(statType) !== null;
}

export function getStatCategories(): StatCategory[] {
  return Array.from(STAT_CATEGORIES.values());
}

export function getIndividualStats(): StatCategory[] {
  return getStatCategories().filter(c => !c.isCombination);
}

export function getCombinationStats(): StatCategory[] {
  return getStatCategories().filter(c => c.isCombination);
}

export function getStatDisplayName(statType: string): string {
  return getStatCategory(statType)?.name ?? statType;
}

/**
 * Per-game values for a stat type, summing the components of combination stats.
 * Order of games is preserved. Returns null for unknown stat types.
 */
export function combineStatValues(games: GameStatLine[], statType: string): number[] | null {
  const category = getStatCategory(statType);
  if (!category) return null;
  return games.map(game => category.fields.reduce((sum, field) => sum + (game[field] || 0), 0));
}
