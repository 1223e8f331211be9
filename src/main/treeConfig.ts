import { getLogger } from '../utils/logger';

export interface TreeConfig {
  depth: number;
  humanReadable: boolean;
  includeMimeType: boolean;
  followSymlinks: boolean;
  logfile: string | null;
  verbose: boolean;
}

export const DEFAULT_DEPTH = 3;

const logger = getLogger('tree-config');

export const coerceBoolean = (value: unknown, fallback = false): boolean => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const normalised = value.trim().toLowerCase();
    if (!normalised) return fallback;
    return ['1', 'true', 't', 'yes', 'y', 'on'].includes(normalised);
  }
  return fallback;
};

const parseDepth = (raw: string | undefined): number => {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_DEPTH;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < -1) {
    logger.warn(`Ignoring DIR_TREE_DEPTH=${raw}; expected -1 or a non-negative integer.`);
    return DEFAULT_DEPTH;
  }
  return parsed;
};

export const resolveTreeConfig = (
  overrides: Partial<TreeConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): TreeConfig => ({
  depth: overrides.depth ?? parseDepth(env.DIR_TREE_DEPTH),
  humanReadable: overrides.humanReadable ?? coerceBoolean(env.DIR_TREE_HUMAN_READABLE),
  includeMimeType: overrides.includeMimeType ?? coerceBoolean(env.DIR_TREE_MIME_TYPE),
  followSymlinks: overrides.followSymlinks ?? coerceBoolean(env.DIR_TREE_FOLLOW_SYMLINKS, true),
  logfile: overrides.logfile ?? (env.DIR_TREE_LOGFILE?.trim() || null),
  verbose: overrides.verbose ?? coerceBoolean(env.DIR_TREE_LOG_VERBOSE),
});
