import path from 'path';
import { DEFAULT_EXPAND_ALL_LIMIT } from './treeBuilder';

export interface ExplorerConfig {
  rootPath: string;
  showHidden: boolean;
  editor: string;
  statusTtlMs: number;
  recentChangeMs: number;
  expandAllLimit: number;
  watch: boolean;
  verboseLogging: boolean;
  logFile: string | null;
}

export const DEFAULT_EDITOR = 'vim';
export const DEFAULT_STATUS_TTL_MS = 3000;
export const DEFAULT_RECENT_CHANGE_MS = 5000;

export const coerceBoolean = (value: unknown): boolean => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const normalised = value.trim().toLowerCase();
    return ['1', 'true', 't', 'yes', 'y', 'on'].includes(normalised);
  }
  return false;
};

const positiveInteger = (value: string | undefined, fallback: number) => {
  if (!value) return fallback;
  const numeric = Number.parseInt(value, 10);
  return Number.isFinite(numeric) && numeric > 0 ? numeric : fallback;
};

const nonEmpty = (value: string | undefined) => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export const resolveEditor = (env: NodeJS.ProcessEnv = process.env) =>
  nonEmpty(env.VISUAL) ?? nonEmpty(env.EDITOR) ?? DEFAULT_EDITOR;

export const resolveExplorerConfig = (
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ExplorerConfig> = {},
): ExplorerConfig => {
  const base: ExplorerConfig = {
    rootPath: process.cwd(),
    showHidden: false,
    editor: resolveEditor(env),
    statusTtlMs: positiveInteger(env.DIRTREE_STATUS_TTL_MS, DEFAULT_STATUS_TTL_MS),
    recentChangeMs: DEFAULT_RECENT_CHANGE_MS,
    expandAllLimit: positiveInteger(env.DIRTREE_EXPAND_LIMIT, DEFAULT_EXPAND_ALL_LIMIT),
    watch: true,
    verboseLogging: coerceBoolean(env.DIRTREE_LOG_VERBOSE),
    logFile: nonEmpty(env.DIRTREE_LOG_FILE) ?? null,
  };
  const merged: ExplorerConfig = { ...base, ...overrides };
  merged.rootPath = path.resolve(merged.rootPath);
  return merged;
};
