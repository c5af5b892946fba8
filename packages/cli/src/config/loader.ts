/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';

import { ConfigError } from '../errors/cli-errors.js';

import { DEFAULT_CONFIG, applyProfile, ANALYSIS_PROFILES } from './defaults.js';
import type { CliOptions, SlipfinderConfig } from './schema.js';
import { parsePartialConfig, validateConfig, type PartialConfig } from './validation.js';

type EnvKind = 'string' | 'number';

/**
 * Environment variable mapping
 * Maps env var names to config paths
 */
export const ENV_VAR_MAP: Record<string, { path: string; kind: EnvKind }> = {
  // Lichess
  LICHESS_TOKEN: { path: 'lichess.token', kind: 'string' },
  SLIPFINDER_LICHESS_URL: { path: 'lichess.baseUrl', kind: 'string' },

  // Retrieval
  SLIPFINDER_MAX_GAMES: { path: 'retrieval.maxGames', kind: 'number' },

  // Engine
  STOCKFISH_PATH: { path: 'engine.path', kind: 'string' },
  SLIPFINDER_PROFILE: { path: 'engine.profile', kind: 'string' },
  SLIPFINDER_DEPTH: { path: 'engine.depth', kind: 'number' },
  SLIPFINDER_THREADS: { path: 'engine.threads', kind: 'number' },
  SLIPFINDER_HASH_MB: { path: 'engine.hashMb', kind: 'number' },

  // Analysis
  SLIPFINDER_MIN_CP: { path: 'analysis.minCpLoss', kind: 'number' },
  SLIPFINDER_INACCURACY: { path: 'analysis.thresholds.inaccuracy', kind: 'number' },
  SLIPFINDER_MISTAKE: { path: 'analysis.thresholds.mistake', kind: 'number' },
  SLIPFINDER_BLUNDER: { path: 'analysis.thresholds.blunder', kind: 'number' },
  SLIPFINDER_SIDE: { path: 'analysis.side', kind: 'string' },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Merge a partial configuration over a complete one
 * Source values override target values
 */
export function deepMerge(target: SlipfinderConfig, source: PartialConfig): SlipfinderConfig {
  return {
    lichess: { ...target.lichess, ...source.lichess },
    retrieval: { ...target.retrieval, ...source.retrieval },
    engine: { ...target.engine, ...source.engine },
    analysis: {
      ...target.analysis,
      ...source.analysis,
      thresholds: { ...target.analysis.thresholds, ...source.analysis?.thresholds },
    },
    output: { ...target.output, ...source.output },
  };
}

/**
 * Set a nested property on an object using dot notation path
 */
function setNestedProperty(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;

  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Numbers are converted; anything unparseable is left for validation to report
 */
function parseEnvValue(value: string, kind: EnvKind): unknown {
  if (kind === 'number') {
    const num = Number(value);
    return value.trim() === '' || Number.isNaN(num) ? value : num;
  }
  return value;
}

/**
 * Load configuration from environment variables
 * @throws ConfigValidationError if a variable holds an invalid value
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialConfig {
  const config: Record<string, unknown> = {};

  for (const [envVar, { path, kind }] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      setNestedProperty(config, path, parseEnvValue(value, kind));
    }
  }

  return parsePartialConfig(config);
}

/**
 * Load configuration from config file using cosmiconfig
 *
 * Without an explicit path the usual places are searched and a missing file
 * is not an error.
 */
export async function loadConfigFile(configPath?: string): Promise<PartialConfig | null> {
  const explorer = cosmiconfig('slipfinder', {
    searchPlaces: [
      'package.json',
      '.slipfinderrc',
      '.slipfinderrc.json',
      '.slipfinderrc.yaml',
      '.slipfinderrc.yml',
      '.slipfinderrc.js',
      '.slipfinderrc.cjs',
      'slipfinder.config.js',
      'slipfinder.config.cjs',
    ],
  });

  let result: CosmiconfigResult;
  try {
    result = configPath ? await explorer.load(configPath) : await explorer.search();
  } catch (error) {
    const source = configPath ?? 'configuration file';
    throw new ConfigError(
      `Failed to read ${source}: ${error instanceof Error ? error.message : String(error)}`,
      'Check that the file exists and is valid JSON, YAML or JavaScript',
    );
  }

  if (!result || result.isEmpty) {
    return null;
  }
  return parsePartialConfig(result.config);
}

function definedEntries(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Map CLI options to a partial config
 * @throws ConfigValidationError if an option holds an invalid value
 */
export function mapCliToConfig(options: CliOptions): PartialConfig {
  return parsePartialConfig({
    lichess: definedEntries({ token: options.token }),
    retrieval: definedEntries({
      maxGames: options.maxGames,
      since: options.since,
      until: options.until,
      perfTypes: options.perf,
    }),
    engine: definedEntries({
      path: options.engine,
      profile: options.profile,
      depth: options.depth,
      threads: options.threads,
      hashMb: options.hashMb,
    }),
    analysis: definedEntries({
      minCpLoss: options.minCp,
      side: options.side,
      thresholds: definedEntries({
        inaccuracy: options.inaccuracy,
        mistake: options.mistake,
        blunder: options.blunder,
      }),
    }),
  });
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 *
 * A profile sets the search depth only when no source gives one explicitly.
 *
 * @throws ConfigValidationError if the merged configuration is invalid
 * @throws ConfigError if an explicit config file cannot be read
 */
export async function loadConfig(
  cliOptions: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<SlipfinderConfig> {
  const fileConfig = await loadConfigFile(cliOptions.config);
  const envConfig = loadEnvConfig(env);
  const cliConfig = mapCliToConfig(cliOptions);

  let config = structuredClone(DEFAULT_CONFIG);
  if (fileConfig) {
    config = deepMerge(config, fileConfig);
  }
  config = deepMerge(config, envConfig);
  config = deepMerge(config, cliConfig);

  const explicitDepth = cliConfig.engine?.depth ?? envConfig.engine?.depth ?? fileConfig?.engine?.depth;
  if (explicitDepth === undefined) {
    config.engine = applyProfile(config.engine, config.engine.profile);
  }

  return validateConfig(config);
}

/**
 * Format configuration for display, with the token masked
 */
export function formatConfig(config: SlipfinderConfig): string {
  const masked = config.lichess.token ? { ...config, lichess: { ...config.lichess, token: '***' } } : config;
  return JSON.stringify(masked, null, 2);
}

export { ANALYSIS_PROFILES };
