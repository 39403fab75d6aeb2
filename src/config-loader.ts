/**
 * Migrator configuration loader
 * Uses cosmiconfig to search for configuration in various formats
 *
 * Precedence: explicit overrides > environment > config file > defaults.
 * The result is resolved once and passed explicitly to everything that
 * needs it.
 */

import { cosmiconfig } from 'cosmiconfig';
import AjvModule from 'ajv';
import { parse as parseDotenv } from 'dotenv';
import { readFile } from 'fs/promises';
import { join, resolve } from 'path';
import type { ProcessingMode } from './core/types.js';
import {
  DEFAULT_CONFIG,
  SOURCE_GROUPS,
  migratorConfigSchema,
  type MigratorConfig,
  type MigratorConfigInput,
} from './config-schema.js';
import { MigrationError } from './errors.js';

const Ajv = AjvModule.default;

/**
 * Module name for cosmiconfig
 */
const MODULE_NAME = 'scssmigrate';

/**
 * Configuration search locations (in priority order)
 */
export const SEARCH_PLACES = [
  '.scssmigraterc',
  '.scssmigraterc.json',
  '.scssmigraterc.yaml',
  'scssmigrate.config.js',
  '.config/scssmigrate.json',
  'package.json',
];

/** Prefix of environment variables read by resolveConfig */
export const ENV_PREFIX = 'SCSS_MIGRATE_';

/**
 * AJV validator for configuration schema
 */
const ajv = new Ajv({ allErrors: true });
const validateConfig = ajv.compile(migratorConfigSchema);

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public errors: Array<{ path: string; message: string }>
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates raw configuration with AJV
 *
 * @param filepath - Source of the configuration (for errors)
 * @throws {ConfigValidationError} If configuration is invalid
 */
export function validateConfigInput(config: unknown, filepath: string): MigratorConfigInput {
  if (!validateConfig(config)) {
    const errors = (validateConfig.errors ?? []).map((err) => ({
      path: err.instancePath || '(root)',
      message: err.message ?? 'Unknown error',
    }));
    throw new ConfigValidationError(`Invalid configuration in ${filepath}`, errors);
  }
  return toConfigInput(config);
}

/**
 * Narrow a schema-valid object to the input shape
 */
function toConfigInput(value: unknown): MigratorConfigInput {
  if (!isRecord(value)) return {};
  const input: MigratorConfigInput = {};
  if (typeof value.themesDir === 'string') input.themesDir = value.themesDir;
  if (typeof value.imageBaseUrl === 'string') input.imageBaseUrl = value.imageBaseUrl;
  if (typeof value.format === 'boolean') input.format = value.format;
  if (typeof value.predeterminedStyles === 'boolean') input.predeterminedStyles = value.predeterminedStyles;
  if (isRecord(value.processing)) input.processing = pickProcessing(value.processing);
  if (isRecord(value.sources)) input.sources = pickGroups(value.sources, isStringList);
  if (isRecord(value.outputs)) input.outputs = pickGroups(value.outputs, (v): v is string => typeof v === 'string');
  if (isRecord(value.repair)) input.repair = pickRepair(value.repair);
  return input;
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function pickGroups<T>(
  value: Record<string, unknown>,
  guard: (v: unknown) => v is T
): Partial<Record<(typeof SOURCE_GROUPS)[number], T>> {
  const picked: Partial<Record<(typeof SOURCE_GROUPS)[number], T>> = {};
  for (const group of SOURCE_GROUPS) {
    const entry = value[group];
    if (guard(entry)) picked[group] = entry;
  }
  return picked;
}

function isProcessingMode(value: unknown): value is ProcessingMode {
  return (
    value === 'full' ||
    value === 'variables_only' ||
    value === 'mixins_only' ||
    value === 'validation_only' ||
    value === 'dry_run'
  );
}

function pickProcessing(value: Record<string, unknown>): Partial<MigratorConfig['processing']> {
  const picked: Partial<MigratorConfig['processing']> = {};
  if (isProcessingMode(value.mode)) picked.mode = value.mode;
  if (typeof value.strictMode === 'boolean') picked.strictMode = value.strictMode;
  if (typeof value.testCompilation === 'boolean') picked.testCompilation = value.testCompilation;
  if (typeof value.maxContentBytes === 'number') picked.maxContentBytes = value.maxContentBytes;
  if (typeof value.compilerBinary === 'string') picked.compilerBinary = value.compilerBinary;
  return picked;
}

const REPAIR_NUMBER_KEYS = [
  'maxRetries',
  'maxEscalations',
  'pollIntervalMs',
  'cycleTimeoutMs',
  'totalTimeoutMs',
  'cleanupTimeoutMs',
  'logTailLines',
] as const;

function pickRepair(value: Record<string, unknown>): Partial<MigratorConfig['repair']> {
  const picked: Partial<MigratorConfig['repair']> = {};
  if (typeof value.enabled === 'boolean') picked.enabled = value.enabled;
  if (typeof value.containerName === 'string') picked.containerName = value.containerName;
  if (typeof value.candidatePrefix === 'string') picked.candidatePrefix = value.candidatePrefix;
  if (isStringList(value.finishedMarkers)) picked.finishedMarkers = value.finishedMarkers;
  if (isStringList(value.errorIndicators)) picked.errorIndicators = value.errorIndicators;
  for (const key of REPAIR_NUMBER_KEYS) {
    const entry = value[key];
    if (typeof entry === 'number') picked[key] = entry;
  }
  return picked;
}

/**
 * Loads migrator configuration from filesystem
 *
 * @param searchFrom - Directory to start search from (defaults to current)
 * @returns Found configuration or null if not found
 * @throws {ConfigValidationError} If configuration is invalid
 */
export async function loadConfigFile(searchFrom?: string): Promise<MigratorConfigInput | null> {
  const explorer = cosmiconfig(MODULE_NAME, { searchPlaces: SEARCH_PLACES });
  const result = await explorer.search(searchFrom);

  if (!result || result.isEmpty) {
    return null;
  }
  return validateConfigInput(result.config, result.filepath);
}

/**
 * Clears cosmiconfig cache (useful for tests)
 */
export function clearConfigCache(): void {
  cosmiconfig(MODULE_NAME, { searchPlaces: SEARCH_PLACES }).clearCaches();
}

/**
 * Formats validation errors for user output
 */
export function formatValidationErrors(error: ConfigValidationError): string {
  const errorList = error.errors.map((err) => `  - ${err.path}: ${err.message}`).join('\n');
  return `${error.message}\n\nErrors:\n${errorList}`;
}

// ============================================================================
// Environment
// ============================================================================

function parseBoolean(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

function parseInteger(value: string): number | undefined {
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Reads `SCSS_MIGRATE_*` variables into a partial configuration.
 * Unparseable values are reported and ignored.
 */
export function configFromEnv(env: Readonly<Record<string, string | undefined>>): MigratorConfigInput {
  const read = (key: string): string | undefined => {
    const value = env[`${ENV_PREFIX}${key}`];
    return value === undefined || value.trim() === '' ? undefined : value.trim();
  };
  const flag = (key: string): boolean | undefined => {
    const raw = read(key);
    if (raw === undefined) return undefined;
    const parsed = parseBoolean(raw);
    if (parsed === undefined) console.error(`[config-loader] Ignoring ${ENV_PREFIX}${key}=${raw}: not a boolean`);
    return parsed;
  };
  const integer = (key: string): number | undefined => {
    const raw = read(key);
    if (raw === undefined) return undefined;
    const parsed = parseInteger(raw);
    if (parsed === undefined) console.error(`[config-loader] Ignoring ${ENV_PREFIX}${key}=${raw}: not an integer`);
    return parsed;
  };

  const input: MigratorConfigInput = {};
  const themesDir = read('THEMES_DIR');
  if (themesDir) input.themesDir = themesDir;
  const imageBaseUrl = read('IMAGE_BASE_URL');
  if (imageBaseUrl) input.imageBaseUrl = imageBaseUrl;
  const format = flag('FORMAT');
  if (format !== undefined) input.format = format;
  const predetermined = flag('PREDETERMINED_STYLES');
  if (predetermined !== undefined) input.predeterminedStyles = predetermined;

  const processing: Partial<MigratorConfig['processing']> = {};
  const mode = read('MODE');
  if (isProcessingMode(mode)) processing.mode = mode;
  else if (mode !== undefined) console.error(`[config-loader] Ignoring ${ENV_PREFIX}MODE=${mode}: unknown mode`);
  const strict = flag('STRICT');
  if (strict !== undefined) processing.strictMode = strict;
  const testCompilation = flag('TEST_COMPILATION');
  if (testCompilation !== undefined) processing.testCompilation = testCompilation;
  const compilerBinary = read('COMPILER');
  if (compilerBinary) processing.compilerBinary = compilerBinary;
  if (Object.keys(processing).length > 0) input.processing = processing;

  const repair: Partial<MigratorConfig['repair']> = {};
  const enabled = flag('REPAIR');
  if (enabled !== undefined) repair.enabled = enabled;
  const container = read('CONTAINER');
  if (container) repair.containerName = container;
  const maxRetries = integer('MAX_RETRIES');
  if (maxRetries !== undefined) repair.maxRetries = maxRetries;
  const maxEscalations = integer('MAX_ESCALATIONS');
  if (maxEscalations !== undefined) repair.maxEscalations = maxEscalations;
  if (Object.keys(repair).length > 0) input.repair = repair;

  return input;
}

/**
 * Variables from `<cwd>/.env`; a missing file yields none
 */
export async function loadDotenv(cwd: string): Promise<Record<string, string>> {
  try {
    return parseDotenv(await readFile(join(cwd, '.env'), 'utf-8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Deep merges a partial config over a full one, with override values taking priority
 */
export function mergeConfigs(base: MigratorConfig, override: MigratorConfigInput | null): MigratorConfig {
  if (!override) return base;

  return {
    themesDir: override.themesDir ?? base.themesDir,
    imageBaseUrl: override.imageBaseUrl ?? base.imageBaseUrl,
    format: override.format ?? base.format,
    predeterminedStyles: override.predeterminedStyles ?? base.predeterminedStyles,
    processing: { ...base.processing, ...override.processing },
    sources: { ...base.sources, ...override.sources },
    outputs: { ...base.outputs, ...override.outputs },
    repair: { ...base.repair, ...override.repair },
  };
}

export interface ResolveConfigOptions {
  /** Highest-priority values, e.g. from command line flags */
  overrides?: MigratorConfigInput;
  /** Directory searched for the config file and `.env` (default: process.cwd()) */
  cwd?: string;
  /** Environment (default: process.env); `.env` entries fill in what it lacks */
  env?: Readonly<Record<string, string | undefined>>;
}

/**
 * Resolve the configuration once: overrides > environment > file > defaults.
 * Relative `themesDir` is taken from `cwd`.
 *
 * @throws {MigrationError} CONFIG_INVALID when the file or overrides are invalid
 */
export async function resolveConfig(options: ResolveConfigOptions = {}): Promise<MigratorConfig> {
  const cwd = options.cwd ?? process.cwd();

  let fromFile: MigratorConfigInput | null;
  let overrides: MigratorConfigInput | undefined;
  try {
    fromFile = await loadConfigFile(cwd);
    overrides = options.overrides ? validateConfigInput(options.overrides, 'overrides') : undefined;
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error(`[config-loader] ${formatValidationErrors(error)}`);
      throw new MigrationError(error.message, 'CONFIG_INVALID', { errors: error.errors });
    }
    throw error;
  }

  const env = { ...(await loadDotenv(cwd)), ...(options.env ?? process.env) };

  const merged = [fromFile, configFromEnv(env), overrides ?? null].reduce<MigratorConfig>(
    (config, layer) => mergeConfigs(config, layer),
    DEFAULT_CONFIG
  );

  return { ...merged, themesDir: resolve(cwd, merged.themesDir) };
}
