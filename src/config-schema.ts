/**
 * Migrator configuration schema
 * Defines TypeScript interfaces and JSON Schema for validation
 */

import type { ProcessingMode } from './core/types.js';
import { DEFAULT_IMAGE_BASE_URL } from './core/passes/path-pass.js';
import { DEFAULT_MAX_CONTENT_BYTES } from './core/pipeline.js';
import { DEFAULT_REPAIR_SETTINGS } from './repair/repair-loop.js';
import type { RepairSettings } from './repair/types.js';

/**
 * Logical output groups of a theme
 */
export type SourceGroup = 'interior' | 'listing' | 'detail' | 'home';

export const SOURCE_GROUPS: readonly SourceGroup[] = ['interior', 'listing', 'detail', 'home'];

/**
 * Main migrator configuration
 */
export interface MigratorConfig {
  /** Directory holding one directory per theme slug */
  themesDir: string;

  /** Absolute URL prefix for rewritten image paths */
  imageBaseUrl: string;

  /** Transformation pipeline */
  processing: {
    mode: ProcessingMode;
    /** Validation errors fail the file */
    strictMode: boolean;
    /** Round trip through the `sass` command line compiler */
    testCompilation: boolean;
    maxContentBytes: number;
    /** Executable used for `testCompilation` */
    compilerBinary: string;
  };

  /** Source files per group, relative to `<themesDir>/<slug>/css` */
  sources: Record<SourceGroup, string[]>;

  /** Output file per group, relative to `<themesDir>/<slug>` */
  outputs: Record<SourceGroup, string>;

  /** Format outputs with prettier */
  format: boolean;

  /** Append brand fragments to the interior output */
  predeterminedStyles: boolean;

  /** Compile-verify-repair loop against the watch-compiler */
  repair: RepairSettings & {
    enabled: boolean;
    /** Container whose log the watch-compiler writes to */
    containerName: string;
  };
}

/**
 * Partial configuration as accepted from files, environment and overrides
 */
export type MigratorConfigInput = {
  [K in keyof MigratorConfig]?: MigratorConfig[K] extends string[] | string | boolean | number
    ? MigratorConfig[K]
    : Partial<MigratorConfig[K]>;
};

const stringList = { type: 'array', items: { type: 'string' } };
const positiveInteger = { type: 'integer', minimum: 1 };
const nonNegativeInteger = { type: 'integer', minimum: 0 };

const groupProperties = <T>(schema: T) => ({
  interior: schema,
  listing: schema,
  detail: schema,
  home: schema,
});

/**
 * JSON Schema for configuration validation using AJV.
 * Every key is optional; missing keys come from DEFAULT_CONFIG.
 */
export const migratorConfigSchema = {
  type: 'object',
  properties: {
    themesDir: { type: 'string', minLength: 1 },
    imageBaseUrl: { type: 'string', minLength: 1 },
    processing: {
      type: 'object',
      properties: {
        mode: {
          type: 'string',
          enum: ['full', 'variables_only', 'mixins_only', 'validation_only', 'dry_run'],
        },
        strictMode: { type: 'boolean' },
        testCompilation: { type: 'boolean' },
        maxContentBytes: positiveInteger,
        compilerBinary: { type: 'string', minLength: 1 },
      },
      additionalProperties: false,
    },
    sources: {
      type: 'object',
      properties: groupProperties(stringList),
      additionalProperties: false,
    },
    outputs: {
      type: 'object',
      properties: groupProperties({ type: 'string', minLength: 1 }),
      additionalProperties: false,
    },
    format: { type: 'boolean' },
    predeterminedStyles: { type: 'boolean' },
    repair: {
      type: 'object',
      properties: {
        enabled: { type: 'boolean' },
        containerName: { type: 'string', minLength: 1 },
        candidatePrefix: { type: 'string', minLength: 1 },
        maxRetries: nonNegativeInteger,
        maxEscalations: nonNegativeInteger,
        pollIntervalMs: positiveInteger,
        cycleTimeoutMs: positiveInteger,
        totalTimeoutMs: positiveInteger,
        cleanupTimeoutMs: nonNegativeInteger,
        logTailLines: positiveInteger,
        finishedMarkers: stringList,
        errorIndicators: stringList,
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: MigratorConfig = {
  themesDir: 'dealer-themes',
  imageBaseUrl: DEFAULT_IMAGE_BASE_URL,
  processing: {
    mode: 'full',
    strictMode: false,
    testCompilation: false,
    maxContentBytes: DEFAULT_MAX_CONTENT_BYTES,
    compilerBinary: 'sass',
  },
  sources: {
    interior: ['style.scss', 'inside.scss'],
    listing: ['lvrp.scss', 'vrp.scss'],
    detail: ['lvdp.scss', 'vdp.scss'],
    home: ['home.scss'],
  },
  outputs: {
    interior: 'sb-inside.scss',
    listing: 'sb-vrp.scss',
    detail: 'sb-vdp.scss',
    home: 'sb-home.scss',
  },
  format: true,
  predeterminedStyles: true,
  repair: {
    ...DEFAULT_REPAIR_SETTINGS,
    enabled: false,
    containerName: 'dealerinspire_legacy_assets',
  },
};
