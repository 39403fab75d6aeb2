/**
 * Legacy SCSS → CSS custom properties migrator
 */

export * from './core/index.js';
export * from './repair/index.js';
export { migrateTheme, computeTotals } from './migration.js';
export type {
  MigrateThemeOptions,
  FileMigrationReport,
  MigrationTotals,
  ThemeMigrationReport,
} from './migration.js';
export {
  resolveConfig,
  loadConfigFile,
  configFromEnv,
  mergeConfigs,
  validateConfigInput,
  formatValidationErrors,
  clearConfigCache,
  ConfigValidationError,
} from './config-loader.js';
export type { ResolveConfigOptions } from './config-loader.js';
export { DEFAULT_CONFIG, SOURCE_GROUPS, migratorConfigSchema } from './config-schema.js';
export type { MigratorConfig, MigratorConfigInput, SourceGroup } from './config-schema.js';
export { readThemeSources, combineSources } from './edge/theme-sources.js';
export type { ThemeSources, GroupSource, SourceFile } from './edge/theme-sources.js';
export { writeFileAtomic, writeFilesAtomic } from './edge/file-writer.js';
export { formatStylesheet } from './edge/formatter.js';
export { appendPredeterminedStyles, detectBrand, PREDETERMINED_FRAGMENTS } from './edge/predetermined-styles.js';
export { MigrationError, createMigrationError, isMigrationError, hasErrorCode } from './errors.js';
export type { MigrationErrorCode } from './errors.js';
