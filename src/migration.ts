/**
 * Theme migration - sources → pipeline → fragments → formatting → atomic
 * write → optional compile-verify-repair
 */

import { join } from 'path';
import { performance } from 'perf_hooks';
import type { MigratorConfig, SourceGroup } from './config-schema.js';
import { processStylesheet } from './core/pipeline.js';
import type { ProcessingResult } from './core/types.js';
import { SassCliCompiler, type StylesheetCompiler } from './core/validation/index.js';
import { writeFilesAtomic } from './edge/file-writer.js';
import { formatStylesheet } from './edge/formatter.js';
import { appendPredeterminedStyles } from './edge/predetermined-styles.js';
import { readThemeSources } from './edge/theme-sources.js';
import { MigrationError } from './errors.js';
import { DockerLogSource } from './repair/log-source.js';
import { runRepairLoop, type RepairLoopDeps } from './repair/repair-loop.js';
import type { RepairReport } from './repair/types.js';
import { GitReverter } from './repair/vcs.js';

export interface MigrateThemeOptions {
  /** Transform and report without writing (also implied by mode `dry_run`) */
  dryRun?: boolean;
  /** Interrupts the repair loop */
  signal?: AbortSignal;
  /** Compiler for `processing.testCompilation` (default: `sass` CLI) */
  compiler?: StylesheetCompiler;
  /** Collaborators of the repair loop (default: docker logs + git) */
  repair?: Partial<Omit<RepairLoopDeps, 'signal'>>;
}

export interface FileMigrationReport {
  group: SourceGroup;
  /** Source files, relative to the theme directory */
  sources: string[];
  outputPath: string;
  /** Null when the file holds predetermined fragments only */
  result: ProcessingResult | null;
  appendedFragments: string[];
}

export interface MigrationTotals {
  filesWritten: number;
  variablesConverted: number;
  mixinsResolved: number;
  mixinsFlagged: number;
  functionsConverted: number;
  importsRemoved: number;
  linesMigrated: number;
  validationErrors: number;
  validationWarnings: number;
  elapsedMs: number;
}

export interface ThemeMigrationReport {
  slug: string;
  themeDir: string;
  dryRun: boolean;
  files: FileMigrationReport[];
  /** Theme stylesheets outside every group */
  unassignedSources: string[];
  /** Present when the repair loop ran */
  repair?: RepairReport;
  totals: MigrationTotals;
}

/**
 * Sum per-file summaries
 */
export function computeTotals(files: readonly FileMigrationReport[], filesWritten: number, elapsedMs: number): MigrationTotals {
  const totals: MigrationTotals = {
    filesWritten,
    variablesConverted: 0,
    mixinsResolved: 0,
    mixinsFlagged: 0,
    functionsConverted: 0,
    importsRemoved: 0,
    linesMigrated: 0,
    validationErrors: 0,
    validationWarnings: 0,
    elapsedMs,
  };
  for (const { result } of files) {
    if (!result) continue;
    totals.variablesConverted += result.summary.variablesConverted;
    totals.mixinsResolved += result.summary.mixinsResolved;
    totals.mixinsFlagged += result.summary.mixinsFlagged;
    totals.functionsConverted += result.summary.functionsConverted;
    totals.importsRemoved += result.summary.importsRemoved;
    totals.linesMigrated += result.summary.linesMigrated;
    totals.validationErrors += result.summary.validationErrors;
    totals.validationWarnings += result.summary.validationWarnings;
  }
  return totals;
}

/**
 * Migrate one theme's stylesheets into its four output files
 *
 * @throws {MigrationError} SOURCE_NOT_FOUND, VALIDATION_FAILED (strict mode),
 * WRITE_FAILED, COMPILATION_FAILED or ABORTED
 */
export async function migrateTheme(
  slug: string,
  config: MigratorConfig,
  options: MigrateThemeOptions = {}
): Promise<ThemeMigrationReport> {
  const started = performance.now();
  const dryRun = options.dryRun === true || config.processing.mode === 'dry_run';
  const sources = await readThemeSources(config, slug);
  const compiler =
    options.compiler ??
    (config.processing.testCompilation ? new SassCliCompiler({ binary: config.processing.compilerBinary }) : undefined);

  const files: FileMigrationReport[] = [];
  const outputs = new Map<string, string>();

  for (const source of sources.groups) {
    const hasFragments = source.group === 'interior' && config.predeterminedStyles;
    if (source.combined === '' && !hasFragments) continue;

    const outputPath = join(sources.themeDir, config.outputs[source.group]);
    let output = '';
    let result: ProcessingResult | null = null;

    if (source.combined !== '') {
      result = await processStylesheet(source.combined, {
        mode: config.processing.mode,
        strictMode: config.processing.strictMode,
        testCompilation: config.processing.testCompilation,
        maxContentBytes: config.processing.maxContentBytes,
        imageBaseUrl: config.imageBaseUrl,
        sourceFile: outputPath,
        compiler,
      });
      if (!result.success) {
        throw new MigrationError(`${outputPath} failed validation`, 'VALIDATION_FAILED', {
          file: outputPath,
          errors: result.validation?.errors ?? [],
        });
      }
      output = result.output;
    }

    let appendedFragments: string[] = [];
    if (hasFragments) {
      const appended = await appendPredeterminedStyles(output, slug);
      output = appended.content;
      appendedFragments = appended.appended;
    }
    if (output.trim() === '') continue;

    if (config.format) {
      output = await formatStylesheet(output, outputPath);
    }

    outputs.set(outputPath, output);
    files.push({
      group: source.group,
      sources: source.files.map((file) => file.relativePath),
      outputPath,
      result: result ? { ...result, output } : null,
      appendedFragments,
    });
  }

  let repair: RepairReport | undefined;
  if (!dryRun) {
    await writeFilesAtomic(outputs);

    if (config.repair.enabled && outputs.size > 0) {
      repair = await runRepairLoop(
        join(sources.themeDir, 'css'),
        outputs,
        {
          logs: options.repair?.logs ?? new DockerLogSource(config.repair.containerName),
          reverter: options.repair?.reverter ?? new GitReverter(),
          clock: options.repair?.clock,
          signal: options.signal,
        },
        config.repair
      );

      if (repair.outcome === 'aborted') {
        throw new MigrationError(`Compilation check of ${slug} was interrupted`, 'ABORTED', {
          alterations: repair.alterations,
        });
      }
      if (repair.outcome === 'failed') {
        throw new MigrationError(`${slug} does not compile after every repair tier`, 'COMPILATION_FAILED', {
          alterations: repair.alterations,
          attempts: repair.attempts,
        });
      }
    }
  }

  const totals = computeTotals(files, dryRun ? 0 : outputs.size, performance.now() - started);
  console.error(
    `[migration] ${slug}: ${files.length} file(s)${dryRun ? ' (dry run)' : ''}, ` +
      `${totals.variablesConverted} variables, ${totals.mixinsResolved} mixins resolved, ` +
      `${totals.mixinsFlagged} flagged, ${totals.importsRemoved} imports removed`
  );

  return {
    slug,
    themeDir: sources.themeDir,
    dryRun,
    files,
    unassignedSources: sources.unassigned,
    repair,
    totals,
  };
}
