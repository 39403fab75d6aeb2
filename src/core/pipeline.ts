/**
 * Pipeline - main transformation pipeline
 * Runs the passes over one stylesheet, then validates the result
 */

import { performance } from 'perf_hooks';
import type {
  ProcessingMode,
  ProcessingOptions,
  ProcessingResult,
  ProcessingSummary,
  ValidationResult,
} from './types.js';
import { TransformationContext } from './context.js';
import { runVariablePass } from './passes/variable-pass.js';
import { DEFAULT_IMAGE_BASE_URL, runPathPass } from './passes/path-pass.js';
import { runFunctionPass } from './passes/function-pass.js';
import { runMixinPass } from './passes/mixin-pass.js';
import { runImportPass } from './passes/import-pass.js';
import { runContentCleaner } from './passes/content-cleaner.js';
import { validateStylesheet } from './validation/index.js';
import type { StylesheetCompiler } from './validation/compiler.js';
import { MigrationError, errorMessage } from '../errors.js';

/** 10 MB */
export const DEFAULT_MAX_CONTENT_BYTES = 10 * 1024 * 1024;

export const DEFAULT_PROCESSING_OPTIONS: ProcessingOptions = {
  convertVariables: true,
  convertPaths: true,
  convertFunctions: true,
  convertMixins: true,
  removeImports: true,
  validateSyntax: true,
  testCompilation: false,
  strictMode: false,
  imageBaseUrl: DEFAULT_IMAGE_BASE_URL,
  maxContentBytes: DEFAULT_MAX_CONTENT_BYTES,
};

const NO_CONVERSIONS = {
  convertVariables: false,
  convertPaths: false,
  convertFunctions: false,
  convertMixins: false,
  removeImports: false,
} satisfies Partial<ProcessingOptions>;

/**
 * Option presets per processing mode
 */
export function optionsForMode(mode: ProcessingMode): Partial<ProcessingOptions> {
  switch (mode) {
    case 'variables_only':
      return { ...NO_CONVERSIONS, convertVariables: true };
    case 'mixins_only':
      return { ...NO_CONVERSIONS, convertMixins: true };
    case 'validation_only':
      return { ...NO_CONVERSIONS, validateSyntax: true };
    case 'dry_run':
    case 'full':
    default:
      return {};
  }
}

/**
 * Options accepted by the pipeline entry points
 */
export interface PipelineOptions extends Partial<ProcessingOptions> {
  mode?: ProcessingMode;
  /** Used in messages only */
  sourceFile?: string;
  /** Needed when testCompilation is set */
  compiler?: StylesheetCompiler;
}

export function resolveProcessingOptions(options: PipelineOptions = {}): ProcessingOptions {
  const base = { ...DEFAULT_PROCESSING_OPTIONS, ...optionsForMode(options.mode ?? 'full') };
  return {
    convertVariables: options.convertVariables ?? base.convertVariables,
    convertPaths: options.convertPaths ?? base.convertPaths,
    convertFunctions: options.convertFunctions ?? base.convertFunctions,
    convertMixins: options.convertMixins ?? base.convertMixins,
    removeImports: options.removeImports ?? base.removeImports,
    validateSyntax: options.validateSyntax ?? base.validateSyntax,
    testCompilation: options.testCompilation ?? base.testCompilation,
    strictMode: options.strictMode ?? base.strictMode,
    imageBaseUrl: options.imageBaseUrl ?? base.imageBaseUrl,
    maxContentBytes: options.maxContentBytes ?? base.maxContentBytes,
  };
}

/**
 * Reject content the pipeline cannot process
 */
export function assertProcessable(content: string, options: ProcessingOptions, sourceFile?: string): void {
  const label = sourceFile ?? 'stylesheet';
  if (content.trim().length === 0) {
    throw new MigrationError(`${label} is empty`, 'EMPTY_CONTENT', { sourceFile });
  }
  const bytes = Buffer.byteLength(content, 'utf8');
  if (bytes > options.maxContentBytes) {
    throw new MigrationError(
      `${label} is ${bytes} bytes; limit is ${options.maxContentBytes}`,
      'CONTENT_TOO_LARGE',
      { sourceFile, bytes, limit: options.maxContentBytes }
    );
  }
}

type Pass = (context: TransformationContext) => TransformationContext;

/**
 * Run one pass; a throwing pass leaves the content unchanged and is recorded
 */
function runPass(context: TransformationContext, name: string, pass: Pass): void {
  try {
    pass(context);
  } catch (error) {
    context.addWarning('pass_failed', `${name} failed: ${errorMessage(error)}`);
    console.error(`[pipeline] ${name} failed on ${context.sourceFile ?? 'stylesheet'}:`, errorMessage(error));
  }
}

/**
 * Run the passes in their fixed order:
 * variables → paths → functions → mixins → imports → cleanup
 */
export function transformStylesheet(content: string, options: PipelineOptions = {}): TransformationContext {
  const resolved = resolveProcessingOptions(options);
  assertProcessable(content, resolved, options.sourceFile);

  const context = new TransformationContext(content, options.sourceFile);

  if (resolved.convertVariables) runPass(context, 'variable pass', runVariablePass);
  if (resolved.convertPaths) runPass(context, 'path pass', (ctx) => runPathPass(ctx, resolved.imageBaseUrl));
  if (resolved.convertFunctions) runPass(context, 'function pass', runFunctionPass);
  if (resolved.convertMixins) runPass(context, 'mixin pass', runMixinPass);
  if (resolved.removeImports) runPass(context, 'import pass', runImportPass);
  if (context.transformationsApplied.length > 0) runPass(context, 'cleanup', runContentCleaner);

  return context;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function buildSummary(
  context: TransformationContext,
  elapsedMs: number,
  validation?: ValidationResult
): ProcessingSummary {
  const inputBytes = Buffer.byteLength(context.sourceContent, 'utf8');
  const outputBytes = Buffer.byteLength(context.currentContent, 'utf8');
  const sizeDelta = inputBytes - outputBytes;

  return {
    variablesConverted: context.variables.length,
    mixinsResolved: context.mixinStats.resolved,
    mixinsFlagged: context.mixinStats.flagged,
    functionsConverted: context.functions.length,
    importsRemoved: context.imports.length,
    inputBytes,
    outputBytes,
    sizeDelta,
    sizeReductionPercent: inputBytes > 0 ? round((sizeDelta / inputBytes) * 100, 2) : 0,
    linesMigrated: context.currentContent.split('\n').filter((line) => line.trim() !== '').length,
    elapsedMs,
    validationErrors: validation?.errors.length ?? 0,
    validationWarnings: validation?.warnings.length ?? 0,
  };
}

/**
 * Transform and validate one stylesheet
 *
 * @throws {MigrationError} EMPTY_CONTENT or CONTENT_TOO_LARGE
 */
export async function processStylesheet(
  content: string,
  options: PipelineOptions = {}
): Promise<ProcessingResult> {
  const started = performance.now();
  const resolved = resolveProcessingOptions(options);
  const context = transformStylesheet(content, options);

  let validation: ValidationResult | undefined;
  if (resolved.validateSyntax || resolved.testCompilation) {
    context.processingStep = 'validation';
    validation = await validateStylesheet(context.currentContent, {
      testCompilation: resolved.testCompilation,
      compiler: options.compiler,
    });
  }

  const success = !resolved.strictMode || validation === undefined || validation.isValid;

  return {
    success,
    output: context.currentContent,
    summary: buildSummary(context, performance.now() - started, validation),
    transformationsApplied: [...context.transformationsApplied],
    warnings: [...context.warnings],
    validation,
    variables: context.variables,
    mixins: context.mixins,
    functions: context.functions,
    imports: context.imports,
  };
}
