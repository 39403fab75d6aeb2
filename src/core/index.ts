/**
 * Core module - entry point
 * Transforms legacy SCSS into custom-property based stylesheets
 */

// Main pipeline
export {
  processStylesheet,
  transformStylesheet,
  resolveProcessingOptions,
  optionsForMode,
  buildSummary,
  DEFAULT_PROCESSING_OPTIONS,
} from './pipeline.js';
export type { PipelineOptions } from './pipeline.js';

export { TransformationContext } from './context.js';
export type { MixinStats } from './context.js';

// Passes
export * from './passes/index.js';

// Validation
export { validateStylesheet, checkSyntax, scanRemainingScss, SassCliCompiler } from './validation/index.js';
export type { StylesheetCompiler, CompilationOutcome, SassCliCompilerOptions, ValidateOptions } from './validation/index.js';

// Types
export type {
  Variable,
  VariableType,
  VariableScope,
  MixinReference,
  MixinExpansionStatus,
  MixinExpansionSource,
  FunctionCall,
  ImportStatement,
  ImportDirective,
  TransformationStep,
  PassWarning,
  ValidationIssue,
  IssueSeverity,
  RemainingScss,
  ValidationResult,
  ProcessingOptions,
  ProcessingMode,
  ProcessingSummary,
  ProcessingResult,
} from './types.js';
