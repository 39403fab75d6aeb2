/**
 * Core types for the SCSS-to-custom-properties transformation pipeline
 */

// ============================================================================
// Extracted elements
// ============================================================================

/**
 * Value type inferred from a variable's raw value
 */
export type VariableType =
  | 'color'
  | 'size'
  | 'string'
  | 'number'
  | 'boolean'
  | 'list'
  | 'map'
  | 'unknown';

/**
 * Where a variable was declared
 * - root: top level, hoisted into the :root block
 * - local: inside a rule block, rewritten in place
 */
export type VariableScope = 'root' | 'local';

/**
 * SCSS variable declaration
 */
export interface Variable {
  /** Name without the `$` sigil */
  name: string;
  /** Value as written (flags such as !default stripped) */
  rawValue: string;
  inferredType: VariableType;
  /** Always `--${name}` */
  customPropertyName: string;
  /** Names of other variables referenced in rawValue */
  dependencies: string[];
  /** 1-based line in the content the pass received */
  sourceLine: number;
  scope: VariableScope;
  /** Declared with !default */
  isDefault: boolean;
}

export type MixinExpansionStatus = 'known' | 'unknown';

/**
 * How a known mixin was expanded
 */
export type MixinExpansionSource = 'local-definition' | 'library' | 'none';

/**
 * A single `@include` invocation
 */
export interface MixinReference {
  readonly name: string;
  /** Split argument list, absent when the include has no parentheses */
  readonly parameters?: readonly string[];
  readonly sourceLine: number;
  readonly expansionStatus: MixinExpansionStatus;
  readonly expansionSource: MixinExpansionSource;
}

/**
 * A color/math helper call found by the function pass
 */
export interface FunctionCall {
  readonly name: string;
  readonly arguments: readonly string[];
  /** Text that replaced the call */
  readonly replacement: string;
  readonly resolution: 'literal' | 'placeholder';
  readonly sourceLine: number;
}

export type ImportDirective = 'import' | 'use' | 'forward';

/**
 * A removed `@import` / `@use` / `@forward` directive
 */
export interface ImportStatement {
  readonly directive: ImportDirective;
  readonly paths: readonly string[];
  /** Path is a URL or package path rather than a relative partial */
  readonly isExternal: boolean;
  readonly sourceLine: number;
}

// ============================================================================
// Pipeline steps
// ============================================================================

/**
 * Steps of the transformation pipeline, in execution order
 */
export type TransformationStep =
  | 'created'
  | 'variable_processing'
  | 'path_conversion'
  | 'function_conversion'
  | 'mixin_conversion'
  | 'import_removal'
  | 'cleanup'
  | 'validation';

/**
 * Non-fatal issue raised by a pass
 */
export interface PassWarning {
  step: TransformationStep;
  kind: string;
  message: string;
  line?: number;
}

// ============================================================================
// Validation
// ============================================================================

export type IssueSeverity = 'error' | 'warning';

/**
 * Structured validation error or warning
 */
export interface ValidationIssue {
  kind: string;
  message: string;
  severity: IssueSeverity;
  line?: number;
  sourceSnippet?: string;
}

/**
 * Preprocessor tokens still present after transformation
 */
export interface RemainingScss {
  hasRemainingScss: boolean;
  variables: string[];
  mixins: string[];
  functions: string[];
}

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  balancedBraces: boolean;
  /** Unset when the compiler was unavailable or not requested */
  compilationSuccessful?: boolean;
  compilationTimeMs?: number;
  remaining: RemainingScss;
}

// ============================================================================
// Processing results
// ============================================================================

/**
 * Which passes run and whether the output is validated
 */
export interface ProcessingOptions {
  convertVariables: boolean;
  convertPaths: boolean;
  convertFunctions: boolean;
  convertMixins: boolean;
  removeImports: boolean;
  validateSyntax: boolean;
  testCompilation: boolean;
  /** Validation errors make the result unsuccessful */
  strictMode: boolean;
  /** Absolute URL prefix used by the path pass */
  imageBaseUrl: string;
  /** Inputs above this size are rejected */
  maxContentBytes: number;
}

/**
 * Named presets for ProcessingOptions
 */
export type ProcessingMode =
  | 'full'
  | 'variables_only'
  | 'mixins_only'
  | 'validation_only'
  | 'dry_run';

export interface ProcessingSummary {
  variablesConverted: number;
  mixinsResolved: number;
  mixinsFlagged: number;
  functionsConverted: number;
  importsRemoved: number;
  inputBytes: number;
  outputBytes: number;
  sizeDelta: number;
  sizeReductionPercent: number;
  linesMigrated: number;
  elapsedMs: number;
  validationErrors: number;
  validationWarnings: number;
}

export interface ProcessingResult {
  success: boolean;
  output: string;
  summary: ProcessingSummary;
  transformationsApplied: string[];
  warnings: PassWarning[];
  validation?: ValidationResult;
  variables: Variable[];
  mixins: MixinReference[];
  functions: FunctionCall[];
  imports: ImportStatement[];
}
