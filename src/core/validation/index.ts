/**
 * Validator - static syntax checks composed with an optional compilation check
 */

import type { ValidationResult } from '../types.js';
import { checkSyntax } from './syntax-validator.js';
import type { StylesheetCompiler } from './compiler.js';

export { checkSyntax, scanRemainingScss } from './syntax-validator.js';
export type { SyntaxCheckResult } from './syntax-validator.js';
export { SassCliCompiler } from './compiler.js';
export type { StylesheetCompiler, CompilationOutcome, SassCliCompilerOptions } from './compiler.js';

export interface ValidateOptions {
  /** Run the compilation check (skipped when no compiler is given) */
  testCompilation?: boolean;
  compiler?: StylesheetCompiler;
}

/**
 * Validate stylesheet text.
 *
 * An unavailable compiler leaves `compilationSuccessful` unset; only an
 * actual failed compile sets it to false.
 */
export async function validateStylesheet(
  content: string,
  options: ValidateOptions = {}
): Promise<ValidationResult> {
  const syntax = checkSyntax(content);
  const result: ValidationResult = {
    isValid: syntax.errors.length === 0,
    errors: [...syntax.errors],
    warnings: [...syntax.warnings],
    balancedBraces: syntax.balancedBraces,
    remaining: syntax.remaining,
  };

  const { compiler, testCompilation = false } = options;
  if (!testCompilation || !compiler) {
    return result;
  }

  if (!(await compiler.isAvailable())) {
    result.warnings.push({
      kind: 'compiler_unavailable',
      message: 'Compiler not available; compilation check skipped',
      severity: 'warning',
    });
    return result;
  }

  const outcome = await compiler.compile(content);
  result.compilationSuccessful = outcome.success;
  result.compilationTimeMs = outcome.durationMs;
  if (!outcome.success) {
    result.errors.push({
      kind: 'compilation_failed',
      message: outcome.error ?? 'Compilation failed',
      severity: 'error',
    });
  }
  result.isValid = result.errors.length === 0 && result.compilationSuccessful !== false;
  return result;
}
