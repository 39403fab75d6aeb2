/**
 * Fixers - one per compilation error kind
 *
 * Pure functions of (content, error). A fixer that cannot do anything
 * returns the content unchanged with `changed: false`.
 */

import { codeText, countBraces, scanLines, type ScannedLine } from '../core/scanner.js';
import { toCustomPropertyName } from '../core/passes/variable-pass.js';
import { errorMessage } from '../errors.js';
import { commentOutFix, isCommentedOut, type Alteration } from './commenting.js';
import type { CompilationError, CompilationErrorKind, FixResult } from './types.js';

export type Fixer = (content: string, error: CompilationError) => FixResult;

const UNTERMINATED_DECLARATION = /^-{0,2}[a-zA-Z][\w-]*\s*:(?!:)\s*[^;{}]+$/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function unchanged(content: string, description: string): FixResult {
  return { content, changed: false, description, alterations: [] };
}

/**
 * Replace one line's text, recording the alteration
 */
function replaceLine(content: string, index: number, text: string, reason: string): FixResult {
  const lines = content.split('\n');
  const before = lines[index];
  if (before === undefined || before === text) {
    return unchanged(content, `${reason}: nothing to change`);
  }
  lines[index] = text;
  return {
    content: lines.join('\n'),
    changed: true,
    description: `${reason} (line ${index + 1})`,
    alterations: [{ line: index + 1, before, after: text, reason }],
  };
}

/**
 * Rewrite the code segments of a line, leaving strings and comments alone
 */
function mapCode(line: ScannedLine, transform: (code: string) => string): string {
  return line.segments.map((s) => (s.kind === 'code' ? transform(s.text) : s.text)).join('');
}

// ============================================================================
// Line-level repairs
// ============================================================================

/**
 * Close or drop parentheses so the line's code is balanced
 */
export function balanceParentheses(line: ScannedLine): string {
  const code = codeText(line.segments);
  const opens = (code.match(/\(/g) ?? []).length;
  const closes = (code.match(/\)/g) ?? []).length;

  if (opens > closes) {
    const missing = ')'.repeat(opens - closes);
    const match = line.text.match(/^(.*?)(\s*;?\s*)$/);
    return match ? `${match[1]}${missing}${match[2]}` : `${line.text}${missing}`;
  }

  if (closes > opens) {
    let surplus = closes - opens;
    const chars = line.text.split('');
    for (let i = chars.length - 1; i >= 0 && surplus > 0; i--) {
      if (chars[i] === ')') {
        chars.splice(i, 1);
        surplus--;
      }
    }
    return chars.join('');
  }

  return line.text;
}

/**
 * Append `;` to a declaration missing its terminator
 */
export function terminateDeclaration(line: ScannedLine): string | null {
  const code = codeText(line.segments).trim();
  if (!UNTERMINATED_DECLARATION.test(code) || code.endsWith(',')) {
    return null;
  }
  const commentIndex = line.segments.findIndex((s) => s.kind === 'comment');
  if (commentIndex === -1) {
    return `${line.text.trimEnd()};`;
  }
  const head = line.segments.slice(0, commentIndex).map((s) => s.text).join('').trimEnd();
  const tail = line.segments.slice(commentIndex).map((s) => s.text).join('');
  return `${head}; ${tail}`;
}

function previousCodeLine(lines: ScannedLine[], index: number): number {
  for (let i = index - 1; i >= 0; i--) {
    if (!isCommentedOut(lines[i])) return i;
  }
  return -1;
}

// ============================================================================
// Fixers
// ============================================================================

/**
 * `$name` left in the output: point it at the custom property
 */
export const fixUndefinedVariable: Fixer = (content, error) => {
  const name = error.captures.name;
  const reason = `undefined variable${name ? ` $${name}` : ''}`;
  if (!name) {
    return error.lineNumber ? commentOutFix(content, [error.lineNumber - 1], reason) : unchanged(content, reason);
  }

  const pattern = new RegExp(`\\$${escapeRegExp(name)}(?![\\w-])(\\s*:(?!:))?`, 'g');
  const property = toCustomPropertyName(name);
  const scanned = scanLines(content);
  const alterations: Alteration[] = [];

  const lines = scanned.map((line) => {
    if (isCommentedOut(line) || !line.text.includes(`$${name}`)) return line.text;
    const next = mapCode(line, (code) =>
      code.replace(pattern, (_m, colon?: string) => (colon ? `${property}${colon}` : `var(${property})`))
    );
    if (next !== line.text) {
      alterations.push({ line: line.index + 1, before: line.text, after: next, reason });
    }
    return next;
  });

  if (alterations.length === 0) {
    return error.lineNumber ? commentOutFix(content, [error.lineNumber - 1], reason) : unchanged(content, reason);
  }
  return {
    content: lines.join('\n'),
    changed: true,
    description: `${reason} → var(${property}) (${alterations.length} line(s))`,
    alterations,
  };
};

/**
 * Comment out every line invoking the mixin
 */
export const fixUndefinedMixin: Fixer = (content, error) => {
  const name = error.captures.name;
  const reason = `undefined mixin${name ? ` "${name}"` : ''}`;
  if (!name) {
    return error.lineNumber ? commentOutFix(content, [error.lineNumber - 1], reason) : unchanged(content, reason);
  }

  const invocation = new RegExp(`@include\\s+${escapeRegExp(name)}(?![\\w-])`);
  const indexes = scanLines(content)
    .filter((line) => !isCommentedOut(line) && invocation.test(codeText(line.segments)))
    .map((line) => line.index);

  return commentOutFix(content, indexes, reason);
};

/**
 * Missing terminator, unbalanced parentheses or an unclosed block
 */
export const fixSyntaxError: Fixer = (content, error) => {
  const expected = error.captures.expected;
  const scanned = scanLines(content);

  if (expected === '}') {
    const { opens, closes } = scanned.reduce(
      (acc, line) => {
        const counts = countBraces(line.segments);
        return { opens: acc.opens + counts.opens, closes: acc.closes + counts.closes };
      },
      { opens: 0, closes: 0 }
    );
    if (opens > closes) {
      const closing = '}'.repeat(opens - closes);
      return {
        content: `${content.trimEnd()}\n${closing}`,
        changed: true,
        description: `closed ${opens - closes} unclosed block(s)`,
        alterations: [{ line: scanned.length + 1, before: '', after: closing, reason: 'unclosed block' }],
      };
    }
  }

  if (error.lineNumber === undefined) {
    return unchanged(content, 'syntax error without a line number');
  }
  const index = error.lineNumber - 1;
  const line = scanned[index];
  if (!line) {
    return unchanged(content, `syntax error on missing line ${error.lineNumber}`);
  }

  if (expected === ':' && error.captures.name) {
    const property = new RegExp(`^(\\s*${escapeRegExp(error.captures.name)})\\s+(?!:)`);
    if (property.test(line.text)) {
      return replaceLine(content, index, line.text.replace(property, '$1: '), 'missing ":" after property');
    }
  }

  // The compiler reports the token after the missing `;`, usually on the next line
  for (const candidate of [previousCodeLine(scanned, index), index]) {
    const target = scanned[candidate];
    if (!target || isCommentedOut(target)) continue;
    const terminated = terminateDeclaration(target);
    if (terminated !== null) {
      return replaceLine(content, candidate, terminated, 'missing ";"');
    }
  }

  const balanced = balanceParentheses(line);
  if (balanced !== line.text) {
    return replaceLine(content, index, balanced, 'unbalanced parentheses');
  }

  return unchanged(content, `no heuristic for syntax error on line ${error.lineNumber}`);
};

/**
 * Targeted repair of the reported line, else comment it out
 */
export const fixInvalidCss: Fixer = (content, error) => {
  if (error.lineNumber === undefined) {
    return unchanged(content, 'invalid CSS without a line number');
  }
  const index = error.lineNumber - 1;
  const line = scanLines(content)[index];
  if (!line || isCommentedOut(line)) {
    return unchanged(content, `invalid CSS on line ${error.lineNumber}: nothing to change`);
  }

  const balanced = balanceParentheses(line);
  if (balanced !== line.text) {
    return replaceLine(content, index, balanced, 'unbalanced parentheses');
  }

  const deduplicated = mapCode(line, (code) => code.replace(/;(\s*;)+/g, ';'));
  if (deduplicated !== line.text) {
    return replaceLine(content, index, deduplicated, 'duplicate ";"');
  }

  return commentOutFix(content, [index], 'invalid CSS');
};

export const FIXERS: Readonly<Record<CompilationErrorKind, Fixer>> = {
  undefined_variable: fixUndefinedVariable,
  undefined_mixin: fixUndefinedMixin,
  syntax_error: fixSyntaxError,
  invalid_css: fixInvalidCss,
};

/**
 * Dispatch to the fixer for the error's kind; a throwing fixer counts as no change
 */
export function applyFix(content: string, error: CompilationError): FixResult {
  try {
    return FIXERS[error.kind](content, error);
  } catch (caught) {
    console.error(`[repair-loop] ${error.kind} fixer failed:`, errorMessage(caught));
    return unchanged(content, `${error.kind} fixer failed: ${errorMessage(caught)}`);
  }
}
