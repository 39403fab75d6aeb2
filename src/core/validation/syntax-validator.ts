/**
 * Syntax validator - static checks that need no external compiler
 *
 * Brace balance, unterminated strings, declaration shape, pseudo-element
 * spelling, deprecated constructs, and a scan for preprocessor tokens that
 * survived the transformation.
 */

import type { RemainingScss, ValidationIssue } from '../types.js';
import { codeText, scanLines, type ScannedLine } from '../scanner.js';

const VALID_PSEUDO_ELEMENTS: ReadonlySet<string> = new Set([
  'before',
  'after',
  'first-line',
  'first-letter',
  'selection',
  'placeholder',
  'marker',
  'backdrop',
  'file-selector-button',
  'cue',
  'part',
  'slotted',
  'spelling-error',
  'grammar-error',
]);

const PSEUDO_ELEMENT = /::([a-zA-Z][\w-]*)/g;
const VENDOR_PREFIX = /^-(?:webkit|moz|ms|o)-/;
const DECLARATION = /^(-{0,2}[\w-]*)\s*:(?!:)\s*(.*?)\s*(;?)$/;
const VARIABLE_DIVISION = /(?:\$[\w-]+|var\(--[\w-]+\))\s*\/\s*[\d$(]|[\d)]\s*\/\s*\$[\w-]+/;
const REMAINING_VARIABLE = /\$([a-zA-Z][\w-]*)/g;
const REMAINING_MIXIN = /@include\s+([\w-]+)/g;
const REMAINING_FUNCTION =
  /(?<![\w-])(lighten|darken|mix|saturate|desaturate|transparentize|fade-out|opacify|fade-in|adjust-hue|map-get|map-merge)\s*\(/g;

export interface SyntaxCheckResult {
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  balancedBraces: boolean;
  remaining: RemainingScss;
}

function issue(
  kind: string,
  message: string,
  severity: ValidationIssue['severity'],
  line: ScannedLine
): ValidationIssue {
  return { kind, message, severity, line: line.index + 1, sourceSnippet: line.text.trim() };
}

/**
 * Brace balance over code segments (strings and comments ignored)
 */
export function checkBraces(lines: ScannedLine[]): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  let depth = 0;
  let lastOpen: ScannedLine | undefined;

  for (const line of lines) {
    for (const ch of codeText(line.segments)) {
      if (ch === '{') {
        depth++;
        lastOpen = line;
      } else if (ch === '}') {
        depth--;
        if (depth < 0) {
          issues.push(issue('unbalanced_braces', 'Closing brace without a matching opening brace', 'error', line));
          depth = 0;
        }
      }
    }
  }

  if (depth > 0 && lastOpen) {
    issues.push(issue('unbalanced_braces', `${depth} unclosed brace(s)`, 'error', lastOpen));
  }
  return issues;
}

/**
 * Strings opened on a line and never closed on it
 */
export function checkStrings(lines: ScannedLine[]): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  for (const line of lines) {
    for (const segment of line.segments) {
      if (segment.kind !== 'string') continue;
      const quote = segment.text[0];
      const closed = segment.text.length > 1 && segment.text.endsWith(quote) && !segment.text.endsWith(`\\${quote}`);
      if (!closed) {
        issues.push(issue('unterminated_string', `Unterminated string starting with ${quote}`, 'error', line));
      }
    }
  }
  return issues;
}

/**
 * Next line holding code, for terminator checks
 */
function nextCodeLine(lines: ScannedLine[], from: number): string {
  for (let i = from + 1; i < lines.length; i++) {
    const code = codeText(lines[i].segments).trim();
    if (code) return code;
  }
  return '';
}

/**
 * `name: value;` shape inside blocks, plus parenthesis balance in values
 */
export function checkDeclarations(lines: ScannedLine[]): { errors: ValidationIssue[]; warnings: ValidationIssue[] } {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  lines.forEach((line, index) => {
    if (line.depthBefore === 0) return;
    const code = codeText(line.segments).trim();
    if (!code || /[{}]/.test(code) || code.endsWith(',') || /^[@&%]/.test(code)) return;

    const match = code.match(DECLARATION);
    if (!match) return;
    const [, name, value, terminator] = match;
    const hasStrings = line.segments.some((s) => s.kind === 'string' || s.kind === 'interpolation');

    if (!name) {
      errors.push(issue('empty_property_name', 'Declaration has no property name', 'error', line));
      return;
    }
    if (!value && !hasStrings) {
      errors.push(issue('empty_property_value', `Property "${name}" has no value`, 'error', line));
      return;
    }

    const opens = (value.match(/\(/g) ?? []).length;
    const closes = (value.match(/\)/g) ?? []).length;
    if (terminator && opens !== closes) {
      errors.push(issue('unbalanced_parentheses', `Unbalanced parentheses in value of "${name}"`, 'error', line));
    }

    if (!terminator && !nextCodeLine(lines, index).startsWith('}')) {
      warnings.push(issue('missing_terminator', `Declaration of "${name}" is not terminated with ";"`, 'warning', line));
    }
  });

  return { errors, warnings };
}

/**
 * Unknown `::pseudo-element` names (vendor-prefixed ones are accepted)
 */
export function checkPseudoElements(lines: ScannedLine[]): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  for (const line of lines) {
    for (const match of codeText(line.segments).matchAll(PSEUDO_ELEMENT)) {
      const name = match[1].toLowerCase();
      if (!VALID_PSEUDO_ELEMENTS.has(name) && !VENDOR_PREFIX.test(name)) {
        issues.push(issue('unknown_pseudo_element', `Unknown pseudo-element "::${match[1]}"`, 'warning', line));
      }
    }
  }
  return issues;
}

/**
 * `@import` and slash division
 */
export function checkDeprecated(lines: ScannedLine[]): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  for (const line of lines) {
    const code = codeText(line.segments);
    if (/@import\b/.test(code)) {
      issues.push(issue('deprecated_import', '@import is deprecated', 'warning', line));
    }
    if (!/url\(/.test(code) && VARIABLE_DIVISION.test(code)) {
      issues.push(issue('deprecated_division', 'Slash division is deprecated; use calc()', 'warning', line));
    }
  }
  return issues;
}

/**
 * Preprocessor tokens left in code (comments and strings excluded)
 */
export function scanRemainingScss(lines: ScannedLine[]): RemainingScss {
  const variables = new Set<string>();
  const mixins = new Set<string>();
  const functions = new Set<string>();

  for (const line of lines) {
    const code = line.segments
      .filter((s) => s.kind === 'code' || s.kind === 'interpolation')
      .map((s) => s.text)
      .join(' ');
    for (const match of code.matchAll(REMAINING_VARIABLE)) variables.add(match[1]);
    for (const match of code.matchAll(REMAINING_MIXIN)) mixins.add(match[1]);
    for (const match of code.matchAll(REMAINING_FUNCTION)) functions.add(match[1]);
  }

  return {
    hasRemainingScss: variables.size > 0 || mixins.size > 0 || functions.size > 0,
    variables: [...variables],
    mixins: [...mixins],
    functions: [...functions],
  };
}

/**
 * Run every static check
 */
export function checkSyntax(content: string): SyntaxCheckResult {
  const lines = scanLines(content);
  const braceIssues = checkBraces(lines);
  const declarations = checkDeclarations(lines);

  return {
    errors: [...braceIssues, ...checkStrings(lines), ...declarations.errors],
    warnings: [...declarations.warnings, ...checkPseudoElements(lines), ...checkDeprecated(lines)],
    balancedBraces: braceIssues.length === 0,
    remaining: scanRemainingScss(lines),
  };
}
