/**
 * Function pass - color helper calls to literals or placeholders
 *
 * A call whose color arguments all resolve to literal colors (directly or
 * through an extracted variable) is computed with chroma-js using the
 * preprocessor's semantics. Anything else keeps its base color and gets a
 * comment saying which adjustment was dropped.
 */

import chroma from 'chroma-js';
import type { TransformationContext } from '../context.js';
import type { FunctionCall } from '../types.js';
import { findMatching, lineNumberAt, scanLines, splitArguments } from '../scanner.js';
import { isColorLiteral } from './value-types.js';

export const FUNCTION_PASS_NAME = 'color_functions_converted';

export const COLOR_HELPERS = [
  'lighten',
  'darken',
  'mix',
  'saturate',
  'desaturate',
  'transparentize',
  'fade-out',
  'opacify',
  'fade-in',
  'rgba',
] as const;

export type ColorHelper = (typeof COLOR_HELPERS)[number];

const HELPER_CALL = /(?<![\w-])(lighten|darken|mix|saturate|desaturate|transparentize|fade-out|opacify|fade-in|rgba)\s*\(/g;
const HELPER_NAME = new RegExp(HELPER_CALL.source);
const FUNCTION_DEFINITION = /@function\s+[\w-]+\s*\([^)]*\)\s*\{/g;
const VAR_REFERENCE = /^var\(\s*--([\w-]+)\s*\)$/;
const SCSS_REFERENCE = /^\$([\w-]+)$/;
const AMOUNT = /^(-?\d*\.?\d+)(%?)$/;

const MAX_RESOLVE_DEPTH = 8;

function isColorHelper(name: string): name is ColorHelper {
  return COLOR_HELPERS.some((helper) => helper === name);
}

// ============================================================================
// Value resolution
// ============================================================================

/**
 * Resolve an argument to a literal color through extracted variables
 */
export function resolveColor(
  arg: string,
  context: TransformationContext,
  depth = 0
): string | null {
  const value = arg.trim();
  if (isColorLiteral(value) && chroma.valid(value)) {
    return value;
  }
  if (depth >= MAX_RESOLVE_DEPTH) {
    return null;
  }
  const reference = value.match(VAR_REFERENCE) ?? value.match(SCSS_REFERENCE);
  if (!reference) {
    return null;
  }
  const variable = context.getVariable(reference[1]);
  return variable ? resolveColor(variable.rawValue, context, depth + 1) : null;
}

/**
 * Parse `10%` or `0.1` into a number; percentages stay in percent units
 */
function parseAmount(raw: string | undefined): { value: number; percent: boolean } | null {
  if (raw === undefined) {
    return null;
  }
  const match = raw.trim().match(AMOUNT);
  if (!match) {
    return null;
  }
  return { value: parseFloat(match[1]), percent: match[2] === '%' };
}

/** Amount as a 0..1 fraction (`10%` and `0.1` both give 0.1) */
function fraction(amount: { value: number; percent: boolean }): number {
  return amount.percent ? amount.value / 100 : amount.value;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Serialize a computed color: hex when opaque, rgba() otherwise
 */
export function formatColor(color: chroma.Color): string {
  const alpha = color.alpha();
  if (alpha >= 1) {
    return color.hex('rgb');
  }
  const [r, g, b] = color.rgb();
  return `rgba(${r}, ${g}, ${b}, ${round(alpha, 3)})`;
}

/**
 * Compute a helper call; null when an argument is not a literal
 */
export function computeColorHelper(
  name: ColorHelper,
  args: readonly string[],
  context: TransformationContext
): string | null {
  const base = args[0] === undefined ? null : resolveColor(args[0], context);
  if (!base) {
    return null;
  }
  const color = chroma(base);

  switch (name) {
    case 'lighten':
    case 'darken': {
      const amount = parseAmount(args[1]);
      if (!amount) return null;
      const delta = name === 'lighten' ? fraction(amount) : -fraction(amount);
      return formatColor(color.set('hsl.l', clamp01(color.get('hsl.l') + delta)));
    }
    case 'saturate':
    case 'desaturate': {
      const amount = parseAmount(args[1]);
      if (!amount) return null;
      const delta = name === 'saturate' ? fraction(amount) : -fraction(amount);
      const saturation = color.get('hsl.s');
      return formatColor(color.set('hsl.s', clamp01((Number.isNaN(saturation) ? 0 : saturation) + delta)));
    }
    case 'transparentize':
    case 'fade-out':
    case 'opacify':
    case 'fade-in': {
      const amount = parseAmount(args[1]);
      if (!amount) return null;
      const sign = name === 'opacify' || name === 'fade-in' ? 1 : -1;
      return formatColor(color.alpha(clamp01(color.alpha() + sign * fraction(amount))));
    }
    case 'rgba': {
      const amount = parseAmount(args[1]);
      if (args.length !== 2 || !amount) return null;
      return formatColor(color.alpha(clamp01(fraction(amount))));
    }
    case 'mix': {
      const other = args[1] === undefined ? null : resolveColor(args[1], context);
      if (!other) return null;
      const weight = args[2] === undefined ? { value: 50, percent: true } : parseAmount(args[2]);
      if (!weight) return null;
      // weight is the share of the first color
      return formatColor(chroma.mix(base, other, 1 - clamp01(fraction(weight)), 'rgb'));
    }
  }
}

/**
 * Replacement used when a call cannot be computed
 */
export function placeholderFor(name: ColorHelper, args: readonly string[]): string {
  const base = args[0] ?? '';
  const detail = args.slice(1).join(', ');
  return `${base} /* ${name}${detail ? ` ${detail}` : ''} not applied */`;
}

// ============================================================================
// Pass
// ============================================================================

/**
 * Remove `@function` definitions (balanced braces); returns removed count
 */
export function removeFunctionDefinitions(content: string): { content: string; removed: string[] } {
  const removed: string[] = [];
  let result = content;
  FUNCTION_DEFINITION.lastIndex = 0;
  let match = FUNCTION_DEFINITION.exec(result);

  while (match) {
    const open = match.index + match[0].length - 1;
    const close = findMatching(result, open, '{', '}');
    if (close === -1) {
      break;
    }
    const name = match[0].replace(/^@function\s+/, '').replace(/\s*\(.*$/s, '');
    removed.push(name);
    let end = close + 1;
    if (result[end] === '\n') end++;
    result = result.slice(0, match.index) + result.slice(end);
    FUNCTION_DEFINITION.lastIndex = match.index;
    match = FUNCTION_DEFINITION.exec(result);
  }

  return { content: result, removed };
}

/**
 * Convert every helper call in a code fragment, innermost first
 */
function convertCalls(
  text: string,
  context: TransformationContext,
  line: number,
  calls: FunctionCall[]
): string {
  let output = '';
  let cursor = 0;
  const pattern = new RegExp(HELPER_CALL.source, 'g');
  let match = pattern.exec(text);

  while (match) {
    const name = match[1];
    const open = match.index + match[0].length - 1;
    const close = findMatching(text, open, '(', ')');
    if (close === -1 || !isColorHelper(name)) {
      break;
    }

    const inner = convertCalls(text.slice(open + 1, close), context, line, calls);
    const args = splitArguments(inner);

    // rgba(r, g, b, a) is plain CSS
    if (name === 'rgba' && args.length !== 2) {
      output += text.slice(cursor, open + 1) + inner + ')';
    } else {
      const literal = computeColorHelper(name, args, context);
      const replacement = literal ?? placeholderFor(name, args);
      const resolution: FunctionCall['resolution'] = literal ? 'literal' : 'placeholder';
      calls.push(
        Object.freeze({
          name,
          arguments: Object.freeze([...args]),
          replacement,
          resolution,
          sourceLine: line,
        })
      );
      output += text.slice(cursor, match.index) + replacement;
    }

    cursor = close + 1;
    pattern.lastIndex = cursor;
    match = pattern.exec(text);
  }

  return output + text.slice(cursor);
}

export function runFunctionPass(context: TransformationContext): TransformationContext {
  context.processingStep = 'function_conversion';

  const { content: withoutDefinitions, removed } = removeFunctionDefinitions(context.currentContent);
  for (const name of removed) {
    context.addWarning(
      'function_definition_removed',
      `@function ${name} removed`,
      lineNumberAt(context.currentContent, context.currentContent.indexOf(`@function ${name}`))
    );
  }

  const calls: FunctionCall[] = [];
  const lines = scanLines(withoutDefinitions).map((scanned) => {
    if (!HELPER_NAME.test(scanned.text)) {
      return scanned.text;
    }
    return scanned.segments
      .map((segment) =>
        segment.kind === 'code' ? convertCalls(segment.text, context, scanned.index + 1, calls) : segment.text
      )
      .join('');
  });

  context.functions = [...context.functions, ...calls];
  context.updateContent(lines.join('\n'), 'function_conversion');
  context.addTransformation(FUNCTION_PASS_NAME);
  return context;
}
