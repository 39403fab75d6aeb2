/**
 * Aggressive fallback - comments out every line holding a risky construct
 */

import { scanLines } from '../core/scanner.js';
import { AGGRESSIVE_COMMENT_PREFIX, commentOutLines, isCommentedOut } from './commenting.js';
import type { FixResult } from './types.js';

interface RiskyConstruct {
  label: string;
  pattern: RegExp;
}

/**
 * Checked in order; the first match names the reason for a line
 */
export const RISKY_CONSTRUCTS: readonly RiskyConstruct[] = [
  { label: 'mixin invocation', pattern: /@include\s+[\w-]+/ },
  {
    label: 'color helper',
    pattern: /(?<![\w-])(?:lighten|darken|mix|saturate|desaturate|transparentize|fade-out|opacify|fade-in|adjust-hue)\s*\(/,
  },
  { label: 'preprocessor variable', pattern: /\$[a-zA-Z_][\w-]*/ },
];

function riskyLabel(code: string): string | undefined {
  return RISKY_CONSTRUCTS.find((construct) => construct.pattern.test(code))?.label;
}

export function applyAggressiveFallback(content: string): FixResult {
  const targets = new Map<number, string>();

  for (const line of scanLines(content)) {
    if (isCommentedOut(line)) continue;
    const code = line.segments
      .filter((s) => s.kind === 'code' || s.kind === 'interpolation')
      .map((s) => s.text)
      .join('');
    const label = riskyLabel(code);
    if (label) {
      targets.set(line.index, `aggressive fallback: ${label}`);
    }
  }

  const { content: next, alterations } = commentOutLines(content, targets, AGGRESSIVE_COMMENT_PREFIX);
  return {
    content: next,
    changed: alterations.length > 0,
    description:
      alterations.length > 0
        ? `aggressive fallback commented out ${alterations.length} line(s)`
        : 'aggressive fallback found nothing to comment out',
    alterations,
  };
}
