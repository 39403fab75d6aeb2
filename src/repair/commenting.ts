/**
 * Line commenting used by the fixers and the aggressive fallback
 */

import { codeText, countBraces, indentationOf, scanLines, type ScannedLine } from '../core/scanner.js';
import type { FixResult, LineAlteration } from './types.js';

export const FIX_COMMENT_PREFIX = '// ';
export const AGGRESSIVE_COMMENT_PREFIX = '// COMPILE FIX: ';

export type Alteration = Omit<LineAlteration, 'file'>;

/**
 * Line holds no code: blank, or comments only
 */
export function isCommentedOut(line: ScannedLine): boolean {
  return (
    codeText(line.segments).trim() === '' &&
    line.segments.every((s) => s.kind === 'code' || s.kind === 'comment')
  );
}

function netBraces(line: ScannedLine): number {
  const { opens, closes } = countBraces(line.segments);
  return opens - closes;
}

/**
 * Index of the line closing the block opened on `start`
 */
function blockEnd(lines: ScannedLine[], start: number): number {
  let depth = 0;
  for (let i = start; i < lines.length; i++) {
    depth += netBraces(lines[i]);
    if (depth <= 0) return i;
  }
  return lines.length - 1;
}

/**
 * Comment out lines by 0-based index, each with its own reason.
 *
 * A target line that opens a block takes the whole block with it. Closing
 * braces at the end of a target line are moved to a line of their own so
 * the surrounding rule stays balanced.
 */
export function commentOutLines(
  content: string,
  targets: ReadonlyMap<number, string>,
  prefix: string = FIX_COMMENT_PREFIX
): { content: string; alterations: Alteration[] } {
  const scanned = scanLines(content);
  const reasons = new Map<number, string>();
  const inBlock = new Set<number>();

  for (const [index, reason] of [...targets].sort(([a], [b]) => a - b)) {
    const line = scanned[index];
    if (!line || isCommentedOut(line) || reasons.has(index)) continue;
    reasons.set(index, reason);
    if (netBraces(line) > 0) {
      const end = blockEnd(scanned, index);
      for (let i = index + 1; i <= end; i++) {
        if (!reasons.has(i)) reasons.set(i, reason);
        inBlock.add(i);
      }
    }
  }

  const output: string[] = [];
  const alterations: Alteration[] = [];

  scanned.forEach((line, index) => {
    const reason = reasons.get(index);
    if (reason === undefined || isCommentedOut(line)) {
      output.push(line.text);
      return;
    }

    const indent = indentationOf(line.text);
    let body = line.text.slice(indent.length).trimEnd();
    let trailing = '';
    if (!inBlock.has(index) && netBraces(line) < 0) {
      const match = body.match(/(?:\s*\})+$/);
      if (match) {
        trailing = match[0].replace(/\s/g, '');
        body = body.slice(0, body.length - match[0].length);
      }
    }

    const commented = `${indent}${prefix}${body}`;
    const after = trailing ? `${commented}\n${indent}${trailing}` : commented;
    output.push(after);
    alterations.push({ line: index + 1, before: line.text, after, reason });
  });

  return { content: output.join('\n'), alterations };
}

/**
 * FixResult for commenting out lines with one reason
 */
export function commentOutFix(content: string, indexes: readonly number[], reason: string): FixResult {
  const { content: next, alterations } = commentOutLines(
    content,
    new Map(indexes.map((index) => [index, reason]))
  );
  return {
    content: next,
    changed: alterations.length > 0,
    description: alterations.length > 0 ? `${reason} (${alterations.length} line(s) commented out)` : `${reason}: nothing to change`,
    alterations,
  };
}
