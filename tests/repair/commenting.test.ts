/**
 * Unit tests for line commenting
 */

import { describe, it, expect } from 'vitest';
import { scanLines } from '../../src/core/scanner.js';
import { commentOutFix, commentOutLines, isCommentedOut } from '../../src/repair/commenting.js';

const line = (text: string) => scanLines(text)[0];

describe('isCommentedOut', () => {
  it('should treat blank and comment-only lines as commented out', () => {
    expect(isCommentedOut(line(''))).toBe(true);
    expect(isCommentedOut(line('  // color: red;'))).toBe(true);
    expect(isCommentedOut(line('  /* note */'))).toBe(true);
  });

  it('should treat lines with code or strings as live', () => {
    expect(isCommentedOut(line('  color: red; // x'))).toBe(false);
    expect(isCommentedOut(line('  "x"'))).toBe(false);
  });
});

describe('commentOutLines', () => {
  it('should keep indentation and prefix the line', () => {
    const result = commentOutLines('.a {\n  color: $x;\n}', new Map([[1, 'test']]));

    expect(result.content).toBe('.a {\n  // color: $x;\n}');
    expect(result.alterations).toEqual([{ line: 2, before: '  color: $x;', after: '  // color: $x;', reason: 'test' }]);
  });

  it('should take a whole block with a line that opens it', () => {
    const result = commentOutLines('.a {\n  @include foo {\n    color: red;\n  }\n}', new Map([[1, 'test']]));

    expect(result.content).toBe('.a {\n  // @include foo {\n    // color: red;\n  // }\n}');
    expect(result.alterations.map((a) => a.line)).toEqual([2, 3, 4]);
  });

  it('should move closing braces to their own line', () => {
    const result = commentOutLines('.a {\n  color: $x; }', new Map([[1, 'test']]));
    expect(result.content).toBe('.a {\n  // color: $x;\n  }');
  });

  it('should skip lines that are already commented out', () => {
    const result = commentOutLines('.a {\n  // color: $x;\n}', new Map([[1, 'test']]));
    expect(result.alterations).toEqual([]);
  });

  it('should use the given prefix', () => {
    const result = commentOutLines('.a {\n  width: $w;\n}', new Map([[1, 'test']]), '// COMPILE FIX: ');
    expect(result.content).toBe('.a {\n  // COMPILE FIX: width: $w;\n}');
  });
});

describe('commentOutFix', () => {
  it('should describe what it changed', () => {
    expect(commentOutFix('.a {\n  x: y;\n}', [1], 'invalid CSS').description).toBe(
      'invalid CSS (1 line(s) commented out)'
    );
    expect(commentOutFix('.a {}', [4], 'invalid CSS')).toMatchObject({
      changed: false,
      description: 'invalid CSS: nothing to change',
    });
  });
});
