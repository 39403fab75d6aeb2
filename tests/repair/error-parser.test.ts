/**
 * Unit tests for the compiler log parser
 */

import { describe, it, expect } from 'vitest';
import {
  hasErrorIndicator,
  hasFinishedMarkers,
  parseCompilationErrors,
} from '../../src/repair/error-parser.js';
import { DEFAULT_REPAIR_SETTINGS } from '../../src/repair/repair-loop.js';

describe('parseCompilationErrors', () => {
  it('should take the mixin name from the source excerpt', () => {
    const log = [
      'Error: Undefined mixin.',
      '  ╷',
      '3 │   @include foo;',
      '  │   ^^^^^^^^^^^^',
      '  ╵',
      '  test-compilation-sb-inside.scss 3:3  root stylesheet',
    ].join('\n');

    expect(parseCompilationErrors(log)).toEqual([
      {
        kind: 'undefined_mixin',
        raw: 'Error: Undefined mixin.',
        file: 'test-compilation-sb-inside.scss',
        lineNumber: 3,
        captures: { name: 'foo' },
      },
    ]);
  });

  it('should take the mixin name from the message', () => {
    const log = "Error: undefined mixin 'foo'\n        on line 7 of test-compilation-sb-home.scss";

    expect(parseCompilationErrors(log)).toEqual([
      {
        kind: 'undefined_mixin',
        raw: "Error: undefined mixin 'foo'",
        file: 'test-compilation-sb-home.scss',
        lineNumber: 7,
        captures: { name: 'foo' },
      },
    ]);
  });

  it('should read undefined variables with their location', () => {
    const log = 'Error: Undefined variable.\n   ╷\n12 │   color: $brand-red;\n   ╵\n  sb-vdp.scss 12:10  root stylesheet';
    const [error] = parseCompilationErrors(log);

    expect(error.kind).toBe('undefined_variable');
    expect(error.captures.name).toBe('brand-red');
    expect(error.file).toBe('sb-vdp.scss');
    expect(error.lineNumber).toBe(12);
  });

  it('should read the "on line N of file" style', () => {
    const log = 'Error: Undefined variable: "$primary".\n        on line 5 of sass/test-compilation-sb-home.scss';
    const [error] = parseCompilationErrors(log);

    expect(error).toMatchObject({
      kind: 'undefined_variable',
      captures: { name: 'primary' },
      file: 'sass/test-compilation-sb-home.scss',
      lineNumber: 5,
    });
  });

  it('should capture the expected token of a syntax error', () => {
    const [error] = parseCompilationErrors('Error: Invalid CSS after "  color: red": expected ";", was "margin: 0;"');

    expect(error.kind).toBe('syntax_error');
    expect(error.captures).toEqual({ after: '  color: red', expected: ';', found: 'margin: 0;' });
  });

  it('should classify an expected closing brace', () => {
    const [error] = parseCompilationErrors('Error: expected "}".\n  sb-home.scss 40:1  root stylesheet');
    expect(error).toMatchObject({ kind: 'syntax_error', captures: { expected: '}' }, lineNumber: 40 });
  });

  it('should classify parenthesis errors as invalid CSS', () => {
    const [error] = parseCompilationErrors('Error: expected ")".');
    expect(error).toMatchObject({ kind: 'invalid_css', captures: { expected: ')' } });
  });

  it('should read a missing colon after a property', () => {
    const [error] = parseCompilationErrors('Error: property "color" must be followed by a \':\'');
    expect(error).toMatchObject({ kind: 'syntax_error', captures: { name: 'color', expected: ':' } });
  });

  it('should report a repeated error once', () => {
    const line = 'Error: Undefined variable: "$x".';
    expect(parseCompilationErrors(`${line}\n${line}`)).toHaveLength(1);
  });

  it('should ignore unrelated log lines', () => {
    expect(parseCompilationErrors("[10:00:01] Starting 'sass'...\n[10:00:02] Finished 'sass' after 1 s")).toEqual([]);
  });
});

describe('log signals', () => {
  it('should detect configured error indicators case-insensitively', () => {
    expect(hasErrorIndicator('SCSS Compilation Error in sb-home', DEFAULT_REPAIR_SETTINGS.errorIndicators)).toBe(true);
    expect(hasErrorIndicator("Finished 'sass' after 1 s", DEFAULT_REPAIR_SETTINGS.errorIndicators)).toBe(false);
  });

  it('should require every finished marker', () => {
    const markers = DEFAULT_REPAIR_SETTINGS.finishedMarkers;
    expect(hasFinishedMarkers("Finished 'sass' after 1 s\nFinished 'processCss' after 2 s", markers)).toBe(true);
    expect(hasFinishedMarkers("Finished 'sass' after 1 s", markers)).toBe(false);
  });
});
