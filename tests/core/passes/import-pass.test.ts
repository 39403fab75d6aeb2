/**
 * Unit tests for the import pass
 */

import { describe, it, expect } from 'vitest';
import { TransformationContext } from '../../../src/core/context.js';
import { IMPORT_PASS_NAME, parseImportPaths, runImportPass } from '../../../src/core/passes/import-pass.js';

describe('parseImportPaths', () => {
  it('should unquote every path of a directive', () => {
    expect(parseImportPaths("'a', \"b\"")).toEqual(['a', 'b']);
  });

  it('should drop module clauses', () => {
    expect(parseImportPaths('"theme/colors" as c')).toEqual(['theme/colors']);
  });
});

describe('runImportPass', () => {
  it('should remove every directive and record one statement per directive', () => {
    const context = runImportPass(
      new TransformationContext("@import 'a', 'b';\n@use \"sass:math\";\n.a { color: red; }")
    );

    expect(context.currentContent).toBe('\n\n.a { color: red; }');
    expect(context.transformationsApplied).toEqual([IMPORT_PASS_NAME]);
    expect(context.imports).toEqual([
      { directive: 'import', paths: ['a', 'b'], isExternal: false, sourceLine: 1 },
      { directive: 'use', paths: ['sass:math'], isExternal: true, sourceLine: 2 },
    ]);
  });

  it('should leave directives inside comments and strings', () => {
    const input = "/* @import 'old'; */\n.a { content: \"@import x;\"; }\n// see @import\n@import 'b';";
    const context = runImportPass(new TransformationContext(input));

    expect(context.currentContent).toBe("/* @import 'old'; */\n.a { content: \"@import x;\"; }\n// see @import\n");
    expect(context.imports).toEqual([{ directive: 'import', paths: ['b'], isExternal: false, sourceLine: 4 }]);
  });

  it('should flag URL imports as external', () => {
    const context = runImportPass(new TransformationContext('@import url(https://fonts.test/css);'));
    expect(context.imports[0].isExternal).toBe(true);
    expect(context.currentContent).toBe('');
  });
});
