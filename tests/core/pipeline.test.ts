/**
 * Tests for the transformation pipeline
 */

import { describe, it, expect } from 'vitest';
import {
  processStylesheet,
  resolveProcessingOptions,
  transformStylesheet,
  optionsForMode,
} from '../../src/core/pipeline.js';
import { MigrationError } from '../../src/errors.js';

describe('processStylesheet', () => {
  it('should convert variables into a :root block', async () => {
    const result = await processStylesheet('$primary: #ff0000; .a { color: $primary; }');

    expect(result.success).toBe(true);
    expect(result.output).toBe(':root {\n  --primary: #ff0000;\n}\n\n.a { color: var(--primary); }');
    expect(result.summary.variablesConverted).toBe(1);
    expect(result.validation?.isValid).toBe(true);
  });

  it('should expand a local mixin and drop its definition', async () => {
    const result = await processStylesheet('@mixin flexbox(){display:flex;} .b{@include flexbox();}');

    expect(result.output).toBe('.b{display:flex;}');
    expect(result.summary.mixinsResolved).toBe(1);
  });

  it('should count one import per directive', async () => {
    const result = await processStylesheet("@import 'a';\n@import 'b', 'c';\n.x { color: red; }");

    expect(result.output).toBe('.x { color: red; }');
    expect(result.imports).toHaveLength(2);
    expect(result.summary.importsRemoved).toBe(2);
  });

  it('should run the passes in their fixed order', async () => {
    const result = await processStylesheet('.a { color: red; }');

    expect(result.transformationsApplied).toEqual([
      'variables_to_custom_properties',
      'relative_paths_to_absolute',
      'color_functions_converted',
      'mixins_expanded',
      'imports_removed',
      'content_cleanup',
    ]);
  });

  it('should be idempotent on its own output', async () => {
    const first = await processStylesheet(
      '$gap: 4px;\n@import "base";\n.a {\n  margin: $gap;\n  background: url(../images/a.png);\n}'
    );
    const second = await processStylesheet(first.output);

    expect(second.output).toBe(first.output);
  });

  it('should hoist variables declared after a protocol-relative URL', async () => {
    const result = await processStylesheet(
      '.a { background: url(//cdn.example.com/bg.png); }\n$gap: 4px;\n.b { margin: $gap; }',
      { strictMode: true }
    );

    expect(result.success).toBe(true);
    expect(result.validation?.errors).toEqual([]);
    expect(result.output).toBe(
      ':root {\n  --gap: 4px;\n}\n\n.a { background: url(//cdn.example.com/bg.png); }\n.b { margin: var(--gap); }'
    );
  });

  it('should expand includes nested in a local mixin in one run', async () => {
    const first = await processStylesheet('@mixin btn {\n  @include border-radius(4px);\n  color: red;\n}\n.a {\n  @include btn;\n}');

    expect(first.output).toBe('.a {\n  border-radius: 4px;\n  background-clip: padding-box;\n  color: red;\n}');
    expect(first.validation?.remaining.hasRemainingScss).toBe(false);

    const second = await processStylesheet(first.output);
    expect(second.output).toBe(first.output);
  });

  it('should keep mixin parameters out of the variable conversion', async () => {
    const result = await processStylesheet('@mixin pad($v) {\n  padding: $v;\n}\n.a {\n  @include pad(2px);\n}');

    expect(result.output).toBe('.a {\n  padding: 2px;\n}');
    expect(result.warnings).toEqual([]);
  });

  it('should compute color helpers on hoisted variables', async () => {
    const result = await processStylesheet('$text: #000000;\n.a { color: transparentize($text, 0.5); }');

    expect(result.output).toBe(':root {\n  --text: #000000;\n}\n\n.a { color: rgba(0, 0, 0, 0.5); }');
    expect(result.summary.functionsConverted).toBe(1);
  });

  it('should leave content untouched in validation_only mode', async () => {
    const input = '$a: 1px;\n.x { width: $a; }   \n';
    const result = await processStylesheet(input, { mode: 'validation_only' });

    expect(result.output).toBe(input);
    expect(result.transformationsApplied).toEqual([]);
    expect(result.validation).toBeDefined();
  });

  it('should only convert variables in variables_only mode', async () => {
    const result = await processStylesheet("$c: red;\n@import 'x';\n.a { color: $c; }", { mode: 'variables_only' });

    expect(result.output).toBe(":root {\n  --c: red;\n}\n\n@import 'x';\n.a { color: var(--c); }");
    expect(result.transformationsApplied).toEqual(['variables_to_custom_properties', 'content_cleanup']);
  });

  it('should fail in strict mode when validation finds errors', async () => {
    const result = await processStylesheet('.a { color: red;', { strictMode: true });

    expect(result.success).toBe(false);
    expect(result.validation?.errors.map((e) => e.kind)).toEqual(['unbalanced_braces']);
    expect(result.summary.validationErrors).toBe(1);
  });

  it('should succeed outside strict mode despite validation errors', async () => {
    const result = await processStylesheet('.a { color: red;');
    expect(result.success).toBe(true);
  });

  it('should report size figures', async () => {
    const result = await processStylesheet("@import 'a';\n.b {}");

    expect(result.summary.inputBytes).toBe(18);
    expect(result.summary.outputBytes).toBe(5);
    expect(result.summary.sizeDelta).toBe(13);
    expect(result.summary.sizeReductionPercent).toBe(72.22);
    expect(result.summary.linesMigrated).toBe(1);
  });

  it('should reject empty content', async () => {
    await expect(processStylesheet('  \n ')).rejects.toMatchObject({ code: 'EMPTY_CONTENT' });
  });

  it('should reject content above the size limit', async () => {
    const promise = processStylesheet('.a{}x', { maxContentBytes: 4 });

    await expect(promise).rejects.toBeInstanceOf(MigrationError);
    await expect(promise).rejects.toMatchObject({
      code: 'CONTENT_TOO_LARGE',
      details: { bytes: 5, limit: 4 },
    });
  });
});

describe('options', () => {
  it('should disable every conversion for validation_only', () => {
    expect(optionsForMode('validation_only')).toEqual({
      convertVariables: false,
      convertPaths: false,
      convertFunctions: false,
      convertMixins: false,
      removeImports: false,
      validateSyntax: true,
    });
  });

  it('should let explicit options override the mode preset', () => {
    const options = resolveProcessingOptions({ mode: 'mixins_only', removeImports: true });
    expect(options.convertMixins).toBe(true);
    expect(options.removeImports).toBe(true);
    expect(options.convertVariables).toBe(false);
  });

  it('should leave plain CSS unchanged without warnings', () => {
    const context = transformStylesheet('.a {}', { imageBaseUrl: '/img/' });
    expect(context.warnings).toEqual([]);
    expect(context.currentContent).toBe('.a {}');
  });
});
