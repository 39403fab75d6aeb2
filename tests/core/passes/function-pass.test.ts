/**
 * Unit tests for the function pass
 */

import { describe, it, expect } from 'vitest';
import chroma from 'chroma-js';
import { TransformationContext } from '../../../src/core/context.js';
import {
  computeColorHelper,
  formatColor,
  placeholderFor,
  removeFunctionDefinitions,
  runFunctionPass,
} from '../../../src/core/passes/function-pass.js';
import { runVariablePass } from '../../../src/core/passes/variable-pass.js';

const empty = () => new TransformationContext('.a {}');

describe('computeColorHelper', () => {
  it('should darken and lighten by lightness points', () => {
    expect(computeColorHelper('darken', ['#ffffff', '100%'], empty())).toBe('#000000');
    expect(computeColorHelper('lighten', ['#000000', '100%'], empty())).toBe('#ffffff');
  });

  it('should lower opacity with transparentize', () => {
    expect(computeColorHelper('transparentize', ['#000000', '0.5'], empty())).toBe('rgba(0, 0, 0, 0.5)');
  });

  it('should set alpha with two-argument rgba', () => {
    expect(computeColorHelper('rgba', ['#ffffff', '0.25'], empty())).toBe('rgba(255, 255, 255, 0.25)');
  });

  it('should return null for non-literal arguments', () => {
    expect(computeColorHelper('darken', ['$brand', '10%'], empty())).toBeNull();
    expect(computeColorHelper('darken', ['#fff', 'lots'], empty())).toBeNull();
  });
});

describe('formatColor', () => {
  it('should use hex for opaque colors', () => {
    expect(formatColor(chroma('#336699'))).toBe('#336699');
  });
});

describe('placeholderFor', () => {
  it('should keep the base color and name the dropped adjustment', () => {
    expect(placeholderFor('darken', ['$brand', '10%'])).toBe('$brand /* darken 10% not applied */');
    expect(placeholderFor('lighten', ['red'])).toBe('red /* lighten not applied */');
  });
});

describe('removeFunctionDefinitions', () => {
  it('should remove definitions with their bodies', () => {
    const { content, removed } = removeFunctionDefinitions(
      '@function rem($px) {\n  @return $px / 16px * 1rem;\n}\n.a { color: red; }'
    );
    expect(content).toBe('.a { color: red; }');
    expect(removed).toEqual(['rem']);
  });
});

describe('runFunctionPass', () => {
  it('should compute helpers on literal colors', () => {
    const context = runFunctionPass(new TransformationContext('.a { color: darken(#ffffff, 100%); }'));

    expect(context.currentContent).toBe('.a { color: #000000; }');
    expect(context.functions).toEqual([
      {
        name: 'darken',
        arguments: ['#ffffff', '100%'],
        replacement: '#000000',
        resolution: 'literal',
        sourceLine: 1,
      },
    ]);
  });

  it('should resolve arguments through extracted variables', () => {
    const context = new TransformationContext('$brand: #000000;\n.a { color: lighten($brand, 100%); }');
    runVariablePass(context);
    runFunctionPass(context);

    expect(context.currentContent).toBe(':root {\n  --brand: #000000;\n}\n\n.a { color: #ffffff; }');
  });

  it('should leave a placeholder when the color is unknown', () => {
    const context = runFunctionPass(new TransformationContext('.a { color: darken($brand, 10%); }'));

    expect(context.currentContent).toBe('.a { color: $brand /* darken 10% not applied */; }');
    expect(context.functions[0].resolution).toBe('placeholder');
  });

  it('should leave four-argument rgba untouched', () => {
    const context = runFunctionPass(new TransformationContext('.a { color: rgba(0, 0, 0, 0.5); }'));

    expect(context.currentContent).toBe('.a { color: rgba(0, 0, 0, 0.5); }');
    expect(context.functions).toEqual([]);
  });

  it('should not touch helpers inside comments', () => {
    const input = '.a { color: red; } // darken(#fff, 10%)';
    expect(runFunctionPass(new TransformationContext(input)).currentContent).toBe(input);
  });

  it('should warn about removed function definitions', () => {
    const context = runFunctionPass(new TransformationContext('.a {}\n@function half($n) {\n  @return $n / 2;\n}'));

    expect(context.currentContent).toBe('.a {}\n');
    expect(context.warnings).toEqual([
      {
        step: 'function_conversion',
        kind: 'function_definition_removed',
        message: '@function half removed',
        line: 2,
      },
    ]);
  });
});
