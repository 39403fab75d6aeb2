/**
 * Variable pass - SCSS variables to CSS custom properties
 *
 * Top-level `$name: value;` declarations are hoisted into one `:root` block,
 * declarations inside rule blocks become rule-scoped custom properties, and
 * usages are rewritten to `var(--name)` except where the value only means
 * something to the preprocessor (mixin/function bodies, map literals,
 * directives, map lookups, interpolation and strings).
 */

import type { TransformationContext } from '../context.js';
import type { Variable, VariableScope } from '../types.js';
import { scanLines, segmentLine, type LineSegment, type ScannedLine } from '../scanner.js';
import { inferValueType } from './value-types.js';

export const VARIABLE_PASS_NAME = 'variables_to_custom_properties';

const DECLARATION = /^([ \t]*)\$([\w-]+)[ \t]*:[ \t]*([^;\n]*?)[ \t]*;/;
const VARIABLE_REF = /\$([a-zA-Z_][\w-]*)/g;
const REF_OR_DECLARATION = /\$([a-zA-Z_][\w-]*)(\s*:(?!:))?/g;
const FLAGS = /\s*!(?:default|global)\b/g;
const MAP_HELPERS = /\bmap-(?:get|keys|values|has-key|merge)\s*\(/;
const MEDIA_LINE = /^@(?:media|supports)\b/;
const PREPROCESSOR_DIRECTIVE =
  /^@(?:include|extend|if|else|each|for|while|function|return|mixin|use|forward|import|debug|warn|error|content|at-root)\b/;

/**
 * Custom property name for a variable name
 */
export function toCustomPropertyName(name: string): string {
  return `--${name.replace(/^\$/, '')}`;
}

/**
 * Names referenced in a value (unique, in order of appearance)
 */
export function findVariableReferences(value: string): string[] {
  const names: string[] = [];
  for (const match of value.matchAll(VARIABLE_REF)) {
    if (!names.includes(match[1])) {
      names.push(match[1]);
    }
  }
  return names;
}

/**
 * Replace every `$name` in a value with `var(--name)`
 */
export function convertValueReferences(value: string): string {
  return value.replace(VARIABLE_REF, (_m, name: string) => `var(${toCustomPropertyName(name)})`);
}

function createVariable(
  name: string,
  rawValue: string,
  sourceLine: number,
  scope: VariableScope,
  isDefault: boolean
): Variable {
  return {
    name,
    rawValue,
    inferredType: inferValueType(rawValue),
    customPropertyName: toCustomPropertyName(name),
    dependencies: findVariableReferences(rawValue),
    sourceLine,
    scope,
    isDefault,
  };
}

/**
 * Mutable state of one pass run
 */
interface PassState {
  context: TransformationContext;
  rootVariables: Map<string, Variable>;
  localVariables: Variable[];
  referenced: Map<string, number>;
}

function registerRootVariable(state: PassState, variable: Variable): void {
  const existing = state.rootVariables.get(variable.name);
  if (!existing) {
    state.rootVariables.set(variable.name, variable);
    return;
  }

  state.context.addWarning(
    'variable_conflict',
    `Variable $${variable.name} redefined (first declared on line ${existing.sourceLine})`,
    variable.sourceLine
  );

  // A later plain declaration wins; !default never overrides an earlier value
  if (!variable.isDefault) {
    state.rootVariables.set(variable.name, { ...variable, sourceLine: existing.sourceLine });
  }
}

/**
 * Rewrite references inside the code segments of a line
 */
function rewriteSegments(state: PassState, segments: LineSegment[], lineNumber: number): string {
  return segments
    .map((segment) => {
      if (segment.kind !== 'code') {
        return segment.text;
      }
      return segment.text.replace(REF_OR_DECLARATION, (_m, name: string, colon?: string) => {
        if (colon) {
          // `$name:` in the middle of a line declares a rule-scoped variable
          state.localVariables.push(createVariable(name, '', lineNumber, 'local', false));
          return `${toCustomPropertyName(name)}${colon}`;
        }
        if (!state.referenced.has(name)) {
          state.referenced.set(name, lineNumber);
        }
        return `var(${toCustomPropertyName(name)})`;
      });
    })
    .join('');
}

/**
 * `@media` / `@supports` cannot hold var(); inline literal values instead
 */
function inlineMediaReferences(state: PassState, segments: LineSegment[]): string {
  return segments
    .map((segment) => {
      if (segment.kind !== 'code') {
        return segment.text;
      }
      return segment.text.replace(VARIABLE_REF, (match, name: string) => {
        const variable = state.rootVariables.get(name);
        if (variable && variable.dependencies.length === 0) {
          return variable.rawValue;
        }
        return match;
      });
    })
    .join('');
}

/**
 * Convert usages on one stylesheet-region line
 */
function convertUsageLine(state: PassState, text: string, segments: LineSegment[], lineNumber: number): string {
  const trimmed = text.trim();
  if (!text.includes('$')) {
    return text;
  }
  if (PREPROCESSOR_DIRECTIVE.test(trimmed) || trimmed.startsWith('%')) {
    return text;
  }
  const code = segments.filter((s) => s.kind === 'code').map((s) => s.text).join('');
  if (MAP_HELPERS.test(code)) {
    return text;
  }
  if (MEDIA_LINE.test(trimmed)) {
    return inlineMediaReferences(state, segments);
  }
  return rewriteSegments(state, segments, lineNumber);
}

/**
 * Process one scanned line: consume leading declarations, then convert usages
 */
function processLine(state: PassState, line: ScannedLine): string | null {
  const lineNumber = line.index + 1;
  if (line.region !== 'stylesheet') {
    return line.text;
  }

  let rest = line.text;
  let segments = line.segments;
  let localOutput = '';
  let consumed = false;

  if (segments[0]?.kind === 'code') {
    let match = DECLARATION.exec(rest);
    while (match) {
      const [whole, indent, name, rawValue] = match;
      const isDefault = /!default\b/.test(rawValue);
      const value = rawValue.replace(FLAGS, '').trim();
      consumed = true;

      // top-level declarations were registered by collectRootDeclarations
      if (line.depthBefore > 0) {
        const variable = createVariable(name, value, lineNumber, 'local', isDefault);
        state.localVariables.push(variable);
        for (const dep of variable.dependencies) {
          if (!state.referenced.has(dep)) state.referenced.set(dep, lineNumber);
        }
        localOutput += `${indent}${variable.customPropertyName}: ${convertValueReferences(value)};`;
      }

      rest = rest.slice(whole.length);
      match = DECLARATION.exec(rest);
    }
  }

  if (consumed) {
    if (!rest.trim()) {
      return localOutput || null;
    }
    segments = segmentLine(rest).segments;
  }

  return localOutput + convertUsageLine(state, rest, segments, lineNumber);
}

/**
 * Build the `:root` block for hoisted variables
 */
export function buildRootBlock(variables: Variable[]): string {
  const properties = variables.map(
    (v) => `  ${v.customPropertyName}: ${convertValueReferences(v.rawValue)};`
  );
  return `:root {\n${properties.join('\n')}\n}\n\n`;
}

/**
 * Run the variable pass on the context's current content
 */
export function runVariablePass(context: TransformationContext): TransformationContext {
  context.processingStep = 'variable_processing';

  const state: PassState = {
    context,
    rootVariables: new Map(),
    localVariables: [],
    referenced: new Map(),
  };

  // Declarations first, so @media lines can inline values declared later in the file
  const scanned = scanLines(context.currentContent);
  for (const line of scanned) {
    if (line.region === 'stylesheet' && line.depthBefore === 0 && line.segments[0]?.kind === 'code') {
      collectRootDeclarations(state, line);
    }
  }
  const output: string[] = [];
  for (const line of scanned) {
    const processed = processLine(state, line);
    if (processed !== null) {
      output.push(processed);
    }
  }

  // Map keeps first-seen order; values were reconciled while collecting
  const rootVariables = [...state.rootVariables.values()];
  context.variables = [...rootVariables, ...state.localVariables];

  const declared = new Set(context.variables.map((v) => v.name));
  for (const variable of rootVariables) {
    for (const dep of variable.dependencies) {
      if (!declared.has(dep)) {
        context.addWarning(
          'unresolved_variable',
          `Variable $${variable.name} references undeclared $${dep}`,
          variable.sourceLine
        );
      }
    }
  }
  for (const [name, line] of state.referenced) {
    if (!declared.has(name)) {
      context.addWarning('unresolved_variable', `Undeclared variable $${name} converted to var(--${name})`, line);
    }
  }

  let content = output.join('\n');
  if (rootVariables.length > 0) {
    content = buildRootBlock(rootVariables) + content.replace(/^\s+/, '');
  }

  context.updateContent(content, 'variable_processing');
  context.addTransformation(VARIABLE_PASS_NAME);
  return context;
}

/**
 * First sweep: register top-level declarations without rewriting anything
 */
function collectRootDeclarations(state: PassState, line: ScannedLine): void {
  let rest = line.text;
  let match = DECLARATION.exec(rest);
  while (match) {
    const [whole, , name, rawValue] = match;
    const isDefault = /!default\b/.test(rawValue);
    const value = rawValue.replace(FLAGS, '').trim();
    registerRootVariable(state, createVariable(name, value, line.index + 1, 'root', isDefault));
    rest = rest.slice(whole.length);
    match = DECLARATION.exec(rest);
  }
}
