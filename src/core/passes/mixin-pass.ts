/**
 * Mixin pass - expands @include invocations and deletes @mixin definitions
 *
 * Resolution order for an invocation:
 * 1. a mixin defined in the same file (parameters and @content substituted)
 * 2. the fixed library table
 * 3. otherwise a TODO marker comment for manual follow-up
 */

import { compareTwoStrings } from 'string-similarity';
import type { TransformationContext } from '../context.js';
import type { MixinExpansionSource, MixinReference } from '../types.js';
import {
  commentSpans,
  findMatching,
  indentationOf,
  isInsideSpan,
  lineNumberAt,
  splitArguments,
} from '../scanner.js';
import { getLibraryMixin, LIBRARY_MIXIN_NAMES } from './mixin-library.js';
import { convertValueReferences } from './variable-pass.js';

export const MIXIN_PASS_NAME = 'mixins_expanded';

const MIXIN_DEFINITION = /@mixin\s+([\w-]+)\s*/g;
const INCLUDE = /@include\s+([\w-]+)\s*/g;
const CONTROL_DIRECTIVE = /@(?:if|else|each|for|while|return)\b/;
const INTERPOLATED_LITERAL = /#\{([^}$]*)\}/g;
const SUGGESTION_THRESHOLD = 0.5;

/**
 * Parameter of a local mixin definition
 */
export interface MixinParameter {
  name: string;
  defaultValue?: string;
}

/**
 * A `@mixin` defined in the processed file
 */
export interface MixinDefinition {
  name: string;
  parameters: MixinParameter[];
  body: string;
  /** Expandable: no control directives in the body */
  simple: boolean;
  start: number;
  end: number;
}

/**
 * One `@include` found in the content
 */
interface Invocation {
  name: string;
  args: string[] | undefined;
  block: string | null;
  start: number;
  end: number;
}

// ============================================================================
// Parsing
// ============================================================================

function skipWhitespace(text: string, index: number): number {
  let i = index;
  while (i < text.length && /\s/.test(text[i])) i++;
  return i;
}

export function parseParameters(raw: string): MixinParameter[] {
  return splitArguments(raw).map((param) => {
    const match = param.match(/^\$([\w-]+)\s*(?::\s*([\s\S]+))?$/);
    if (!match) {
      return { name: param.replace(/^\$/, '') };
    }
    return match[2] === undefined ? { name: match[1] } : { name: match[1], defaultValue: match[2].trim() };
  });
}

/**
 * Find every `@mixin` definition with balanced-brace bodies
 */
export function findMixinDefinitions(content: string): MixinDefinition[] {
  const comments = commentSpans(content);
  const definitions: MixinDefinition[] = [];
  const pattern = new RegExp(MIXIN_DEFINITION.source, 'g');
  let match = pattern.exec(content);

  while (match) {
    if (isInsideSpan(comments, match.index)) {
      match = pattern.exec(content);
      continue;
    }

    let cursor = match.index + match[0].length;
    let rawParams = '';
    if (content[cursor] === '(') {
      const close = findMatching(content, cursor, '(', ')');
      if (close === -1) break;
      rawParams = content.slice(cursor + 1, close);
      cursor = skipWhitespace(content, close + 1);
    }
    if (content[cursor] !== '{') {
      match = pattern.exec(content);
      continue;
    }
    const close = findMatching(content, cursor, '{', '}');
    if (close === -1) break;

    const body = content.slice(cursor + 1, close);
    definitions.push({
      name: match[1],
      parameters: parseParameters(rawParams),
      body,
      simple: !CONTROL_DIRECTIVE.test(body),
      start: match.index,
      end: close + 1,
    });
    pattern.lastIndex = close + 1;
    match = pattern.exec(content);
  }

  return definitions;
}

/**
 * Remove definitions (and a directly following newline) from content
 */
function removeRanges(content: string, ranges: Array<{ start: number; end: number }>): string {
  let result = content;
  for (const { start, end } of [...ranges].sort((a, b) => b.start - a.start)) {
    const stop = result[end] === '\n' ? end + 1 : end;
    result = result.slice(0, start) + result.slice(stop);
  }
  return result;
}

/**
 * Find top-level `@include` invocations (nested ones stay inside `block`)
 */
function findInvocations(content: string): Invocation[] {
  const comments = commentSpans(content);
  const invocations: Invocation[] = [];
  const pattern = new RegExp(INCLUDE.source, 'g');
  let match = pattern.exec(content);

  while (match) {
    if (isInsideSpan(comments, match.index)) {
      match = pattern.exec(content);
      continue;
    }

    let cursor = match.index + match[0].length;
    let end = match.index + match[0].trimEnd().length;
    let args: string[] | undefined;
    if (content[cursor] === '(') {
      const close = findMatching(content, cursor, '(', ')');
      if (close === -1) {
        match = pattern.exec(content);
        continue;
      }
      args = splitArguments(content.slice(cursor + 1, close));
      cursor = close + 1;
      end = cursor;
    }

    let block: string | null = null;
    const afterArgs = skipWhitespace(content, cursor);
    if (content[afterArgs] === '{') {
      const close = findMatching(content, afterArgs, '{', '}');
      if (close === -1) {
        match = pattern.exec(content);
        continue;
      }
      block = content.slice(afterArgs + 1, close);
      end = close + 1;
    } else if (content[afterArgs] === ';') {
      end = afterArgs + 1;
    }

    invocations.push({ name: match[1], args, block, start: match.index, end });
    pattern.lastIndex = end;
    match = pattern.exec(content);
  }

  return invocations;
}

// ============================================================================
// Expansion
// ============================================================================

/**
 * Trim surrounding blank lines and the common indentation of a body
 */
export function dedent(body: string): string {
  const lines = body.split('\n').map((line) => line.trimEnd());
  while (lines.length > 0 && lines[0].trim() === '') lines.shift();
  while (lines.length > 0 && lines[lines.length - 1].trim() === '') lines.pop();
  const indents = lines.filter((line) => line.trim() !== '').map((line) => indentationOf(line).length);
  const common = indents.length > 0 ? Math.min(...indents) : 0;
  return lines.map((line) => line.slice(common)).join('\n');
}

function indentBlock(text: string, indent: string): string {
  return text
    .split('\n')
    .map((line, index) => (index === 0 || line === '' ? line : `${indent}${line}`))
    .join('\n');
}

/**
 * Bind invocation arguments to definition parameters
 */
function bindArguments(definition: MixinDefinition, args: string[]): Map<string, string> {
  const bound = new Map<string, string>();
  let position = 0;

  for (const arg of args) {
    const keyword = arg.match(/^\$([\w-]+)\s*:\s*([\s\S]+)$/);
    if (keyword && definition.parameters.some((p) => p.name === keyword[1])) {
      bound.set(keyword[1], keyword[2].trim());
      continue;
    }
    const parameter = definition.parameters[position];
    if (parameter) {
      bound.set(parameter.name, arg);
    }
    position++;
  }

  for (const parameter of definition.parameters) {
    if (!bound.has(parameter.name) && parameter.defaultValue !== undefined) {
      bound.set(parameter.name, parameter.defaultValue);
    }
  }
  return bound;
}

/**
 * Expand a local definition at a call site
 */
export function expandLocalMixin(definition: MixinDefinition, args: string[], block: string | null): string {
  const bound = bindArguments(definition, args);
  let body = definition.body.replace(/\$([\w-]+)/g, (match, name: string) => bound.get(name) ?? match);
  body = body.replace(INTERPOLATED_LITERAL, '$1');
  const content = block === null ? '' : dedent(block);
  body = body.replace(/@content\s*;?/g, () => content);
  return convertValueReferences(dedent(body));
}

/**
 * Closest library name for a flagged mixin
 */
export function suggestMixin(name: string): string | null {
  let best: string | null = null;
  let bestScore = SUGGESTION_THRESHOLD;
  for (const candidate of LIBRARY_MIXIN_NAMES) {
    const score = compareTwoStrings(name, candidate);
    if (score >= bestScore) {
      best = candidate;
      bestScore = score;
    }
  }
  return best;
}

/**
 * Marker comment left for an unknown mixin
 */
export function unknownMixinMarker(name: string, original: string, hasBlock: boolean): string {
  const suggestion = suggestMixin(name);
  const hint = suggestion ? ` (closest known: "${suggestion}")` : '';
  const preserved = hasBlock ? `\n${original.replace(/\*\//g, '* /')}\n` : ' ';
  return `/* TODO: convert mixin "${name}" manually${hint}${preserved}*/`;
}

/**
 * Expand invocations in a fragment, recursing into content blocks and into
 * the bodies of local definitions. `expanding` holds the local mixins on the
 * current path; a mixin that includes itself is flagged.
 */
function expandInvocations(
  content: string,
  definitions: Map<string, MixinDefinition>,
  context: TransformationContext,
  lineOffset: number,
  references: MixinReference[],
  expanding: ReadonlySet<string> = new Set()
): string {
  const invocations = findInvocations(content);
  if (invocations.length === 0) {
    return content;
  }

  let output = '';
  let cursor = 0;

  for (const invocation of invocations) {
    const sourceLine = lineOffset + lineNumberAt(content, invocation.start) - 1;
    const lineStart = content.lastIndexOf('\n', invocation.start - 1) + 1;
    const indent = indentationOf(content.slice(lineStart, invocation.start));
    const args = (invocation.args ?? []).map((arg) => convertValueReferences(arg));
    const block =
      invocation.block === null
        ? null
        : expandInvocations(invocation.block, definitions, context, sourceLine, references, expanding);

    let expansion: string | null = null;
    let source: MixinExpansionSource = 'none';

    const local = definitions.get(invocation.name);
    if (local && local.simple && !expanding.has(local.name)) {
      expansion = expandInvocations(
        expandLocalMixin(local, invocation.args ?? [], block),
        definitions,
        context,
        sourceLine,
        references,
        new Set([...expanding, local.name])
      );
      source = 'local-definition';
    } else {
      const library = getLibraryMixin(invocation.name);
      const expanded = library ? library(args, block === null ? null : dedent(block)) : null;
      if (expanded !== null) {
        expansion = expanded;
        source = 'library';
      }
    }

    if (expansion === null) {
      const original = content.slice(invocation.start, invocation.end);
      expansion = unknownMixinMarker(invocation.name, original, invocation.block !== null);
      context.mixinStats.flagged++;
      context.addWarning('unknown_mixin', `Mixin "${invocation.name}" needs manual conversion`, sourceLine);
    } else {
      context.mixinStats.resolved++;
    }

    references.push(
      Object.freeze({
        name: invocation.name,
        parameters: invocation.args ? Object.freeze([...invocation.args]) : undefined,
        sourceLine,
        expansionStatus: source === 'none' ? 'unknown' : 'known',
        expansionSource: source,
      })
    );

    output += content.slice(cursor, invocation.start) + indentBlock(expansion, indent);
    cursor = invocation.end;
  }

  return output + content.slice(cursor);
}

/**
 * Run the mixin pass on the context's current content
 */
export function runMixinPass(context: TransformationContext): TransformationContext {
  context.processingStep = 'mixin_conversion';

  const found = findMixinDefinitions(context.currentContent);
  const definitions = new Map<string, MixinDefinition>();
  for (const definition of found) {
    if (definitions.has(definition.name)) {
      context.addWarning('mixin_conflict', `Mixin "${definition.name}" defined more than once; last definition used`);
    }
    definitions.set(definition.name, definition);
  }

  const withoutDefinitions = removeRanges(context.currentContent, found);
  const references: MixinReference[] = [];
  const content = expandInvocations(withoutDefinitions, definitions, context, 1, references);

  context.mixins = [...context.mixins, ...references];
  context.updateContent(content, 'mixin_conversion');
  context.addTransformation(MIXIN_PASS_NAME);
  return context;
}
