/**
 * Route Compiler
 *
 * Walks the trie once and produces the Matcher's node table.
 *
 * Per depth, children are grouped into statics (keyed by text), complex
 * segments and the single simple segment, which fixes the evaluation order
 * static → complex → simple.
 *
 * Fast return: once a child's own test has passed, no later sibling can match
 * the same path segment if the child is a static followed only by statics, or
 * if it is the last child at its depth. When that holds for the child and for
 * every ancestor, a failure anywhere below it ends the lookup at once instead
 * of unwinding to try alternatives that cannot succeed.
 */

import { isSegmentsConverter } from './converters.js';
import type { FieldConverter } from './converters.js';
import { Matcher } from './matcher.js';
import type {
  CompiledLevel,
  ComplexBranch,
  RemainderBranch,
  SimpleBranch,
  StaticBranch,
} from './matcher.js';
import type { SimpleSegment } from './template.js';
import type { RouteTrie, TrieNode } from './trie.js';

export interface CompileOptions {
  maxSegments?: number;
}

interface CompileState {
  levels: number;
}

function compileLevel<TResource, TResponder>(
  nodes: readonly TrieNode<TResource, TResponder>[],
  parentFast: boolean,
  state: CompileState
): CompiledLevel<TResource, TResponder> | null {
  if (nodes.length === 0) return null;
  state.levels++;

  const statics: TrieNode<TResource, TResponder>[] = [];
  const complex: TrieNode<TResource, TResponder>[] = [];
  let simple: TrieNode<TResource, TResponder> | null = null;

  for (const node of nodes) {
    switch (node.segment.kind) {
      case 'static':
        statics.push(node);
        break;
      case 'complex':
        complex.push(node);
        break;
      case 'simple':
        simple = node;
        break;
    }
  }

  const hasVarSibling = complex.length > 0 || simple !== null;

  let staticMap: Map<string, StaticBranch<TResource, TResponder>> | null = null;
  if (statics.length > 0) {
    staticMap = new Map();
    const fast = parentFast && !hasVarSibling;
    for (const node of statics) {
      staticMap.set(node.segment.raw, {
        route: node.route,
        next: compileLevel(node.children, fast, state),
        fastReturn: fast,
      });
    }
  }

  const complexBranches: ComplexBranch<TResource, TResponder>[] = [];
  for (let i = 0; i < complex.length; i++) {
    const node = complex[i];
    const segment = node.segment;
    if (segment.kind !== 'complex') continue;

    const fast = parentFast && i === complex.length - 1 && simple === null;
    complexBranches.push({
      pattern: segment.pattern,
      fields: segment.fields,
      route: node.route,
      next: compileLevel(node.children, fast, state),
      fastReturn: fast,
    });
  }

  return {
    statics: staticMap,
    complex: complexBranches,
    simple: simple === null ? null : compileSimple(simple, parentFast, state),
  };
}

function compileSimple<TResource, TResponder>(
  node: TrieNode<TResource, TResponder>,
  fast: boolean,
  state: CompileState
): SimpleBranch<TResource, TResponder> | RemainderBranch<TResource, TResponder> | null {
  const segment: SimpleSegment | null = node.segment.kind === 'simple' ? node.segment : null;
  if (segment === null) return null;

  const { name, converter } = segment.field;

  if (converter !== null && isSegmentsConverter(converter)) {
    // Only ever the last segment of its template, so it always carries a route
    if (node.route === null) return null;
    return { kind: 'remainder', name, converter, route: node.route };
  }

  const fieldConverter: FieldConverter | null = converter;
  return {
    kind: 'field',
    name,
    converter: fieldConverter,
    route: node.route,
    next: compileLevel(node.children, fast, state),
    fastReturn: fast,
  };
}

/**
 * Compile a trie into an immutable Matcher.
 */
export function compileTrie<TResource, TResponder>(
  trie: RouteTrie<TResource, TResponder>,
  opts: CompileOptions = {}
): Matcher<TResource, TResponder> {
  const state: CompileState = { levels: 0 };
  const root: CompiledLevel<TResource, TResponder> = compileLevel(trie.roots, true, state) ?? {
    statics: null,
    complex: [],
    simple: null,
  };

  return new Matcher<TResource, TResponder>(root, opts.maxSegments ?? Infinity, {
    routes: trie.size,
    levels: state.levels,
    compiledAt: Date.now(),
  });
}
