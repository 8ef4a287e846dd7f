/**
 * Compiled Route Matcher
 *
 * Design decisions:
 * - Immutable once built; find() reads, never writes, shared state
 * - Static children looked up through a Map — O(1) per depth
 * - Sibling order fixed at compile time: static → complex → simple
 * - Params bound while unwinding a successful walk, so a branch that fails
 *   half way never leaks values into the result
 * - A miss is `null`, never an exception
 *
 * CRITICAL HOT PATH — no logging, no throwing, one params object per hit
 */

import type { FieldConverter, SegmentsConverter } from './converters.js';
import type { ComplexField } from './template.js';
import type { MethodMap, RoutePayload } from './trie.js';

export interface MatchResult<TResource = unknown, TResponder = unknown> {
  resource: TResource;
  methodMap: MethodMap<TResponder>;
  params: Record<string, unknown>;
  uriTemplate: string;
}

interface BranchBase<TResource, TResponder> {
  readonly route: RoutePayload<TResource, TResponder> | null;
  readonly next: CompiledLevel<TResource, TResponder> | null;
  /** When nothing below this branch matches, the whole lookup is a miss */
  readonly fastReturn: boolean;
}

export type StaticBranch<TResource, TResponder> = BranchBase<TResource, TResponder>;

export interface ComplexBranch<TResource, TResponder> extends BranchBase<TResource, TResponder> {
  readonly pattern: RegExp;
  readonly fields: readonly ComplexField[];
}

export interface SimpleBranch<TResource, TResponder> extends BranchBase<TResource, TResponder> {
  readonly kind: 'field';
  readonly name: string;
  readonly converter: FieldConverter | null;
}

export interface RemainderBranch<TResource, TResponder> {
  readonly kind: 'remainder';
  readonly name: string;
  readonly converter: SegmentsConverter;
  readonly route: RoutePayload<TResource, TResponder>;
}

export interface CompiledLevel<TResource, TResponder> {
  readonly statics: ReadonlyMap<string, StaticBranch<TResource, TResponder>> | null;
  readonly complex: readonly ComplexBranch<TResource, TResponder>[];
  readonly simple: SimpleBranch<TResource, TResponder> | RemainderBranch<TResource, TResponder> | null;
}

/** Returned up the stack by a fast-return branch: stop trying alternatives */
const ABORT: unique symbol = Symbol('abort');

type Step<TResource, TResponder> = RoutePayload<TResource, TResponder> | null | typeof ABORT;

export interface MatcherStats {
  routes: number;
  levels: number;
  compiledAt: number;
}

/**
 * Split a request path into segments.
 * Leading slashes are skipped; a trailing slash yields a final empty segment.
 */
export function splitPath(path: string): string[] {
  let start = 0;
  while (start < path.length && path.charCodeAt(start) === 47 /* '/' */) start++;
  return path.substring(start).split('/');
}

export class Matcher<TResource = unknown, TResponder = unknown> {
  private readonly _root: CompiledLevel<TResource, TResponder>;
  private readonly _maxSegments: number;
  readonly stats: Readonly<MatcherStats>;

  constructor(root: CompiledLevel<TResource, TResponder>, maxSegments: number, stats: MatcherStats) {
    this._root = root;
    this._maxSegments = maxSegments;
    this.stats = Object.freeze(stats);
    Object.freeze(this);
  }

  /**
   * Resolve a request path. Pure: the same path always yields an equal result.
   */
  find(path: string): MatchResult<TResource, TResponder> | null {
    const segments = splitPath(path);
    if (segments.length > this._maxSegments) return null;

    const params: Record<string, unknown> = {};
    const route = this._walk(this._root, segments, 0, params);
    if (route === null || route === ABORT) return null;

    return {
      resource: route.resource,
      methodMap: route.methodMap,
      params,
      uriTemplate: route.uriTemplate,
    };
  }

  private _walk(
    level: CompiledLevel<TResource, TResponder>,
    segments: string[],
    depth: number,
    params: Record<string, unknown>
  ): Step<TResource, TResponder> {
    const segment = segments[depth];

    // Try static child first — O(1)
    if (level.statics !== null) {
      const branch = level.statics.get(segment);
      if (branch !== undefined) {
        const found = this._descend(branch, segments, depth, params);
        if (found !== null) return found;
      }
    }

    for (let i = 0; i < level.complex.length; i++) {
      const branch = level.complex[i];
      const match = branch.pattern.exec(segment);
      if (match === null) continue;

      const values = convertGroups(branch.fields, match);
      if (values === null) continue;

      const found = this._descend(branch, segments, depth, params);
      if (found === null) continue;
      if (found !== ABORT) {
        for (let f = 0; f < branch.fields.length; f++) {
          params[branch.fields[f].name] = values[f];
        }
      }
      return found;
    }

    const simple = level.simple;
    if (simple === null) return null;

    if (simple.kind === 'remainder') {
      const value = simple.converter.convert(segments.slice(depth));
      if (value === null) return null;
      params[simple.name] = value;
      return simple.route;
    }

    const value = simple.converter === null ? segment : simple.converter.convert(segment);
    if (value === null) return null;

    const found = this._descend(simple, segments, depth, params);
    if (found !== null && found !== ABORT) {
      params[simple.name] = value;
    }
    return found;
  }

  private _descend(
    branch: BranchBase<TResource, TResponder>,
    segments: string[],
    depth: number,
    params: Record<string, unknown>
  ): Step<TResource, TResponder> {
    let found: Step<TResource, TResponder>;

    if (depth === segments.length - 1) {
      found = branch.route;
    } else if (branch.next !== null) {
      found = this._walk(branch.next, segments, depth + 1, params);
    } else {
      found = null;
    }

    if (found === null && branch.fastReturn) return ABORT;
    return found;
  }
}

function convertGroups(fields: readonly ComplexField[], match: RegExpExecArray): unknown[] | null {
  const values: unknown[] = new Array(fields.length);
  for (let i = 0; i < fields.length; i++) {
    const raw = match[i + 1];
    const converter = fields[i].converter;
    if (converter === null) {
      values[i] = raw;
      continue;
    }
    const value = converter.convert(raw);
    if (value === null) return null;
    values[i] = value;
  }
  return values;
}
