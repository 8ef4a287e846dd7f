/**
 * Route Trie
 *
 * One node per template segment; templates sharing a prefix share ancestors.
 * Built only during registration — the compiler turns it into a Matcher.
 *
 * Sibling rules:
 * - an identical raw segment is the same node (descend, or replace the payload)
 * - two different simple fields at one depth conflict (`{id}` vs `{name}`)
 * - two complex segments conflict when their skeletons are equal
 *   (`{a}.{b}` vs `{x}.{y}`)
 * - a static segment never conflicts; statics are tried first at match time
 */

import { routeConflict } from './errors.js';
import type { ParsedTemplate, Segment } from './template.js';

export type MethodMap<TResponder = unknown> = Readonly<Record<string, TResponder>>;

export interface RoutePayload<TResource = unknown, TResponder = unknown> {
  readonly resource: TResource;
  readonly methodMap: MethodMap<TResponder>;
  readonly uriTemplate: string;
  readonly parsed: ParsedTemplate;
}

export class TrieNode<TResource = unknown, TResponder = unknown> {
  readonly segment: Segment;
  readonly children: TrieNode<TResource, TResponder>[] = [];
  route: RoutePayload<TResource, TResponder> | null = null;

  constructor(segment: Segment) {
    this.segment = segment;
  }
}

/**
 * Whether a candidate segment would make matching ambiguous next to an
 * existing, non-identical sibling.
 */
export function conflicts(existing: Segment, candidate: Segment): boolean {
  switch (existing.kind) {
    case 'static':
      return false;
    case 'simple':
      return candidate.kind === 'simple';
    case 'complex':
      return candidate.kind === 'complex' && candidate.skeleton === existing.skeleton;
  }
}

export class RouteTrie<TResource = unknown, TResponder = unknown> {
  readonly roots: TrieNode<TResource, TResponder>[] = [];
  /** Nodes carrying a payload, in first-registration order */
  private _terminals: TrieNode<TResource, TResponder>[] = [];
  private _nodeCount = 0;

  get size(): number {
    return this._terminals.length;
  }

  get nodeCount(): number {
    return this._nodeCount;
  }

  /** Payloads in first-registration order */
  routes(): RoutePayload<TResource, TResponder>[] {
    const out: RoutePayload<TResource, TResponder>[] = [];
    for (const node of this._terminals) {
      if (node.route !== null) out.push(node.route);
    }
    return out;
  }

  /**
   * Insert a parsed template. Conflicts are detected before anything is
   * attached, so a failed insert leaves the trie as it was.
   *
   * @returns true when an existing route was replaced
   */
  insert(parsed: ParsedTemplate, methodMap: MethodMap<TResponder>, resource: TResource): boolean {
    const payload: RoutePayload<TResource, TResponder> = {
      resource,
      methodMap,
      uriTemplate: parsed.template,
      parsed,
    };
    const segments = parsed.segments;

    let siblings = this.roots;
    for (let depth = 0; depth < segments.length; depth++) {
      const segment = segments[depth];
      let next: TrieNode<TResource, TResponder> | null = null;

      for (const node of siblings) {
        if (node.segment.raw === segment.raw) {
          next = node;
          break;
        }
        if (conflicts(node.segment, segment)) {
          throw routeConflict(parsed.template, segment.raw, node.segment.raw);
        }
      }

      if (next === null) {
        siblings.push(this._branch(segments, depth, payload));
        return false;
      }

      if (depth === segments.length - 1) {
        const replaced = next.route !== null;
        if (!replaced) this._terminals.push(next);
        next.route = payload;
        return replaced;
      }

      siblings = next.children;
    }

    return false;
  }

  /** Build a detached chain of new nodes for segments[from..] */
  private _branch(
    segments: readonly Segment[],
    from: number,
    payload: RoutePayload<TResource, TResponder>
  ): TrieNode<TResource, TResponder> {
    const head = new TrieNode<TResource, TResponder>(segments[from]);
    let tail = head;
    for (let i = from + 1; i < segments.length; i++) {
      const child = new TrieNode<TResource, TResponder>(segments[i]);
      tail.children.push(child);
      tail = child;
    }
    tail.route = payload;
    this._terminals.push(tail);
    this._nodeCount += segments.length - from;
    return head;
  }
}
