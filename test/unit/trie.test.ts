import { describe, expect, test } from 'vitest';
import { ConverterRegistry } from '../../src/core/converters.js';
import { RouteConflictError } from '../../src/core/errors.js';
import { classifySegment, parseTemplate } from '../../src/core/template.js';
import { RouteTrie, conflicts } from '../../src/core/trie.js';

const registry = new ConverterRegistry();

function insert(trie: RouteTrie<string, string>, template: string, resource = template): boolean {
  return trie.insert(parseTemplate(template, registry), { GET: 'on_get' }, resource);
}

describe('conflicts', () => {
  const seg = (raw: string) => classifySegment(raw, registry);

  test('statics never conflict', () => {
    expect(conflicts(seg('a'), seg('{x}'))).toBe(false);
    expect(conflicts(seg('{x}'), seg('a'))).toBe(false);
  });

  test('two simple fields conflict', () => {
    expect(conflicts(seg('{id}'), seg('{name:int}'))).toBe(true);
  });

  test('complex segments conflict only on equal skeletons', () => {
    expect(conflicts(seg('{a}.{b}'), seg('{x}.{y:int}'))).toBe(true);
    expect(conflicts(seg('{a}.{b}'), seg('{a}-{b}'))).toBe(false);
    expect(conflicts(seg('{a}.{b}'), seg('{a}'))).toBe(false);
  });
});

describe('RouteTrie', () => {
  test('templates share prefixes', () => {
    const trie = new RouteTrie<string, string>();
    insert(trie, '/repos/{org}');
    insert(trie, '/repos/{org}/{repo}');
    insert(trie, '/repos/{org}/members');
    expect(trie.size).toBe(3);
    expect(trie.nodeCount).toBe(4);
    expect(trie.roots).toHaveLength(1);
  });

  test('re-registering a template replaces the payload in place', () => {
    const trie = new RouteTrie<string, string>();
    expect(insert(trie, '/widgets/{id}', 'first')).toBe(false);
    expect(insert(trie, '/widgets/{id}', 'second')).toBe(true);
    expect(trie.size).toBe(1);
    expect(trie.nodeCount).toBe(2);
    expect(trie.routes().map((r) => r.resource)).toEqual(['second']);
  });

  test('a differently named simple sibling is a conflict', () => {
    const trie = new RouteTrie<string, string>();
    insert(trie, '/widgets/{id}');
    expect(() => insert(trie, '/widgets/{name}')).toThrow(RouteConflictError);
    expect(() => insert(trie, '/widgets/{name}')).toThrow(
      'The URI template "/widgets/{name}" conflicts with another route: segment "{name}" is ambiguous with "{id}"'
    );
  });

  test('complex siblings with equal skeletons conflict', () => {
    const trie = new RouteTrie<string, string>();
    insert(trie, '/files/{name}.{ext}');
    insert(trie, '/files/{name}.tar.{comp}');
    expect(() => insert(trie, '/files/{base}.{suffix}')).toThrow(RouteConflictError);
  });

  test('a failed insert leaves the trie unchanged', () => {
    const trie = new RouteTrie<string, string>();
    insert(trie, '/a/{x}/b');
    insert(trie, '/c/d/{x}');
    const before = trie.nodeCount;

    expect(() => insert(trie, '/a/{y}/c')).toThrow(RouteConflictError);
    expect(() => insert(trie, '/c/d/{y}/e')).toThrow(RouteConflictError);

    expect(trie.nodeCount).toBe(before);
    expect(trie.size).toBe(2);
    expect(trie.routes().map((r) => r.uriTemplate)).toEqual(['/a/{x}/b', '/c/d/{x}']);
  });

  test('routes are listed in first-registration order', () => {
    const trie = new RouteTrie<string, string>();
    insert(trie, '/b');
    insert(trie, '/a');
    insert(trie, '/b', 'again');
    expect(trie.routes().map((r) => [r.uriTemplate, r.resource])).toEqual([
      ['/b', 'again'],
      ['/a', '/a'],
    ]);
  });
});
