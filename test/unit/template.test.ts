import { describe, expect, test } from 'vitest';
import { ConverterRegistry, IntConverter, PathConverter } from '../../src/core/converters.js';
import {
  ConverterConfigError,
  TemplateSyntaxError,
  UnknownConverterError,
} from '../../src/core/errors.js';
import { classifySegment, parseTemplate, segmentsConverterOf } from '../../src/core/template.js';

const registry = new ConverterRegistry();

describe('classifySegment', () => {
  test('static text', () => {
    expect(classifySegment('repos', registry)).toEqual({ kind: 'static', raw: 'repos' });
  });

  test('a placeholder spanning the segment is simple', () => {
    const segment = classifySegment('{org}', registry);
    expect(segment).toEqual({
      kind: 'simple',
      raw: '{org}',
      field: { name: 'org', converterName: null, converterArgs: null, converter: null },
    });
  });

  test('converter references in all three spellings', () => {
    for (const raw of ['{id:int}', '{id:int(3)}', '{id:int:3}']) {
      const segment = classifySegment(raw, registry);
      expect(segment.kind).toBe('simple');
      if (segment.kind !== 'simple') continue;
      expect(segment.field.converterName).toBe('int');
      expect(segment.field.converter).toBeInstanceOf(IntConverter);
    }

    const withArgs = classifySegment('{id:int(min=1, max=9)}', registry);
    expect(withArgs.kind === 'simple' && withArgs.field.converterArgs).toBe('min=1, max=9');
  });

  test('quoted converter arguments may contain braces', () => {
    const segment = classifySegment('{ts:dt("%H}")}', registry);
    expect(segment.kind === 'simple' && segment.field.converterArgs).toBe('"%H}"');
  });

  test('literal text mixed with placeholders is complex', () => {
    const segment = classifySegment('{usr0}:{branch0}', registry);
    expect(segment.kind).toBe('complex');
    if (segment.kind !== 'complex') return;
    expect(segment.pattern.source).toBe('^(.+):(.+)$');
    expect(segment.skeleton).toBe('{}:{}');
    expect(segment.fields.map((f) => f.name)).toEqual(['usr0', 'branch0']);
  });

  test('literal dots are escaped', () => {
    const segment = classifySegment('{name}.{ext}', registry);
    expect(segment.kind === 'complex' && segment.pattern.source).toBe('^(.+)\\.(.+)$');
  });

  test('complex fields may carry converters', () => {
    const segment = classifySegment('v{major:int}', registry);
    expect(segment.kind).toBe('complex');
    if (segment.kind !== 'complex') return;
    expect(segment.skeleton).toBe('v{}');
    expect(segment.fields[0].converter).toBeInstanceOf(IntConverter);
  });

  test('a consuming converter cannot share its segment', () => {
    expect(() => classifySegment('x{rest:path}', registry)).toThrow(TemplateSyntaxError);
  });

  test('malformed braces and names', () => {
    expect(() => classifySegment('{}', registry)).toThrow('empty field name');
    expect(() => classifySegment('{1x}', registry)).toThrow('field name "1x" must start with a letter');
    expect(() => classifySegment('{a', registry)).toThrow('unclosed "{"');
    expect(() => classifySegment('a}', registry)).toThrow('unbalanced "}"');
    expect(() => classifySegment('{a{b}}', registry)).toThrow('nested "{"');
    expect(() => classifySegment('{a:}', registry)).toThrow('invalid converter reference');
  });

  test('__proto__ is not a usable field name', () => {
    expect(() => classifySegment('{__proto__}', registry)).toThrow('field name "__proto__" is reserved');
    expect(() => classifySegment('v{__proto__:int}', registry)).toThrow(TemplateSyntaxError);
    expect(classifySegment('{proto}', registry).kind).toBe('simple');
  });

  test('field names may contain hyphens', () => {
    const segment = classifySegment('{team-id}', registry);
    expect(segment.kind === 'simple' && segment.field.name).toBe('team-id');
  });
});

describe('parseTemplate', () => {
  test('classifies every segment', () => {
    const parsed = parseTemplate('/repos/{org}/{repo}/compare/{usr0}:{branch0}', registry);
    expect(parsed.segments.map((s) => s.kind)).toEqual(['static', 'simple', 'simple', 'static', 'complex']);
    expect(parsed.fieldNames).toEqual(['org', 'repo', 'usr0', 'branch0']);
  });

  test('a trailing slash is dropped but the template is kept as written', () => {
    const parsed = parseTemplate('/items/', registry);
    expect(parsed.template).toBe('/items/');
    expect(parsed.segments).toEqual([{ kind: 'static', raw: 'items' }]);
  });

  test('the root template is a single empty segment', () => {
    expect(parseTemplate('/', registry).segments).toEqual([{ kind: 'static', raw: '' }]);
  });

  test('structural rules', () => {
    expect(() => parseTemplate('users', registry)).toThrow('URI templates must start with "/"');
    expect(() => parseTemplate('/a b', registry)).toThrow('may not include whitespace');
    expect(() => parseTemplate('/a//b', registry)).toThrow('may not include empty segments');
    expect(() => parseTemplate('/{a}/{a}', registry)).toThrow('field name "a" is used more than once');
    expect(() => parseTemplate('/{a}.{a}', registry)).toThrow(TemplateSyntaxError);
  });

  test('a consuming converter must be last', () => {
    expect(() => parseTemplate('/{rest:path}/x', registry)).toThrow(
      'the converter of field "rest" consumes the rest of the path, so it must be in the last segment'
    );
    const parsed = parseTemplate('/assets/{rest:path}', registry);
    expect(segmentsConverterOf(parsed.segments[1])).toBeInstanceOf(PathConverter);
    expect(segmentsConverterOf(parsed.segments[0])).toBeNull();
  });

  test('converter errors surface unchanged', () => {
    expect(() => parseTemplate('/{a:nope}', registry)).toThrow(UnknownConverterError);
    expect(() => parseTemplate('/{a:int(min=)}', registry)).toThrow(ConverterConfigError);
  });

  test('errors carry the template', () => {
    try {
      parseTemplate('/a//b', registry);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(TemplateSyntaxError);
      if (!(err instanceof TemplateSyntaxError)) return;
      expect(err.code).toBe('TEMPLATE_SYNTAX');
      expect(err.details).toEqual({ template: '/a//b' });
    }
  });
});
