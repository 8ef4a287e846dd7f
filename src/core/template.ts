/**
 * URI Template Parser
 *
 * Splits a template such as `/repos/{org}/{repo}/compare/{usr0}:{branch0}`
 * into typed segments:
 *
 *   static   "repos"            exact string equality
 *   simple   "{org}"            one field spanning the whole segment
 *   complex  "{usr0}:{branch0}" literal text mixed with fields, matched by RegExp
 *
 * Placeholder grammar:
 *   {name}  {name:conv}  {name:conv(args)}  {name:conv:args}
 *
 * Everything here runs at registration time and throws TemplateSyntaxError
 * (or a converter error) on bad input.
 */

import { isSegmentsConverter } from './converters.js';
import type { Converter, ConverterRegistry, FieldConverter, SegmentsConverter } from './converters.js';
import { templateSyntax } from './errors.js';

export interface FieldSpec {
  readonly name: string;
  /** Converter name and argument text exactly as written, for inspection */
  readonly converterName: string | null;
  readonly converterArgs: string | null;
}

export interface SimpleField extends FieldSpec {
  readonly converter: Converter | null;
}

export interface ComplexField extends FieldSpec {
  readonly converter: FieldConverter | null;
}

export interface StaticSegment {
  readonly kind: 'static';
  readonly raw: string;
}

export interface SimpleSegment {
  readonly kind: 'simple';
  readonly raw: string;
  readonly field: SimpleField;
}

export interface ComplexSegment {
  readonly kind: 'complex';
  readonly raw: string;
  readonly pattern: RegExp;
  readonly fields: readonly ComplexField[];
  /** Raw text with every placeholder replaced by `{}` — used for conflict checks */
  readonly skeleton: string;
}

export type Segment = StaticSegment | SimpleSegment | ComplexSegment;

export interface ParsedTemplate {
  /** The template exactly as registered */
  readonly template: string;
  readonly segments: readonly Segment[];
  readonly fieldNames: readonly string[];
}

const FIELD_NAME_RE = /^[A-Za-z_][A-Za-z0-9_-]*$/;
const CONVERTER_SPEC_RE = /^([A-Za-z_][A-Za-z0-9_]*)(?:\(([^]*)\)|:([^]*))?$/;
const WHITESPACE_RE = /\s/;

/** The `{}` token cannot occur literally in a valid segment */
const SKELETON_TOKEN = '{}';

interface Placeholder {
  start: number;
  end: number;
  body: string;
}

function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Locate `{...}` spans in a segment. Quotes inside a placeholder may hide
 * braces, so `{ts:dt("%H}")}` is one placeholder.
 */
function scanPlaceholders(template: string, raw: string): Placeholder[] {
  const spans: Placeholder[] = [];
  let i = 0;

  while (i < raw.length) {
    const ch = raw[i];

    if (ch === '}') {
      throw templateSyntax(template, `unbalanced "}" in segment "${raw}"`, { segment: raw });
    }

    if (ch !== '{') {
      i++;
      continue;
    }

    let j = i + 1;
    let quote: string | null = null;
    for (; j < raw.length; j++) {
      const c = raw[j];
      if (quote !== null) {
        if (c === '\\') j++;
        else if (c === quote) quote = null;
      } else if (c === '"' || c === "'") {
        quote = c;
      } else if (c === '{') {
        throw templateSyntax(template, `nested "{" in segment "${raw}"`, { segment: raw });
      } else if (c === '}') {
        break;
      }
    }

    if (j >= raw.length) {
      throw templateSyntax(template, `unclosed "{" in segment "${raw}"`, { segment: raw });
    }

    spans.push({ start: i, end: j + 1, body: raw.slice(i + 1, j) });
    i = j + 1;
  }

  return spans;
}

/** Split a placeholder body into field name and converter reference */
function parseFieldBody(template: string, body: string): FieldSpec {
  const colon = body.indexOf(':');
  const name = colon === -1 ? body : body.slice(0, colon);

  if (name === '') {
    throw templateSyntax(template, 'empty field name', { field: body });
  }
  if (!FIELD_NAME_RE.test(name)) {
    throw templateSyntax(
      template,
      `field name "${name}" must start with a letter or "_" and contain only letters, digits, "_" and "-"`,
      { field: name }
    );
  }
  // Would hit the prototype setter when bound into the params object
  if (name === '__proto__') {
    throw templateSyntax(template, 'field name "__proto__" is reserved', { field: name });
  }

  if (colon === -1) {
    return { name, converterName: null, converterArgs: null };
  }

  const spec = CONVERTER_SPEC_RE.exec(body.slice(colon + 1));
  if (spec === null) {
    throw templateSyntax(template, `invalid converter reference in "{${body}}"`, { field: name });
  }

  return { name, converterName: spec[1], converterArgs: spec[2] ?? spec[3] ?? null };
}

function resolveConverter(registry: ConverterRegistry, field: FieldSpec): Converter | null {
  if (field.converterName === null) return null;
  return registry.resolve(field.converterName, field.converterArgs, field.name);
}

/**
 * Classify one raw template segment.
 */
export function classifySegment(raw: string, registry: ConverterRegistry, template: string = raw): Segment {
  const spans = scanPlaceholders(template, raw);

  if (spans.length === 0) {
    return { kind: 'static', raw };
  }

  if (spans.length === 1 && spans[0].start === 0 && spans[0].end === raw.length) {
    const spec = parseFieldBody(template, spans[0].body);
    return { kind: 'simple', raw, field: { ...spec, converter: resolveConverter(registry, spec) } };
  }

  const fields: ComplexField[] = [];
  let source = '^';
  let skeleton = '';
  let prev = 0;

  for (const span of spans) {
    const literal = raw.slice(prev, span.start);
    const spec = parseFieldBody(template, span.body);
    const converter = resolveConverter(registry, spec);

    if (converter !== null && isSegmentsConverter(converter)) {
      throw templateSyntax(
        template,
        `converter "${spec.converterName}" of field "${spec.name}" consumes the rest of the path ` +
          'and cannot share its segment with other text',
        { field: spec.name }
      );
    }

    fields.push({ ...spec, converter });
    source += escapeRegExp(literal) + '(.+)';
    skeleton += literal + SKELETON_TOKEN;
    prev = span.end;
  }

  const tail = raw.slice(prev);
  source += escapeRegExp(tail) + '$';
  skeleton += tail;

  return { kind: 'complex', raw, pattern: new RegExp(source, 's'), fields, skeleton };
}

/** The consuming converter of a simple segment, if it has one */
export function segmentsConverterOf(segment: Segment): SegmentsConverter | null {
  if (segment.kind !== 'simple' || segment.field.converter === null) return null;
  return isSegmentsConverter(segment.field.converter) ? segment.field.converter : null;
}

/**
 * Validate a whole template and classify each of its segments.
 */
export function parseTemplate(template: string, registry: ConverterRegistry): ParsedTemplate {
  if (typeof template !== 'string') {
    throw templateSyntax(String(template), 'URI templates must be strings');
  }
  if (!template.startsWith('/')) {
    throw templateSyntax(template, 'URI templates must start with "/"');
  }
  if (WHITESPACE_RE.test(template)) {
    throw templateSyntax(template, 'URI templates may not include whitespace');
  }
  if (template.includes('//')) {
    throw templateSyntax(template, 'URI templates may not include empty segments ("//")');
  }

  const path = template.length > 1 && template.endsWith('/') ? template.slice(0, -1) : template;
  const rawSegments = path.slice(1).split('/');
  const segments: Segment[] = [];
  const fieldNames: string[] = [];

  for (let i = 0; i < rawSegments.length; i++) {
    const segment = classifySegment(rawSegments[i], registry, template);

    const names =
      segment.kind === 'simple'
        ? [segment.field.name]
        : segment.kind === 'complex'
          ? segment.fields.map((f) => f.name)
          : [];

    for (const name of names) {
      if (fieldNames.includes(name)) {
        throw templateSyntax(template, `field name "${name}" is used more than once`, { field: name });
      }
      fieldNames.push(name);
    }

    if (i < rawSegments.length - 1 && segmentsConverterOf(segment) !== null) {
      throw templateSyntax(
        template,
        `the converter of field "${names[0]}" consumes the rest of the path, so it must be in the last segment`,
        { field: names[0] }
      );
    }

    segments.push(segment);
  }

  return { template, segments, fieldNames };
}
