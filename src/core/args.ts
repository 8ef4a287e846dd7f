/**
 * Converter Argument Parser
 *
 * Turns the text between the parentheses of `{id:int(3, min=1)}` (or after the
 * second colon of `{id:int:3,min=1}`) into positional and keyword values.
 *
 * Grammar:
 *   args    := [item (',' item)*]
 *   item    := [ident '='] value
 *   value   := integer | decimal | quoted string | boolean | null
 *
 * Positional items must come before keyword items.
 */

import { converterConfig } from './errors.js';

export type ConverterArgValue = string | number | boolean | null;

export interface ConverterArgs {
  readonly positional: readonly ConverterArgValue[];
  readonly named: Readonly<Record<string, ConverterArgValue>>;
}

export const NO_ARGS: ConverterArgs = Object.freeze({
  positional: Object.freeze<ConverterArgValue[]>([]),
  named: Object.freeze<Record<string, ConverterArgValue>>({}),
});

const KEYWORD_RE = /^([A-Za-z_][A-Za-z0-9_]*)\s*=\s*([^]*)$/;
const DECIMAL_RE = /^[+-]?(?:\d+\.\d*|\.\d+|\d+)(?:[eE][+-]?\d+)?$/;

/** Split on commas that are not inside a quoted string */
function splitItems(converter: string, source: string): string[] {
  const items: string[] = [];
  let quote: string | null = null;
  let start = 0;

  for (let i = 0; i < source.length; i++) {
    const ch = source[i];
    if (quote !== null) {
      if (ch === '\\') {
        i++;
      } else if (ch === quote) {
        quote = null;
      }
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === ',') {
      items.push(source.slice(start, i));
      start = i + 1;
    }
  }

  if (quote !== null) {
    throw converterConfig(converter, `unterminated string in "${source}"`, { args: source });
  }

  items.push(source.slice(start));
  return items;
}

function unquote(literal: string): string {
  const body = literal.slice(1, -1);
  let out = '';
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch === '\\' && i + 1 < body.length) {
      const next = body[++i];
      out += next === 'n' ? '\n' : next === 't' ? '\t' : next;
    } else {
      out += ch;
    }
  }
  return out;
}

function parseValue(converter: string, text: string): ConverterArgValue {
  if (text.length >= 2 && (text[0] === '"' || text[0] === "'") && text[text.length - 1] === text[0]) {
    return unquote(text);
  }
  if (DECIMAL_RE.test(text)) {
    return Number(text);
  }
  switch (text) {
    case 'true':
    case 'True':
      return true;
    case 'false':
    case 'False':
      return false;
    case 'null':
    case 'None':
      return null;
  }
  throw converterConfig(converter, `cannot parse argument value "${text}"`, { value: text });
}

/**
 * Parse an argument string for the named converter.
 * Throws ConverterConfigError on malformed input.
 */
export function parseConverterArgs(converter: string, source: string | null): ConverterArgs {
  if (source === null || source.trim() === '') return NO_ARGS;

  const positional: ConverterArgValue[] = [];
  const named: Record<string, ConverterArgValue> = {};
  let sawKeyword = false;

  for (const rawItem of splitItems(converter, source)) {
    const item = rawItem.trim();
    if (item === '') {
      throw converterConfig(converter, `empty argument in "${source}"`, { args: source });
    }

    const kw = KEYWORD_RE.exec(item);
    if (kw !== null) {
      const key = kw[1];
      if (Object.prototype.hasOwnProperty.call(named, key)) {
        throw converterConfig(converter, `keyword argument "${key}" repeated`, { args: source });
      }
      named[key] = parseValue(converter, kw[2].trim());
      sawKeyword = true;
    } else {
      if (sawKeyword) {
        throw converterConfig(converter, 'positional argument follows keyword argument', { args: source });
      }
      positional.push(parseValue(converter, item));
    }
  }

  return { positional, named };
}

/**
 * Bind parsed arguments to a factory's parameter list, in declaration order.
 * Unknown keywords, extra positionals and double binding are config errors.
 */
export function bindArgs(
  converter: string,
  params: readonly string[],
  args: ConverterArgs
): Record<string, ConverterArgValue> {
  if (args.positional.length > params.length) {
    throw converterConfig(
      converter,
      `takes at most ${params.length} positional argument(s) but ${args.positional.length} were given`
    );
  }

  const bound: Record<string, ConverterArgValue> = {};
  for (let i = 0; i < args.positional.length; i++) {
    bound[params[i]] = args.positional[i];
  }

  for (const [key, value] of Object.entries(args.named)) {
    if (!params.includes(key)) {
      throw converterConfig(converter, `unexpected keyword argument "${key}"`, { keyword: key });
    }
    if (Object.prototype.hasOwnProperty.call(bound, key)) {
      throw converterConfig(converter, `got multiple values for argument "${key}"`, { keyword: key });
    }
    bound[key] = value;
  }

  return bound;
}
