/**
 * Field Converters
 *
 * Design decisions:
 * - A converter is a plain object with convert(); classes are a convenience
 * - convert() returns null for "does not match" — never throws at request time
 * - Arguments are parsed and validated once, when the template is registered
 * - Each router owns its registry — no process-wide mutable state
 * - Built-ins: int, float, dt, uuid, path
 */

import { bindArgs, parseConverterArgs } from './args.js';
import type { ConverterArgs, ConverterArgValue } from './args.js';
import { compileFormat } from './datetime.js';
import type { CompiledFormat } from './datetime.js';
import { RouterError, converterConfig, duplicateConverter, unknownConverter } from './errors.js';
import { compileSchema } from './validation.js';
import type { ValidatorFn } from './validation.js';

/** Converts a single path segment (or part of one) */
export interface FieldConverter<T = unknown> {
  readonly consumesRemainingSegments?: false;
  convert(fragment: string): T | null;
}

/** Converts every remaining path segment; only legal as the last segment of a template */
export interface SegmentsConverter<T = unknown> {
  readonly consumesRemainingSegments: true;
  convert(fragments: readonly string[]): T | null;
}

export type Converter = FieldConverter | SegmentsConverter;

export type ConverterFactory = (args: ConverterArgs) => Converter;

const CONVERTER_NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isSegmentsConverter(converter: Converter): converter is SegmentsConverter {
  return converter.consumesRemainingSegments === true;
}

/**
 * Bind and validate arguments for a built-in converter.
 * Parameter names follow declaration order so positional arguments work.
 */
function prepareArgs(
  name: string,
  params: readonly string[],
  validate: ValidatorFn,
  args: ConverterArgs
): Record<string, ConverterArgValue> {
  const bound = bindArgs(name, params, args);
  const errors = validate(bound);
  if (errors) {
    throw converterConfig(name, errors.join('; '), { errors });
  }
  return bound;
}

function optionalNumber(value: ConverterArgValue | undefined): number | null {
  return typeof value === 'number' ? value : null;
}

// =================== int ===================

const INT_RE = /^[+-]?\d+$/;

export interface IntConverterOptions {
  numDigits?: number | null;
  min?: number | null;
  max?: number | null;
}

/**
 * Converts a field value to an integer.
 *
 * Leading zeros are accepted (`007` converts to 7); surrounding whitespace is
 * not. Values beyond Number.MAX_SAFE_INTEGER convert to a bigint.
 */
export class IntConverter implements FieldConverter<number | bigint> {
  private readonly _numDigits: number | null;
  private readonly _min: number | null;
  private readonly _max: number | null;

  constructor(opts: IntConverterOptions = {}) {
    const numDigits = opts.numDigits ?? null;
    if (numDigits !== null && numDigits < 1) {
      throw converterConfig('int', 'num_digits must be at least 1', { num_digits: numDigits });
    }
    this._numDigits = numDigits;
    this._min = opts.min ?? null;
    this._max = opts.max ?? null;
  }

  convert(fragment: string): number | bigint | null {
    if (this._numDigits !== null && fragment.length !== this._numDigits) return null;
    if (!INT_RE.test(fragment)) return null;

    const num = Number(fragment);
    const value = Number.isSafeInteger(num) ? num : BigInt(fragment);

    if (this._min !== null && value < this._min) return null;
    if (this._max !== null && value > this._max) return null;

    return value;
  }
}

const INT_PARAMS = ['num_digits', 'min', 'max'] as const;
const INT_ARGS = compileSchema({
  num_digits: { type: 'integer', nullable: true, min: 1 },
  min: { type: 'integer', nullable: true },
  max: { type: 'integer', nullable: true },
});

// =================== float ===================

const FLOAT_RE = /^[+-]?(?:(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?|nan|inf|infinity)$/i;

export interface FloatConverterOptions {
  min?: number | null;
  max?: number | null;
  finite?: boolean;
}

/**
 * Converts a field value to a float.
 *
 * Accepts `nan`, `inf` and `infinity` in any case, which `finite` (the
 * default) then rejects.
 */
export class FloatConverter implements FieldConverter<number> {
  private readonly _min: number | null;
  private readonly _max: number | null;
  private readonly _finite: boolean;

  constructor(opts: FloatConverterOptions = {}) {
    this._min = opts.min ?? null;
    this._max = opts.max ?? null;
    this._finite = opts.finite ?? true;
  }

  convert(fragment: string): number | null {
    if (!FLOAT_RE.test(fragment)) return null;

    const value = parseFloatLiteral(fragment);
    if (this._finite && !Number.isFinite(value)) return null;

    if (this._min !== null && value < this._min) return null;
    if (this._max !== null && value > this._max) return null;

    return value;
  }
}

function parseFloatLiteral(fragment: string): number {
  const negative = fragment[0] === '-';
  const unsigned = fragment[0] === '-' || fragment[0] === '+' ? fragment.slice(1) : fragment;
  const lower = unsigned.toLowerCase();

  if (lower === 'nan') return NaN;
  if (lower === 'inf' || lower === 'infinity') return negative ? -Infinity : Infinity;
  return Number(fragment);
}

const FLOAT_PARAMS = ['min', 'max', 'finite'] as const;
const FLOAT_ARGS = compileSchema({
  min: { type: 'number', nullable: true },
  max: { type: 'number', nullable: true },
  finite: { type: 'boolean', nullable: true },
});

// =================== dt ===================

export const DEFAULT_DATETIME_FORMAT = '%Y-%m-%dT%H:%M:%S%z';

/**
 * Converts a field value to a Date using a strptime-style format string.
 */
export class DateTimeConverter implements FieldConverter<Date> {
  private readonly _format: CompiledFormat;

  constructor(formatString: string = DEFAULT_DATETIME_FORMAT) {
    try {
      this._format = compileFormat(formatString);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw converterConfig('dt', reason, { format_string: formatString });
    }
  }

  get formatString(): string {
    return this._format.format;
  }

  convert(fragment: string): Date | null {
    return this._format.parse(fragment);
  }
}

const DT_PARAMS = ['format_string'] as const;
const DT_ARGS = compileSchema({
  format_string: { type: 'string', nullable: true, minLength: 1 },
});

// =================== uuid ===================

const UUID_RE = /^(?:urn:uuid:)?(\{)?([0-9a-f-]+)(\})?$/i;
const UUID_HEX_RE = /^[0-9a-f]{32}$/i;

/**
 * Converts a field value to a canonical (lowercase, hyphenated) UUID string.
 * Hyphens may appear anywhere; 32 hex digits must remain once they are removed.
 */
export class UUIDConverter implements FieldConverter<string> {
  convert(fragment: string): string | null {
    const m = UUID_RE.exec(fragment);
    if (m === null) return null;
    // Braces come in pairs or not at all
    if ((m[1] === undefined) !== (m[3] === undefined)) return null;

    const hex = m[2].replace(/-/g, '').toLowerCase();
    if (!UUID_HEX_RE.test(hex)) return null;

    return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
  }
}

// =================== path ===================

/**
 * Binds the remainder of the request path, segments joined with `/`.
 */
export class PathConverter implements SegmentsConverter<string> {
  readonly consumesRemainingSegments = true;

  convert(fragments: readonly string[]): string {
    return fragments.join('/');
  }
}

// =================== Registry ===================

function noArgs(name: string, create: () => Converter): ConverterFactory {
  return (args) => {
    if (args.positional.length > 0 || Object.keys(args.named).length > 0) {
      throw converterConfig(name, 'takes no arguments');
    }
    return create();
  };
}

export const BUILTIN_CONVERTERS: Readonly<Record<string, ConverterFactory>> = Object.freeze({
  int: (args: ConverterArgs) => {
    const opts = prepareArgs('int', INT_PARAMS, INT_ARGS, args);
    return new IntConverter({
      numDigits: optionalNumber(opts.num_digits),
      min: optionalNumber(opts.min),
      max: optionalNumber(opts.max),
    });
  },
  float: (args: ConverterArgs) => {
    const opts = prepareArgs('float', FLOAT_PARAMS, FLOAT_ARGS, args);
    return new FloatConverter({
      min: optionalNumber(opts.min),
      max: optionalNumber(opts.max),
      finite: typeof opts.finite === 'boolean' ? opts.finite : true,
    });
  },
  dt: (args: ConverterArgs) => {
    const opts = prepareArgs('dt', DT_PARAMS, DT_ARGS, args);
    return new DateTimeConverter(
      typeof opts.format_string === 'string' ? opts.format_string : DEFAULT_DATETIME_FORMAT
    );
  },
  uuid: noArgs('uuid', () => new UUIDConverter()),
  path: noArgs('path', () => new PathConverter()),
});

/**
 * Name → factory map owned by a router.
 *
 * Mutated only while routes are being set up; resolve() is what the
 * template parser calls for every `{field:converter}` it meets.
 */
export class ConverterRegistry {
  private _factories = new Map<string, ConverterFactory>();

  constructor(factories: Readonly<Record<string, ConverterFactory>> = BUILTIN_CONVERTERS) {
    for (const [name, factory] of Object.entries(factories)) {
      this.register(name, factory);
    }
  }

  /** Register a converter factory under a new name */
  register(name: string, factory: ConverterFactory): this {
    if (!CONVERTER_NAME_RE.test(name)) {
      throw converterConfig(name, 'converter names must be identifiers');
    }
    if (this._factories.has(name)) {
      throw duplicateConverter(name);
    }
    this._factories.set(name, factory);
    return this;
  }

  has(name: string): boolean {
    return this._factories.has(name);
  }

  names(): string[] {
    return [...this._factories.keys()];
  }

  /**
   * Build a configured converter.
   * @param config argument text, e.g. `min=1, max=50`
   * @param field field name, only used in error messages
   */
  resolve(name: string, config: string | null = null, field?: string): Converter {
    const factory = this._factories.get(name);
    if (factory === undefined) {
      throw unknownConverter(name, field);
    }
    const args = parseConverterArgs(name, config);
    try {
      return factory(args);
    } catch (err) {
      if (err instanceof RouterError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw converterConfig(name, reason, { field });
    }
  }
}
