/**
 * Registration-time Errors
 *
 * Design decisions:
 * - One RouterError base with a stable string code per failure kind
 * - Thin subclasses so callers can branch with instanceof or on `code`
 * - Only thrown while routes and converters are being registered
 * - Lookups never throw: a miss is a null result, not an error
 * - No stack trace capture in production (configurable)
 */

export type RouterErrorCode =
  | 'TEMPLATE_SYNTAX'
  | 'ROUTE_CONFLICT'
  | 'UNKNOWN_CONVERTER'
  | 'CONVERTER_CONFIG'
  | 'DUPLICATE_CONVERTER';

export interface ErrorJson {
  error: string;
  code: RouterErrorCode;
  details?: Record<string, unknown>;
}

/**
 * Base class for every error raised while configuring a router
 */
export class RouterError extends Error {
  readonly code: RouterErrorCode;
  readonly details: Record<string, unknown> | null;

  constructor(code: RouterErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details || null;

    if (process.env.NODE_ENV === 'production') {
      this.stack = undefined;
    }
  }

  toJSON(): ErrorJson {
    const obj: ErrorJson = {
      error: this.message,
      code: this.code,
    };
    if (this.details) obj.details = this.details;
    return obj;
  }
}

/** Malformed URI template or placeholder */
export class TemplateSyntaxError extends RouterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('TEMPLATE_SYNTAX', message, details);
  }
}

/** Two templates would match the same path ambiguously */
export class RouteConflictError extends RouterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('ROUTE_CONFLICT', message, details);
  }
}

export class UnknownConverterError extends RouterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('UNKNOWN_CONVERTER', message, details);
  }
}

/** Converter arguments could not be parsed, or the factory rejected them */
export class ConverterConfigError extends RouterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONVERTER_CONFIG', message, details);
  }
}

export class DuplicateConverterError extends RouterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('DUPLICATE_CONVERTER', message, details);
  }
}

// =================== Pre-built Error Factories ===================

export function templateSyntax(
  template: string,
  reason: string,
  details?: Record<string, unknown>
): TemplateSyntaxError {
  return new TemplateSyntaxError(`Invalid URI template "${template}": ${reason}`, {
    template,
    ...details,
  });
}

export function routeConflict(template: string, segment: string, existing: string): RouteConflictError {
  return new RouteConflictError(
    `The URI template "${template}" conflicts with another route: ` +
      `segment "${segment}" is ambiguous with "${existing}"`,
    { template, segment, existing }
  );
}

export function unknownConverter(name: string, field?: string): UnknownConverterError {
  const where = field ? ` (used by field "${field}")` : '';
  return new UnknownConverterError(`Unknown converter "${name}"${where}`, { converter: name, field });
}

export function converterConfig(name: string, reason: string, details?: Record<string, unknown>): ConverterConfigError {
  return new ConverterConfigError(`Invalid configuration for converter "${name}": ${reason}`, {
    converter: name,
    ...details,
  });
}

export function duplicateConverter(name: string): DuplicateConverterError {
  return new DuplicateConverterError(`A converter named "${name}" is already registered`, {
    converter: name,
  });
}
