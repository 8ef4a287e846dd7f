/**
 * trellis-router — Public API
 *
 * ESM-only, tree-shakable exports
 * Import only what you need:
 *   import { Router } from 'trellis-router';
 *   import { ConverterRegistry, IntConverter } from 'trellis-router';
 */

// Core
export { Router } from './core/router.js';
export type { RouterOptions, AddRouteOptions } from './core/router.js';
export { Matcher, splitPath } from './core/matcher.js';
export type { MatchResult, MatcherStats } from './core/matcher.js';
export { compileTrie } from './core/compiler.js';
export type { CompileOptions } from './core/compiler.js';
export { RouteTrie, TrieNode, conflicts } from './core/trie.js';
export type { MethodMap, RoutePayload } from './core/trie.js';
export { parseTemplate, classifySegment, segmentsConverterOf } from './core/template.js';
export type {
  Segment,
  StaticSegment,
  SimpleSegment,
  ComplexSegment,
  FieldSpec,
  SimpleField,
  ComplexField,
  ParsedTemplate,
} from './core/template.js';

// Converters
export {
  ConverterRegistry,
  BUILTIN_CONVERTERS,
  DEFAULT_DATETIME_FORMAT,
  IntConverter,
  FloatConverter,
  DateTimeConverter,
  UUIDConverter,
  PathConverter,
  isSegmentsConverter,
} from './core/converters.js';
export type {
  Converter,
  ConverterFactory,
  FieldConverter,
  SegmentsConverter,
  IntConverterOptions,
  FloatConverterOptions,
} from './core/converters.js';
export { parseConverterArgs, bindArgs, NO_ARGS } from './core/args.js';
export type { ConverterArgs, ConverterArgValue } from './core/args.js';
export { compileFormat } from './core/datetime.js';
export type { CompiledFormat } from './core/datetime.js';

// Inspection
export { inspectRoutes, formatRoutes, describeRoute, resourceName } from './core/inspect.js';
export type { RouteInfo, FieldInfo, FormatOptions, RouteSource } from './core/inspect.js';

// Errors
export {
  RouterError,
  TemplateSyntaxError,
  RouteConflictError,
  UnknownConverterError,
  ConverterConfigError,
  DuplicateConverterError,
  templateSyntax,
  routeConflict,
  unknownConverter,
  converterConfig,
  duplicateConverter,
} from './core/errors.js';
export type { ErrorJson, RouterErrorCode } from './core/errors.js';

// Logging
export { Logger, createLogger, noopLogger, LogLevel } from './core/logger.js';
export type { LoggerOptions, ILogger, LogFields } from './core/logger.js';

// Config
export { loadConfig, envInt, envBool, DEFAULT_CONFIG } from './core/config.js';
export type { RouterConfig, LoggingConfig, RoutingConfig, ConfigOverrides } from './core/config.js';

// Validation
export { compileSchema } from './core/validation.js';
export type { SchemaField, Schema, ValidatorFn } from './core/validation.js';
