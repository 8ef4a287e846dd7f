/**
 * Trie Router
 *
 * Design decisions:
 * - Registration builds a trie; lookups run a compiled, frozen Matcher
 * - Compiled lazily on the first find() after a change, or eagerly on request
 * - addRoute() after compilation never touches the live matcher — the next
 *   compile swaps the reference (copy-on-write)
 * - Each router owns its converter registry
 * - Logging only at registration and compile time
 *
 * CRITICAL HOT PATH — find() is one null check plus Matcher#find()
 */

import { compileTrie } from './compiler.js';
import { loadConfig } from './config.js';
import type { ConfigOverrides, RouterConfig } from './config.js';
import { ConverterRegistry } from './converters.js';
import type { ConverterFactory } from './converters.js';
import { describeRoute } from './inspect.js';
import type { RouteInfo } from './inspect.js';
import { LogLevel, createLogger, noopLogger } from './logger.js';
import type { ILogger } from './logger.js';
import type { MatchResult, Matcher } from './matcher.js';
import { parseTemplate } from './template.js';
import { RouteTrie } from './trie.js';
import type { MethodMap } from './trie.js';

export interface RouterOptions {
  /** Registry to resolve `{field:converter}` references; a fresh one with the built-ins by default */
  converters?: ConverterRegistry;
  logger?: ILogger;
  config?: ConfigOverrides;
}

export interface AddRouteOptions {
  /** Compile right away instead of on the next find() */
  compile?: boolean;
}

export class Router<TResource = unknown, TResponder = unknown> {
  readonly options: { readonly converters: ConverterRegistry };
  readonly config: Readonly<RouterConfig>;
  private _trie = new RouteTrie<TResource, TResponder>();
  private _matcher: Matcher<TResource, TResponder> | null = null;
  private _log: ILogger;

  constructor(opts: RouterOptions = {}) {
    this.config = loadConfig(opts.config);
    this.options = { converters: opts.converters ?? new ConverterRegistry() };
    this._log = opts.logger ?? this._defaultLogger();
  }

  private _defaultLogger(): ILogger {
    const { enabled, level, timestamp } = this.config.logging;
    if (!enabled) return noopLogger;
    return createLogger({ level, timestamp, name: 'router' });
  }

  /** Number of registered routes */
  get size(): number {
    return this._trie.size;
  }

  /** Whether the current routes have been compiled */
  get compiled(): boolean {
    return this._matcher !== null;
  }

  /**
   * Register a route.
   *
   * Throws TemplateSyntaxError, RouteConflictError or a converter error;
   * a rejected route leaves the router unchanged.
   */
  addRoute(
    uriTemplate: string,
    methodMap: MethodMap<TResponder>,
    resource: TResource,
    opts: AddRouteOptions = {}
  ): void {
    const parsed = parseTemplate(uriTemplate, this.options.converters);
    const replaced = this._trie.insert(parsed, methodMap, resource);
    this._matcher = null;

    if (this._log.enabled(LogLevel.DEBUG)) {
      this._log.debug(replaced ? 'route replaced' : 'route added', {
        template: uriTemplate,
        methods: Object.keys(methodMap),
        segments: parsed.segments.map((s) => s.kind),
      });
    }

    if (opts.compile || this.config.router.eagerCompile) {
      this.compile();
    }
  }

  /**
   * Resolve a request path to a route, or null when nothing matches.
   */
  find(path: string): MatchResult<TResource, TResponder> | null {
    return (this._matcher ?? this.compile()).find(path);
  }

  /**
   * Build a Matcher from the current routes and make it the live one.
   */
  compile(): Matcher<TResource, TResponder> {
    const start = performance.now();
    const matcher = compileTrie(this._trie, { maxSegments: this.config.router.maxSegments });
    this._matcher = matcher;

    this._log.info('routes compiled', {
      routes: matcher.stats.routes,
      levels: matcher.stats.levels,
      ms: Math.round((performance.now() - start) * 1000) / 1000,
    });
    return matcher;
  }

  /** Add a converter to this router's registry */
  registerConverter(name: string, factory: ConverterFactory): this {
    this.options.converters.register(name, factory);
    this._log.debug('converter registered', { converter: name });
    return this;
  }

  /** Registered routes in registration order */
  routes(): RouteInfo[] {
    return this._trie.routes().map(describeRoute);
  }
}
