/**
 * Static Router Configuration
 *
 * Design decisions:
 * - Loaded once when a router is built — frozen, immutable
 * - Defaults < explicit overrides < environment variables
 * - Deep freeze to prevent accidental mutation
 * - No external dependencies
 */

export interface LoggingConfig {
  readonly level: number;
  readonly enabled: boolean;
  readonly timestamp: boolean;
}

export interface RoutingConfig {
  /** Compile on every addRoute() instead of on the first find() */
  readonly eagerCompile: boolean;
  /** Paths with more segments than this are a miss without being walked; unlimited by default */
  readonly maxSegments: number;
}

export interface RouterConfig {
  readonly logging: LoggingConfig;
  readonly router: RoutingConfig;
}

export interface ConfigOverrides {
  logging?: Partial<LoggingConfig>;
  router?: Partial<RoutingConfig>;
}

/** Deep freeze an object */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Object.getOwnPropertyNames(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (typeof value === 'object' && value !== null) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/** Get env as integer */
export function envInt(key: string, defaultValue: number): number {
  const val = process.env[key];
  if (val !== undefined) {
    const parsed = parseInt(val, 10);
    return isNaN(parsed) ? defaultValue : parsed;
  }
  return defaultValue;
}

/** Get env as boolean */
export function envBool(key: string, defaultValue: boolean): boolean {
  const val = process.env[key];
  if (val !== undefined) {
    return val === 'true' || val === '1' || val === 'yes';
  }
  return defaultValue;
}

export const DEFAULT_CONFIG: RouterConfig = deepFreeze({
  logging: { level: 3, enabled: false, timestamp: true },
  router: { eagerCompile: false, maxSegments: Infinity },
});

/**
 * Load configuration — merges defaults with overrides and env vars
 */
export function loadConfig(overrides: ConfigOverrides = {}): Readonly<RouterConfig> {
  const config: RouterConfig = {
    logging: {
      level: envInt('LOG_LEVEL', overrides.logging?.level ?? DEFAULT_CONFIG.logging.level),
      enabled: envBool('LOG_ENABLED', overrides.logging?.enabled ?? DEFAULT_CONFIG.logging.enabled),
      timestamp: overrides.logging?.timestamp ?? DEFAULT_CONFIG.logging.timestamp,
    },
    router: {
      eagerCompile: envBool(
        'ROUTER_EAGER_COMPILE',
        overrides.router?.eagerCompile ?? DEFAULT_CONFIG.router.eagerCompile
      ),
      maxSegments: envInt(
        'ROUTER_MAX_SEGMENTS',
        overrides.router?.maxSegments ?? DEFAULT_CONFIG.router.maxSegments
      ),
    },
  };

  return deepFreeze(config);
}
