/**
 * Route Inspection
 *
 * Read-only views of a router's registered routes, for startup banners,
 * debugging and the print-routes CLI.
 */

import type { RoutePayload } from './trie.js';

export interface FieldInfo {
  name: string;
  converter: string | null;
  /** Converter arguments exactly as written in the template */
  args: string | null;
}

export interface RouteInfo {
  template: string;
  resource: string;
  methods: string[];
  fields: FieldInfo[];
}

export interface FormatOptions {
  /** List each route's methods under it */
  verbose?: boolean;
}

/** Anything that lists its routes — in practice a Router */
export interface RouteSource {
  routes(): RouteInfo[];
}

/** Human-readable name of a resource handle */
export function resourceName(resource: unknown): string {
  if (typeof resource === 'string') return resource;
  if (typeof resource === 'function') return resource.name || '<anonymous>';
  if (typeof resource === 'object' && resource !== null) {
    const ctor: unknown = Reflect.get(resource, 'constructor');
    if (typeof ctor === 'function' && ctor.name) return ctor.name;
    return '<object>';
  }
  return String(resource);
}

export function describeRoute<TResource, TResponder>(route: RoutePayload<TResource, TResponder>): RouteInfo {
  const fields: FieldInfo[] = [];
  for (const segment of route.parsed.segments) {
    switch (segment.kind) {
      case 'static':
        break;
      case 'simple':
        fields.push({
          name: segment.field.name,
          converter: segment.field.converterName,
          args: segment.field.converterArgs,
        });
        break;
      case 'complex':
        for (const field of segment.fields) {
          fields.push({ name: field.name, converter: field.converterName, args: field.converterArgs });
        }
        break;
    }
  }

  return {
    template: route.uriTemplate,
    resource: resourceName(route.resource),
    methods: Object.keys(route.methodMap),
    fields,
  };
}

export function inspectRoutes(router: RouteSource): RouteInfo[] {
  return router.routes();
}

/**
 * Render routes as text:
 *
 *   • Routes:
 *       ⇒ /users/{id} - UsersResource:
 *          ├── GET
 *          └── DELETE
 */
export function formatRoutes(routes: readonly RouteInfo[], opts: FormatOptions = {}): string {
  const lines = ['• Routes:'];

  for (const route of routes) {
    const showMethods = opts.verbose === true && route.methods.length > 0;
    lines.push(`    ⇒ ${route.template} - ${route.resource}${showMethods ? ':' : ''}`);
    if (!showMethods) continue;

    for (let i = 0; i < route.methods.length; i++) {
      const branch = i === route.methods.length - 1 ? '└──' : '├──';
      lines.push(`       ${branch} ${route.methods[i]}`);
    }
  }

  return lines.join('\n');
}
