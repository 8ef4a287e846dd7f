#!/usr/bin/env node

/**
 * trellis-router — print-routes
 *
 * Registers the routes of a JSON manifest on a fresh router, exactly as an
 * application would at boot, and prints the resulting route table.
 *
 * Usage:
 *   npx tsx cli/print-routes.ts [--verbose] <manifest.json>
 *
 * Manifest:
 *   [{ "template": "/users/{id:int}", "resource": "UserResource", "methods": ["GET"] }]
 *
 * Exit codes: 0 ok, 1 bad manifest or registration error, 2 usage error
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { RouterError } from '../src/core/errors.js';
import { formatRoutes, inspectRoutes } from '../src/core/inspect.js';
import { Router } from '../src/core/router.js';
import { compileSchema } from '../src/core/validation.js';

export interface ManifestEntry {
  template: string;
  resource: string;
  methods: string[];
}

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

const defaultIO: CliIO = {
  out: (line) => process.stdout.write(line + '\n'),
  err: (line) => process.stderr.write(line + '\n'),
};

const USAGE = 'Usage: print-routes [--verbose] <manifest.json>';

const validateEntry = compileSchema({
  template: { type: 'string', required: true },
  resource: { type: 'string', required: true, minLength: 1 },
  methods: { type: 'array', required: true },
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check a parsed manifest. Returns the entries, or the list of problems.
 */
export function readManifest(data: unknown): { entries: ManifestEntry[] } | { errors: string[] } {
  if (!Array.isArray(data)) {
    return { errors: ['manifest must be a JSON array'] };
  }

  const entries: ManifestEntry[] = [];
  const errors: string[] = [];

  data.forEach((item: unknown, index: number) => {
    if (!isRecord(item)) {
      errors.push(`[${index}] must be an object`);
      return;
    }
    const problems = validateEntry(item);
    if (problems) {
      for (const p of problems) errors.push(`[${index}] ${p}`);
      return;
    }

    const { template, resource, methods } = item;
    if (typeof template !== 'string' || typeof resource !== 'string' || !Array.isArray(methods)) return;

    const names: string[] = [];
    for (const m of methods) {
      if (typeof m !== 'string' || m === '') {
        errors.push(`[${index}] methods must be non-empty strings`);
        return;
      }
      names.push(m.toUpperCase());
    }
    entries.push({ template, resource, methods: names });
  });

  return errors.length > 0 ? { errors } : { entries };
}

/**
 * Register manifest entries on a new router. The responder for each method
 * is `<resource>.on_<method>`.
 */
export function buildRouter(entries: readonly ManifestEntry[]): Router<string, string> {
  const router = new Router<string, string>();
  for (const entry of entries) {
    const methodMap: Record<string, string> = {};
    for (const method of entry.methods) {
      methodMap[method] = `${entry.resource}.on_${method.toLowerCase()}`;
    }
    router.addRoute(entry.template, methodMap, entry.resource);
  }
  return router;
}

export function main(argv: readonly string[], io: CliIO = defaultIO): number {
  let verbose = false;
  const files: string[] = [];

  for (const arg of argv) {
    if (arg === '--verbose' || arg === '-v') verbose = true;
    else if (arg === '--help' || arg === '-h') {
      io.out(USAGE);
      return 0;
    } else if (arg.startsWith('-')) {
      io.err(`Unknown option: ${arg}`);
      io.err(USAGE);
      return 2;
    } else files.push(arg);
  }

  if (files.length !== 1) {
    io.err(USAGE);
    return 2;
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(files[0], 'utf8'));
  } catch (err) {
    io.err(`Cannot read manifest ${files[0]}: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  const manifest = readManifest(data);
  if ('errors' in manifest) {
    for (const e of manifest.errors) io.err(`Invalid manifest entry ${e}`);
    return 1;
  }

  let router: Router<string, string>;
  try {
    router = buildRouter(manifest.entries);
  } catch (err) {
    if (err instanceof RouterError) {
      io.err(`${err.name}: ${err.message}`);
      return 1;
    }
    throw err;
  }

  io.out(formatRoutes(inspectRoutes(router), { verbose }));
  return 0;
}

// Run only when executed directly
if (process.argv[1] !== undefined && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  process.exitCode = main(process.argv.slice(2));
}
