/**
 * Router Performance & Memory Benchmark
 *
 * Run: npx tsx bench/router.ts
 */

import { Router } from '../src/core/router.js';

function formatMemory(bytes: number): string {
  return (bytes / 1024 / 1024).toFixed(2) + ' MB';
}

function getMemory() {
  const m = process.memoryUsage();
  return { rss: m.rss, heapUsed: m.heapUsed, heapTotal: m.heapTotal };
}

function printMemory(label: string, mem: ReturnType<typeof getMemory>): void {
  console.log(`  ${label}:`);
  console.log(`    RSS:          ${formatMemory(mem.rss)}`);
  console.log(`    Heap Used:    ${formatMemory(mem.heapUsed)}`);
  console.log(`    Heap Total:   ${formatMemory(mem.heapTotal)}`);
}

function time(label: string, iterations: number, fn: () => unknown): void {
  const start = performance.now();
  for (let i = 0; i < iterations; i++) {
    fn();
  }
  const elapsed = performance.now() - start;
  console.log(
    `  ${label} (${iterations.toLocaleString()}x): ${elapsed.toFixed(1)}ms (${((elapsed / iterations) * 1000000).toFixed(0)}ns/op)`
  );
}

function buildRouter(resourceCount: number): Router<string, string> {
  const router = new Router<string, string>();
  const methods = { GET: 'on_get', PUT: 'on_put', DELETE: 'on_delete' };

  for (let i = 0; i < resourceCount; i++) {
    router.addRoute(`/api/resource${i}`, { GET: 'on_get', POST: 'on_post' }, `Collection${i}`);
    router.addRoute(`/api/resource${i}/{id:int}`, methods, `Item${i}`);
    router.addRoute(`/api/resource${i}/{id:int}/files/{rest:path}`, { GET: 'on_get' }, `Files${i}`);
    router.addRoute(`/api/resource${i}/by-date/{day:dt("%Y-%m-%d")}`, { GET: 'on_get' }, `ByDate${i}`);
  }
  router.addRoute('/repos/{org}/{repo}/compare/{usr0}:{branch0}...{usr1}:{branch1}', { GET: 'on_get' }, 'Compare');
  router.addRoute('/emojis/signs/{id:uuid}', { GET: 'on_get' }, 'Sign');

  return router;
}

function benchRegistration(resourceCount: number): Router<string, string> {
  console.log('\n--- Registration & Compile ---');

  let start = performance.now();
  const router = buildRouter(resourceCount);
  let elapsed = performance.now() - start;
  console.log(`  Routes registered: ${router.size} in ${elapsed.toFixed(1)}ms`);

  start = performance.now();
  const matcher = router.compile();
  elapsed = performance.now() - start;
  console.log(`  Compiled ${matcher.stats.levels} levels in ${elapsed.toFixed(1)}ms`);

  return router;
}

function benchLookups(router: Router<string, string>): void {
  console.log('\n--- Lookup ---');

  const iterations = 1_000_000;
  time('Static', iterations, () => router.find('/api/resource50'));
  time('Simple + int', iterations, () => router.find('/api/resource50/12345'));
  time('Path remainder', iterations, () => router.find('/api/resource50/7/files/css/site/main.css'));
  time('Datetime', iterations, () => router.find('/api/resource50/by-date/2024-02-29'));
  time('UUID', iterations, () => router.find('/emojis/signs/6f2c1ae0-3b47-4c5e-9c1c-1d8f7b3a9e10'));
  time('Complex', iterations, () => router.find('/repos/acme/widgets/compare/alice:main...bob:feature'));
  time('Miss (converter)', iterations, () => router.find('/api/resource50/not-a-number'));
  time('Miss (unknown)', iterations, () => router.find('/not/found/path'));
}

async function main(): Promise<void> {
  console.log('================================================');
  console.log('  trellis-router — Performance Benchmark');
  console.log('================================================');

  const startMem = getMemory();
  printMemory('Startup Memory', startMem);

  const router = benchRegistration(100);
  benchLookups(router);

  if (global.gc) {
    global.gc();
    await new Promise((r) => setTimeout(r, 100));
  }

  const endMem = getMemory();
  console.log('\n--- Final Memory ---');
  printMemory('After Benchmarks', endMem);

  console.log(`\n  Memory delta: ${formatMemory(endMem.rss - startMem.rss)} RSS`);
  console.log('================================================\n');
}

main().catch(console.error);
