/**
 * One analysis pass: discovery, batched per-file analysis, aggregation.
 */
import * as os from 'node:os';
import * as path from 'node:path';
import type { ResultCache } from '../cache/types.js';
import type { FileResult } from '../report/types.js';
import type { DiscoveredFile } from '../discovery/types.js';
import type { AnalysisOptions, AnalysisRun } from './types.js';
import { Analyzer } from './analyzer.js';
import { FileDiscoverer } from '../discovery/walker.js';
import { Aggregator } from '../report/aggregator.js';
import { getCacheFiles, openResultCache } from '../cache/open.js';
import { createRegistry, normalizesWhitespace } from '../rules/builtin.js';
import { isDirectory } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('runner');

/**
 * Default worker count: 75% of available CPUs (min 2, max 16).
 */
export function defaultConcurrency(): number {
  return Math.min(Math.max(Math.floor(os.cpus().length * 0.75), 2), 16);
}

/**
 * Group an async sequence into arrays of up to size items.
 */
async function* batches<T>(source: AsyncIterable<T> | Iterable<T>, size: number): AsyncGenerator<T[]> {
  let batch: T[] = [];
  for await (const item of source) {
    batch.push(item);
    if (batch.length >= size) {
      yield batch;
      batch = [];
    }
  }
  if (batch.length > 0) {
    yield batch;
  }
}

/**
 * Run the analysis.
 * Only a missing or unreadable root rejects; every per-file problem ends up
 * in the report. Aborting the signal stops new batches from starting and
 * yields a report marked incomplete.
 *
 * @throws AccessError when the root cannot be resolved
 */
export async function runAnalysis(options: AnalysisOptions): Promise<AnalysisRun> {
  const startTime = performance.now();
  const root = path.resolve(options.root);
  const { config, signal } = options;

  const registry = options.registry ?? createRegistry(config);
  const ownsCache = options.cache === undefined;
  // A single-file root keeps its cache beside the file
  const cacheRoot = (await isDirectory(root)) ? root : path.dirname(root);
  const cache: ResultCache | null = ownsCache ? openResultCache(cacheRoot, config.cache) : (options.cache ?? null);
  const corruptBefore = cache?.stats().corrupt ?? 0;

  const analyzer = new Analyzer({
    root,
    registry,
    cache,
    readTimeoutMs: config.analysis.read_timeout_ms,
    normalizeWhitespace: normalizesWhitespace(config),
  });
  // The cache changes on every run, so it is never analyzed, whatever the scan patterns
  const discoverer = FileDiscoverer.fromSettings(root, config.scan, signal, getCacheFiles(cacheRoot, config.cache));
  const concurrency = options.concurrency ?? config.analysis.concurrency ?? defaultConcurrency();

  const results: FileResult[] = [];
  let cancelled = false;
  let cachePruned = 0;
  let cacheCorrupt = 0;

  try {
    const source: AsyncIterable<DiscoveredFile> | Iterable<DiscoveredFile> = options.paths
      ? await discoverer.discoverList(options.paths)
      : discoverer.discover();

    for await (const batch of batches(source, concurrency)) {
      if (signal?.aborted) {
        cancelled = true;
        break;
      }

      // allSettled so one failed analysis never takes the batch down with it
      const settled = await Promise.allSettled(batch.map((file) => analyzer.analyze(file.path, file.relativePath)));
      for (let i = 0; i < settled.length; i++) {
        const outcome = settled[i];
        results.push(
          outcome.status === 'fulfilled' ? outcome.value : analyzer.unreadableResult(batch[i].path, outcome.reason, batch[i].relativePath)
        );
      }
      options.onProgress?.(results.length);
    }

    // Discovery stops quietly on abort, so the last batch may be short
    if (signal?.aborted) {
      cancelled = true;
    }

    if (cache) {
      cacheCorrupt = cache.stats().corrupt - corruptBefore;
      if (!cancelled && !options.paths) {
        cachePruned = cache.prune(new Set(results.map((r) => r.path)));
      }
    }
  } finally {
    if (ownsCache) {
      cache?.close();
    }
  }

  const discoveryFindings = discoverer.getIssues();
  const report = new Aggregator(registry, { clock: options.clock }).aggregate(results, {
    root,
    complete: !cancelled,
    discoveryFindings,
  });

  const counters = analyzer.cacheCounters();
  const stats = {
    durationMs: performance.now() - startTime,
    filesAnalyzed: results.length,
    cacheHits: counters.hits,
    cacheMisses: counters.misses,
    cacheCorrupt,
    cachePruned,
    discoveryIssues: discoveryFindings.length,
    cancelled,
  };

  log.debug(
    `Analyzed ${stats.filesAnalyzed} files (${stats.cacheHits} cached) in ${Math.round(stats.durationMs)}ms`
  );

  return { report, stats };
}
