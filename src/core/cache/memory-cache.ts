import type { FileResult } from '../report/types.js';
import type { CacheStats, ResultCache } from './types.js';
import { decodeCachedResult } from './decode.js';
import { CacheCorruptionError } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

interface StoredEntry {
  fingerprint: string;
  ruleSetVersion: string;
  /** Serialized result; a hit decodes a fresh copy */
  payload: string;
}

/**
 * In-process result cache for library use and tests.
 * Lives as long as the instance.
 */
export class MemoryResultCache implements ResultCache {
  private readonly entries = new Map<string, StoredEntry>();
  private counters = { hits: 0, misses: 0, corrupt: 0 };

  get(path: string, fingerprint: string, ruleSetVersion: string): FileResult | null {
    const entry = this.entries.get(path);
    if (!entry || entry.fingerprint !== fingerprint || entry.ruleSetVersion !== ruleSetVersion) {
      this.counters.misses++;
      return null;
    }

    try {
      const result = decodeCachedResult(path, entry.payload);
      this.counters.hits++;
      return result;
    } catch (error) {
      if (!(error instanceof CacheCorruptionError)) throw error;
      this.counters.corrupt++;
      this.counters.misses++;
      log.debug(error.message);
      return null;
    }
  }

  put(path: string, fingerprint: string, ruleSetVersion: string, result: FileResult): void {
    this.entries.set(path, { fingerprint, ruleSetVersion, payload: JSON.stringify(result) });
  }

  /**
   * Store a raw payload under a path, bypassing serialization.
   */
  putRaw(path: string, fingerprint: string, ruleSetVersion: string, payload: string): void {
    this.entries.set(path, { fingerprint, ruleSetVersion, payload });
  }

  prune(keep: ReadonlySet<string>): number {
    let pruned = 0;
    for (const path of [...this.entries.keys()]) {
      if (!keep.has(path)) {
        this.entries.delete(path);
        pruned++;
      }
    }
    return pruned;
  }

  clear(): number {
    const count = this.entries.size;
    this.entries.clear();
    return count;
  }

  stats(): CacheStats {
    return { entries: this.entries.size, ...this.counters };
  }

  close(): void {
    this.entries.clear();
  }
}
