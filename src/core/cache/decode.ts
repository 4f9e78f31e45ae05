import type { FileResult } from '../report/types.js';
import { FileResultSchema } from '../report/schema.js';
import { CacheCorruptionError, ErrorCodes } from '../../utils/errors.js';

/**
 * Decode a stored result, checking it against the result schema.
 * @throws CacheCorruptionError when the payload is not a valid FileResult for this path
 */
export function decodeCachedResult(path: string, payload: string): FileResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch (error) {
    throw new CacheCorruptionError(
      ErrorCodes.CACHE_ENTRY_CORRUPT,
      `Cached result for ${path} is not valid JSON`,
      { path, originalError: error instanceof Error ? error.message : String(error) }
    );
  }

  const result = FileResultSchema.safeParse(parsed);
  if (!result.success) {
    throw new CacheCorruptionError(
      ErrorCodes.CACHE_ENTRY_CORRUPT,
      `Cached result for ${path} does not match the result format`,
      { path, issues: result.error.issues.map((i) => `${i.path.map(String).join('.')}: ${i.message}`) }
    );
  }
  if (result.data.path !== path) {
    throw new CacheCorruptionError(
      ErrorCodes.CACHE_ENTRY_CORRUPT,
      `Cached result for ${path} belongs to ${result.data.path}`,
      { path }
    );
  }
  return result.data;
}
