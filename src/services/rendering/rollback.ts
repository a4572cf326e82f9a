// Undo for a failed rendering run

import * as fs from 'fs/promises';
import * as path from 'path';
import { describeError, hasErrorCode, isNotFoundError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';

/**
 * A file or directory that did not exist before the run created it
 */
export interface CreatedPath {
  kind: 'file' | 'directory';
  path: string;
}

/**
 * Directories from `first` down to `last`, as created by a recursive mkdir that returned `first`
 */
export function directoryChain(first: string, last: string): string[] {
  const chain = [first];
  let current = first;
  for (const segment of path.relative(first, last).split(path.sep)) {
    if (segment.length > 0) {
      current = path.join(current, segment);
      chain.push(current);
    }
  }
  return chain;
}

/**
 * Removes created paths newest first and returns the ones that are gone.
 *
 * Directories are only removed once empty, so anything a hook put there is kept.
 * Failures are logged and the remaining paths are still attempted.
 */
export async function removeCreatedPaths(created: readonly CreatedPath[]): Promise<string[]> {
  const removed: string[] = [];
  for (const entry of [...created].reverse()) {
    try {
      if (entry.kind === 'file') {
        await fs.rm(entry.path, { force: true });
      } else {
        await fs.rmdir(entry.path);
      }
      removed.push(entry.path);
    } catch (error) {
      if (isNotFoundError(error)) {
        removed.push(entry.path);
      } else if (hasErrorCode(error, 'ENOTEMPTY') || hasErrorCode(error, 'EEXIST')) {
        logger.warn('Keeping directory that is not empty', { path: entry.path });
      } else {
        logger.error('Failed to remove generated path', { path: entry.path, error: describeError(error) });
      }
    }
  }
  return removed;
}
