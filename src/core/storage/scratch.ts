/**
 * Scratch Storage
 *
 * Request-scoped temp directories for downloaded and converted media.
 * Release and cleanup never throw.
 */

import { existsSync, mkdtempSync, rmSync, realpathSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join, relative, isAbsolute, resolve } from 'path';
import type { Logger } from '../types.js';

const SCRATCH_PREFIX = 'accent-';

export interface ScratchDir {
  readonly path: string;
  file(name: string): string;
  release(): void;
}

function tempRoot(): string {
  const root = tmpdir();
  try {
    return realpathSync(root);
  } catch {
    return resolve(root);
  }
}

export function isUnderTempRoot(path: string, root: string = tempRoot()): boolean {
  const rel = relative(root, resolve(path));
  return rel !== '' && !rel.startsWith('..') && !isAbsolute(rel);
}

export function allocateScratchDir(logger?: Logger, root: string = tempRoot()): ScratchDir {
  const path = mkdtempSync(join(root, SCRATCH_PREFIX));
  let released = false;

  return {
    path,
    file: (name: string) => join(path, name),
    release: () => {
      if (released) return;
      released = true;
      try {
        rmSync(path, { recursive: true, force: true });
      } catch (err) {
        logger?.debug('Scratch release failed', { path, error: String(err) });
      }
    },
  };
}

/**
 * Removes a file and, when its parent lives under the temp root, the parent
 * directory as well. Missing paths are fine.
 */
export function cleanup(filePath: string, logger?: Logger, root: string = tempRoot()): void {
  try {
    if (existsSync(filePath)) rmSync(filePath, { force: true, recursive: true });
    const parent = dirname(resolve(filePath));
    if (isUnderTempRoot(parent, root) && existsSync(parent)) {
      rmSync(parent, { recursive: true, force: true });
    }
  } catch (err) {
    logger?.debug('Cleanup failed', { path: filePath, error: String(err) });
  }
}

/** Removes a single file and nothing else. For files that sit in shared directories. */
export function removeFile(filePath: string, logger?: Logger): void {
  try {
    rmSync(filePath, { force: true });
  } catch (err) {
    logger?.debug('File removal failed', { path: filePath, error: String(err) });
  }
}
