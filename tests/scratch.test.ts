import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { allocateScratchDir, cleanup, isUnderTempRoot, removeFile } from '../src/core/storage/scratch.js';

const TEST_ROOT = join(import.meta.dirname ?? '.', '__scratch_tmp__');

describe('scratch storage', () => {
  beforeEach(() => {
    rmSync(TEST_ROOT, { recursive: true, force: true });
    mkdirSync(TEST_ROOT, { recursive: true });
  });

  afterEach(() => {
    rmSync(TEST_ROOT, { recursive: true, force: true });
  });

  it('allocates a unique directory per call', () => {
    const a = allocateScratchDir(undefined, TEST_ROOT);
    const b = allocateScratchDir(undefined, TEST_ROOT);
    expect(a.path).not.toBe(b.path);
    expect(existsSync(a.path)).toBe(true);
    expect(a.file('audio.mp3')).toBe(join(a.path, 'audio.mp3'));
    a.release();
    b.release();
  });

  it('release removes the directory and its contents, and is idempotent', () => {
    const dir = allocateScratchDir(undefined, TEST_ROOT);
    writeFileSync(dir.file('audio.mp3'), 'x');
    dir.release();
    dir.release();
    expect(readdirSync(TEST_ROOT)).toEqual([]);
  });

  it('knows what lives under the temp root', () => {
    expect(isUnderTempRoot(join(TEST_ROOT, 'accent-x'), TEST_ROOT)).toBe(true);
    expect(isUnderTempRoot(TEST_ROOT, TEST_ROOT)).toBe(false);
    expect(isUnderTempRoot(join(TEST_ROOT, '..'), TEST_ROOT)).toBe(false);
  });

  it('cleanup removes the file and its scratch parent', () => {
    const dir = allocateScratchDir(undefined, TEST_ROOT);
    const file = dir.file('audio.mp3');
    writeFileSync(file, 'x');
    cleanup(file, undefined, TEST_ROOT);
    expect(existsSync(file)).toBe(false);
    expect(existsSync(dir.path)).toBe(false);
  });

  it('cleanup never removes the root itself', () => {
    const file = join(TEST_ROOT, 'loose.mp3');
    writeFileSync(file, 'x');
    cleanup(file, undefined, TEST_ROOT);
    expect(existsSync(file)).toBe(false);
    expect(existsSync(TEST_ROOT)).toBe(true);
  });

  it('cleanup leaves parents outside the root alone', () => {
    const outside = join(TEST_ROOT, 'outside');
    const root = join(TEST_ROOT, 'root');
    mkdirSync(outside);
    mkdirSync(root);
    const file = join(outside, 'upload.mp4');
    writeFileSync(file, 'x');
    cleanup(file, undefined, root);
    expect(existsSync(file)).toBe(false);
    expect(existsSync(outside)).toBe(true);
  });

  it('removeFile leaves a shared parent directory in place, even under the root', () => {
    const shared = join(TEST_ROOT, 'uploads');
    mkdirSync(shared);
    const mine = join(shared, 'a.mp4');
    const theirs = join(shared, 'b.mp4');
    writeFileSync(mine, 'x');
    writeFileSync(theirs, 'y');
    removeFile(mine);
    removeFile(join(shared, 'missing.mp4'));
    expect(readdirSync(shared)).toEqual(['b.mp4']);
  });

  it('cleanup tolerates missing paths', () => {
    expect(() => cleanup(join(TEST_ROOT, 'nope', 'gone.mp3'), undefined, TEST_ROOT)).not.toThrow();
  });
});
