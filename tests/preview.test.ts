import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { execFileSync } from 'child_process';
import * as fs from 'fs/promises';
import * as path from 'path';
import { PREVIEW_MAX_LINES, PREVIEW_PLACEHOLDER, UNREADABLE_FILE, readPreview } from '../src/preview/readPreview';
import type { FsProbe } from '../src/tree/fsProbe';
import { nodeFsProbe } from '../src/tree/fsProbe';
import { setupTestDir, teardownTestDir } from './helpers';

describe('preview.readPreview', () => {
  let root: string;

  beforeAll(async () => {
    root = await setupTestDir({ files: ['dir/b.txt', 'dir/A.md', 'dir/.env', 'dir/sub/x.txt'] });
    await fs.writeFile(path.join(root, 'three.txt'), 'one\ntwo\nthree\n', 'utf-8');
    const long = Array.from({ length: 150 }, (_, i) => `line ${i}`).join('\n');
    await fs.writeFile(path.join(root, 'long.txt'), long, 'utf-8');
  });

  afterAll(async () => {
    await teardownTestDir(root);
  });

  it('should list directory entries with directories first', () => {
    expect(readPreview(path.join(root, 'dir'), false)).toEqual({
      title: 'dir',
      lines: ['sub/', 'A.md', 'b.txt'],
    });
  });

  it('should include hidden entries when shown', () => {
    expect(readPreview(path.join(root, 'dir'), true).lines).toEqual(['sub/', '.env', 'A.md', 'b.txt']);
  });

  it('should show the lines of a file', () => {
    expect(readPreview(path.join(root, 'three.txt'), false)).toEqual({
      title: 'three.txt',
      lines: ['one', 'two', 'three'],
    });
  });

  it('should stop after the line limit', () => {
    const { lines } = readPreview(path.join(root, 'long.txt'), false);
    expect(lines).toHaveLength(PREVIEW_MAX_LINES);
    expect(lines[PREVIEW_MAX_LINES - 1]).toBe('line 99');
  });

  it('should show a placeholder without a selection', () => {
    expect(readPreview(null, false)).toEqual({ title: 'Preview', lines: [PREVIEW_PLACEHOLDER] });
    expect(readPreview(path.join(root, 'absent'), false).lines).toEqual([PREVIEW_PLACEHOLDER]);
  });

  it.skipIf(process.platform === 'win32')('should not open named pipes', () => {
    const fifo = path.join(root, 'pipe');
    execFileSync('mkfifo', [fifo]);
    expect(readPreview(fifo, false)).toEqual({ title: 'Preview', lines: [PREVIEW_PLACEHOLDER] });
  });

  it('should report files that cannot be read', () => {
    const probe: FsProbe = { ...nodeFsProbe, exists: () => true, isDirectory: () => false, isFile: () => true };
    expect(readPreview(path.join(root, 'vanished.txt'), false, probe)).toEqual({
      title: 'vanished.txt',
      lines: [UNREADABLE_FILE],
    });
  });
});
