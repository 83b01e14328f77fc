/**
 * Test helpers: temporary directory trees and in-process stand-ins for the
 * filesystem probe and the size worker.
 */

import * as fs from 'fs/promises';
import * as net from 'net';
import * as os from 'os';
import * as path from 'path';
import type { SizeResult, SizeService } from '../src/size/sizeWorker';
import type { DirEntry, FsProbe } from '../src/tree/fsProbe';
import { nodeFsProbe } from '../src/tree/fsProbe';
import type { SizeEntry } from '../src/types';

/** Create a temporary test directory with optional files and subdirectories. */
export async function setupTestDir(opts?: { files?: string[]; subdirs?: string[] }): Promise<string> {
  const testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'treenav-test-'));

  if (opts?.subdirs) {
    for (const subdir of opts.subdirs) {
      await fs.mkdir(path.join(testDir, subdir), { recursive: true });
    }
  }

  if (opts?.files) {
    for (const file of opts.files) {
      const filePath = path.join(testDir, file);
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, `content of ${file}`, 'utf-8');
    }
  }

  return testDir;
}

/** Remove a temporary test directory. */
export async function teardownTestDir(testDir: string): Promise<void> {
  await fs.rm(testDir, { recursive: true, force: true });
}

/** An error shaped like the ones fs throws. */
export function errnoError(code: string): Error & { code: string } {
  return Object.assign(new Error(`${code}: simulated failure`), { code });
}

/**
 * Real filesystem probe that records every directory it lists, and fails
 * listings of the paths in `failures` with the given errno code.
 */
export function recordingProbe(failures: Record<string, string> = {}): FsProbe & { reads: string[] } {
  const reads: string[] = [];
  return {
    reads,
    readDir(dirPath: string): DirEntry[] {
      reads.push(dirPath);
      const code = failures[dirPath];
      if (code !== undefined) {
        throw errnoError(code);
      }
      return nodeFsProbe.readDir(dirPath);
    },
    isDirectory: (target) => nodeFsProbe.isDirectory(target),
    isFile: (target) => nodeFsProbe.isFile(target),
    exists: (target) => nodeFsProbe.exists(target),
  };
}

/** Size service whose results are released by the test. */
export class FakeSizeService implements SizeService {
  readonly requested: string[] = [];
  accept = true;
  closed = false;
  private ready: SizeResult[] = [];

  request(dirPath: string): boolean {
    if (!this.accept) return false;
    this.requested.push(dirPath);
    return true;
  }

  /** Make a result available to the next drain. */
  complete(dirPath: string, bytes: number): void {
    this.ready.push({ path: dirPath, bytes });
  }

  drain(cache: Map<string, SizeEntry>): number {
    const ready = this.ready;
    this.ready = [];
    for (const result of ready) {
      cache.set(result.path, { status: 'resolved', bytes: result.bytes });
    }
    return ready.length;
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * Terminal input for Ink: chunks queued by `send` are handed out through
 * `read()` on the next 'readable' event, the way a raw-mode tty delivers
 * key presses.
 */
export class FakeStdin extends net.Socket {
  isTTY = true;
  isRaw = false;
  private chunks: string[] = [];

  send(data: string): void {
    this.chunks.push(data);
    this.emit('readable');
  }

  read(size?: number): string | null {
    if (size === 0) return null;
    return this.chunks.shift() ?? null;
  }

  setRawMode(mode: boolean): this {
    this.isRaw = mode;
    return this;
  }

  ref(): this {
    return this;
  }

  unref(): this {
    return this;
  }
}

/** Terminal output for Ink that keeps every write. */
export class FakeStdout extends net.Socket {
  isTTY = false;
  columns = 100;
  rows = 24;
  readonly writes: string[] = [];

  write(chunk: Uint8Array | string): boolean {
    this.writes.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf-8'));
    return true;
  }

  clearLine(): boolean {
    return true;
  }

  clearScreenDown(): boolean {
    return true;
  }

  cursorTo(): boolean {
    return true;
  }

  moveCursor(): boolean {
    return true;
  }

  getColorDepth(): number {
    return 1;
  }

  hasColors(): boolean {
    return false;
  }

  getWindowSize(): [number, number] {
    return [this.columns, this.rows];
  }
}

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

/** Rendered Ink frame without color codes. */
export function plainFrame(frame: string | undefined): string {
  return (frame ?? '').replace(ANSI_PATTERN, '');
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
