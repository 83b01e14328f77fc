import { describe, it, expect } from 'vitest';
import { formatEntryLabel, formatMatchLabel, formatSize, getIcon, withErrorLabel } from '../src/tree/labels';

describe('tree.labels', () => {
  describe('formatSize', () => {
    it('should print bytes below 1K as whole numbers', () => {
      expect(formatSize(0)).toBe('0B');
      expect(formatSize(1023)).toBe('1023B');
    });

    it('should use one decimal for K, M and G', () => {
      expect(formatSize(1024)).toBe('1.0K');
      expect(formatSize(1536)).toBe('1.5K');
      expect(formatSize(1024 * 1024)).toBe('1.0M');
      expect(formatSize(5 * 1024 * 1024 * 1024)).toBe('5.0G');
    });
  });

  describe('getIcon', () => {
    it('should show open and closed folders', () => {
      expect(getIcon('src', true, false)).toBe('📁');
      expect(getIcon('src', true, true)).toBe('📂');
    });

    it('should pick icons by extension, case-insensitively', () => {
      expect(getIcon('report.PDF', false, false)).toBe('📕');
      expect(getIcon('main.ts', false, false)).toBe('📝');
      expect(getIcon('Makefile', false, false)).toBe('📄');
      expect(getIcon('archive.unknown', false, false)).toBe('📄');
    });
  });

  describe('formatEntryLabel', () => {
    it('should add the star marker', () => {
      expect(formatEntryLabel({ name: 'src', isDirectory: true, isExpanded: false, isStarred: true })).toBe(
        '📁 src ★',
      );
    });

    it('should only annotate sizes of expanded directories', () => {
      const size = { status: 'resolved', bytes: 2048 } as const;
      expect(formatEntryLabel({ name: 'src', isDirectory: true, isExpanded: true, isStarred: false, size })).toBe(
        '📂 src [2.0K]',
      );
      expect(formatEntryLabel({ name: 'src', isDirectory: true, isExpanded: false, isStarred: false, size })).toBe(
        '📁 src',
      );
    });

    it('should show pending sizes as an ellipsis', () => {
      expect(
        formatEntryLabel({
          name: 'src',
          isDirectory: true,
          isExpanded: true,
          isStarred: false,
          size: { status: 'pending' },
        }),
      ).toBe('📂 src [...]');
    });
  });

  it('should format search matches without markers', () => {
    expect(formatMatchLabel('notes.md', false)).toBe('📃 notes.md');
    expect(formatMatchLabel('src', true)).toBe('📁 src');
  });

  it('should append error categories', () => {
    expect(withErrorLabel('📂 secret', 'permission-denied')).toBe('📂 secret [Permission denied]');
  });
});
