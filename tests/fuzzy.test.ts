import { describe, it, expect } from 'vitest';
import { MAX_MATCHES, fuzzyScore, searchPaths } from '../src/search/fuzzy';

describe('search.fuzzyScore', () => {
  it('should reward separator boundaries and runs', () => {
    // m at start (10), r after '.' (10), s extends the run (5)
    expect(fuzzyScore('main.rs', 'mrs')).toBe(25);
    expect(fuzzyScore('config.rs', 'co')).toBe(15);
    expect(fuzzyScore('config.rs', 'cn')).toBe(11);
  });

  it('should rank a consecutive prefix above a scattered match', () => {
    const prefix = fuzzyScore('config.rs', 'co');
    const scattered = fuzzyScore('config.rs', 'cn');
    expect(prefix).not.toBeNull();
    expect(scattered).not.toBeNull();
    expect(prefix ?? 0).toBeGreaterThan(scattered ?? 0);
  });

  it('should match only ordered subsequences', () => {
    expect(fuzzyScore('main.rs', 'sm')).toBeNull();
    expect(fuzzyScore('main.rs', 'mainx')).toBeNull();
  });

  it('should ignore case', () => {
    expect(fuzzyScore('README.md', 'readme')).toBe(fuzzyScore('readme.md', 'README'));
  });

  it('should score an empty query as zero', () => {
    expect(fuzzyScore('anything', '')).toBe(0);
  });
});

describe('search.searchPaths', () => {
  it('should rank by basename score, best first', () => {
    const matches = searchPaths(
      [
        { path: '/r/src/cargo.toml', isDirectory: false },
        { path: '/r/readme.md', isDirectory: false },
        { path: '/r/config.rs', isDirectory: false },
      ],
      'co',
    );
    expect(matches).toEqual([
      { path: '/r/config.rs', score: 15, isDirectory: false },
      { path: '/r/src/cargo.toml', score: 11, isDirectory: false },
    ]);
  });

  it('should score the basename only', () => {
    expect(searchPaths([{ path: '/zzz/file', isDirectory: false }], 'zzz')).toEqual([]);
  });

  it('should skip candidates without a basename', () => {
    expect(searchPaths([{ path: '/', isDirectory: true }], '')).toEqual([]);
  });

  it('should keep snapshot order for ties and cap the result', () => {
    const candidates = Array.from({ length: 60 }, (_, i) => ({ path: `/r/file${i}`, isDirectory: false }));
    const matches = searchPaths(candidates, 'f');
    expect(matches).toHaveLength(MAX_MATCHES);
    expect(matches[0].path).toBe('/r/file0');
    expect(matches[MAX_MATCHES - 1].path).toBe('/r/file49');
  });
});
