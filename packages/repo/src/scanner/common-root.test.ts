import { describe, it, expect } from 'vitest';
import { findHighestCommonRoot } from './common-root';

describe('findHighestCommonRoot', () => {
  it('returns undefined for no directories', () => {
    expect(findHighestCommonRoot([])).toBeUndefined();
  });

  it('returns a single directory itself', () => {
    expect(findHighestCommonRoot(['/work/app'])).toBe('/work/app');
  });

  it('returns the deepest shared ancestor', () => {
    expect(findHighestCommonRoot(['/work/app/core', '/work/app/web/src'])).toBe('/work/app');
  });

  it('treats a parent and its child as rooted at the parent', () => {
    expect(findHighestCommonRoot(['/work/app', '/work/app/core'])).toBe('/work/app');
  });

  it('ignores duplicates', () => {
    expect(findHighestCommonRoot(['/work/app/', '/work/app'])).toBe('/work/app');
  });

  it('compares whole segments', () => {
    expect(findHighestCommonRoot(['/work/app', '/work/apple'])).toBe('/work');
  });

  it('falls back to the filesystem root', () => {
    expect(findHighestCommonRoot(['/a', '/b'])).toBe('/');
  });
});
