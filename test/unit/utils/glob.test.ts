import { describe, it, expect } from 'vitest';
import { globToRegex, matchGlob, matchAny } from '../../../src/utils/glob.js';

describe('glob', () => {
  it('should match single-segment wildcards', () => {
    expect(matchGlob('*.jpg', 'IMG_0001.jpg')).toBe(true);
    expect(matchGlob('*.jpg', 'dcim/IMG_0001.jpg')).toBe(false);
    expect(matchGlob('IMG_????.jpg', 'IMG_0001.jpg')).toBe(true);
    expect(matchGlob('IMG_????.jpg', 'IMG_001.jpg')).toBe(false);
  });

  it('should match across directories with **', () => {
    expect(matchGlob('**/*.png', 'a/b/c.png')).toBe(true);
    expect(matchGlob('**/*.png', 'c.png')).toBe(true);
    expect(matchGlob('dcim/**', 'dcim/2026/01/x.heic')).toBe(true);
  });

  it('should expand brace alternatives', () => {
    const pattern = '*.{jpg,jpeg,png}';
    expect(matchGlob(pattern, 'a.jpeg')).toBe(true);
    expect(matchGlob(pattern, 'a.png')).toBe(true);
    expect(matchGlob(pattern, 'a.gif')).toBe(false);
  });

  it('should escape regex characters', () => {
    expect(matchGlob('photo(1).jpg', 'photo(1).jpg')).toBe(true);
    expect(matchGlob('a.jpg', 'abjpg')).toBe(false);
  });

  it('should honour case-insensitive matching', () => {
    expect(matchGlob('*.jpg', 'IMG.JPG')).toBe(false);
    expect(matchGlob('*.jpg', 'IMG.JPG', true)).toBe(true);
    expect(globToRegex('*.jpg', true).flags).toBe('i');
  });

  it('should treat backslashes as separators', () => {
    expect(matchGlob('dcim/*.jpg', 'dcim\\a.jpg')).toBe(true);
  });

  it('should close unbalanced braces', () => {
    expect(matchGlob('*.{jpg,png', 'a.png')).toBe(true);
    expect(matchGlob('*.{jpg,png', 'a.gif')).toBe(false);
  });

  it('should match any of several patterns', () => {
    expect(matchAny(['*.part', '.*'], '.hidden')).toBe(true);
    expect(matchAny(['*.part', '.*'], 'a.jpg.part')).toBe(true);
    expect(matchAny(['*.part', '.*'], 'a.jpg')).toBe(false);
  });
});
