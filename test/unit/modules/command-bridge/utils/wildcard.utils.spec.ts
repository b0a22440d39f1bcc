import 'reflect-metadata';
import { ValidationError } from '@src/index';
import { createPathMatcher, hasWildcard, normalizePath, wildcardToRegExp } from '@modules/command-bridge/utils';

describe('wildcard utils', () => {
  it('should trim separators from paths', () => {
    expect(normalizePath('/Root/Child/')).toBe('Root/Child');
  });

  it('should detect wildcards', () => {
    expect(hasWildcard('Enemy*')).toBe(true);
    expect(hasWildcard('Enemy?')).toBe(true);
    expect(hasWildcard('Enemy')).toBe(false);
  });

  it('should escape regex characters in wildcard patterns', () => {
    expect(wildcardToRegExp('a.b*').source).toBe('^a\\.b.*$');
  });

  describe('createPathMatcher', () => {
    it('should match the whole path case-insensitively with *', () => {
      const matches = createPathMatcher('Enemies/Grunt*');
      expect(matches('Enemies/Grunt_01')).toBe(true);
      expect(matches('enemies/grunt')).toBe(true);
      expect(matches('Level/Enemies/Grunt_01')).toBe(false);
    });

    it('should match exactly one character with ?', () => {
      const matches = createPathMatcher('?1');
      expect(matches('A1')).toBe(true);
      expect(matches('AB')).toBe(false);
      expect(matches('AA1')).toBe(false);
    });

    it('should use exact path equality without wildcards', () => {
      const matches = createPathMatcher('/Root/Child');
      expect(matches('Root/Child')).toBe(true);
      expect(matches('Root/Child/Grandchild')).toBe(false);
      expect(matches('root/child')).toBe(false);
    });

    it('should search regex patterns anywhere in the path', () => {
      const matches = createPathMatcher('Item\\d', true);
      expect(matches('Shelf/item1')).toBe(true);
      expect(matches('Shelf/ItemA')).toBe(false);
    });

    it('should reject invalid regex patterns', () => {
      expect(() => createPathMatcher('([', true)).toThrow(ValidationError);
    });
  });
});
