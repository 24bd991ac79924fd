import { describe, it, expect } from 'vitest';
import { TypeMatcher, globToRegExp } from '../../src/domain/converter/type-matcher.js';

describe('globToRegExp', () => {
  it('should match any run of characters, dots included, for *', () => {
    expect(globToRegExp('compute.instance.*').test('compute.instance.create.start')).toBe(true);
    expect(globToRegExp('compute.instance.*').test('image.upload')).toBe(false);
    expect(globToRegExp('*.start').test('compute.instance.create.start')).toBe(true);
  });

  it('should match exactly one character for ?', () => {
    expect(globToRegExp('image.?').test('image.x')).toBe(true);
    expect(globToRegExp('image.?').test('image.xy')).toBe(false);
  });

  it('should treat regex metacharacters literally', () => {
    expect(globToRegExp('a.b').test('axb')).toBe(false);
    expect(globToRegExp('a+b').test('a+b')).toBe(true);
    expect(globToRegExp('a+b').test('aab')).toBe(false);
    expect(globToRegExp('(x)|y').test('(x)|y')).toBe(true);
  });

  it('should support character classes', () => {
    expect(globToRegExp('volume.[cd]*').test('volume.create.end')).toBe(true);
    expect(globToRegExp('volume.[cd]*').test('volume.update.end')).toBe(false);
    expect(globToRegExp('volume.[!cd]*').test('volume.update.end')).toBe(true);
    expect(globToRegExp('volume.[!cd]*').test('volume.create.end')).toBe(false);
  });

  it('should treat an unclosed [ literally', () => {
    expect(globToRegExp('a[b').test('a[b')).toBe(true);
  });

  it('should be case sensitive', () => {
    expect(globToRegExp('image.*').test('IMAGE.upload')).toBe(false);
  });
});

describe('TypeMatcher', () => {
  it('should include a single pattern', () => {
    const m = TypeMatcher.build('test.thing');
    expect(m.includes).toEqual(['test.thing']);
    expect(m.excludes).toEqual([]);
    expect(m.included('test.thing')).toBe(true);
    expect(m.excluded('test.thing')).toBe(false);
    expect(m.matches('test.thing')).toBe(true);
    expect(m.matches('random.thing')).toBe(false);
  });

  it('should include every pattern of a list', () => {
    const m = TypeMatcher.build(['test.thing', 'other.thing']);
    expect(m.includes).toHaveLength(2);
    expect(m.matches('test.thing')).toBe(true);
    expect(m.matches('other.thing')).toBe(true);
    expect(m.matches('random.thing')).toBe(false);
  });

  it('should widen an exclusion-only string to everything else', () => {
    const m = TypeMatcher.build('!test.thing');
    expect(m.includes).toEqual(['*']);
    expect(m.excludes).toEqual(['test.thing']);
    expect(m.excluded('test.thing')).toBe(true);
    expect(m.included('random.thing')).toBe(true);
    expect(m.matches('test.thing')).toBe(false);
    expect(m.matches('random.thing')).toBe(true);
  });

  it('should widen an exclusion-only list to everything else', () => {
    const m = TypeMatcher.build(['!test.thing', '!other.thing']);
    expect(m.includes).toEqual(['*']);
    expect(m.excludes).toEqual(['test.thing', 'other.thing']);
    expect(m.matches('test.thing')).toBe(false);
    expect(m.matches('other.thing')).toBe(false);
    expect(m.matches('random.thing')).toBe(true);
  });

  it('should combine includes and excludes', () => {
    const m = TypeMatcher.build(['*.start', '*.end', '!scheduler.*']);
    expect(m.matches('compute.instance.create.start')).toBe(true);
    expect(m.matches('image.delete.end')).toBe(true);
    expect(m.matches('compute.instance.exists')).toBe(false);
    expect(m.matches('scheduler.run_instance.start')).toBe(false);
  });

  it('should exclude every image notification for !image.*', () => {
    const m = TypeMatcher.build('!image.*');
    expect(m.matches('image.upload')).toBe(false);
    expect(m.matches('image.delete.end')).toBe(false);
    expect(m.matches('compute.instance.create.start')).toBe(true);
    expect(m.matches('images.upload')).toBe(true);
  });

  it('should let an exclusion win over an inclusion', () => {
    const m = TypeMatcher.build(['compute.*', '!compute.instance.exists']);
    expect(m.matches('compute.instance.create.end')).toBe(true);
    expect(m.matches('compute.instance.exists')).toBe(false);
  });

  describe('isCatchAll', () => {
    it('should be true for *', () => {
      expect(TypeMatcher.build('*').isCatchAll()).toBe(true);
    });

    it('should be true for * alongside other inclusions', () => {
      expect(TypeMatcher.build(['*', 'foo']).isCatchAll()).toBe(true);
    });

    it('should be false when any exclusion is present', () => {
      expect(TypeMatcher.build(['*', '!foo']).isCatchAll()).toBe(false);
      expect(TypeMatcher.build('!image.*').isCatchAll()).toBe(false);
    });

    it('should be false for patterns that merely match everything', () => {
      expect(TypeMatcher.build('**').isCatchAll()).toBe(false);
      expect(TypeMatcher.build('compute.*').isCatchAll()).toBe(false);
    });
  });

  it('should render its patterns', () => {
    expect(TypeMatcher.build(['*.end', '!scheduler.*']).toString()).toBe('*.end, !scheduler.*');
  });
});
