import { describe, it, expect } from 'vitest';
import { matchesSearchPattern, searchPatternToRegExp } from '../../../src/locator/search-pattern.js';

describe('matchesSearchPattern', () => {
  it('matches * across any run of characters', () => {
    expect(matchesSearchPattern('D_000001_model_P1.cif.V12', 'D_000001_model_P1.cif.V*')).toBe(true);
    expect(matchesSearchPattern('D_000001_model_P1.cif', 'D_000001_model_P1.cif.V*')).toBe(false);
  });

  it('treats dots literally', () => {
    expect(matchesSearchPattern('D_000001_model_P1xcif.V1', 'D_000001_model_P1.cif.V*')).toBe(false);
  });

  it('matches ? against exactly one character', () => {
    expect(matchesSearchPattern('ab', 'a?')).toBe(true);
    expect(matchesSearchPattern('abc', 'a?')).toBe(false);
  });

  it('does not cross path separators', () => {
    expect(matchesSearchPattern('log/run.log', '*log')).toBe(false);
  });

  it('leaves dotfiles to patterns that start with a dot', () => {
    expect(matchesSearchPattern('.session.log', '*log')).toBe(false);
    expect(matchesSearchPattern('.session.log', '?session.log')).toBe(false);
    expect(matchesSearchPattern('.session.log', '.*log')).toBe(true);
    expect(matchesSearchPattern('run.log', '*log')).toBe(true);
  });

  it('escapes regex metacharacters', () => {
    expect(searchPatternToRegExp('a+b(1)').test('a+b(1)')).toBe(true);
  });
});
