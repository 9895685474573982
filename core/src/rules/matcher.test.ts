/**
 * Text matcher tests
 */

import { describe, it, expect } from '@jest/globals';
import { ConfigError } from '../errors.js';
import { compileTextMatcher, globSyntaxError } from './matcher.js';

describe('globSyntaxError', () => {
  it('accepts well-formed patterns', () => {
    expect(globSyntaxError('*.desktop')).toBeNull();
    expect(globSyntaxError('{slack,discord}*')).toBeNull();
    expect(globSyntaxError('[a-z]?')).toBeNull();
    expect(globSyntaxError('literal\\[')).toBeNull();
  });

  it('reports unclosed classes and braces', () => {
    expect(globSyntaxError('[abc')).toBe('unclosed "["');
    expect(globSyntaxError('{a,b')).toBe('unclosed "{"');
    expect(globSyntaxError('a}')).toBe('unbalanced "}"');
    expect(globSyntaxError('abc\\')).toBe('trailing backslash');
  });
});

describe('compileTextMatcher', () => {
  it('supports brace alternatives in globs', () => {
    const matcher = compileTextMatcher({ glob: '{slack,discord}' }, 'rules.0.match.app');
    expect(matcher.kind).toBe('glob');
    expect(matcher.test('Discord')).toBe(true);
    expect(matcher.test('Signal')).toBe(false);
  });

  it('anchors globs to the whole value', () => {
    const matcher = compileTextMatcher({ glob: 'mail' }, 'where');
    expect(matcher.test('mail')).toBe(true);
    expect(matcher.test('thunderbird mail')).toBe(false);
  });

  it('names the offending field in the error', () => {
    expect(() => compileTextMatcher({ glob: '[x' }, 'rules.2.match.summary')).toThrow(
      'rules.2.match.summary: invalid glob "[x": unclosed "["',
    );
    expect(() => compileTextMatcher({ glob: '[x' }, 'w')).toThrow(ConfigError);
  });

  it('uses contains semantics for the explicit form', () => {
    const matcher = compileTextMatcher({ contains: 'UPDATE' }, 'w');
    expect(matcher.test('System update ready')).toBe(true);
  });
});
