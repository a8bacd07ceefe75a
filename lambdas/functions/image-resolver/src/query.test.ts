import { describe, it, expect } from 'vitest';

import { InvalidQueryError } from './errors';
import { compileQuery, literalPrefix } from './query';

describe('compileQuery', () => {
  it.each(['self', 'amazon', 'aws-marketplace', '123456789012'])('accepts owner scope %s', (ownerScope) => {
    expect(() => compileQuery({ ownerScope, namePattern: '^bastion' })).not.toThrow();
  });

  it.each(['', 'someone', '12345', '1234567890123'])('rejects owner scope "%s"', (ownerScope) => {
    expect(() => compileQuery({ ownerScope, namePattern: '^bastion' })).toThrow(InvalidQueryError);
  });

  it('rejects an empty name pattern', () => {
    expect(() => compileQuery({ ownerScope: 'self', namePattern: '' })).toThrow('Name pattern must not be empty');
  });

  it('rejects a pattern that does not compile', () => {
    expect(() => compileQuery({ ownerScope: 'self', namePattern: 'bastion-[' })).toThrow(InvalidQueryError);
  });

  it('rejects unbalanced parentheses even though the anchored group would balance them', () => {
    expect(() => compileQuery({ ownerScope: 'self', namePattern: 'a)(b' })).toThrow(InvalidQueryError);
  });

  it('anchors the pattern at the start of the name', () => {
    const { matcher } = compileQuery({ ownerScope: 'self', namePattern: 'bastion' });

    expect(matcher.test('bastion-2024-01')).toBe(true);
    expect(matcher.test('old-bastion-2024-01')).toBe(false);
  });

  it('anchors every branch of an alternation', () => {
    const { matcher } = compileQuery({ ownerScope: 'self', namePattern: 'bastion|cluster' });

    expect(matcher.test('cluster-node')).toBe(true);
    expect(matcher.test('my-cluster-node')).toBe(false);
  });

  it('does not require the pattern to cover the whole name', () => {
    const { matcher } = compileQuery({ ownerScope: 'self', namePattern: '^bastion-20' });

    expect(matcher.test('bastion-2024-02-hardened')).toBe(true);
  });

  it('returns the literal prefix of the pattern', () => {
    expect(compileQuery({ ownerScope: 'self', namePattern: '^bastion.*' }).namePrefix).toBe('bastion');
  });
});

describe('literalPrefix', () => {
  it.each([
    { pattern: '^bastion.*', expected: 'bastion' },
    { pattern: 'cluster-2024', expected: 'cluster-2024' },
    { pattern: 'ab?c', expected: 'a' },
    { pattern: 'abc*', expected: 'ab' },
    { pattern: 'abc{2}', expected: 'ab' },
    { pattern: 'abc+', expected: 'abc' },
    { pattern: 'bastion|cluster', expected: '' },
    { pattern: '^[bc]astion', expected: '' },
    { pattern: 'rhel\\.9', expected: 'rhel' },
  ])('derives "$expected" from $pattern', ({ pattern, expected }) => {
    expect(literalPrefix(pattern)).toBe(expected);
  });
});
