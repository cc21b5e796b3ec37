import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { buildGreeting, greetingMessage, parseCount } from './greeting';

describe('greetingMessage', () => {
  it('greets by name', () => {
    expect(greetingMessage('World', false)).toBe('Hello, World!');
  });

  it('uppercases the whole greeting', () => {
    expect(greetingMessage('Ada', true)).toBe('HELLO, ADA!');
  });
});

describe('buildGreeting', () => {
  it('prints a single unnumbered line by default', () => {
    expect(buildGreeting({ name: 'World', count: 1, uppercase: false })).toEqual(['Hello, World!']);
  });

  it('numbers repeated lines from 1', () => {
    expect(buildGreeting({ name: 'Ada', count: 3, uppercase: false })).toEqual([
      'Hello, Ada! (1)',
      'Hello, Ada! (2)',
      'Hello, Ada! (3)'
    ]);
  });

  it('prints nothing for a zero count', () => {
    expect(buildGreeting({ name: 'Ada', count: 0, uppercase: true })).toEqual([]);
  });
});

describe('parseCount', () => {
  it('accepts non-negative integers', () => {
    expect(parseCount('0')).toBe(0);
    expect(parseCount('12')).toBe(12);
  });

  it('rejects negatives, fractions and words', () => {
    expect(() => parseCount('-1')).toThrowError(InvalidArgumentError);
    expect(() => parseCount('1.5')).toThrowError(InvalidArgumentError);
    expect(() => parseCount('many')).toThrowError('Expected a non-negative integer.');
  });

  it('rejects counts past 32 bits', () => {
    expect(() => parseCount('4294967296')).toThrowError('Count is too large.');
  });
});
