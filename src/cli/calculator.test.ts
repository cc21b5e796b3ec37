import { describe, it, expect } from 'vitest';
import {
  CalcError,
  INTERACTIVE_HELP,
  add,
  applyOperator,
  divide,
  evaluateExpression,
  formatNumber,
  handleInteractiveLine,
  multiply,
  parseNumber,
  power,
  squareRoot,
  subtract
} from './calculator';

describe('arithmetic', () => {
  it('computes the basic operations', () => {
    expect(add(2, 3)).toBe(5);
    expect(subtract(5, 3)).toBe(2);
    expect(multiply(4, 3)).toBe(12);
    expect(divide(10, 2)).toBe(5);
  });

  it('rejects division by zero', () => {
    expect(() => divide(5, 0)).toThrowError('Division by zero');
  });

  it('rejects results that are not finite', () => {
    expect(() => add(Number.MAX_VALUE, Number.MAX_VALUE)).toThrowError('Invalid expression: Result overflow');
    expect(() => multiply(Number.MAX_VALUE, 2)).toThrowError('Invalid expression: Result overflow');
  });

  it('computes square roots of non-negative numbers only', () => {
    expect(squareRoot(16)).toBe(4);
    expect(squareRoot(9)).toBe(3);
    expect(() => squareRoot(-1)).toThrowError('Invalid expression: Cannot calculate square root of negative number');
  });

  it('computes powers', () => {
    expect(power(2, 3)).toBe(8);
    expect(power(5, 2)).toBe(25);
    expect(power(-2, 3)).toBe(-8);
    expect(() => power(-2, 0.5)).toThrowError('Invalid expression: Cannot calculate non-integer power of negative number');
    expect(() => power(10, 400)).toThrowError('Invalid expression: Result overflow or invalid');
  });

  it('reports unknown operators', () => {
    expect(() => applyOperator('%', 1, 2)).toThrowError('Unknown operation: %');
    expect(applyOperator('*', 6, 7)).toBe(42);
  });
});

describe('parseNumber', () => {
  it('parses signed decimals', () => {
    expect(parseNumber('-2.5')).toBe(-2.5);
    expect(parseNumber(' 10 ')).toBe(10);
  });

  it('rejects anything else with a ParseError', () => {
    let caught: unknown;
    try {
      parseNumber('abc');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CalcError);
    expect(caught instanceof CalcError && caught.kind).toBe('ParseError');
    expect(caught instanceof CalcError && caught.message).toBe('Number parsing error: "abc" is not a number');
  });
});

describe('evaluateExpression', () => {
  it('evaluates single operations', () => {
    expect(evaluateExpression('2 + 3')).toBe(5);
    expect(evaluateExpression('10 - 4')).toBe(6);
    expect(evaluateExpression('3 * 4')).toBe(12);
    expect(evaluateExpression('15 / 3')).toBe(5);
  });

  it('gives multiplication precedence over addition', () => {
    expect(evaluateExpression('2 + 3 * 4')).toBe(14);
  });

  it('associates subtraction and division to the left', () => {
    expect(evaluateExpression('10 - 4 - 3')).toBe(3);
    expect(evaluateExpression('8 / 4 / 2')).toBe(1);
  });

  it('negates a leading minus', () => {
    expect(evaluateExpression('-5')).toBe(-5);
    expect(evaluateExpression('-5 + 3')).toBe(-2);
  });

  it('fails on bad input', () => {
    expect(() => evaluateExpression('5 / 0')).toThrowError('Division by zero');
    expect(() => evaluateExpression('abc')).toThrowError('Invalid expression: abc');
    expect(() => evaluateExpression('')).toThrowError(CalcError);
  });
});

describe('formatNumber', () => {
  it('keeps ordinary values as they are', () => {
    expect(formatNumber(5)).toBe('5');
    expect(formatNumber(-2.5)).toBe('-2.5');
    expect(formatNumber(0.1)).toBe('0.1');
  });

  it('writes large values out in full', () => {
    expect(formatNumber(1e21)).toBe('1000000000000000000000');
    expect(formatNumber(-2.5e22)).toBe('-25000000000000000000000');
  });

  it('writes small values out in full', () => {
    expect(formatNumber(1.5e-7)).toBe('0.00000015');
  });
});

describe('handleInteractiveLine', () => {
  it('prints large results without an exponent', () => {
    expect(handleInteractiveLine('100000000000 * 100000000000').output).toEqual([
      `100000000000 * 100000000000 = 1${'0'.repeat(22)}`
    ]);
  });


  it('prints an evaluated expression', () => {
    expect(handleInteractiveLine('2 + 3')).toEqual({ output: ['2 + 3 = 5'], done: false });
  });

  it('handles the sqrt command', () => {
    expect(handleInteractiveLine('sqrt 16')).toEqual({ output: ['√16 = 4'], done: false });
    expect(handleInteractiveLine('sqrt x')).toEqual({ output: ['Error: Invalid number format'], done: false });
    expect(handleInteractiveLine('sqrt -4').output).toEqual([
      'Error: Invalid expression: Cannot calculate square root of negative number'
    ]);
  });

  it('reports errors without stopping', () => {
    expect(handleInteractiveLine('1 / 0')).toEqual({ output: ['Error: Division by zero'], done: false });
  });

  it('ignores blank lines', () => {
    expect(handleInteractiveLine('   ')).toEqual({ output: [], done: false });
  });

  it('prints help', () => {
    expect(handleInteractiveLine('help').output).toEqual([...INTERACTIVE_HELP]);
  });

  it('stops on quit and exit', () => {
    expect(handleInteractiveLine('quit')).toEqual({ output: ['Goodbye!'], done: true });
    expect(handleInteractiveLine(' exit ')).toEqual({ output: ['Goodbye!'], done: true });
  });
});
