import { describe, expect, it } from 'vitest';
import {
  evaluateArithmetic,
  formatArithmeticResult,
  formatGrouped2,
  roundAwayFromZero,
} from '@/search/arithmetic';

describe('evaluateArithmetic', () => {
  it('respects precedence and parentheses', () => {
    expect(evaluateArithmetic('2 + 3 * 4')).toBe(14);
    expect(evaluateArithmetic('(2 + 3) * 4')).toBe(20);
    expect(evaluateArithmetic('10 - 4 - 3')).toBe(3);
    expect(evaluateArithmetic('-3 * 2')).toBe(-6);
  });

  it('returns null for division by zero', () => {
    expect(evaluateArithmetic('5 / 0')).toBeNull();
    expect(evaluateArithmetic('5 / (2 - 2)')).toBeNull();
  });

  it('rejects anything outside the allow-list', () => {
    expect(evaluateArithmetic('2 ** 3')).toBeNull();
    expect(evaluateArithmetic('process.exit()')).toBeNull();
    expect(evaluateArithmetic('2 + x')).toBeNull();
  });

  it('rejects malformed expressions', () => {
    expect(evaluateArithmetic('(2 + 3')).toBeNull();
    expect(evaluateArithmetic('2 +')).toBeNull();
    expect(evaluateArithmetic('')).toBeNull();
  });
});

describe('formatting', () => {
  it('prints integers plainly and rounds the rest to two places', () => {
    expect(formatArithmeticResult(60)).toBe('60');
    expect(formatArithmeticResult(2.5)).toBe('2.5');
    expect(formatArithmeticResult(10 / 3)).toBe('3.33');
  });

  it('rounds halves away from zero', () => {
    expect(roundAwayFromZero(0.125, 2)).toBe(0.13);
    expect(roundAwayFromZero(-0.125, 2)).toBe(-0.13);
    expect(roundAwayFromZero(37.77777, 1)).toBe(37.8);
  });

  it('groups thousands with two decimals', () => {
    expect(formatGrouped2(34.5)).toBe('34.50');
    expect(formatGrouped2(1234.5)).toBe('1,234.50');
  });
});
