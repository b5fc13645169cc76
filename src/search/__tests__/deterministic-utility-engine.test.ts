import { describe, expect, it } from 'vitest';
import { normalizeArithmeticExpression, tryMatch } from '@/search/deterministic-utility-engine';

describe('tryMatch', () => {
  it('answers percent-of with two decimals', () => {
    expect(tryMatch('what is 15% of 230')).toEqual({
      result: { category: 'calculator', answer: '15% of 230 = **34.50**' },
      confidence: 'high',
    });
  });

  it('converts Fahrenheit to Celsius', () => {
    expect(tryMatch('100 F to C')).toEqual({
      result: { category: 'conversion', answer: '100.0°F equals **37.8°C**.' },
      confidence: 'high',
    });
  });

  it('does not match a bare word', () => {
    expect(tryMatch('weather')).toBeNull();
  });

  it('evaluates plain and worded arithmetic', () => {
    expect(tryMatch('5 * 12')?.result.answer).toBe('5 * 12 = **60**');
    expect(tryMatch('what is 10 divided by 4?')?.result.answer).toBe('10 / 4 = **2.5**');
  });

  it('does not treat a bare number as a calculation', () => {
    expect(tryMatch('2024')).toBeNull();
  });

  it('converts weights with the short display unit', () => {
    expect(tryMatch('10 lb to kg')?.result.answer).toBe('10 lb equals **4.5359 kg**.');
  });

  it('picks up conversational temperature wrappers at medium confidence', () => {
    expect(tryMatch('if I set it to 72F what is that in C')).toEqual({
      result: { category: 'conversion', answer: '72.0°F equals **22.2°C**.' },
      confidence: 'medium',
    });
  });

  it('ignores empty input', () => {
    expect(tryMatch('   ')).toBeNull();
  });
});

describe('normalizeArithmeticExpression', () => {
  it('strips lead-ins and rewrites operator words', () => {
    expect(normalizeArithmeticExpression('Can you calculate 3 times 4 please?')).toBe('3 * 4');
    expect(normalizeArithmeticExpression('what is 1,200 plus 5')).toBe('1200 + 5');
    expect(normalizeArithmeticExpression('6x7')).toBe('6 * 7');
  });
});
