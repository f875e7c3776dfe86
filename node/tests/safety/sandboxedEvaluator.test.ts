import { describe, expect, it } from 'vitest';
import { evaluate, formatResult, looksLikeExpression } from '@/safety/sandboxedEvaluator';

function valueOf(expression: string): number {
  const result = evaluate(expression);
  if (!result.success) throw new Error(`expected success for ${expression}: ${result.error.message}`);
  return result.value;
}

describe('sandboxed evaluator', () => {
  it('respects precedence and associativity', () => {
    expect(valueOf('2 + 3 * 4')).toBe(14);
    expect(valueOf('(2 + 3) * 4')).toBe(20);
    expect(valueOf('2 ^ 3 ^ 2')).toBe(512);
    expect(valueOf('2 ** 10')).toBe(1024);
    expect(valueOf('-2 ^ 2')).toBe(-4);
    expect(valueOf('10 - 4 - 3')).toBe(3);
    expect(valueOf('7 % 4')).toBe(3);
  });

  it('knows functions and constants', () => {
    expect(valueOf('sqrt(16) + abs(-2)')).toBe(6);
    expect(valueOf('cos(0)')).toBe(1);
    expect(valueOf('PI')).toBe(Math.PI);
    expect(valueOf('log10(1000)')).toBe(3);
  });

  it('reports domain errors', () => {
    expect(evaluate('sqrt(-1)')).toEqual({
      success: false,
      error: { kind: 'domain', message: 'sqrt of a negative number' },
    });
    expect(evaluate('ln(0)')).toEqual({
      success: false,
      error: { kind: 'domain', message: 'ln of a non-positive number' },
    });
  });

  it('reports division by zero and overflow', () => {
    expect(evaluate('1 / 0')).toEqual({
      success: false,
      error: { kind: 'division_by_zero', message: 'Division by zero' },
    });
    const overflow = evaluate('10 ^ 400');
    expect(overflow.success).toBe(false);
    if (!overflow.success) expect(overflow.error.kind).toBe('overflow');
  });

  it('rejects anything that is not arithmetic', () => {
    // the quote never makes it past the tokenizer
    expect(evaluate("__import__('os')")).toEqual({
      success: false,
      error: { kind: 'rejected', message: "Unexpected character ''' at position 11" },
    });
    expect(evaluate('__import__(1)')).toEqual({
      success: false,
      error: { kind: 'rejected', message: "Unknown identifier '__import__'" },
    });
    expect(evaluate('process.exit(1)')).toMatchObject({ success: false, error: { kind: 'rejected' } });
    expect(evaluate('(1 + 2')).toEqual({ success: false, error: { kind: 'rejected', message: "Expected ')'" } });
    expect(evaluate('')).toEqual({ success: false, error: { kind: 'rejected', message: 'Empty expression' } });
  });

  it('limits nesting depth', () => {
    const deep = `${'('.repeat(100)}1${')'.repeat(100)}`;
    expect(evaluate(deep)).toEqual({
      success: false,
      error: { kind: 'rejected', message: 'Expression is nested too deeply' },
    });
  });
});

describe('formatResult', () => {
  it('prints integers unchanged and trims float noise', () => {
    expect(formatResult(14)).toBe('14');
    expect(formatResult(0.1 + 0.2)).toBe('0.3');
    expect(formatResult(1 / 3)).toBe('0.333333333333');
  });
});

describe('looksLikeExpression', () => {
  it.each([
    ['2 + 2', true],
    ['sqrt(2) * 3', true],
    ['history of the printing press', false],
    ['covid-19 statistics', false],
    ['-5', false],
    ['pi * e', false],
  ])('%s -> %s', (text, expected) => {
    expect(looksLikeExpression(text)).toBe(expected);
  });
});
