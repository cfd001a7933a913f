import { describe, it, expect } from 'vitest';
import { roundDecimalString, roundNumber } from '../../src/evaluation/rounding.js';

describe('roundDecimalString', () => {
  it('should round ties to the even neighbour', () => {
    expect(roundDecimalString('2.5', 0)).toBe(2);
    expect(roundDecimalString('3.5', 0)).toBe(4);
    expect(roundDecimalString('-1.234565', 5)).toBe(-1.23456);
    expect(roundDecimalString('1.234575', 5)).toBe(1.23458);
  });

  it('should round away from a tie by the trailing digits', () => {
    expect(roundDecimalString('1.2345650001', 5)).toBe(1.23457);
    expect(roundDecimalString('1.2345649999', 5)).toBe(1.23456);
  });

  it('should carry into the integer part', () => {
    expect(roundDecimalString('0.999996', 5)).toBe(1);
    expect(roundDecimalString('-9.999999', 5)).toBe(-10);
  });

  it('should accept numbers without an integer or fraction part', () => {
    expect(roundDecimalString('.5', 0)).toBe(0);
    expect(roundDecimalString('17', 5)).toBe(17);
    expect(roundDecimalString('+4.25', 1)).toBe(4.2);
  });

  it('should fall back to numeric parsing for other notations', () => {
    expect(roundDecimalString('1.5e-3', 2)).toBe(0);
    expect(roundDecimalString('Infinity', 5)).toBe(Infinity);
  });
});

describe('roundNumber', () => {
  it('should round accuracy fractions to 3 decimals', () => {
    expect(roundNumber(2 / 3, 3)).toBe(0.667);
    expect(roundNumber(1 / 3, 3)).toBe(0.333);
    expect(roundNumber(1 / 8, 2)).toBe(0.12);
  });

  it('should leave huge magnitudes alone', () => {
    expect(roundNumber(1e20, 5)).toBe(1e20);
    expect(roundNumber(-0, 5)).toBe(0);
  });
});
