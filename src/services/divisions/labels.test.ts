import { describe, it, expect } from 'vitest';
import { divisionId, divisionLetters, divisionName } from './labels.js';

describe('divisionLetters', () => {
  it('uses single letters for the first 26 divisions', () => {
    expect(divisionLetters(0)).toBe('A');
    expect(divisionLetters(1)).toBe('B');
    expect(divisionLetters(25)).toBe('Z');
  });

  it('continues with two letters after Z', () => {
    expect(divisionLetters(26)).toBe('AA');
    expect(divisionLetters(27)).toBe('AB');
    expect(divisionLetters(51)).toBe('AZ');
    expect(divisionLetters(52)).toBe('BA');
    expect(divisionLetters(701)).toBe('ZZ');
  });

  it('continues with three letters after ZZ', () => {
    expect(divisionLetters(702)).toBe('AAA');
  });

  it('rejects negative or fractional indexes', () => {
    expect(() => divisionLetters(-1)).toThrow(RangeError);
    expect(() => divisionLetters(1.5)).toThrow(RangeError);
  });
});

describe('divisionId', () => {
  it('prefixes the letters with DIV-', () => {
    expect(divisionId(0)).toBe('DIV-A');
    expect(divisionId(26)).toBe('DIV-AA');
  });
});

describe('divisionName', () => {
  it('returns the display name', () => {
    expect(divisionName(2)).toBe('Division C');
  });
});
