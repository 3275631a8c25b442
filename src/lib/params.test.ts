import { describe, expect, it } from 'vitest';
import { numberList, numberParam, optionalBoolean, optionalNumber, stringList, stringParam } from './params.js';

describe('request value readers', () => {
  it('reads strings', () => {
    expect(stringParam('Chest')).toBe('Chest');
    expect(stringParam('')).toBeUndefined();
    expect(stringParam(['Chest'])).toBeUndefined();
  });

  it('reads numbers from numbers or numeric strings', () => {
    expect(numberParam('25', 50)).toBe(25);
    expect(numberParam(7, 50)).toBe(7);
    expect(numberParam(undefined, 50)).toBe(50);
    expect(numberParam('many', 50)).toBe(50);
    expect(optionalNumber(3)).toBe(3);
    expect(optionalNumber('3')).toBeUndefined();
  });

  it('reads booleans and lists', () => {
    expect(optionalBoolean(false)).toBe(false);
    expect(optionalBoolean('false')).toBeUndefined();
    expect(stringList(['Chest', 3, 'Back'])).toEqual(['Chest', 'Back']);
    expect(stringList('Chest')).toBeUndefined();
    expect(numberList([12, '10', 8])).toEqual([12, 8]);
  });
});
