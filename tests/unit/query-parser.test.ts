import { describe, it, expect } from 'vitest';
import { MalformedInputError } from '../../lambda/shared/errors';
import { parseFeatureVector } from '../../lambda/shared/query-parser';

describe('parseFeatureVector', () => {
  it('parses a bracketed list', () => {
    expect(parseFeatureVector('[1.0,2.5,3.0]')).toEqual([1, 2.5, 3]);
  });

  it('parses a single-element list', () => {
    expect(parseFeatureVector('[1.0]')).toEqual([1]);
  });

  it('accepts a list with the closing bracket missing', () => {
    expect(parseFeatureVector('[1.0,2.0')).toEqual([1, 2]);
  });

  it('accepts a list without any brackets', () => {
    expect(parseFeatureVector('1,2')).toEqual([1, 2]);
  });

  it('trims whitespace around values', () => {
    expect(parseFeatureVector(' [ 1.5 , 2 ] ')).toEqual([1.5, 2]);
  });

  it('parses signs and exponents', () => {
    expect(parseFeatureVector('[1e3,-2.5,+.5]')).toEqual([1000, -2.5, 0.5]);
  });

  it('rejects a non-numeric value', () => {
    expect(() => parseFeatureVector('[1.0,abc,3.0]')).toThrow(MalformedInputError);
    expect(() => parseFeatureVector('[1.0,abc,3.0]')).toThrow('Value at position 1 is not numeric: "abc"');
  });

  it('rejects empty values', () => {
    expect(() => parseFeatureVector('[]')).toThrow(MalformedInputError);
    expect(() => parseFeatureVector('[1,,2]')).toThrow(MalformedInputError);
  });

  it('rejects hexadecimal and non-finite values', () => {
    expect(() => parseFeatureVector('[0x10]')).toThrow(MalformedInputError);
    expect(() => parseFeatureVector('[Infinity]')).toThrow(MalformedInputError);
    expect(() => parseFeatureVector('[NaN]')).toThrow(MalformedInputError);
  });

  it('rejects brackets inside interior values', () => {
    expect(() => parseFeatureVector('[1,[2],3]')).toThrow(MalformedInputError);
  });

  it('checks the expected number of values', () => {
    expect(parseFeatureVector('[1,2,3]', 3)).toEqual([1, 2, 3]);
    expect(() => parseFeatureVector('[1,2]', 3)).toThrow('Expected 3 values, received 2');
  });
});
