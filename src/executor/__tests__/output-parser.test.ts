import { describe, it, expect } from 'vitest';
import { parseOutput, toObservations } from '../output-parser';

describe('parseOutput', () => {
  it('should parse a plain number', () => {
    expect(parseOutput('42')).toEqual({ kind: 'numeric', value: 42 });
  });

  it('should ignore surrounding whitespace', () => {
    expect(parseOutput('  -0.5\n')).toEqual({ kind: 'numeric', value: -0.5 });
  });

  it('should accept exponent notation', () => {
    expect(parseOutput('1e3')).toEqual({ kind: 'numeric', value: 1000 });
    expect(parseOutput('.25')).toEqual({ kind: 'numeric', value: 0.25 });
  });

  it('should parse a JSON object of numbers', () => {
    expect(parseOutput('{"health":200,"DB":1}')).toEqual({
      kind: 'labelled',
      values: [
        ['health', 200],
        ['DB', 1],
      ],
    });
  });

  it('should reject text output', () => {
    expect(parseOutput('ERROR: timeout')).toEqual({
      kind: 'parse-failure',
      reason: 'output is neither a number nor JSON',
    });
  });

  it('should reject empty output', () => {
    expect(parseOutput(' \n')).toEqual({ kind: 'parse-failure', reason: 'empty output' });
  });

  it('should list integer-like keys before the others', () => {
    expect(parseOutput('{"b":1,"10":2,"a":3}')).toEqual({
      kind: 'labelled',
      values: [
        ['10', 2],
        ['b', 1],
        ['a', 3],
      ],
    });
  });

  it('should reject non-object JSON', () => {
    expect(parseOutput('[1, 2]')).toEqual({ kind: 'parse-failure', reason: 'JSON output must be an object' });
    expect(parseOutput('null')).toEqual({ kind: 'parse-failure', reason: 'JSON output must be an object' });
    expect(parseOutput('"7"')).toEqual({ kind: 'parse-failure', reason: 'JSON output must be an object' });
  });

  it('should reject an object with a non-numeric value', () => {
    expect(parseOutput('{"a":1,"b":"2"}')).toEqual({
      kind: 'parse-failure',
      reason: 'value of "b" is not a number',
    });
  });

  it('should reject an empty object', () => {
    expect(parseOutput('{}')).toEqual({ kind: 'parse-failure', reason: 'JSON object has no keys' });
  });

  it('should not accept hexadecimal or special numbers', () => {
    expect(parseOutput('0x10').kind).toBe('parse-failure');
    expect(parseOutput('Infinity').kind).toBe('parse-failure');
    expect(parseOutput('NaN').kind).toBe('parse-failure');
  });
});

describe('toObservations', () => {
  it('should attribute a plain number to the main component', () => {
    expect(toObservations({ kind: 'numeric', value: 42 })).toEqual([{ component: 'main', value: 42 }]);
  });

  it('should emit one observation per JSON key', () => {
    expect(
      toObservations({
        kind: 'labelled',
        values: [
          ['health', 200],
          ['DB', 1],
        ],
      })
    ).toEqual([
      { component: 'health', value: 200 },
      { component: 'DB', value: 1 },
    ]);
  });

  it('should emit nothing for a parse failure', () => {
    expect(toObservations({ kind: 'parse-failure', reason: 'empty output' })).toEqual([]);
  });
});
