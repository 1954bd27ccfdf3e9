/**
 * Classification of a command's captured stdout.
 *
 * A command either prints one number (`42`, `-0.5`, `1e3`) or a JSON object
 * mapping component names to numbers (`{"health": 200, "db": 1}`). Anything
 * else is a parse failure.
 */

import { MAIN_COMPONENT, type Observation, type ParsedOutput } from '../types';

const NUMBER_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Classify captured output, trying a plain number first and a JSON object second.
 *
 * Labelled values follow JavaScript property order: integer-like keys first in
 * ascending order, then the remaining keys as written.
 */
export function parseOutput(raw: string): ParsedOutput {
  const text = raw.trim();

  if (text.length === 0) {
    return { kind: 'parse-failure', reason: 'empty output' };
  }

  if (NUMBER_PATTERN.test(text)) {
    return { kind: 'numeric', value: Number(text) };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { kind: 'parse-failure', reason: 'output is neither a number nor JSON' };
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return { kind: 'parse-failure', reason: 'JSON output must be an object' };
  }

  const values: Array<[string, number]> = [];
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== 'number') {
      return { kind: 'parse-failure', reason: `value of "${key}" is not a number` };
    }
    values.push([key, value]);
  }

  if (values.length === 0) {
    return { kind: 'parse-failure', reason: 'JSON object has no keys' };
  }

  return { kind: 'labelled', values };
}

/**
 * Observations carried by a successful classification; none for a failure.
 */
export function toObservations(output: ParsedOutput): Observation[] {
  switch (output.kind) {
    case 'numeric':
      return [{ component: MAIN_COMPONENT, value: output.value }];
    case 'labelled':
      return output.values.map(([component, value]) => ({ component, value }));
    case 'parse-failure':
      return [];
  }
}
