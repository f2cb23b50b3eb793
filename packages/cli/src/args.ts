import { ValidationError, type Scope, type ScopeSelector, type ScopeValue } from '@stratum/core';

function parseValue(raw: string): ScopeValue {
  const trimmed = raw.trim();
  return /^-?\d+(\.\d+)?$/.test(trimmed) ? Number(trimmed) : trimmed;
}

function splitPairs(input: string, label: string): Array<[string, string]> {
  const pairs = input
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean)
    .map((part): [string, string] => {
      const index = part.indexOf('=');
      if (index <= 0) {
        throw new ValidationError(`Malformed ${label} entry "${part}"; expected field=value`);
      }
      return [part.slice(0, index).trim(), part.slice(index + 1)];
    });
  if (pairs.length === 0) {
    throw new ValidationError(`${label} must name at least one field`);
  }
  return pairs;
}

/** `user=alice,agent=planner` */
export function parseScopeArg(input: string): Scope {
  const scope: Scope = {};
  for (const [name, value] of splitPairs(input, 'scope')) {
    scope[name] = parseValue(value);
  }
  return scope;
}

/** `user=alice|bob,agent=*`: `|` lists alternatives and `*` matches any value. */
export function parseSelectorArg(input: string): ScopeSelector {
  const selector: ScopeSelector = {};
  for (const [name, value] of splitPairs(input, 'selector')) {
    if (value.trim() === '*') {
      selector[name] = { any: true };
      continue;
    }
    const values = value.split('|').map(parseValue);
    selector[name] = values.length === 1 ? values[0] : { in: values };
  }
  return selector;
}
