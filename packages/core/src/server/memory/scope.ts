import type { FieldSelector, Scope, ScopeField, ScopeSelector, ScopeValue } from './models';

/** Per field: the allowed values, or `null` to match any value. */
export type ScopeFilter = Record<string, ScopeValue[] | null>;

export function scopeKey(scope: Scope, fields?: readonly ScopeField[]): string {
  const names = fields ? fields.map((field) => field.name) : Object.keys(scope).sort();
  return JSON.stringify(names.map((name) => [name, scope[name] ?? null]));
}

export function sameScope(a: Scope, b: Scope): boolean {
  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) {
    return false;
  }
  return aKeys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && a[key] === b[key]);
}

export function scopeToFilter(scope: Scope): ScopeFilter {
  const filter: ScopeFilter = {};
  for (const [name, value] of Object.entries(scope)) {
    filter[name] = [value];
  }
  return filter;
}

export function matchesScopeFilter(scope: Scope, filter: ScopeFilter): boolean {
  for (const [name, allowed] of Object.entries(filter)) {
    if (allowed === null) {
      if (!Object.prototype.hasOwnProperty.call(scope, name)) {
        return false;
      }
      continue;
    }
    const value = scope[name];
    if (value === undefined || !allowed.includes(value)) {
      return false;
    }
  }
  return true;
}

export function isWildcard(selector: FieldSelector): selector is { any: true } {
  return typeof selector === 'object' && 'any' in selector;
}

export function isValueSet(selector: FieldSelector): selector is { in: ScopeValue[] } {
  return typeof selector === 'object' && 'in' in selector;
}

export function selectorToFilter(selector: ScopeSelector): ScopeFilter {
  const filter: ScopeFilter = {};
  for (const [name, field] of Object.entries(selector)) {
    if (isWildcard(field)) {
      filter[name] = null;
    } else if (isValueSet(field)) {
      filter[name] = [...new Set(field.in)];
    } else {
      filter[name] = [field];
    }
  }
  return filter;
}

/** Returns the single scope a selector names, or null when it spans more than one. */
export function exactScopeOf(selector: ScopeSelector): Scope | null {
  const scope: Scope = {};
  for (const [name, field] of Object.entries(selector)) {
    if (isWildcard(field)) {
      return null;
    }
    if (isValueSet(field)) {
      const values = [...new Set(field.in)];
      if (values.length !== 1) {
        return null;
      }
      scope[name] = values[0];
    } else {
      scope[name] = field;
    }
  }
  return scope;
}

export function countCombinations(filter: ScopeFilter): number | null {
  let total = 1;
  for (const allowed of Object.values(filter)) {
    if (allowed === null) {
      return null;
    }
    total *= allowed.length;
  }
  return total;
}

export function describeScope(scope: Scope | null): string {
  if (!scope) {
    return '(cross-scope)';
  }
  return Object.entries(scope)
    .map(([name, value]) => `${name}=${value}`)
    .join(',');
}
