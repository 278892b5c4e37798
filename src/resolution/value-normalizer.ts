/**
 * value-normalizer.ts
 * Turns resolved prop values into their serializable form.
 *
 * - Date → ISO string, URL → href
 * - objects exposing `toArray()` → that result, normalized again
 * - arrays and plain objects are walked: nested lazy/deferred props are
 *   dropped, nested merge/once/always props and functions are resolved
 * - any other value (class instances included) passes through untouched
 */

import { isProp, isResolver } from '../models/props.js';
import type { Prop } from '../models/props.js';

/** Value that knows its own serializable shape. */
export interface Arrayable {
  toArray(): unknown;
}

export function isArrayable(value: unknown): value is Arrayable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'toArray' in value &&
    typeof value.toArray === 'function'
  );
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Marker for nested entries that must not be sent. */
const OMIT: unique symbol = Symbol('omit');

export class ValueNormalizer {
  static normalize(value: unknown): unknown {
    if (value instanceof Date) return value.toISOString();
    if (value instanceof URL) return value.href;
    if (isArrayable(value)) return ValueNormalizer.normalize(value.toArray());

    if (Array.isArray(value)) {
      const items: unknown[] = [];
      for (const item of value) {
        const normalized = ValueNormalizer._nested(item);
        if (normalized !== OMIT) items.push(normalized);
      }
      return items;
    }

    if (isPlainObject(value)) {
      const entries: [string, unknown][] = [];
      for (const [key, item] of Object.entries(value)) {
        const normalized = ValueNormalizer._nested(item);
        if (normalized !== OMIT) entries.push([key, normalized]);
      }
      return Object.fromEntries(entries);
    }

    return value;
  }

  private static _nested(value: unknown): unknown {
    if (isProp(value)) {
      if (value.kind === 'lazy' || value.kind === 'deferred') return OMIT;
      return toPresentationValue(value);
    }
    if (isResolver(value)) {
      return ValueNormalizer.normalize(value());
    }
    return ValueNormalizer.normalize(value);
  }
}

/** Invokes the prop's resolver. Callers decide how often; nothing is memoized. */
export function resolveProp(prop: Prop): unknown {
  return prop.resolver();
}

/** Resolves the prop and normalizes the result for serialization. */
export function toPresentationValue(prop: Prop): unknown {
  return ValueNormalizer.normalize(resolveProp(prop));
}
