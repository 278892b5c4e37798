/**
 * value-normalizer.test.ts
 *
 * Covers value normalization: dates, URLs, toArray(), nested props and
 * functions inside arrays and plain objects, and class instances.
 */

import { Props } from '../../props/prop-factory.js';
import { ValueNormalizer, isArrayable, isPlainObject } from '../value-normalizer.js';

class Money {
  constructor(readonly cents: number) {}
}

class UserResource {
  constructor(private readonly _name: string) {}

  toArray(): unknown {
    return { name: this._name, joined: new Date('2024-05-01T10:00:00.000Z') };
  }
}

describe('ValueNormalizer', () => {
  it('converts dates and URLs to strings', () => {
    expect(ValueNormalizer.normalize(new Date('2024-01-02T03:04:05.000Z'))).toBe(
      '2024-01-02T03:04:05.000Z',
    );
    expect(ValueNormalizer.normalize(new URL('https://app.test/a?b=1'))).toBe(
      'https://app.test/a?b=1',
    );
  });

  it('normalizes the result of toArray()', () => {
    expect(ValueNormalizer.normalize(new UserResource('alice'))).toEqual({
      name: 'alice',
      joined: '2024-05-01T10:00:00.000Z',
    });
  });

  it('drops nested lazy and deferred props and resolves the others', () => {
    const value = {
      title: 'Report',
      total: () => 42,
      details: Props.lazy(() => 'hidden'),
      chart: Props.defer(() => 'later'),
      tags: [Props.always(() => 'a'), Props.defer(() => 'b'), () => 'c'],
      owner: Props.once(() => ({ since: new Date('2020-01-01T00:00:00.000Z') })),
    };
    expect(ValueNormalizer.normalize(value)).toEqual({
      title: 'Report',
      total: 42,
      tags: ['a', 'c'],
      owner: { since: '2020-01-01T00:00:00.000Z' },
    });
  });

  it('passes primitives and class instances through untouched', () => {
    const money = new Money(500);
    expect(ValueNormalizer.normalize(money)).toBe(money);
    expect(ValueNormalizer.normalize(null)).toBeNull();
    expect(ValueNormalizer.normalize('x')).toBe('x');
  });

  it('recognises plain objects and arrayables', () => {
    expect(isPlainObject({})).toBe(true);
    expect(isPlainObject(Object.create(null))).toBe(true);
    expect(isPlainObject(new Money(1))).toBe(false);
    expect(isPlainObject([])).toBe(false);
    expect(isArrayable(new UserResource('bob'))).toBe(true);
    expect(isArrayable({ toArray: 1 })).toBe(false);
  });
});
