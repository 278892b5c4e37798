/**
 * shared-registry.test.ts
 *
 * Covers sharing, once sharing, composer lookup order, freeze and flush.
 */

import type { Composer } from '../shared-registry.js';
import { SharedRegistry } from '../shared-registry.js';
import { RegistryFrozenError } from '../errors.js';

describe('SharedRegistry', () => {
  let registry: SharedRegistry;

  beforeEach(() => {
    registry = new SharedRegistry();
  });

  it('shares single values and records', () => {
    registry.share('appName', 'Acme');
    registry.share({ locale: 'en', appName: 'Acme 2' });
    expect([...registry.getShared().entries()]).toEqual([
      ['appName', 'Acme 2'],
      ['locale', 'en'],
    ]);
    expect(registry.getShared('locale')).toBe('en');
    expect(registry.getShared('missing')).toBeNull();
    expect(registry.getShared('missing', 'fallback')).toBe('fallback');
  });

  it('shares once props with their options', () => {
    const prop = registry.shareOnce('plans', () => ['free'], { cacheKey: 'plans-v2', expiresAt: 5000 });
    expect(prop.kind).toBe('once');
    expect(prop.cacheKey).toBe('plans-v2');
    expect(prop.expiresAt).toBe(5000);
    expect(registry.getShared('plans')).toBe(prop);
  });

  it('returns exact composers before wildcard ones', () => {
    const wildcard: Composer = () => undefined;
    const users: Composer = () => undefined;
    const both: Composer = () => undefined;
    registry.composer('*', wildcard);
    registry.composer('Users/Index', users);
    registry.composer(['Users/Index', 'Users/Show'], both);

    expect(registry.composersFor('Users/Index')).toEqual([users, both, wildcard]);
    expect(registry.composersFor('Users/Show')).toEqual([both, wildcard]);
    expect(registry.composersFor('Home')).toEqual([wildcard]);
    expect(registry.composersFor('*')).toEqual([wildcard]);
  });

  it('rejects mutation after freeze', () => {
    registry.freeze();
    expect(registry.isFrozen).toBe(true);
    expect(() => registry.share('a', 1)).toThrow(RegistryFrozenError);
    expect(() => registry.shareOnce('a', () => 1)).toThrow(
      'SharedRegistry is frozen; "shareOnce" is only allowed during startup.',
    );
    expect(() => registry.composer('*', () => undefined)).toThrow(RegistryFrozenError);
  });

  it('clears everything and lifts the freeze on flush', () => {
    registry.share('a', 1);
    registry.composer('*', () => undefined);
    registry.freeze();
    registry.flush();
    expect(registry.isFrozen).toBe(false);
    expect(registry.getShared().size).toBe(0);
    expect(registry.composersFor('Home')).toEqual([]);
  });
});
