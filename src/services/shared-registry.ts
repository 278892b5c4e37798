/**
 * shared-registry.ts
 * Props shared with every page, and composers registered per component.
 *
 * Populate at startup, then `freeze()`: requests only read from the
 * registry. Per-request additions go through `Inertia.share()`, which writes
 * to the request's own overlay instead.
 *
 * Usage:
 *   const registry = new SharedRegistry();
 *   registry.share('appName', 'Acme');
 *   registry.composer(['Users/Index', 'Users/Show'], (inertia) => inertia.share('tab', 'users'));
 *   registry.composer('*', (inertia) => inertia.share('now', () => Date.now()));
 *   registry.freeze();
 */

import type { Inertia } from '../adapter/inertia.js';
import type { OnceProp, Resolver } from '../models/props.js';
import { Props } from '../props/prop-factory.js';
import { RegistryFrozenError } from './errors.js';

/** Runs before a component renders; may share extra props or set history flags. */
export type Composer = (inertia: Inertia) => void;

/** Component name that matches every render. */
export const WILDCARD_COMPONENT = '*';

export interface ShareOnceOptions {
  cacheKey?: string;
  /** Epoch milliseconds. */
  expiresAt?: number;
}

export class SharedRegistry {
  private readonly _shared = new Map<string, unknown>();
  private readonly _composers = new Map<string, Composer[]>();
  private _frozen = false;

  share(key: string, value: unknown): void;
  share(values: Record<string, unknown>): void;
  share(keyOrValues: string | Record<string, unknown>, value?: unknown): void {
    this._assertMutable('share');
    if (typeof keyOrValues === 'string') {
      this._shared.set(keyOrValues, value);
      return;
    }
    for (const [key, item] of Object.entries(keyOrValues)) {
      this._shared.set(key, item);
    }
  }

  /** Shares a once prop under `key` and returns it. */
  shareOnce(key: string, resolver: Resolver, options: ShareOnceOptions = {}): OnceProp {
    this._assertMutable('shareOnce');
    const prop = Props.once(resolver, options.cacheKey ?? null, options.expiresAt ?? null);
    this._shared.set(key, prop);
    return prop;
  }

  getShared(): ReadonlyMap<string, unknown>;
  getShared(key: string, fallback?: unknown): unknown;
  getShared(key?: string, fallback: unknown = null): unknown {
    if (key === undefined) return this._shared;
    return this._shared.has(key) ? this._shared.get(key) : fallback;
  }

  /** Registers `composer` for one or several component names, or `*`. */
  composer(components: string | readonly string[], composer: Composer): void {
    this._assertMutable('composer');
    const names = typeof components === 'string' ? [components] : components;
    for (const name of names) {
      const list = this._composers.get(name) ?? [];
      list.push(composer);
      this._composers.set(name, list);
    }
  }

  /** Composers for `component` first, then the wildcard ones. */
  composersFor(component: string): Composer[] {
    const exact = component === WILDCARD_COMPONENT ? [] : (this._composers.get(component) ?? []);
    return [...exact, ...(this._composers.get(WILDCARD_COMPONENT) ?? [])];
  }

  freeze(): void {
    this._frozen = true;
  }

  get isFrozen(): boolean {
    return this._frozen;
  }

  /** Clears shared props and composers, and lifts the freeze. For test isolation. */
  flush(): void {
    this._shared.clear();
    this._composers.clear();
    this._frozen = false;
  }

  private _assertMutable(operation: string): void {
    if (this._frozen) throw new RegistryFrozenError(operation);
  }
}
