/**
 * prop-factory.ts
 * Constructors for every Prop variant.
 *
 * Usage:
 *   inertia.render('Users/Index', {
 *     users: () => repo.page(1),
 *     stats: Props.defer(() => repo.stats(), 'sidebar'),
 *     roles: Props.once(() => repo.roles(), 'roles'),
 *   });
 */

import { PROP_BRAND } from '../models/props.js';
import type {
  AlwaysProp,
  DeferredProp,
  LazyProp,
  MergeProp,
  MergeStrategy,
  OnceProp,
  Resolver,
} from '../models/props.js';

export class Props {
  /** Evaluated only during partial reloads that request it. */
  static lazy(resolver: Resolver): LazyProp {
    return { [PROP_BRAND]: true, kind: 'lazy', resolver, onceCached: false };
  }

  /** Alias of `lazy`, matching the client library's naming. */
  static optional(resolver: Resolver): LazyProp {
    return Props.lazy(resolver);
  }

  /** Excluded from the first response and fetched right after render, batched by group. */
  static defer(resolver: Resolver, group = 'default'): DeferredProp {
    return {
      [PROP_BRAND]: true,
      kind: 'deferred',
      resolver,
      group,
      onceCached: false,
      mergeConfig: null,
    };
  }

  /** Appended to the client's existing value. */
  static merge(resolver: Resolver, matchKey: string | null = null): MergeProp {
    return Props._merge(resolver, 'append', matchKey);
  }

  static prepend(resolver: Resolver, matchKey: string | null = null): MergeProp {
    return Props._merge(resolver, 'prepend', matchKey);
  }

  static deepMerge(resolver: Resolver, matchKey: string | null = null): MergeProp {
    return Props._merge(resolver, 'deep', matchKey);
  }

  /** Cached by the client after first receipt; `cacheKey` lets pages share the entry. */
  static once(
    resolver: Resolver,
    cacheKey: string | null = null,
    expiresAt: number | null = null,
  ): OnceProp {
    return {
      [PROP_BRAND]: true,
      kind: 'once',
      resolver,
      cacheKey,
      expiresAt,
      fresh: false,
    };
  }

  /** Sent on every response, partial reloads included. */
  static always(resolver: Resolver): AlwaysProp {
    return { [PROP_BRAND]: true, kind: 'always', resolver };
  }

  private static _merge(
    resolver: Resolver,
    strategy: MergeStrategy,
    matchKey: string | null,
  ): MergeProp {
    return {
      [PROP_BRAND]: true,
      kind: 'merge',
      resolver,
      strategy,
      matchKey,
      onceCached: false,
      appendPaths: {},
      prependPaths: [],
    };
  }
}
