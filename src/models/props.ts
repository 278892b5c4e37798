/**
 * props.ts
 * Prop variants carried in a page's prop bag.
 *
 * Every variant is an immutable record tagged with `kind`. Modifiers in
 * `props/prop-modifiers.ts` return new records instead of mutating.
 *
 * Bag entries that are not Props are either a zero-argument function
 * (plain computation, always resolved) or a raw value (sent as-is after
 * normalization).
 */

/** Brand that separates Props from raw values carrying a `kind` field. */
export const PROP_BRAND: unique symbol = Symbol('inertia.prop');

/** Zero-argument computation producing a prop value. */
export type Resolver<T = unknown> = () => T;

export type PropKind = 'always' | 'lazy' | 'deferred' | 'merge' | 'once';

export type MergeStrategy = 'append' | 'prepend' | 'deep';

/** Merge strategies a deferred prop may adopt on arrival. */
export type DeferredMergeStrategy = Extract<MergeStrategy, 'append' | 'deep'>;

// ---------------------------------------------------------------------------
// Variants
// ---------------------------------------------------------------------------

export interface PropBase<K extends PropKind> {
  readonly [PROP_BRAND]: true;
  readonly kind: K;
  readonly resolver: Resolver;
}

/** Sent on every request, including partial reloads that did not name it. */
export interface AlwaysProp extends PropBase<'always'> {}

/** Omitted until a partial reload asks for it. `optional()` builds the same record. */
export interface LazyProp extends PropBase<'lazy'> {
  readonly onceCached: boolean;
}

export interface DeferredProp extends PropBase<'deferred'> {
  /** Batch name; props sharing a group are fetched by one follow-up request. */
  readonly group: string;
  readonly onceCached: boolean;
  readonly mergeConfig: { readonly strategy: DeferredMergeStrategy } | null;
}

export interface MergeProp extends PropBase<'merge'> {
  readonly strategy: MergeStrategy;
  /** Item key the client matches on when merging, e.g. `id`. */
  readonly matchKey: string | null;
  readonly onceCached: boolean;
  /** Nested paths to append to, each with an optional match key. */
  readonly appendPaths: Readonly<Record<string, string | null>>;
  readonly prependPaths: readonly string[];
}

export interface OnceProp extends PropBase<'once'> {
  /** Client cache key; the bag key is used when null. */
  readonly cacheKey: string | null;
  /** Expiration as epoch milliseconds. */
  readonly expiresAt: number | null;
  readonly fresh: boolean;
}

export type Prop = AlwaysProp | LazyProp | DeferredProp | MergeProp | OnceProp;

/** Variants that accept the `once()` modifier. */
export type OnceCapableProp = LazyProp | DeferredProp | MergeProp;

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

export function isProp(value: unknown): value is Prop {
  return typeof value === 'object' && value !== null && PROP_BRAND in value;
}

export function isResolver(value: unknown): value is Resolver {
  return typeof value === 'function';
}

/** Cache key a once-aware prop is tracked under on the client. */
export function onceCacheKey(name: string, prop: Prop): string {
  return prop.kind === 'once' ? (prop.cacheKey ?? name) : name;
}

/** True for variants that opted into client caching. */
export function isOnceCached(prop: Prop): boolean {
  switch (prop.kind) {
    case 'once':
      return true;
    case 'lazy':
    case 'deferred':
    case 'merge':
      return prop.onceCached;
    case 'always':
      return false;
  }
}
