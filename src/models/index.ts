/**
 * models/index.ts
 * Barrel export for the model package.
 */

export type {
  Resolver,
  PropKind,
  MergeStrategy,
  DeferredMergeStrategy,
  PropBase,
  AlwaysProp,
  LazyProp,
  DeferredProp,
  MergeProp,
  OnceProp,
  Prop,
  OnceCapableProp,
} from './props.js';

export { PROP_BRAND, isProp, isResolver, onceCacheKey, isOnceCached } from './props.js';

export type { HeaderSource, RequestIntent } from './request-intent.js';
export { INERTIA_HEADERS } from './request-intent.js';

export type {
  PropBag,
  ResolvedProps,
  OnceEntry,
  PageMetadata,
  HistoryFlags,
  Page,
} from './page.js';

export { emptyMetadata } from './page.js';

export type {
  ErrorBag,
  FlashKind,
  SessionSource,
  InertiaRequest,
  InertiaResponse,
} from './http.js';

export type {
  RootViewData,
  ViewRenderer,
  AdapterConfig,
  ResolvedAdapterConfig,
} from './adapter-config.js';
