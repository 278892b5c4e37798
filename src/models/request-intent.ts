/**
 * request-intent.ts
 * What the client asked for, decoded from the protocol headers.
 */

/** Protocol header names. Lookups are case-insensitive. */
export const INERTIA_HEADERS = {
  INERTIA: 'X-Inertia',
  VERSION: 'X-Inertia-Version',
  PARTIAL_COMPONENT: 'X-Inertia-Partial-Component',
  PARTIAL_DATA: 'X-Inertia-Partial-Data',
  PARTIAL_EXCEPT: 'X-Inertia-Partial-Except',
  EXCEPT_ONCE_PROPS: 'X-Inertia-Except-Once-Props',
  RESET: 'X-Inertia-Reset',
  LOCATION: 'X-Inertia-Location',
  PURPOSE: 'Purpose',
} as const;

/** Minimal header reader; the standard `Headers` class satisfies it. */
export interface HeaderSource {
  get(name: string): string | null;
}

export interface RequestIntent {
  readonly isAjax: boolean;
  /** True only when the partial component header names the component being rendered. */
  readonly isPartialReload: boolean;
  readonly only: ReadonlySet<string>;
  readonly except: ReadonlySet<string>;
  /** Cache keys of once props the client already holds. */
  readonly exceptOnce: ReadonlySet<string>;
  readonly reset: ReadonlySet<string>;
  readonly isPrefetch: boolean;
  /** Asset version the client was built against, or null when not sent. */
  readonly clientVersion: string | null;
}
