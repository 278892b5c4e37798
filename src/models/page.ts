/**
 * page.ts
 * Prop-bag metadata and the page object sent to the client.
 *
 * The Page is the only entity serialized across the wire. Metadata arrays
 * are attached only when non-empty.
 */

/** Ordered mapping from prop name to a raw value, a computation, or a Prop. */
export type PropBag = ReadonlyMap<string, unknown>;

export type ResolvedProps = Record<string, unknown>;

export interface OnceEntry {
  /** Bag key the value is sent under. */
  prop: string;
  /** Epoch milliseconds, or null for no expiry. */
  expiresAt: number | null;
}

export interface PageMetadata {
  /** group → prop names, in bag order. */
  deferredProps: Record<string, string[]>;
  mergeProps: string[];
  prependProps: string[];
  deepMergeProps: string[];
  /** `"prop.matchKey"` entries. */
  matchPropsOn: string[];
  /** cache key → entry. */
  onceProps: Record<string, OnceEntry>;
}

export interface HistoryFlags {
  encryptHistory: boolean;
  clearHistory: boolean;
}

export interface Page extends HistoryFlags {
  component: string;
  props: ResolvedProps;
  url: string;
  version: string;
  deferredProps?: Record<string, string[]>;
  mergeProps?: string[];
  prependProps?: string[];
  deepMergeProps?: string[];
  matchPropsOn?: string[];
  onceProps?: Record<string, OnceEntry>;
}

export function emptyMetadata(): PageMetadata {
  return {
    deferredProps: {},
    mergeProps: [],
    prependProps: [],
    deepMergeProps: [],
    matchPropsOn: [],
    onceProps: {},
  };
}
