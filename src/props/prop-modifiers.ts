/**
 * prop-modifiers.ts
 * Secondary behavior layered onto an existing Prop.
 *
 * Each modifier returns a new record and leaves its input untouched, so a
 * prop shared at startup can be specialised per page without leaking:
 *
 *   const roles = Props.once(() => repo.roles());
 *   share('roles', PropModifiers.as(roles, 'roles'));
 */

import type {
  DeferredProp,
  MergeProp,
  OnceCapableProp,
  OnceProp,
} from '../models/props.js';

/** Relative expiry. Units add up: `{ hours: 1, minutes: 30 }`. */
export interface ExpiryDuration {
  seconds?: number;
  minutes?: number;
  hours?: number;
  days?: number;
}

/** Absolute date, relative duration, or a number of seconds from now. */
export type Expiration = Date | ExpiryDuration | number;

export class PropModifiers {
  /** Let the client cache a lazy, deferred or merge prop like a once prop. */
  static once<P extends OnceCapableProp>(prop: P): P {
    return { ...prop, onceCached: true };
  }

  /** Merge a deferred prop into existing client data once it arrives. */
  static merge(prop: DeferredProp): DeferredProp {
    return { ...prop, mergeConfig: { strategy: 'append' } };
  }

  static deepMerge(prop: DeferredProp): DeferredProp {
    return { ...prop, mergeConfig: { strategy: 'deep' } };
  }

  /** Resend even when the client reports the value as cached. */
  static fresh(prop: OnceProp, fresh = true): OnceProp {
    return { ...prop, fresh };
  }

  static as(prop: OnceProp, cacheKey: string): OnceProp {
    return { ...prop, cacheKey };
  }

  static until(prop: OnceProp, expiration: Expiration, now: number = Date.now()): OnceProp {
    return { ...prop, expiresAt: PropModifiers._expiresAt(expiration, now) };
  }

  static matchOn(prop: MergeProp, matchKey: string): MergeProp {
    return { ...prop, matchKey };
  }

  /**
   * Switch to append and target nested paths. `paths` is one path, a list
   * of paths, or a record of path → match key.
   */
  static append(
    prop: MergeProp,
    paths: string | readonly string[] | Readonly<Record<string, string | null>>,
    matchOn: string | null = null,
  ): MergeProp {
    const appendPaths = new Map(Object.entries(prop.appendPaths));
    if (typeof paths === 'string') {
      appendPaths.set(paths, matchOn);
    } else if (PropModifiers._isPathList(paths)) {
      for (const path of paths) appendPaths.set(path, null);
    } else {
      for (const [path, match] of Object.entries(paths)) appendPaths.set(path, match);
    }
    return { ...prop, strategy: 'append', appendPaths: Object.fromEntries(appendPaths) };
  }

  static prepend(
    prop: MergeProp,
    paths: string | readonly string[] | null = null,
  ): MergeProp {
    let prependPaths = prop.prependPaths;
    if (typeof paths === 'string') {
      prependPaths = [...prependPaths, paths];
    } else if (paths !== null) {
      prependPaths = [...prependPaths, ...paths];
    }
    return { ...prop, strategy: 'prepend', prependPaths };
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private static _isPathList(
    paths: readonly string[] | Readonly<Record<string, string | null>>,
  ): paths is readonly string[] {
    return Array.isArray(paths);
  }

  private static _expiresAt(expiration: Expiration, now: number): number {
    if (expiration instanceof Date) {
      return expiration.getTime();
    }
    if (typeof expiration === 'number') {
      return now + Math.trunc(expiration * 1000);
    }
    const seconds =
      (expiration.seconds ?? 0) +
      (expiration.minutes ?? 0) * 60 +
      (expiration.hours ?? 0) * 3600 +
      (expiration.days ?? 0) * 86400;
    return now + Math.trunc(seconds * 1000);
  }
}
