/**
 * prop-resolver.ts
 * Decides, per bag entry, whether it is sent and with what value.
 *
 * Initial (non-AJAX) load: everything except deferred and lazy props is
 * resolved.
 *
 * AJAX load, in order:
 *   1. partial reload and name ∈ except                         → drop
 *   2. partial reload, only ≠ ∅, name ∉ only, not an always prop,
 *      name not in {errors, flash}                              → drop
 *   3. by kind:
 *      once     drop when its cache key ∈ exceptOnce, unless named in
 *               `only`, fresh, or reset
 *      deferred send only on a partial reload that wants it
 *      lazy     same as deferred; also drop when once-cached and held by
 *               the client (unless reset)
 *      merge    drop when once-cached, held by the client, not named in
 *               `only` and not reset
 *      always, functions, raw values → send
 *
 * Each resolver runs at most once per call. Resolver exceptions are not
 * caught; no partial result is returned.
 */

import { isProp, isResolver } from '../models/props.js';
import type { Prop } from '../models/props.js';
import type { PageMetadata, PropBag, ResolvedProps } from '../models/page.js';
import type { RequestIntent } from '../models/request-intent.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';
import { ValueNormalizer, toPresentationValue } from './value-normalizer.js';

/** Names that bypass the `only` filter of a partial reload. */
export const ALWAYS_SENT_NAMES: ReadonlySet<string> = new Set(['errors', 'flash']);

type Decision = 'send' | 'drop';

export class PropResolver {
  private readonly _log: Logger;

  constructor(logger?: Logger) {
    this._log = logger ?? new SilentLogger();
  }

  resolve(
    bag: PropBag,
    intent: RequestIntent,
    metadata: PageMetadata,
    isInitialLoad: boolean,
  ): ResolvedProps {
    const cacheKeys = PropResolver._cacheKeysByProp(metadata);
    const entries: [string, unknown][] = [];
    const dropped: string[] = [];

    for (const [name, value] of bag) {
      const decision = isInitialLoad
        ? PropResolver._decideInitial(value)
        : PropResolver._decideAjax(name, value, intent, cacheKeys.get(name) ?? name);

      if (decision === 'drop') {
        dropped.push(name);
        continue;
      }
      entries.push([name, PropResolver._present(value)]);
    }

    this._log.debug('Props resolved', {
      initialLoad: isInitialLoad,
      partialReload: intent.isPartialReload,
      sent: entries.map(([name]) => name),
      dropped,
    });

    return Object.fromEntries(entries);
  }

  // ---------------------------------------------------------------------------
  // Policy
  // ---------------------------------------------------------------------------

  private static _decideInitial(value: unknown): Decision {
    if (isProp(value) && (value.kind === 'deferred' || value.kind === 'lazy')) {
      return 'drop';
    }
    return 'send';
  }

  private static _decideAjax(
    name: string,
    value: unknown,
    intent: RequestIntent,
    cacheKey: string,
  ): Decision {
    const partial = intent.isPartialReload;
    const hasOnly = partial && intent.only.size > 0;

    if (partial && intent.except.has(name)) return 'drop';

    const bypassesOnly =
      (isProp(value) && value.kind === 'always') || ALWAYS_SENT_NAMES.has(name);
    if (hasOnly && !intent.only.has(name) && !bypassesOnly) return 'drop';

    if (!isProp(value)) return 'send';

    const explicitlyRequested = hasOnly && intent.only.has(name);
    const wantedByPartial = partial && (intent.only.size === 0 || intent.only.has(name));
    const heldByClient = intent.exceptOnce.has(cacheKey) && !intent.reset.has(name);

    return PropResolver._decideProp(value, {
      explicitlyRequested,
      wantedByPartial,
      heldByClient,
    });
  }

  private static _decideProp(
    prop: Prop,
    ctx: { explicitlyRequested: boolean; wantedByPartial: boolean; heldByClient: boolean },
  ): Decision {
    switch (prop.kind) {
      case 'once':
        return ctx.heldByClient && !ctx.explicitlyRequested && !prop.fresh ? 'drop' : 'send';
      case 'deferred':
        return ctx.wantedByPartial ? 'send' : 'drop';
      case 'lazy':
        if (!ctx.wantedByPartial) return 'drop';
        return prop.onceCached && ctx.heldByClient ? 'drop' : 'send';
      case 'merge':
        return prop.onceCached && ctx.heldByClient && !ctx.explicitlyRequested ? 'drop' : 'send';
      case 'always':
        return 'send';
    }
  }

  // ---------------------------------------------------------------------------
  // Values
  // ---------------------------------------------------------------------------

  private static _present(value: unknown): unknown {
    if (isProp(value)) return toPresentationValue(value);
    if (isResolver(value)) return ValueNormalizer.normalize(value());
    return ValueNormalizer.normalize(value);
  }

  /** prop name → the cache key the client was told about. */
  private static _cacheKeysByProp(metadata: PageMetadata): Map<string, string> {
    const keys = new Map<string, string>();
    for (const [cacheKey, entry] of Object.entries(metadata.onceProps)) {
      keys.set(entry.prop, cacheKey);
    }
    return keys;
  }
}
