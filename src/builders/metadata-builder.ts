/**
 * metadata-builder.ts
 * Derives the protocol metadata of a prop bag without resolving any value.
 *
 * Per entry:
 *   deferred → its group's list; attached merge config → mergeProps /
 *              deepMergeProps; once-cached → onceProps[name]
 *   merge    → mergeProps / prependProps / deepMergeProps by strategy
 *              (one "name.path" entry per nested path when paths are set);
 *              match key → matchPropsOn; once-cached → onceProps[name]
 *   lazy     → once-cached → onceProps[name]
 *   once     → onceProps[cacheKey ?? name] with its expiry
 *
 * Group names and cache keys come from callers, so both maps are collected
 * in Maps and turned into records at the end.
 *
 * Names the client asked to reset are left out of the merge lists: the
 * client drops its copy, so there is nothing to merge into.
 */

import { isOnceCached, isProp, onceCacheKey } from '../models/props.js';
import type { DeferredProp, MergeProp } from '../models/props.js';
import { emptyMetadata } from '../models/page.js';
import type { OnceEntry, Page, PageMetadata, PropBag } from '../models/page.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

export class MetadataBuilder {
  private readonly _log: Logger;

  constructor(logger?: Logger) {
    this._log = logger ?? new SilentLogger();
  }

  build(bag: PropBag, reset: ReadonlySet<string> = new Set()): PageMetadata {
    const metadata = emptyMetadata();
    const deferred = new Map<string, string[]>();
    const once = new Map<string, OnceEntry>();

    for (const [name, value] of bag) {
      if (!isProp(value)) continue;

      if (isOnceCached(value)) {
        once.set(onceCacheKey(name, value), {
          prop: name,
          expiresAt: value.kind === 'once' ? value.expiresAt : null,
        });
      }

      if (value.kind === 'deferred') {
        this._addDeferred(metadata, deferred, name, value, reset);
      } else if (value.kind === 'merge') {
        this._addMerge(metadata, name, value, reset);
      }
    }

    metadata.deferredProps = Object.fromEntries(deferred);
    metadata.onceProps = Object.fromEntries(once);

    this._log.debug('Prop metadata extracted', {
      deferredGroups: deferred.size,
      mergeProps: metadata.mergeProps.length,
      prependProps: metadata.prependProps.length,
      deepMergeProps: metadata.deepMergeProps.length,
      onceProps: once.size,
    });

    return metadata;
  }

  /** Returns a copy of the page carrying the non-empty parts of the metadata. */
  static attach(page: Page, metadata: PageMetadata): Page {
    const result: Page = { ...page };
    if (Object.keys(metadata.deferredProps).length > 0) result.deferredProps = metadata.deferredProps;
    if (metadata.mergeProps.length > 0) result.mergeProps = metadata.mergeProps;
    if (metadata.prependProps.length > 0) result.prependProps = metadata.prependProps;
    if (metadata.deepMergeProps.length > 0) result.deepMergeProps = metadata.deepMergeProps;
    if (metadata.matchPropsOn.length > 0) result.matchPropsOn = metadata.matchPropsOn;
    if (Object.keys(metadata.onceProps).length > 0) result.onceProps = metadata.onceProps;
    return result;
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private _addDeferred(
    metadata: PageMetadata,
    groups: Map<string, string[]>,
    name: string,
    prop: DeferredProp,
    reset: ReadonlySet<string>,
  ): void {
    const group = groups.get(prop.group) ?? [];
    group.push(name);
    groups.set(prop.group, group);

    if (prop.mergeConfig !== null && !reset.has(name)) {
      if (prop.mergeConfig.strategy === 'append') {
        metadata.mergeProps.push(name);
      } else {
        metadata.deepMergeProps.push(name);
      }
    }
  }

  private _addMerge(
    metadata: PageMetadata,
    name: string,
    prop: MergeProp,
    reset: ReadonlySet<string>,
  ): void {
    if (reset.has(name)) {
      this._log.debug('Merge metadata skipped for reset prop', { prop: name });
      return;
    }

    switch (prop.strategy) {
      case 'append': {
        const paths = Object.entries(prop.appendPaths);
        if (paths.length === 0) {
          metadata.mergeProps.push(name);
        }
        for (const [path, match] of paths) {
          metadata.mergeProps.push(`${name}.${path}`);
          if (match !== null) metadata.matchPropsOn.push(`${name}.${path}.${match}`);
        }
        break;
      }
      case 'prepend':
        if (prop.prependPaths.length === 0) {
          metadata.prependProps.push(name);
        }
        for (const path of prop.prependPaths) {
          metadata.prependProps.push(`${name}.${path}`);
        }
        break;
      case 'deep':
        metadata.deepMergeProps.push(name);
        break;
    }

    if (prop.matchKey !== null) {
      metadata.matchPropsOn.push(`${name}.${prop.matchKey}`);
    }
  }
}
