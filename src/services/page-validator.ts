/**
 * page-validator.ts
 * Page invariant checks run right before a page is emitted.
 * Throws PageValidationError on the first violation found.
 *
 * Rules enforced:
 *   1. component is a non-empty string.
 *   2. Every prop name listed in deferredProps and in the merge lists
 *      exists in the prop bag.
 *   3. Every onceProps entry points at a prop of the bag and carries a null
 *      or integer expiresAt.
 *   4. Metadata arrays/maps are either absent or non-empty.
 */

import type { Page, PropBag } from '../models/page.js';
import { PageValidationError } from './errors.js';

const LIST_FIELDS = ['mergeProps', 'prependProps', 'deepMergeProps', 'matchPropsOn'] as const;

export class PageValidator {
  static validate(page: Page, bag: PropBag): void {
    PageValidator._validateComponent(page);
    PageValidator._validateDeferred(page, bag);
    PageValidator._validateMergeLists(page, bag);
    PageValidator._validateOnce(page, bag);
  }

  // ---------------------------------------------------------------------------
  // Rule 1
  // ---------------------------------------------------------------------------

  private static _validateComponent(page: Page): void {
    if (page.component.trim() === '') {
      throw new PageValidationError('Rule 1 violation: page component name is empty.');
    }
  }

  // ---------------------------------------------------------------------------
  // Rules 2 and 4 — deferred groups and merge lists
  // ---------------------------------------------------------------------------

  private static _validateDeferred(page: Page, bag: PropBag): void {
    if (page.deferredProps === undefined) return;

    const groups = Object.entries(page.deferredProps);
    if (groups.length === 0) {
      throw new PageValidationError('Rule 4 violation: deferredProps is present but empty.');
    }
    for (const [group, names] of groups) {
      for (const name of names) {
        if (!bag.has(name)) {
          throw new PageValidationError(
            `Rule 2 violation: deferred group "${group}" lists "${name}" ` +
            `which is not in the prop bag.`,
          );
        }
      }
    }
  }

  private static _validateMergeLists(page: Page, bag: PropBag): void {
    for (const field of LIST_FIELDS) {
      const list = page[field];
      if (list === undefined) continue;
      if (list.length === 0) {
        throw new PageValidationError(`Rule 4 violation: ${field} is present but empty.`);
      }
      for (const entry of list) {
        if (!PageValidator._ownedByBag(entry, bag)) {
          throw new PageValidationError(
            `Rule 2 violation: ${field} lists "${entry}" which names no prop of the bag.`,
          );
        }
      }
    }
  }

  /** Entries are "prop", "prop.path" or "prop.path.matchKey"; prop names may contain dots. */
  private static _ownedByBag(entry: string, bag: PropBag): boolean {
    if (bag.has(entry)) return true;
    for (const key of bag.keys()) {
      if (entry.startsWith(key + '.')) return true;
    }
    return false;
  }

  // ---------------------------------------------------------------------------
  // Rule 3
  // ---------------------------------------------------------------------------

  private static _validateOnce(page: Page, bag: PropBag): void {
    if (page.onceProps === undefined) return;

    const entries = Object.entries(page.onceProps);
    if (entries.length === 0) {
      throw new PageValidationError('Rule 4 violation: onceProps is present but empty.');
    }
    for (const [cacheKey, entry] of entries) {
      if (!bag.has(entry.prop)) {
        throw new PageValidationError(
          `Rule 3 violation: once entry "${cacheKey}" points at "${entry.prop}" ` +
          `which is not in the prop bag.`,
        );
      }
      if (entry.expiresAt !== null && !Number.isInteger(entry.expiresAt)) {
        throw new PageValidationError(
          `Rule 3 violation: once entry "${cacheKey}" has non-integer expiresAt ${entry.expiresAt}.`,
        );
      }
    }
  }
}
