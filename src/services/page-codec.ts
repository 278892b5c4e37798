/**
 * page-codec.ts
 * JSON encoding of the page object, and a checked decoder for pages read
 * back from a `data-page` attribute or a response body.
 */

import type { OnceEntry, Page } from '../models/page.js';
import { isPlainObject } from '../resolution/value-normalizer.js';
import { PageValidationError } from './errors.js';

export function encodePage(page: Page): string {
  return JSON.stringify(page);
}

/** Parses and shape-checks a page. Throws PageValidationError on mismatch. */
export function decodePage(json: string): Page {
  const raw: unknown = JSON.parse(json);
  if (!isPlainObject(raw)) {
    throw new PageValidationError('Encoded page is not a JSON object.');
  }

  const page: Page = {
    component: expectString(raw, 'component'),
    props: expectRecord(raw, 'props'),
    url: expectString(raw, 'url'),
    version: expectString(raw, 'version'),
    encryptHistory: expectBoolean(raw, 'encryptHistory'),
    clearHistory: expectBoolean(raw, 'clearHistory'),
  };

  // Keys such as "__proto__" must stay own properties, hence fromEntries.
  if (raw['deferredProps'] !== undefined) {
    page.deferredProps = Object.fromEntries(
      Object.entries(expectRecord(raw, 'deferredProps')).map(([group, names]): [string, string[]] => [
        group,
        expectStringList(names, `deferredProps.${group}`),
      ]),
    );
  }
  for (const field of ['mergeProps', 'prependProps', 'deepMergeProps', 'matchPropsOn'] as const) {
    if (raw[field] !== undefined) page[field] = expectStringList(raw[field], field);
  }
  if (raw['onceProps'] !== undefined) {
    page.onceProps = Object.fromEntries(
      Object.entries(expectRecord(raw, 'onceProps')).map(([key, entry]): [string, OnceEntry] => [
        key,
        expectOnceEntry(entry, `onceProps.${key}`),
      ]),
    );
  }

  return page;
}

// ---------------------------------------------------------------------------
// Field checks
// ---------------------------------------------------------------------------

function expectString(raw: Record<string, unknown>, field: string): string {
  const value = raw[field];
  if (typeof value !== 'string') {
    throw new PageValidationError(`Encoded page field "${field}" must be a string.`);
  }
  return value;
}

function expectBoolean(raw: Record<string, unknown>, field: string): boolean {
  const value = raw[field];
  if (typeof value !== 'boolean') {
    throw new PageValidationError(`Encoded page field "${field}" must be a boolean.`);
  }
  return value;
}

function expectRecord(raw: Record<string, unknown>, field: string): Record<string, unknown> {
  const value = raw[field];
  if (!isPlainObject(value)) {
    throw new PageValidationError(`Encoded page field "${field}" must be an object.`);
  }
  return value;
}

function expectStringList(value: unknown, label: string): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new PageValidationError(`Encoded page field "${label}" must be a list of strings.`);
  }
  return value;
}

function expectOnceEntry(value: unknown, label: string): OnceEntry {
  if (!isPlainObject(value)) {
    throw new PageValidationError(`Encoded page field "${label}" must be an object.`);
  }
  const prop = value['prop'];
  const expiresAt = value['expiresAt'];
  if (typeof prop !== 'string' || !(expiresAt === null || typeof expiresAt === 'number')) {
    throw new PageValidationError(
      `Encoded page field "${label}" must hold a string prop and a numeric or null expiresAt.`,
    );
  }
  return { prop, expiresAt };
}
