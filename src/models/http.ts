/**
 * http.ts
 * Framework-neutral request and response shapes.
 *
 * The adapter never touches a server library directly; `http/` converts
 * these to and from hono's request/response objects.
 */

import type { HeaderSource } from './request-intent.js';

/** Validation messages per field; only the first message of an array is sent. */
export type ErrorBag = Record<string, string | readonly string[]>;

export type FlashKind = 'info' | 'success' | 'error';

/**
 * Session and auth lookups are collaborators; each accessor is optional and
 * treated as empty when missing.
 */
export interface SessionSource {
  errors?(): ErrorBag;
  flash?(kind: FlashKind): string | null | undefined;
  user?(): unknown;
}

export interface InertiaRequest {
  /** Upper- or lower-case HTTP method. */
  method: string;
  /** Absolute request URL, e.g. `https://app.test/users?page=2`. */
  url: string;
  headers: HeaderSource;
  session?: SessionSource;
}

export interface InertiaResponse {
  status: number;
  headers: Record<string, string>;
  /** Null for redirects and 409 location responses. */
  body: string | null;
}
