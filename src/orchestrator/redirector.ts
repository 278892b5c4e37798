/**
 * redirector.ts
 * Redirect responses following the protocol's conventions.
 *
 * - 302 becomes 303 after PUT/PATCH/DELETE, so the browser re-issues a GET
 *   instead of prompting to resubmit.
 * - An AJAX request cannot follow a cross-origin redirect; it gets 409 with
 *   X-Inertia-Location and the client performs a full visit.
 */

import type { InertiaRequest, InertiaResponse } from '../models/http.js';
import { INERTIA_HEADERS } from '../models/request-intent.js';
import { RequestIntentParser } from '../parsers/request-intent-parser.js';
import { InertiaError } from '../services/errors.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

const SEE_OTHER_METHODS: ReadonlySet<string> = new Set(['PUT', 'PATCH', 'DELETE']);

export class Redirector {
  private readonly _request: InertiaRequest;
  private readonly _log: Logger;

  constructor(request: InertiaRequest, logger?: Logger) {
    this._request = request;
    this._log = logger ?? new SilentLogger();
  }

  redirect(url: string, status = 302): InertiaResponse {
    if (!Number.isInteger(status) || status < 300 || status > 399) {
      throw new InertiaError(`Redirect status must be a 3xx code, got ${status}.`);
    }

    const method = this._request.method.toUpperCase();
    const effectiveStatus = status === 302 && SEE_OTHER_METHODS.has(method) ? 303 : status;

    if (this._isAjax() && this.isExternalUrl(url)) {
      this._log.info('External redirect under AJAX request; sending 409', { url });
      return Redirector.conflict(url);
    }

    this._log.debug('Redirect', { url, status: effectiveStatus, method });
    return { status: effectiveStatus, headers: { Location: url }, body: null };
  }

  /** Redirect to the Referer, or `/` when the request carries none. */
  back(status = 302): InertiaResponse {
    const referer = this._request.headers.get('Referer');
    return this.redirect(referer !== null && referer !== '' ? referer : '/', status);
  }

  /** Full-page visit to `url`: 409 for AJAX requests, a plain redirect otherwise. */
  location(url: string): InertiaResponse {
    if (this._isAjax()) return Redirector.conflict(url);
    return { status: 302, headers: { Location: url }, body: null };
  }

  /** Makes the client reload the current URL, e.g. after an asset version change. */
  forceRefresh(): InertiaResponse {
    return Redirector.conflict(this._request.url);
  }

  /**
   * True for absolute http(s) URLs whose origin differs from the request's.
   * A URL that does not parse (e.g. a malformed Referer) counts as internal.
   */
  isExternalUrl(url: string): boolean {
    if (!url.startsWith('http://') && !url.startsWith('https://')) return false;
    try {
      return new URL(url).origin !== new URL(this._request.url, 'http://localhost').origin;
    } catch {
      this._log.debug('Unparseable redirect URL treated as internal', { url });
      return false;
    }
  }

  static conflict(location: string): InertiaResponse {
    return { status: 409, headers: { [INERTIA_HEADERS.LOCATION]: location }, body: null };
  }

  private _isAjax(): boolean {
    return RequestIntentParser.isInertiaRequest(this._request.headers);
  }
}
