/**
 * request-intent-parser.ts
 * Decodes the protocol headers into a RequestIntent.
 *
 * Never throws: absent, empty or malformed list headers yield empty sets.
 */

import { INERTIA_HEADERS } from '../models/request-intent.js';
import type { HeaderSource, RequestIntent } from '../models/request-intent.js';

export class RequestIntentParser {
  /**
   * @param component  Name of the component being rendered. A partial reload
   *                   aimed at another component counts as a full load.
   */
  static parse(headers: HeaderSource, component: string): RequestIntent {
    const isAjax = RequestIntentParser.isInertiaRequest(headers);
    const partialComponent = headers.get(INERTIA_HEADERS.PARTIAL_COMPONENT);

    return {
      isAjax,
      isPartialReload: isAjax && partialComponent !== null && partialComponent === component,
      only: RequestIntentParser.parseList(headers.get(INERTIA_HEADERS.PARTIAL_DATA)),
      except: RequestIntentParser.parseList(headers.get(INERTIA_HEADERS.PARTIAL_EXCEPT)),
      exceptOnce: RequestIntentParser.parseList(headers.get(INERTIA_HEADERS.EXCEPT_ONCE_PROPS)),
      reset: RequestIntentParser.parseList(headers.get(INERTIA_HEADERS.RESET)),
      isPrefetch: headers.get(INERTIA_HEADERS.PURPOSE) === 'prefetch',
      clientVersion: headers.get(INERTIA_HEADERS.VERSION),
    };
  }

  /** Presence of the marker header; its value is not inspected. */
  static isInertiaRequest(headers: HeaderSource): boolean {
    const marker = headers.get(INERTIA_HEADERS.INERTIA);
    return marker !== null && marker !== '';
  }

  /** Comma-separated list → set of trimmed, non-blank names. */
  static parseList(raw: string | null): Set<string> {
    const names = new Set<string>();
    if (raw === null || raw === '') return names;

    for (const segment of raw.split(',')) {
      const name = segment.trim();
      if (name !== '') names.add(name);
    }
    return names;
  }
}
