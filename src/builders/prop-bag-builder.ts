/**
 * prop-bag-builder.ts
 * Assembles the ordered prop bag for one render.
 *
 * Precedence (later wins, first insertion keeps its position):
 *   1. base props { errors, flash, auth }
 *   2. registry-shared props
 *   3. props shared during this request (composers, controllers)
 *   4. component props
 */

import type { ErrorBag, FlashKind, SessionSource } from '../models/http.js';
import type { PropBag } from '../models/page.js';

const FLASH_KINDS: readonly FlashKind[] = ['info', 'success', 'error'];

export class PropBagBuilder {
  static build(
    session: SessionSource | undefined,
    layers: readonly ReadonlyMap<string, unknown>[],
  ): PropBag {
    const bag = new Map<string, unknown>(Object.entries(PropBagBuilder.baseProps(session)));
    for (const layer of layers) {
      for (const [key, value] of layer) bag.set(key, value);
    }
    return bag;
  }

  static baseProps(session: SessionSource | undefined): Record<string, unknown> {
    return {
      errors: PropBagBuilder.firstMessages(session?.errors?.() ?? {}),
      flash: PropBagBuilder._flash(session),
      auth: { user: () => session?.user?.() ?? null },
    };
  }

  /** Field → first message. */
  static firstMessages(errors: ErrorBag): Record<string, string> {
    const result = new Map<string, string>();
    for (const [field, messages] of Object.entries(errors)) {
      const first = typeof messages === 'string' ? messages : messages[0];
      if (first !== undefined) result.set(field, first);
    }
    return Object.fromEntries(result);
  }

  private static _flash(session: SessionSource | undefined): Record<string, string> {
    const result: Record<string, string> = {};
    if (session === undefined || session.flash === undefined) return result;
    for (const kind of FLASH_KINDS) {
      const message = session.flash(kind);
      if (message !== null && message !== undefined && message !== '') result[kind] = message;
    }
    return result;
  }
}
