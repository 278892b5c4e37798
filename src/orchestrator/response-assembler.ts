/**
 * response-assembler.ts
 * Turns a prop bag into the response for one render.
 *
 * Pipeline order:
 *   1. RequestIntentParser.parse(headers, component)
 *   2. MetadataBuilder.build(bag, intent.reset)
 *   3. Version check (AJAX GET only) → 409 to the current URL on mismatch
 *   4. PropResolver.resolve(bag, intent, metadata, !intent.isAjax)
 *   5. Page assembly (metadata arrays only when non-empty)
 *   6. PageValidator.validate(page, bag) unless skipped
 *   7. JSON response (AJAX) or root view HTML (full load)
 *
 * Composers run before step 1; see Inertia.render().
 */

import type { ResolvedAdapterConfig } from '../models/adapter-config.js';
import type { InertiaRequest, InertiaResponse } from '../models/http.js';
import type { HistoryFlags, Page, PropBag } from '../models/page.js';
import { INERTIA_HEADERS } from '../models/request-intent.js';
import type { RequestIntent } from '../models/request-intent.js';
import { MetadataBuilder } from '../builders/metadata-builder.js';
import { RequestIntentParser } from '../parsers/request-intent-parser.js';
import { PropResolver } from '../resolution/prop-resolver.js';
import { PageValidator } from '../services/page-validator.js';
import { encodePage } from '../services/page-codec.js';
import { defaultViewRenderer, renderRootElement } from '../services/root-element.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';
import { Redirector } from './redirector.js';

export interface AssembleInput {
  component: string;
  bag: PropBag;
  request: InertiaRequest;
  version: string;
  rootView: string;
  history: HistoryFlags;
}

export class ResponseAssembler {
  private readonly _cfg: ResolvedAdapterConfig;
  private readonly _log: Logger;
  private readonly _metadataBuilder: MetadataBuilder;
  private readonly _resolver: PropResolver;

  constructor(cfg: ResolvedAdapterConfig, logger?: Logger) {
    this._cfg = cfg;
    this._log = logger ?? new SilentLogger();
    this._metadataBuilder = new MetadataBuilder(this._log);
    this._resolver = new PropResolver(this._log);
  }

  assemble(input: AssembleInput): InertiaResponse {
    const { component, bag, request } = input;

    // Step 1 — Intent
    const intent = RequestIntentParser.parse(request.headers, component);
    this._log.debug('Request intent parsed', ResponseAssembler._describeIntent(intent));
    if (intent.isPrefetch) {
      this._log.debug('Prefetch request', { component });
    }

    // Step 2 — Metadata
    const metadata = this._metadataBuilder.build(bag, intent.reset);

    // Step 3 — Version check
    if (ResponseAssembler.hasVersionMismatch(intent, request.method, input.version)) {
      this._log.info('Asset version mismatch; forcing full reload', {
        client: intent.clientVersion,
        server: input.version,
        url: request.url,
      });
      return Redirector.conflict(request.url);
    }

    // Step 4 — Resolve
    const props = this._resolver.resolve(bag, intent, metadata, !intent.isAjax);

    // Step 5 — Page
    const page = MetadataBuilder.attach(
      {
        component,
        props,
        url: ResponseAssembler.pageUrl(request.url),
        version: input.version,
        encryptHistory: input.history.encryptHistory,
        clearHistory: input.history.clearHistory,
      },
      metadata,
    );

    // Step 6 — Validate
    if (!this._cfg.skipValidation) {
      PageValidator.validate(page, bag);
    }

    // Step 7 — Emit
    return intent.isAjax ? this._json(page) : this._html(page, input.rootView);
  }

  /** Mismatch only counts for AJAX GET requests that sent a version. */
  static hasVersionMismatch(intent: RequestIntent, method: string, version: string): boolean {
    return (
      intent.isAjax &&
      method.toUpperCase() === 'GET' &&
      intent.clientVersion !== null &&
      intent.clientVersion !== version
    );
  }

  /** Path and query of the request URL, as the client router expects. */
  static pageUrl(url: string): string {
    const parsed = new URL(url, 'http://localhost');
    return parsed.pathname + parsed.search;
  }

  // ---------------------------------------------------------------------------
  // Emission
  // ---------------------------------------------------------------------------

  private _json(page: Page): InertiaResponse {
    this._log.debug('Emitting JSON page', { component: page.component });
    return {
      status: 200,
      headers: {
        'Content-Type': 'application/json',
        [INERTIA_HEADERS.INERTIA]: 'true',
        Vary: INERTIA_HEADERS.INERTIA,
      },
      body: encodePage(page),
    };
  }

  private _html(page: Page, rootView: string): InertiaResponse {
    this._log.debug('Rendering root view', { component: page.component, rootView });
    const render = this._cfg.render ?? defaultViewRenderer;
    const body = render(rootView, {
      page,
      rootElement: renderRootElement(page, this._cfg.rootElementId),
    });
    return {
      status: 200,
      headers: {
        'Content-Type': 'text/html; charset=utf-8',
        Vary: INERTIA_HEADERS.INERTIA,
      },
      body,
    };
  }

  private static _describeIntent(intent: RequestIntent): Record<string, unknown> {
    return {
      ajax: intent.isAjax,
      partial: intent.isPartialReload,
      only: [...intent.only],
      except: [...intent.except],
      exceptOnce: [...intent.exceptOnce],
      reset: [...intent.reset],
      prefetch: intent.isPrefetch,
    };
  }
}
