/**
 * inertia.ts
 * Per-request adapter: what controllers and composers talk to.
 *
 * Holds only per-request state (root view, version, history flags, props
 * shared during this request). Build one per request; never reuse an
 * instance across requests.
 */

import type { ResolvedAdapterConfig } from '../models/adapter-config.js';
import type { InertiaRequest, InertiaResponse } from '../models/http.js';
import type { Page } from '../models/page.js';
import { PropBagBuilder } from '../builders/prop-bag-builder.js';
import { ResponseAssembler } from '../orchestrator/response-assembler.js';
import { Redirector } from '../orchestrator/redirector.js';
import { ConfigResolver } from '../services/config-resolver.js';
import { renderRootElement } from '../services/root-element.js';
import { SharedRegistry } from '../services/shared-registry.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

export interface InertiaOptions {
  registry?: SharedRegistry;
  logger?: Logger;
  /** Precomputed asset version; otherwise derived from the config. */
  version?: string;
}

export class Inertia {
  private readonly _request: InertiaRequest;
  private readonly _cfg: ResolvedAdapterConfig;
  private readonly _registry: SharedRegistry;
  private readonly _log: Logger;
  private readonly _redirector: Redirector;
  private readonly _shared = new Map<string, unknown>();

  private _rootView: string;
  private _version: string;
  private _encryptHistory = false;
  private _clearHistory = false;

  constructor(request: InertiaRequest, cfg: ResolvedAdapterConfig, options: InertiaOptions = {}) {
    this._request = request;
    this._cfg = cfg;
    this._registry = options.registry ?? new SharedRegistry();
    this._log = options.logger ?? new SilentLogger();
    this._redirector = new Redirector(request, this._log);
    this._rootView = cfg.rootView;
    this._version = options.version ?? ConfigResolver.version(cfg, this._log);
  }

  get request(): InertiaRequest {
    return this._request;
  }

  setRootView(view: string): void {
    this._rootView = view;
  }

  setVersion(version: string): void {
    this._version = version;
  }

  getVersion(): string {
    return this._version;
  }

  withEncryptedHistory(encrypt = true): this {
    this._encryptHistory = encrypt;
    return this;
  }

  withClearedHistory(clear = true): this {
    this._clearHistory = clear;
    return this;
  }

  /** Shares props with this render only; the registry is left untouched. */
  share(key: string, value: unknown): this;
  share(values: Record<string, unknown>): this;
  share(keyOrValues: string | Record<string, unknown>, value?: unknown): this {
    if (typeof keyOrValues === 'string') {
      this._shared.set(keyOrValues, value);
    } else {
      for (const [key, item] of Object.entries(keyOrValues)) this._shared.set(key, item);
    }
    return this;
  }

  render(component: string, props: Record<string, unknown> = {}): InertiaResponse {
    const composers = this._registry.composersFor(component);
    this._log.debug('Running composers', { component, count: composers.length });
    for (const composer of composers) {
      composer(this);
    }

    const bag = PropBagBuilder.build(this._request.session, [
      this._registry.getShared(),
      this._shared,
      new Map(Object.entries(props)),
    ]);

    return new ResponseAssembler(this._cfg, this._log).assemble({
      component,
      bag,
      request: this._request,
      version: this._version,
      rootView: this._rootView,
      history: { encryptHistory: this._encryptHistory, clearHistory: this._clearHistory },
    });
  }

  redirect(url: string, status = 302): InertiaResponse {
    return this._redirector.redirect(url, status);
  }

  back(status = 302): InertiaResponse {
    return this._redirector.back(status);
  }

  location(url: string): InertiaResponse {
    return this._redirector.location(url);
  }

  forceRefresh(): InertiaResponse {
    return this._redirector.forceRefresh();
  }

  renderRootElement(page: Page | string = '{}'): string {
    return renderRootElement(page, this._cfg.rootElementId);
  }
}
