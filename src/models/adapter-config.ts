/**
 * adapter-config.ts
 * Configuration for the Inertia adapter.
 */

import type { Page } from './page.js';

/** Data handed to the root view on a full-page (non-AJAX) render. */
export interface RootViewData {
  page: Page;
  /** Ready-to-embed `<div id="…" data-page="…"></div>` markup. */
  rootElement: string;
}

/**
 * Renders the root view for a full-page load. View resolution is the
 * caller's concern; the adapter only passes the view name through.
 */
export type ViewRenderer = (view: string, data: RootViewData) => string;

export interface AdapterConfig {
  /** Root view name passed to the renderer. Defaults to "app". */
  rootView?: string;
  /** `id` of the element that hosts the client app. Defaults to "app". */
  rootElementId?: string;
  /** Asset version. A thunk is evaluated once per adapter instance. Defaults to "1.0". */
  version?: string | (() => string);
  /**
   * Build manifest (e.g. `build/.vite/manifest.json`), relative to
   * `publicRoot`. When present on disk its md5 becomes the version.
   */
  manifestPath?: string;
  publicRoot?: string;
  render?: ViewRenderer;
  /** Skip page invariant checks before emission. Defaults to false. */
  skipValidation?: boolean;
}

/** AdapterConfig with defaults applied. */
export interface ResolvedAdapterConfig {
  rootView: string;
  rootElementId: string;
  version: string | (() => string);
  manifestPath: string | null;
  publicRoot: string;
  render: ViewRenderer | null;
  skipValidation: boolean;
}
