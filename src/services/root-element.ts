/**
 * root-element.ts
 * HTML for full-page loads: the element hosting the client app, and a
 * minimal document used when no view renderer is configured.
 */

import type { RootViewData, ViewRenderer } from '../models/adapter-config.js';
import type { Page } from '../models/page.js';
import { encodePage } from './page-codec.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#039;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** `<div id="app" data-page="{&quot;component&quot;:…}"></div>` */
export function renderRootElement(page: Page | string, elementId = 'app'): string {
  const json = typeof page === 'string' ? page : encodePage(page);
  return `<div id="${escapeHtml(elementId)}" data-page="${escapeHtml(json)}"></div>`;
}

export const defaultViewRenderer: ViewRenderer = (_view: string, data: RootViewData): string =>
  [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    '<meta charset="utf-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1">',
    '</head>',
    '<body>',
    data.rootElement,
    '</body>',
    '</html>',
  ].join('\n');
