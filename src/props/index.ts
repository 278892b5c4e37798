/**
 * props/index.ts
 * Barrel export for prop construction.
 */

export { Props } from './prop-factory.js';
export { PropModifiers } from './prop-modifiers.js';
export type { Expiration, ExpiryDuration } from './prop-modifiers.js';
