/**
 * services/index.ts
 * Barrel export for the adapter's utility services.
 */

export { SharedRegistry, WILDCARD_COMPONENT } from './shared-registry.js';
export type { Composer, ShareOnceOptions } from './shared-registry.js';
export { ConfigResolver } from './config-resolver.js';
export { PageValidator } from './page-validator.js';
export { FileService } from './file-service.js';
export { encodePage, decodePage } from './page-codec.js';
export { escapeHtml, renderRootElement, defaultViewRenderer } from './root-element.js';
export {
  InertiaError,
  PageValidationError,
  RegistryFrozenError,
  ConfigError,
} from './errors.js';
export { ConsoleLogger, MemoryLogger, SilentLogger } from './logger.js';
export type { Logger, LogLevel, LogEntry } from './logger.js';
