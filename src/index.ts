/**
 * index.ts
 * Public surface of the adapter.
 */

export * from './models/index.js';
export { Props, PropModifiers } from './props/index.js';
export type { Expiration, ExpiryDuration } from './props/index.js';

export { RequestIntentParser } from './parsers/request-intent-parser.js';
export { MetadataBuilder } from './builders/metadata-builder.js';
export { PropBagBuilder } from './builders/prop-bag-builder.js';
export { PropResolver, ALWAYS_SENT_NAMES } from './resolution/prop-resolver.js';
export {
  ValueNormalizer,
  resolveProp,
  toPresentationValue,
  isArrayable,
} from './resolution/value-normalizer.js';
export type { Arrayable } from './resolution/value-normalizer.js';

export { ResponseAssembler } from './orchestrator/response-assembler.js';
export type { AssembleInput } from './orchestrator/response-assembler.js';
export { Redirector } from './orchestrator/redirector.js';

export { Inertia } from './adapter/inertia.js';
export type { InertiaOptions } from './adapter/inertia.js';

export {
  SharedRegistry,
  WILDCARD_COMPONENT,
  ConfigResolver,
  PageValidator,
  FileService,
  ConsoleLogger,
  MemoryLogger,
  SilentLogger,
  InertiaError,
  PageValidationError,
  RegistryFrozenError,
  ConfigError,
  encodePage,
  decodePage,
  escapeHtml,
  renderRootElement,
  defaultViewRenderer,
} from './services/index.js';
export type { Composer, ShareOnceOptions, Logger, LogLevel, LogEntry } from './services/index.js';

export { inertia, toResponse } from './http/hono-middleware.js';
export type { InertiaEnv, InertiaMiddlewareOptions } from './http/hono-middleware.js';
