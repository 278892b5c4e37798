/**
 * errors.ts
 * Error types raised by the adapter itself.
 *
 * Resolver failures are not wrapped: whatever a prop's computation throws
 * reaches the caller unchanged.
 */

export class InertiaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InertiaError';
  }
}

/** A page failed an invariant check right before emission. */
export class PageValidationError extends InertiaError {
  constructor(message: string) {
    super(message);
    this.name = 'PageValidationError';
  }
}

/** The shared registry was mutated after `freeze()`. */
export class RegistryFrozenError extends InertiaError {
  constructor(operation: string) {
    super(`SharedRegistry is frozen; "${operation}" is only allowed during startup.`);
    this.name = 'RegistryFrozenError';
  }
}

export class ConfigError extends InertiaError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
