/**
 * config-resolver.ts
 * Applies AdapterConfig defaults and computes the asset version.
 */

import type { AdapterConfig, ResolvedAdapterConfig } from '../models/adapter-config.js';
import { ConfigError } from './errors.js';
import { FileService } from './file-service.js';
import { SilentLogger } from './logger.js';
import type { Logger } from './logger.js';

export const DEFAULT_ROOT_VIEW = 'app';
export const DEFAULT_ROOT_ELEMENT_ID = 'app';
export const DEFAULT_VERSION = '1.0';

export class ConfigResolver {
  /** Throws ConfigError for empty names. */
  static resolve(config: AdapterConfig = {}): ResolvedAdapterConfig {
    const resolved: ResolvedAdapterConfig = {
      rootView: config.rootView ?? DEFAULT_ROOT_VIEW,
      rootElementId: config.rootElementId ?? DEFAULT_ROOT_ELEMENT_ID,
      version: config.version ?? DEFAULT_VERSION,
      manifestPath: config.manifestPath ?? null,
      publicRoot: config.publicRoot ?? process.cwd(),
      render: config.render ?? null,
      skipValidation: config.skipValidation ?? false,
    };

    ConfigResolver._assertNonEmpty('rootView', resolved.rootView);
    ConfigResolver._assertNonEmpty('rootElementId', resolved.rootElementId);
    if (!/^[A-Za-z][\w-]*$/.test(resolved.rootElementId)) {
      throw new ConfigError(
        `rootElementId "${resolved.rootElementId}" is not a valid element id.`,
      );
    }
    if (typeof resolved.version === 'string') {
      ConfigResolver._assertNonEmpty('version', resolved.version);
    }
    if (resolved.manifestPath !== null) {
      ConfigResolver._assertNonEmpty('manifestPath', resolved.manifestPath);
    }

    return resolved;
  }

  /**
   * The manifest's md5 when the file is readable inside the public root,
   * otherwise the configured version.
   */
  static version(config: ResolvedAdapterConfig, logger: Logger = new SilentLogger()): string {
    if (config.manifestPath !== null) {
      const files = new FileService(config.publicRoot);
      const hash = files.md5(config.manifestPath);
      if (hash !== null) return hash;
      logger.warn('Build manifest not readable; using configured version', {
        manifestPath: config.manifestPath,
        exists: files.exists(config.manifestPath),
      });
    }
    return typeof config.version === 'function' ? config.version() : config.version;
  }

  private static _assertNonEmpty(field: string, value: string): void {
    if (value.trim() === '') {
      throw new ConfigError(`AdapterConfig.${field} must be a non-empty string.`);
    }
  }
}
