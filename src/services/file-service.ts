/**
 * file-service.ts
 * Sandboxed reads within the public root, used to fingerprint the build
 * manifest.
 *
 * Constraints:
 * - MUST NOT read any path outside the root.
 * - Returns null for missing or unreadable files rather than throwing.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';

export class FileService {
  private readonly _root: string;

  constructor(root: string) {
    this._root = path.resolve(root);
  }

  /**
   * Read a file as a Buffer.
   * Returns null if the file does not exist or is outside the root.
   */
  read(relOrAbsPath: string): Buffer | null {
    const resolved = this._resolve(relOrAbsPath);
    if (resolved === null) return null;
    try {
      const stat = fs.statSync(resolved, { throwIfNoEntry: false });
      if (stat === undefined || !stat.isFile()) return null;
      return fs.readFileSync(resolved);
    } catch {
      return null;
    }
  }

  exists(relOrAbsPath: string): boolean {
    const resolved = this._resolve(relOrAbsPath);
    if (resolved === null) return false;
    return fs.existsSync(resolved);
  }

  /** md5 hex digest of the file contents, or null when it cannot be read. */
  md5(relOrAbsPath: string): string | null {
    const contents = this.read(relOrAbsPath);
    if (contents === null) return null;
    return crypto.createHash('md5').update(contents).digest('hex');
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private _resolve(relOrAbsPath: string): string | null {
    const abs = path.isAbsolute(relOrAbsPath)
      ? path.normalize(relOrAbsPath)
      : path.resolve(this._root, relOrAbsPath);

    // Sandbox check
    if (!abs.startsWith(this._root + path.sep) && abs !== this._root) {
      return null;
    }

    return abs;
  }
}
