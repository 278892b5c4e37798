/**
 * config-resolver.test.ts
 *
 * Covers config defaults and validation, and the asset version taken from
 * a build manifest in a temp directory.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigResolver } from '../config-resolver.js';
import { ConfigError } from '../errors.js';
import { FileService } from '../file-service.js';
import { MemoryLogger } from '../logger.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'inertia-config-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('ConfigResolver', () => {
  it('applies defaults', () => {
    const cfg = ConfigResolver.resolve();
    expect(cfg.rootView).toBe('app');
    expect(cfg.rootElementId).toBe('app');
    expect(cfg.version).toBe('1.0');
    expect(cfg.manifestPath).toBeNull();
    expect(cfg.render).toBeNull();
    expect(cfg.skipValidation).toBe(false);
  });

  it('rejects empty names and invalid element ids', () => {
    expect(() => ConfigResolver.resolve({ rootView: ' ' })).toThrow(
      'AdapterConfig.rootView must be a non-empty string.',
    );
    expect(() => ConfigResolver.resolve({ rootElementId: '1app' })).toThrow(ConfigError);
    expect(() => ConfigResolver.resolve({ version: '' })).toThrow(ConfigError);
  });

  it('uses the md5 of the manifest when it exists', () => {
    const contents = '{"app.js":{"file":"app-123.js"}}';
    fs.mkdirSync(path.join(tmpDir, 'build'));
    fs.writeFileSync(path.join(tmpDir, 'build', 'manifest.json'), contents);
    const expected = crypto.createHash('md5').update(contents).digest('hex');

    const cfg = ConfigResolver.resolve({
      publicRoot: tmpDir,
      manifestPath: 'build/manifest.json',
      version: 'ignored',
    });
    expect(ConfigResolver.version(cfg)).toBe(expected);
  });

  it('falls back to the configured version and warns when the manifest is missing', () => {
    const logger = new MemoryLogger();
    const cfg = ConfigResolver.resolve({
      publicRoot: tmpDir,
      manifestPath: 'build/manifest.json',
      version: () => 'from-thunk',
    });
    expect(ConfigResolver.version(cfg, logger)).toBe('from-thunk');
    expect(logger.entries).toEqual([
      {
        level: 'warn',
        message: 'Build manifest not readable; using configured version',
        context: { manifestPath: 'build/manifest.json', exists: false },
      },
    ]);
  });
});

describe('FileService', () => {
  it('refuses paths outside its root', () => {
    fs.writeFileSync(path.join(tmpDir, 'inside.txt'), 'x');
    const files = new FileService(path.join(tmpDir));
    expect(files.read('inside.txt')?.toString()).toBe('x');
    expect(files.read('../outside.txt')).toBeNull();
    expect(files.exists('../')).toBe(false);
  });

  it('returns null for directories', () => {
    fs.mkdirSync(path.join(tmpDir, 'dir'));
    expect(new FileService(tmpDir).md5('dir')).toBeNull();
  });

  it('returns null when the file system rejects the path', () => {
    const files = new FileService(tmpDir);
    const tooLong = 'm'.repeat(300) + '.json';
    expect(files.read(tooLong)).toBeNull();
    expect(files.md5(tooLong)).toBeNull();
  });

  it('falls back to the configured version when the manifest cannot be read', () => {
    const cfg = ConfigResolver.resolve({
      publicRoot: tmpDir,
      manifestPath: 'm'.repeat(300) + '.json',
      version: 'v7',
    });
    expect(ConfigResolver.version(cfg)).toBe('v7');
  });
});
