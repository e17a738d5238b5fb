import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadConfig } from '../../../src/config/ConfigLoader.js';

describe('ConfigLoader', () => {
  const tmpDir = path.join(os.tmpdir(), 'pathfrac-config-' + Date.now());

  beforeEach(() => {
    fs.mkdirSync(tmpDir, { recursive: true });
    vi.stubEnv('PATHFRAC_DB_PATH', '');
    vi.stubEnv('PATHFRAC_LOG_LEVEL', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(content: unknown): void {
    fs.writeFileSync(path.join(tmpDir, '.pathfrac.json'), JSON.stringify(content));
  }

  it('should return default config when no file exists', () => {
    const config = loadConfig('/nonexistent/path');
    expect(config).toEqual({
      version: 1,
      store: { dbPath: '.pathfrac/paths.db' },
      output: { format: 'text' },
      log: { level: 'warn' },
    });
  });

  it('should merge the config file over defaults', () => {
    writeConfig({ output: { format: 'json' } });
    const config = loadConfig(tmpDir);
    expect(config.output.format).toBe('json');
    // 其他欄位仍用 defaults
    expect(config.store.dbPath).toBe('.pathfrac/paths.db');
  });

  it('should let overrides win over the config file', () => {
    writeConfig({ store: { dbPath: 'from-file.db' }, log: { level: 'debug' } });
    const config = loadConfig(tmpDir, { store: { dbPath: 'from-code.db' } });
    expect(config.store.dbPath).toBe('from-code.db');
    expect(config.log.level).toBe('debug');
  });

  it('should apply environment overrides last', () => {
    vi.stubEnv('PATHFRAC_DB_PATH', 'env.db');
    vi.stubEnv('PATHFRAC_LOG_LEVEL', 'error');
    const config = loadConfig('/nonexistent/path', { store: { dbPath: 'from-code.db' } });
    expect(config.store.dbPath).toBe('env.db');
    expect(config.log.level).toBe('error');
  });

  it('should reject an unknown log level from the environment', () => {
    vi.stubEnv('PATHFRAC_LOG_LEVEL', 'loud');
    expect(() => loadConfig('/nonexistent/path')).toThrow(
      'PATHFRAC_LOG_LEVEL must be one of debug, info, warn, error, silent',
    );
  });

  it('should reject unknown keys and bad values in the config file', () => {
    writeConfig({ offset: 3 });
    expect(() => loadConfig(tmpDir)).toThrow('Invalid .pathfrac.json at (root)');

    writeConfig({ output: { format: 'yaml' } });
    expect(() => loadConfig(tmpDir)).toThrow('Invalid .pathfrac.json at output.format');
  });

  it('should validate that dbPath is not empty', () => {
    expect(() =>
      loadConfig('/nonexistent', { store: { dbPath: '  ' } })
    ).toThrow('store.dbPath must not be empty');
  });
});
