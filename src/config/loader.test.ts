import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigParseError } from './parser.js';
import { ConfigValidationError } from './validator.js';
import { EnvCoercionError } from './env.js';
import { CONFIG_FILE_NAME, loadConfig } from './loader.js';
import { DEFAULT_CONFIG } from './defaults.js';

describe('loadConfig', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = mkdtempSync(path.join(os.tmpdir(), 'protostub-config-'));
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  it('should fall back to defaults when no config file exists', () => {
    const loaded = loadConfig({ cwd: workDir, env: {} });

    expect(loaded.config).toEqual(DEFAULT_CONFIG);
    expect(loaded.root).toBe(workDir);
    expect(loaded.configPath).toBeUndefined();
    expect(loaded.appliedEnvVars).toEqual([]);
  });

  it('should read protostub.toml from the working directory', () => {
    writeFileSync(path.join(workDir, CONFIG_FILE_NAME), '[repository]\nbranch = "main"\n');

    const loaded = loadConfig({ cwd: workDir, env: {} });

    expect(loaded.config.repository.branch).toBe('main');
    expect(loaded.configPath).toBe(path.join(workDir, CONFIG_FILE_NAME));
  });

  it('should use the directory of an explicit config file as root', () => {
    const nested = path.join(workDir, 'sub');
    mkdirSync(nested);
    writeFileSync(path.join(nested, 'custom.toml'), '[paths]\nscratch_dir = "out"\n');

    const loaded = loadConfig({ cwd: workDir, configPath: 'sub/custom.toml', env: {} });

    expect(loaded.root).toBe(nested);
    expect(loaded.config.paths.scratch_dir).toBe('out');
  });

  it('should apply environment overrides over the file', () => {
    writeFileSync(path.join(workDir, CONFIG_FILE_NAME), '[repository]\nbranch = "main"\n');

    const loaded = loadConfig({
      cwd: workDir,
      env: { PROTOSTUB_REPOSITORY_BRANCH: 'release', PROTOSTUB_DEBUG: 'yes' },
    });

    expect(loaded.config.repository.branch).toBe('release');
    expect(loaded.config.logging.debug).toBe(true);
    expect(loaded.appliedEnvVars).toEqual(['PROTOSTUB_REPOSITORY_BRANCH', 'PROTOSTUB_DEBUG']);
  });

  it('should fail when an explicit config file is missing', () => {
    expect(() => loadConfig({ cwd: workDir, configPath: 'missing.toml', env: {} })).toThrow(
      new ConfigParseError(`Config file not found: ${path.join(workDir, 'missing.toml')}`)
    );
  });

  it('should surface parse errors', () => {
    writeFileSync(path.join(workDir, CONFIG_FILE_NAME), '[paths\n');
    expect(() => loadConfig({ cwd: workDir, env: {} })).toThrow(ConfigParseError);
  });

  it('should surface coercion errors', () => {
    expect(() => loadConfig({ cwd: workDir, env: { PROTOSTUB_DEBUG: 'sometimes' } })).toThrow(
      EnvCoercionError
    );
  });

  it('should validate the merged configuration', () => {
    expect(() =>
      loadConfig({ cwd: workDir, env: { PROTOSTUB_PATHS_SCRATCH_DIR: '/tmp/elsewhere' } })
    ).toThrow(ConfigValidationError);
  });
});
