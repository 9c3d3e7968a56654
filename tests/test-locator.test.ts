import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rmSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigFile } from '../src/config-file.js';
import { configFileCandidates, FLYTECTL_CONFIG_ENV_VAR, getConfigFile } from '../src/locator.js';
import { setLogger } from '../src/logger.js';
import { captureLogs, createTempDir, writeTempFile } from './helpers.js';

let tmpDir: string;
let cwd: string;
let homeDir: string;
let logs: ReturnType<typeof captureLogs>;

beforeEach(() => {
  tmpDir = createTempDir();
  cwd = join(tmpDir, 'work');
  homeDir = join(tmpDir, 'home');
  logs = captureLogs('info');
});

afterEach(() => {
  setLogger(null);
  rmSync(tmpDir, { recursive: true, force: true });
});

describe('configFileCandidates', () => {
  it('lists the search locations in order', () => {
    const candidates = configFileCandidates({
      cwd,
      homeDir,
      env: { [FLYTECTL_CONFIG_ENV_VAR]: '/etc/flyte/config.yaml' },
    });
    expect(candidates).toEqual([
      { source: 'cwd', path: join(cwd, 'flytekit.config') },
      { source: 'home', path: join(homeDir, '.flyte', 'config') },
      { source: 'env', path: '/etc/flyte/config.yaml' },
      { source: 'home-yaml', path: join(homeDir, '.flyte', 'config.yaml') },
    ]);
  });

  it('skips the env candidate when the variable is unset', () => {
    const sources = configFileCandidates({ cwd, homeDir, env: {} }).map((c) => c.source);
    expect(sources).toEqual(['cwd', 'home', 'home-yaml']);
  });

  it('resolves a relative env path against the working directory', () => {
    const candidates = configFileCandidates({ cwd, homeDir, env: { [FLYTECTL_CONFIG_ENV_VAR]: 'sandbox.yaml' } });
    expect(candidates[2]).toEqual({ source: 'env', path: join(cwd, 'sandbox.yaml') });
  });
});

describe('getConfigFile', () => {
  it('returns undefined when no candidate exists', () => {
    expect(getConfigFile(undefined, { cwd, homeDir, env: {} })).toBeUndefined();
    expect(getConfigFile(null, { cwd, homeDir, env: {} })).toBeUndefined();
    expect(logs.lines).toHaveLength(0);
  });

  it('passes a loaded ConfigFile through', () => {
    const cfg = new ConfigFile(writeTempFile(tmpDir, 'any.config', '[platform]\nurl = localhost\n'));
    expect(getConfigFile(cfg)).toBe(cfg);
  });

  it('loads an explicit path', () => {
    const path = writeTempFile(tmpDir, 'explicit.yaml', 'admin:\n  endpoint: localhost:30080\n');
    const cfg = getConfigFile(path);
    expect(cfg).toBeInstanceOf(ConfigFile);
    expect(cfg?.location).toBe(path);
    expect(cfg?.format).toBe('yaml');
  });

  it('prefers the working directory config', () => {
    const local = writeTempFile(cwd, 'flytekit.config', '[platform]\nurl = local\n');
    writeTempFile(homeDir, '.flyte/config', '[platform]\nurl = home\n');
    const cfg = getConfigFile(undefined, { cwd, homeDir, env: {} });
    expect(cfg?.location).toBe(local);
    const records = logs.records();
    expect(records).toHaveLength(1);
    expect(records[0].level).toBe('info');
    expect(records[0].message).toBe(`Using configuration from process root ${local}`);
  });

  it('prefers the home legacy config over the env var and home yaml', () => {
    const home = writeTempFile(homeDir, '.flyte/config', '[platform]\nurl = home\n');
    const fromEnv = writeTempFile(tmpDir, 'sandbox.yaml', 'admin:\n  endpoint: sandbox\n');
    writeTempFile(homeDir, '.flyte/config.yaml', 'admin:\n  endpoint: home-yaml\n');
    const cfg = getConfigFile(undefined, { cwd, homeDir, env: { [FLYTECTL_CONFIG_ENV_VAR]: fromEnv } });
    expect(cfg?.location).toBe(home);
    expect(cfg?.format).toBe('legacy');
  });

  it('uses the env var path before the home yaml config', () => {
    const fromEnv = writeTempFile(tmpDir, 'sandbox.yaml', 'admin:\n  endpoint: sandbox\n');
    writeTempFile(homeDir, '.flyte/config.yaml', 'admin:\n  endpoint: home-yaml\n');
    const cfg = getConfigFile(undefined, { cwd, homeDir, env: { [FLYTECTL_CONFIG_ENV_VAR]: fromEnv } });
    expect(cfg?.location).toBe(fromEnv);
    expect(cfg?.yamlConfig).toEqual({ admin: { endpoint: 'sandbox' } });
    expect(logs.records()[0].message).toBe(`Using flytectl/YAML config from FLYTECTL_CONFIG ${fromEnv}`);
  });

  it('falls through an env var naming a missing file', () => {
    const homeYaml = writeTempFile(homeDir, '.flyte/config.yaml', 'admin:\n  endpoint: home-yaml\n');
    const cfg = getConfigFile(undefined, {
      cwd,
      homeDir,
      env: { [FLYTECTL_CONFIG_ENV_VAR]: join(tmpDir, 'missing.yaml') },
    });
    expect(cfg?.location).toBe(homeYaml);
    expect(logs.records()[0].message).toBe(`Using flytectl/YAML config from home directory ${homeYaml}`);
  });
});
