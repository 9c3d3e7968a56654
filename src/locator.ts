/**
 * Finds the config file to resolve settings against.
 */

import { existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { ConfigFile } from './config-file.js';
import { getLogger } from './logger.js';

/** The variable the flytectl sandbox instructions ask users to set. */
export const FLYTECTL_CONFIG_ENV_VAR = 'FLYTECTL_CONFIG';
export const LOCAL_CONFIG_FILE_NAME = 'flytekit.config';

export type CandidateSource = 'cwd' | 'home' | 'env' | 'home-yaml';

export interface ConfigFileCandidate {
  source: CandidateSource;
  path: string;
}

export interface LocatorOptions {
  cwd?: string;
  homeDir?: string;
  env?: Record<string, string | undefined>;
}

const SOURCE_LABELS: Record<CandidateSource, string> = {
  cwd: 'Using configuration from process root',
  home: 'Using configuration from home directory',
  env: `Using flytectl/YAML config from ${FLYTECTL_CONFIG_ENV_VAR}`,
  'home-yaml': 'Using flytectl/YAML config from home directory',
};

/** Candidate locations in search order; the first one that exists wins. */
export function configFileCandidates(options?: LocatorOptions): ConfigFileCandidate[] {
  const cwd = options?.cwd ?? process.cwd();
  const home = options?.homeDir ?? homedir();
  const env = options?.env ?? process.env;

  const candidates: ConfigFileCandidate[] = [
    { source: 'cwd', path: resolve(cwd, LOCAL_CONFIG_FILE_NAME) },
    { source: 'home', path: join(home, '.flyte', 'config') },
  ];
  const fromEnv = env[FLYTECTL_CONFIG_ENV_VAR];
  if (fromEnv) {
    candidates.push({ source: 'env', path: resolve(cwd, fromEnv) });
  }
  candidates.push({ source: 'home-yaml', path: join(home, '.flyte', 'config.yaml') });
  return candidates;
}

/**
 * Returns a loaded config file for the given hint: a `ConfigFile` is passed
 * through, a path is loaded, and no hint searches the candidate locations.
 * Returns `undefined` when nothing is found, leaving resolution to the
 * environment.
 */
export function getConfigFile(
  hint?: string | ConfigFile | null,
  options?: LocatorOptions,
): ConfigFile | undefined {
  if (hint instanceof ConfigFile) return hint;
  if (typeof hint === 'string') return new ConfigFile(hint);

  for (const candidate of configFileCandidates(options)) {
    if (existsSync(candidate.path)) {
      getLogger().info(`${SOURCE_LABELS[candidate.source]} ${candidate.path}`);
      return new ConfigFile(candidate.path);
    }
  }
  return undefined;
}
