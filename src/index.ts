/**
 * flyte-settings - Layered settings resolution: environment, legacy INI config, flytectl YAML config.
 */

// Entries
export { ConfigEntry, LegacyConfigEntry, YamlConfigEntry, ENV_VAR_PREFIX } from './entries.js';
export type { ConfigDescriptor, ConfigEntryOptions } from './entries.js';
export { ValueType } from './types.js';
export type { Transform, YamlDocument, LegacyDocument, ConfigFormat, ValueSource, ResolvedValue } from './types.js';

// Files
export { ConfigFile, RESERVED_SECTION, DEFAULT_SECTION } from './config-file.js';
export { getConfigFile, configFileCandidates, FLYTECTL_CONFIG_ENV_VAR, LOCAL_CONFIG_FILE_NAME } from './locator.js';
export type { ConfigFileCandidate, CandidateSource, LocatorOptions } from './locator.js';

// Transforms
export { boolTransformer, intTransformer, listTransformer, stripDnsScheme, readFileIfExists, parseInteger } from './transforms.js';

// Well-known settings
export { Platform, Credentials, AWS, GCP, LocalSDK, Secrets, StatsD } from './catalog.js';

// Errors
export {
  SettingsError,
  ConfigNotFoundError,
  ConfigError,
  ConfigFormatError,
  ConfigLookupError,
  ConfigValueError,
  UnsupportedDescriptorError,
  ErrorCodes,
} from './errors.js';
export type { ErrorOptions, ErrorCode } from './errors.js';

// Logging
export { Logger, getLogger, setLogger, LOG_LEVEL_ENV_VAR } from './logger.js';
export type { LoggerOptions, WritableOutput } from './logger.js';

// Utils
export { setIfExists } from './utils/index.js';

export const VERSION = '0.1.0';
