/**
 * Well-known SDK settings, with their legacy section/option and the matching
 * flytectl switch where flytectl has one. Each switch is a distinct flytectl
 * config key (`admin.*`, `console.*`, `storage.connection.*`).
 */

import { ConfigEntry, LegacyConfigEntry, YamlConfigEntry } from './entries.js';
import { intTransformer, listTransformer, readFileIfExists, stripDnsScheme } from './transforms.js';
import { ValueType } from './types.js';

function entry(
  section: string,
  option: string,
  valueType: ValueType = ValueType.String,
  yamlSwitch?: string,
  transform?: (value: unknown) => unknown,
): ConfigEntry {
  return new ConfigEntry(new LegacyConfigEntry(section, option, valueType), {
    yamlEntry: yamlSwitch ? new YamlConfigEntry(yamlSwitch, valueType) : null,
    transform,
  });
}

export const Platform = Object.freeze({
  SECTION: 'platform',
  URL: entry('platform', 'url', ValueType.String, 'admin.endpoint', stripDnsScheme),
  INSECURE: entry('platform', 'insecure', ValueType.Bool, 'admin.insecure'),
  INSECURE_SKIP_VERIFY: entry('platform', 'insecure_skip_verify', ValueType.Bool, 'admin.insecureSkipVerify'),
  CONSOLE_ENDPOINT: entry('platform', 'console_endpoint', ValueType.String, 'console.endpoint'),
  CA_CERT_FILE_PATH: entry('platform', 'ca_cert_file_path', ValueType.String, 'admin.caCertFilePath'),
});

export const Credentials = Object.freeze({
  SECTION: 'credentials',
  COMMAND: entry('credentials', 'command', ValueType.List, 'admin.command', listTransformer),
  CLIENT_ID: entry('credentials', 'client_id', ValueType.String, 'admin.clientId'),
  CLIENT_CREDENTIALS_SECRET: entry(
    'credentials',
    'client_secret',
    ValueType.String,
    'admin.clientSecretLocation',
    readFileIfExists,
  ),
  SCOPES: entry('credentials', 'scopes', ValueType.List, 'admin.scopes', listTransformer),
  AUTH_MODE: entry('credentials', 'auth_mode', ValueType.String, 'admin.authType'),
});

export const AWS = Object.freeze({
  SECTION: 'aws',
  S3_ENDPOINT: entry('aws', 'endpoint', ValueType.String, 'storage.connection.endpoint'),
  S3_ACCESS_KEY_ID: entry('aws', 'access_key_id', ValueType.String, 'storage.connection.access-key'),
  S3_SECRET_ACCESS_KEY: entry('aws', 'secret_access_key', ValueType.String, 'storage.connection.secret-key'),
  ENABLE_DEBUG: entry('aws', 'enable_debug', ValueType.Bool),
  RETRIES: entry('aws', 'retries', ValueType.Int, undefined, intTransformer),
});

export const GCP = Object.freeze({
  SECTION: 'gcp',
  GSUTIL_PARALLELISM: entry('gcp', 'gsutil_parallelism', ValueType.Bool),
});

export const LocalSDK = Object.freeze({
  SECTION: 'sdk',
  WORKFLOW_PACKAGES: entry('sdk', 'workflow_packages', ValueType.List, undefined, listTransformer),
  LOCAL_SANDBOX: entry('sdk', 'local_sandbox'),
  LOGGING_LEVEL: entry('sdk', 'logging_level', ValueType.Int, undefined, intTransformer),
  LOCAL_CACHE_ENABLED: entry('sdk', 'local_cache_enabled', ValueType.Bool),
});

export const Secrets = Object.freeze({
  SECTION: 'secrets',
  ENV_PREFIX: entry('secrets', 'env_prefix'),
  DEFAULT_DIR: entry('secrets', 'default_dir'),
  FILE_PREFIX: entry('secrets', 'file_prefix'),
});

export const StatsD = Object.freeze({
  SECTION: 'statsd',
  HOST: entry('statsd', 'host'),
  PORT: entry('statsd', 'port', ValueType.Int, undefined, intTransformer),
  DISABLED: entry('statsd', 'disabled', ValueType.Bool),
  DISABLE_TAGS: entry('statsd', 'disable_tags', ValueType.Bool),
});
