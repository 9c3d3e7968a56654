/**
 * Config entry descriptors and the cross-source resolution order.
 */

import type { ConfigFile } from './config-file.js';
import { ConfigFormatError } from './errors.js';
import { getLogger } from './logger.js';
import { boolTransformer } from './transforms.js';
import { ValueType, type ResolvedValue, type Transform } from './types.js';

export const ENV_VAR_PREFIX = 'FLYTE';

/**
 * Where a setting lives in a legacy INI-style file, and in the environment as
 * `FLYTE_{SECTION}_{OPTION}`.
 */
export class LegacyConfigEntry {
  readonly kind = 'legacy' as const;
  readonly section: string;
  readonly option: string;
  readonly valueType: ValueType;

  constructor(section: string, option: string, valueType: ValueType = ValueType.String) {
    this.section = section;
    this.option = option;
    this.valueType = valueType;
    Object.freeze(this);
  }

  get envVarName(): string {
    return `${ENV_VAR_PREFIX}_${this.section.toUpperCase()}_${this.option.toUpperCase()}`;
  }

  readFromEnv(transform?: Transform | null): unknown {
    const v = process.env[this.envVarName];
    if (v === undefined) return undefined;
    return transform ? transform(v) : v;
  }

  /** Missing sections, options and unparseable values read as `undefined`; other failures propagate. */
  readFromFile(configFile: ConfigFile | null | undefined, transform?: Transform | null): unknown {
    if (!configFile) return undefined;
    try {
      const v = configFile.get(this);
      return transform ? transform(v) : v;
    } catch (e) {
      if (e instanceof ConfigFormatError) return undefined;
      throw e;
    }
  }
}

/**
 * Where a setting lives in a flytectl YAML file. The switch stays dot-delimited
 * so it lines up with flytectl's flag names.
 */
export class YamlConfigEntry {
  readonly kind = 'yaml' as const;
  readonly switch: string;
  readonly path: readonly string[];
  readonly valueType: ValueType;

  constructor(switchPath: string, valueType: ValueType = ValueType.String) {
    this.switch = switchPath;
    this.path = Object.freeze(switchPath.split('.'));
    this.valueType = valueType;
    Object.freeze(this);
  }

  /**
   * Unlike the legacy reader this swallows every error: a path walk can fail on
   * a missing key, on a scalar or list in the middle of the path, or on a file
   * that holds no YAML document. Falsy leaves (`false`, `0`, `""`) also read as
   * `undefined`, whereas the legacy reader returns them.
   */
  readFromFile(configFile: ConfigFile | null | undefined, transform?: Transform | null): unknown {
    if (!configFile) return undefined;
    try {
      const v = configFile.get(this);
      if (!v) return undefined;
      return transform ? transform(v) : v;
    } catch (e) {
      getLogger().debug(`Could not read switch ${this.switch} from ${configFile.location}`, {
        error: String(e),
      });
      return undefined;
    }
  }
}

export type ConfigDescriptor = LegacyConfigEntry | YamlConfigEntry;

const LEGACY_DEFAULT_TRANSFORMS: Partial<Record<ValueType, Transform>> = {
  [ValueType.Bool]: boolTransformer,
};

export interface ConfigEntryOptions {
  yamlEntry?: YamlConfigEntry | null;
  transform?: Transform | null;
}

/**
 * A setting with its legacy and (optionally) YAML locations. Reads check the
 * environment first, then whichever document the given file holds.
 */
export class ConfigEntry {
  readonly legacy: LegacyConfigEntry;
  readonly yamlEntry: YamlConfigEntry | null;
  readonly transform: Transform | null;

  constructor(legacy: LegacyConfigEntry, options?: ConfigEntryOptions) {
    this.legacy = legacy;
    this.yamlEntry = options?.yamlEntry ?? null;
    this.transform = options?.transform ?? LEGACY_DEFAULT_TRANSFORMS[legacy.valueType] ?? null;
    Object.freeze(this);
  }

  resolve(configFile?: ConfigFile | null): ResolvedValue | undefined {
    const fromEnv = this.legacy.readFromEnv(this.transform);
    if (fromEnv !== undefined) return { value: fromEnv, source: 'env' };

    if (configFile?.legacyConfig) {
      const fromLegacy = this.legacy.readFromFile(configFile, this.transform);
      return fromLegacy === undefined ? undefined : { value: fromLegacy, source: 'legacy' };
    }

    const yamlConfig = configFile?.yamlConfig;
    if (configFile && yamlConfig && Object.keys(yamlConfig).length > 0 && this.yamlEntry) {
      const fromYaml = this.yamlEntry.readFromFile(configFile, this.transform);
      return fromYaml === undefined ? undefined : { value: fromYaml, source: 'yaml' };
    }

    return undefined;
  }

  read(configFile?: ConfigFile | null): unknown {
    return this.resolve(configFile)?.value;
  }
}
