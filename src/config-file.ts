/**
 * A loaded config file: either a legacy INI-style document or a flytectl YAML
 * document, behind one `get(descriptor)` lookup.
 */

import { existsSync, readFileSync } from 'node:fs';
import ini from 'ini';
import yaml from 'js-yaml';
import type { ConfigDescriptor, LegacyConfigEntry, YamlConfigEntry } from './entries.js';
import {
  ConfigError,
  ConfigLookupError,
  ConfigNotFoundError,
  ConfigValueError,
  UnsupportedDescriptorError,
} from './errors.js';
import { getLogger } from './logger.js';
import { parseInteger } from './transforms.js';
import { ValueType, type ConfigFormat, type LegacyDocument, type YamlDocument } from './types.js';

/** Section name reserved for settings that must never come from a user file. */
export const RESERVED_SECTION = 'internal';
export const DEFAULT_SECTION = 'DEFAULT';

const BOOLEAN_STATES: Record<string, boolean> = {
  '1': true,
  yes: true,
  true: true,
  on: true,
  '0': false,
  no: false,
  false: false,
  off: false,
};

type Extractor = (raw: string, where: { section: string; option: string }) => unknown;

const EXTRACTORS: Record<ValueType, Extractor> = {
  [ValueType.String]: (raw) => raw,
  [ValueType.Bool]: (raw, where) => {
    const state = BOOLEAN_STATES[raw.trim().toLowerCase()];
    if (state === undefined) throw new ConfigValueError(raw, 'boolean', where);
    return state;
  },
  [ValueType.Int]: (raw, where) => {
    const parsed = parseInteger(raw);
    if (parsed === undefined) throw new ConfigValueError(raw, 'integer', where);
    return parsed;
  },
  [ValueType.List]: (raw) => raw.split(','),
};

function isMapping(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function rawOptionValue(value: unknown): string {
  if (typeof value === 'string') return value;
  // `key[] = a` lines come back as arrays
  if (Array.isArray(value)) return value.map(String).join(',');
  return String(value);
}

const OPTION_LINE = /^([^=:]*?)\s*[=:]\s*(.*)$/;

interface PendingOption {
  key: string;
  value: string;
}

function quotedOption(option: PendingOption): string {
  return `${JSON.stringify(option.key)}=${JSON.stringify(option.value)}`;
}

/**
 * Rewrites option lines so `ini` keeps values verbatim: both `=` and `:`
 * delimit, `#` and `;` inside a value are not comments, quotes are part of
 * the value, and indented lines continue the previous value. Keys and values
 * are emitted as JSON strings, which `ini` decodes exactly.
 */
function normalizeLegacySource(content: string): string {
  const out: string[] = [];
  let pending: PendingOption | null = null;
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    const isComment = trimmed.startsWith('#') || trimmed.startsWith(';');
    if (pending !== null && trimmed !== '' && !isComment && /^\s/.test(line)) {
      pending.value += '\n' + trimmed;
      continue;
    }
    if (pending !== null) {
      out.push(quotedOption(pending));
      pending = null;
    }
    const match = trimmed === '' || isComment || trimmed.startsWith('[') ? null : OPTION_LINE.exec(trimmed);
    if (match) {
      pending = { key: match[1], value: match[2] };
    } else {
      out.push(line);
    }
  }
  if (pending !== null) out.push(quotedOption(pending));
  return out.join('\n');
}

/**
 * Flattens the decoded INI object into sections. A dotted header such as
 * `[a.b]` decodes as nested objects and is restored as section `a.b`.
 */
function collectSections(
  name: string,
  body: Record<string, unknown>,
  out: Map<string, Map<string, string>>,
): void {
  const options = new Map<string, string>();
  let hasNested = false;
  for (const [key, value] of Object.entries(body)) {
    if (isMapping(value)) {
      hasNested = true;
      collectSections(`${name}.${key}`, value, out);
    } else {
      options.set(key.toLowerCase(), rawOptionValue(value));
    }
  }
  if (options.size > 0 || !hasNested) {
    out.set(name, options);
  }
}

export class ConfigFile {
  private readonly _location: string;
  private readonly _format: ConfigFormat;
  private readonly _legacyConfig: LegacyDocument | null;
  private readonly _legacyDefaults: ReadonlyMap<string, string>;
  private readonly _yamlConfig: YamlDocument | null;

  /** Loads the file at `location`; a location ending in `yaml` is read as YAML, anything else as INI. */
  constructor(location: string) {
    this._location = location;
    if (location.endsWith('yaml')) {
      this._format = 'yaml';
      this._legacyConfig = null;
      this._legacyDefaults = new Map();
      this._yamlConfig = ConfigFile._readYamlConfig(location);
    } else {
      this._format = 'legacy';
      const { sections, defaults } = ConfigFile._readLegacyConfig(location);
      this._legacyConfig = sections;
      this._legacyDefaults = defaults;
      this._yamlConfig = null;
    }
  }

  private static _readYamlConfig(location: string): YamlDocument | null {
    let content: string;
    try {
      content = readFileSync(location, 'utf-8');
    } catch (e) {
      throw new ConfigNotFoundError(location, { cause: e instanceof Error ? e : undefined });
    }

    let data: unknown;
    try {
      data = yaml.load(content);
    } catch (e) {
      getLogger().warn(`Error ${e} reading yaml config file at ${location}, ignoring...`);
      return null;
    }

    if (data === null || data === undefined) {
      getLogger().debug(`Yaml config file at ${location} is empty`);
      return null;
    }
    if (!isMapping(data)) {
      getLogger().warn(`Yaml config file at ${location} does not hold a mapping, ignoring...`);
      return null;
    }
    getLogger().debug(`Loaded yaml config from ${location}`, { document: data });
    return data;
  }

  private static _readLegacyConfig(location: string): {
    sections: LegacyDocument;
    defaults: ReadonlyMap<string, string>;
  } {
    let content = '';
    if (existsSync(location)) {
      try {
        content = readFileSync(location, 'utf-8');
      } catch (e) {
        getLogger().debug(`Could not read config file at ${location}, treating it as empty`, { error: String(e) });
      }
    } else {
      getLogger().debug(`Config file ${location} does not exist, treating it as empty`);
    }

    const decoded: Record<string, unknown> = ini.decode(normalizeLegacySource(content));
    const sections = new Map<string, Map<string, string>>();
    for (const [name, body] of Object.entries(decoded)) {
      if (!isMapping(body)) {
        throw new ConfigError(
          `The config file '${location}' has options outside of any section, starting at '${name}'`,
          { location, option: name },
        );
      }
      collectSections(name, body, sections);
    }

    if (sections.has(RESERVED_SECTION)) {
      throw new ConfigError(
        `The config file '${location}' cannot contain a section for internal only configurations.`,
        { location, section: RESERVED_SECTION },
      );
    }

    const defaults = sections.get(DEFAULT_SECTION) ?? new Map<string, string>();
    sections.delete(DEFAULT_SECTION);
    return { sections, defaults };
  }

  private _getFromLegacy(document: LegacyDocument, entry: LegacyConfigEntry): unknown {
    const section = document.get(entry.section);
    if (section === undefined) {
      throw new ConfigLookupError(entry.section, entry.option);
    }
    const option = entry.option.toLowerCase();
    const raw = section.get(option) ?? this._legacyDefaults.get(option);
    if (raw === undefined) {
      throw new ConfigLookupError(entry.section, entry.option);
    }
    return EXTRACTORS[entry.valueType](raw, { section: entry.section, option: entry.option });
  }

  private _getFromYaml(document: YamlDocument, entry: YamlConfigEntry): unknown {
    let current: unknown = document;
    for (const key of entry.path) {
      if (!isMapping(current)) {
        throw new TypeError(`Cannot read '${key}' of a non-mapping value while resolving switch ${entry.switch}`);
      }
      if (!Object.hasOwn(current, key)) {
        getLogger().error(`Switch ${entry.switch} could not be found in yaml config`);
        getLogger().debug(`Yaml config at ${this._location}`, { document });
        return undefined;
      }
      current = current[key];
    }
    return current;
  }

  /**
   * Looks up a descriptor in the loaded document. Legacy entries read typed
   * values and throw `ConfigFormatError`s on missing or malformed options;
   * YAML entries return the value at the switch path, or `undefined`.
   */
  get(descriptor: ConfigDescriptor): unknown {
    switch (descriptor.kind) {
      case 'legacy':
        if (this._legacyConfig) return this._getFromLegacy(this._legacyConfig, descriptor);
        break;
      case 'yaml':
        if (this._yamlConfig) return this._getFromYaml(this._yamlConfig, descriptor);
        break;
    }
    throw new UnsupportedDescriptorError(String(descriptor.kind), this._location);
  }

  get location(): string {
    return this._location;
  }

  get format(): ConfigFormat {
    return this._format;
  }

  get legacyConfig(): LegacyDocument | null {
    return this._legacyConfig;
  }

  get yamlConfig(): YamlDocument | null {
    return this._yamlConfig;
  }
}
