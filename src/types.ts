/**
 * Shared type definitions for config entries and files.
 */

export enum ValueType {
  String = 'string',
  Bool = 'bool',
  Int = 'int',
  List = 'list',
}

/** Maps a raw value (an env string, or a typed value read from a file) to the setting's value. */
export type Transform<T = unknown> = (value: unknown) => T;

export type YamlDocument = Record<string, unknown>;

/** Section name to lower-cased option name to raw value. */
export type LegacyDocument = ReadonlyMap<string, ReadonlyMap<string, string>>;

export type ConfigFormat = 'legacy' | 'yaml';

export type ValueSource = 'env' | 'legacy' | 'yaml';

export interface ResolvedValue {
  value: unknown;
  source: ValueSource;
}
