/**
 * Value transforms applied by config entries.
 *
 * Environment variables always arrive as strings, while file readers already
 * return typed values, so every transform passes values of its target type
 * through unchanged.
 */

import { existsSync, readFileSync, statSync } from 'node:fs';
import { ConfigValueError } from './errors.js';

const FALSY_STRINGS = ['false', '0', 'off', 'no'];
const INTEGER = /^[+-]?\d+$/;
const DNS_SCHEME = 'dns:///';

export function boolTransformer(value: unknown): unknown {
  if (typeof value === 'string') {
    return value !== '' && !FALSY_STRINGS.includes(value.toLowerCase());
  }
  return value;
}

/** Base-10 integer with optional sign and surrounding whitespace, else `undefined`. */
export function parseInteger(raw: string): number | undefined {
  const trimmed = raw.trim();
  return INTEGER.test(trimmed) ? Number.parseInt(trimmed, 10) : undefined;
}

export function intTransformer(value: unknown): number {
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  const parsed = typeof value === 'string' ? parseInteger(value) : undefined;
  if (parsed === undefined) throw new ConfigValueError(value, 'integer');
  return parsed;
}

export function listTransformer(value: unknown): unknown {
  if (typeof value === 'string') return value.split(',');
  return value;
}

export function stripDnsScheme(value: unknown): unknown {
  if (typeof value === 'string' && value.startsWith(DNS_SCHEME)) {
    return value.slice(DNS_SCHEME.length);
  }
  return value;
}

/**
 * Returns the trimmed contents of the file a value points at, or the value
 * itself when it does not name a file. Client secrets are commonly configured
 * either inline or as a path to a mounted secret.
 */
export function readFileIfExists(value: unknown): unknown {
  if (typeof value !== 'string' || value === '') return value;
  if (!existsSync(value) || !statSync(value).isFile()) return value;
  return readFileSync(value, 'utf-8').trim();
}
