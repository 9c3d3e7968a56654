/**
 * Error hierarchy for settings resolution.
 *
 * `ConfigFormatError` and its subclasses describe user data problems and are
 * absorbed by the entries into "value not found". `ConfigError` and
 * `UnsupportedDescriptorError` are structural and always propagate.
 */

export interface ErrorOptions {
  cause?: Error;
  suggestion?: string | null;
}

export class SettingsError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown>;
  override readonly cause?: Error;
  readonly timestamp: string;
  readonly suggestion: string | null;

  constructor(
    code: string,
    message: string,
    details?: Record<string, unknown>,
    cause?: Error,
    suggestion?: string | null,
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'SettingsError';
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;
    this.timestamp = new Date().toISOString();
    this.suggestion = suggestion ?? null;
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    const obj: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    };
    if (Object.keys(this.details).length > 0) {
      obj.details = this.details;
    }
    if (this.cause !== undefined) {
      obj.cause = String(this.cause);
    }
    obj.timestamp = this.timestamp;
    if (this.suggestion !== null) {
      obj.suggestion = this.suggestion;
    }
    return obj;
  }
}

export class ConfigNotFoundError extends SettingsError {
  constructor(configPath: string, options?: ErrorOptions) {
    super(
      ErrorCodes.CONFIG_NOT_FOUND,
      `Configuration file not found: ${configPath}`,
      { configPath },
      options?.cause,
      options?.suggestion,
    );
    this.name = 'ConfigNotFoundError';
  }
}

export class ConfigError extends SettingsError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(ErrorCodes.CONFIG_INVALID, message, details, options?.cause, options?.suggestion);
    this.name = 'ConfigError';
  }
}

/** A section, option or value of a loaded file could not be read as requested. */
export class ConfigFormatError extends SettingsError {
  constructor(code: string, message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(code, message, details, options?.cause, options?.suggestion);
    this.name = 'ConfigFormatError';
  }
}

export class ConfigLookupError extends ConfigFormatError {
  constructor(section: string, option: string, options?: ErrorOptions) {
    super(
      ErrorCodes.CONFIG_OPTION_NOT_FOUND,
      `No option '${option}' in section '${section}'`,
      { section, option },
      options,
    );
    this.name = 'ConfigLookupError';
  }
}

export class ConfigValueError extends ConfigFormatError {
  constructor(value: unknown, expected: string, where?: { section: string; option: string }, options?: ErrorOptions) {
    const at = where ? ` for [${where.section}] ${where.option}` : '';
    super(
      ErrorCodes.CONFIG_VALUE_INVALID,
      `Not a valid ${expected}${at}: ${JSON.stringify(value)}`,
      { value, expected, ...where },
      options,
    );
    this.name = 'ConfigValueError';
  }
}

export class UnsupportedDescriptorError extends SettingsError {
  constructor(descriptorKind: string, location: string, options?: ErrorOptions) {
    super(
      ErrorCodes.DESCRIPTOR_UNSUPPORTED,
      `Config descriptor '${descriptorKind}' is not supported by '${location}'`,
      { descriptorKind, location },
      options?.cause,
      options?.suggestion ?? 'Legacy entries read .config/INI files, YAML entries read .yaml files',
    );
    this.name = 'UnsupportedDescriptorError';
  }
}

export const ErrorCodes = Object.freeze({
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_INVALID: 'CONFIG_INVALID',
  CONFIG_OPTION_NOT_FOUND: 'CONFIG_OPTION_NOT_FOUND',
  CONFIG_VALUE_INVALID: 'CONFIG_VALUE_INVALID',
  DESCRIPTOR_UNSUPPORTED: 'DESCRIPTOR_UNSUPPORTED',
} as const);

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
