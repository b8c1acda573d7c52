import { Logger } from './logger';

/**
 * Key/value source of raw settings; `process.env` satisfies it.
 */
export type SettingsSource = Readonly<Record<string, string | undefined>>;

/**
 * Type-safe settings accessor with validation and defaults.
 */
export class SettingsAccessor {
  constructor(
    private readonly source: SettingsSource,
    private readonly logger?: Pick<Logger, 'warn'>
  ) { }

  /**
   * Whether a non-empty value is set for the key.
   */
  has(key: string): boolean {
    const value = this.source[key];
    return value !== undefined && value.trim().length > 0;
  }

  /**
   * Get string setting.
   */
  getString(key: string, defaultValue: string): string {
    const value = this.source[key];
    return value !== undefined && value.trim().length > 0 ? value.trim() : defaultValue;
  }

  /**
   * Get optional string setting.
   */
  getOptionalString(key: string): string | undefined {
    return this.has(key) ? this.getString(key, '') : undefined;
  }

  /**
   * Get number setting with optional range validation.
   */
  getNumber(
    key: string,
    defaultValue: number,
    options?: { min?: number; max?: number }
  ): number {
    const rawValue = this.source[key];

    if (rawValue === undefined || rawValue.trim() === '') {
      return defaultValue;
    }

    const parsed = Number(rawValue);
    if (!Number.isFinite(parsed)) {
      this.logWarning(`Setting '${key}' is not a number ("${rawValue}"). Using default ${defaultValue}.`);
      return defaultValue;
    }

    return this.validateNumberRange(parsed, defaultValue, options, key);
  }

  /**
   * Get boolean setting with type coercion.
   */
  getBoolean(key: string, defaultValue: boolean): boolean {
    const rawValue = this.source[key];

    if (rawValue === undefined) {
      return defaultValue;
    }

    const lower = rawValue.toLowerCase().trim();
    if (lower === 'true' || lower === '1') {
      return true;
    }
    if (lower === 'false' || lower === '0' || lower === '') {
      return false;
    }

    this.logWarning(`Setting '${key}' has invalid boolean value "${rawValue}". Using default.`);
    return defaultValue;
  }

  /**
   * Get a setting restricted to a set of names, mapped through a parser.
   */
  getParsed<T>(key: string, defaultValue: T, parse: (raw: string) => T | undefined): T {
    if (!this.has(key)) {
      return defaultValue;
    }
    const raw = this.getString(key, '');
    const parsed = parse(raw);
    if (parsed === undefined) {
      this.logWarning(`Setting '${key}' has unsupported value "${raw}". Using default.`);
      return defaultValue;
    }
    return parsed;
  }

  /**
   * Validate number is within specified range.
   */
  private validateNumberRange(
    value: number,
    defaultValue: number,
    options: { min?: number; max?: number } | undefined,
    key: string
  ): number {
    if (options) {
      if (options.min !== undefined && value < options.min) {
        this.logWarning(
          `Setting '${key}' value ${value} below minimum (${options.min}); using default ${defaultValue}.`
        );
        return defaultValue;
      }
      if (options.max !== undefined && value > options.max) {
        this.logWarning(
          `Setting '${key}' value ${value} above maximum (${options.max}); using default ${defaultValue}.`
        );
        return defaultValue;
      }
    }

    return value;
  }

  private logWarning(message: string): void {
    this.logger?.warn(message);
  }
}
