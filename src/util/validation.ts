/**
 * Validation utility functions
 * Field checks that record violations instead of throwing, so one pass over an
 * input reports every problem at once.
 */

import { Violation } from './error-handler';

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; violations: Violation[] };

/**
 * Accumulates violations for one validation pass
 */
export class ViolationCollector {
  private readonly items: Violation[] = [];

  add(path: string, rule: string, message: string): void {
    this.items.push({ path, rule, message });
  }

  get violations(): Violation[] {
    return [...this.items];
  }

  get count(): number {
    return this.items.length;
  }

  hasErrors(): boolean {
    return this.items.length > 0;
  }

  /**
   * Wrap a value built during validation into a result
   */
  result<T>(value: T): ValidationResult<T> {
    return this.hasErrors() ? { ok: false, violations: this.violations } : { ok: true, value };
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a required property of an object
 * @returns The value, or undefined after recording a `required` violation
 */
export function requireField(
  source: Record<string, unknown>,
  key: string,
  path: string,
  collector: ViolationCollector
): unknown {
  const value = source[key];
  if (value === undefined || value === null) {
    collector.add(path, 'required', 'is not present or has a null value');
    return undefined;
  }
  return value;
}

/**
 * Validate a number value
 * @param options Validation options
 * @returns The number, or undefined when invalid
 */
export function validateNumber(
  value: unknown,
  path: string,
  collector: ViolationCollector,
  options: {
    min?: number;
    max?: number;
    integer?: boolean;
  } = {}
): number | undefined {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    collector.add(path, 'type', 'must be a number');
    return undefined;
  }

  if (options.integer && !Number.isInteger(value)) {
    collector.add(path, 'type', 'must be an integer');
    return undefined;
  }

  if (
    (options.min !== undefined && value < options.min) ||
    (options.max !== undefined && value > options.max)
  ) {
    collector.add(path, 'range', `must be within [${options.min ?? '-inf'}, ${options.max ?? 'inf'}]`);
    return undefined;
  }

  return value;
}

/**
 * Validate a fraction in [0, 1]
 */
export function validateFraction(
  value: unknown,
  path: string,
  collector: ViolationCollector
): number | undefined {
  return validateNumber(value, path, collector, { min: 0, max: 1 });
}

export function validateBoolean(
  value: unknown,
  path: string,
  collector: ViolationCollector
): boolean | undefined {
  if (typeof value !== 'boolean') {
    collector.add(path, 'type', 'must be a boolean (true / false)');
    return undefined;
  }

  return value;
}

export function validateString(
  value: unknown,
  path: string,
  collector: ViolationCollector,
  options: {
    minLength?: number;
    pattern?: RegExp;
  } = {}
): string | undefined {
  if (typeof value !== 'string') {
    collector.add(path, 'type', 'must be a string');
    return undefined;
  }

  if (options.minLength !== undefined && value.trim().length < options.minLength) {
    collector.add(path, 'type', `must be at least ${options.minLength} characters`);
    return undefined;
  }

  if (options.pattern !== undefined && !options.pattern.test(value)) {
    collector.add(path, 'format', 'does not match the required pattern');
    return undefined;
  }

  return value;
}

/**
 * Validate membership of a closed set of values
 */
export function validateEnum<T extends string>(
  value: unknown,
  allowed: readonly T[],
  path: string,
  collector: ViolationCollector
): T | undefined {
  const match = allowed.find(candidate => candidate === value);
  if (match === undefined) {
    collector.add(path, 'enum', `must be one of: ${allowed.map(a => `"${a}"`).join(', ')}`);
  }
  return match;
}

/**
 * Validate a non-empty array
 */
export function validateArray(
  value: unknown,
  path: string,
  collector: ViolationCollector,
  options: { minLength?: number } = {}
): unknown[] | undefined {
  if (!Array.isArray(value)) {
    collector.add(path, 'type', 'must be an array');
    return undefined;
  }

  if (options.minLength !== undefined && value.length < options.minLength) {
    collector.add(path, 'required', `must have at least ${options.minLength} element(s)`);
    return undefined;
  }

  return value;
}

/**
 * Validate an object (non-null, non-array)
 */
export function validateObject(
  value: unknown,
  path: string,
  collector: ViolationCollector
): Record<string, unknown> | undefined {
  if (!isRecord(value)) {
    collector.add(path, 'type', 'must be an object');
    return undefined;
  }
  return value;
}
