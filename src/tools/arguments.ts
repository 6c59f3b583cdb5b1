/**
 * Argument validation helpers for tool inputs
 * Each helper returns a Result whose error is the message shown to the assistant
 */

import type { Result } from '../types/index.js';
import { isValidDriveId } from '../drive/query.js';

export type Args = Record<string, unknown>;

/**
 * Requires a plain object with no keys outside `allowed`
 */
export function readArgs(raw: unknown, allowed: readonly string[]): Result<Args, string> {
  const args = raw === undefined ? {} : raw;
  if (typeof args !== 'object' || args === null || Array.isArray(args)) {
    return { ok: false, error: 'Arguments must be an object' };
  }

  const record: Args = Object.fromEntries(Object.entries(args));
  const unknown = Object.keys(record).filter((key) => !allowed.includes(key));
  if (unknown.length > 0) {
    return { ok: false, error: `Unknown argument(s): ${unknown.join(', ')}` };
  }
  return { ok: true, value: record };
}

/**
 * Requires a string that is not blank
 */
export function requireString(args: Args, key: string): Result<string, string> {
  const value = args[key];
  if (typeof value !== 'string') {
    return { ok: false, error: `${key} is required and must be a string` };
  }
  if (value.trim() === '') {
    return { ok: false, error: `${key} must not be empty` };
  }
  return { ok: true, value };
}

/**
 * Requires a Drive file or folder ID
 */
export function requireDriveId(args: Args, key: string): Result<string, string> {
  const value = requireString(args, key);
  if (!value.ok) {
    return value;
  }
  const id = value.value.trim();
  if (!isValidDriveId(id)) {
    return { ok: false, error: `${key} is not a valid Drive ID: "${value.value}"` };
  }
  return { ok: true, value: id };
}

/**
 * Requires an integer in [min, max]
 */
export function requireInteger(args: Args, key: string, min: number, max: number): Result<number, string> {
  const value = args[key];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    return { ok: false, error: `${key} is required and must be an integer` };
  }
  if (value < min || value > max) {
    return { ok: false, error: `${key} must be between ${min} and ${max}, got ${value}` };
  }
  return { ok: true, value };
}

/**
 * Optional integer in [min, max], falling back to a default when absent
 */
export function optionalInteger(
  args: Args,
  key: string,
  min: number,
  max: number,
  defaultValue: number
): Result<number, string> {
  if (args[key] === undefined) {
    return { ok: true, value: defaultValue };
  }
  return requireInteger(args, key, min, max);
}

/**
 * Requires one of a fixed set of string values
 */
export function requireEnum<T extends string>(args: Args, key: string, values: readonly T[]): Result<T, string> {
  const value = args[key];
  const match = values.find((candidate) => candidate === value);
  if (match === undefined) {
    return { ok: false, error: `${key} must be one of ${values.map((v) => `"${v}"`).join(', ')}` };
  }
  return { ok: true, value: match };
}
