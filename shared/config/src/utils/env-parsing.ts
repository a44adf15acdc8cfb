/**
 * Environment Variable Parsing Utilities
 *
 * Value-based parsing: each function takes the raw string (usually
 * `env.SOMETHING`) and returns a parsed value or the default. None of them
 * throw, so they compose with `??`.
 *
 * Conventions:
 * - `defaultValue` is returned for `undefined`, empty string or NaN
 * - Out-of-range values fall back to the default (or clamp, where noted)
 *   and log a warning when a label is given
 */

export function safeParseInt(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

export function safeParseFloat(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a float and require it to lie in [min, max].
 *
 * @example
 * ```typescript
 * const threshold = safeParseFloatBounded(env.AUTO_APPROVE_QUALITY_THRESHOLD, 0.7, 0, 1, 'AUTO_APPROVE_QUALITY_THRESHOLD');
 * ```
 */
export function safeParseFloatBounded(
  value: string | undefined,
  defaultValue: number,
  min: number,
  max: number,
  label?: string
): number {
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  if (Number.isNaN(parsed)) {
    if (label) console.warn(`[CONFIG] Invalid float value for ${label}: "${value}" - using default`);
    return defaultValue;
  }
  if (parsed < min || parsed > max) {
    if (label) console.warn(`[CONFIG] Value for ${label} (${parsed}) out of range [${min}, ${max}] - using default`);
    return defaultValue;
  }
  return parsed;
}

/**
 * Parse an integer with a lower bound. Values below `min` are clamped to it.
 */
export function safeParseIntBounded(
  value: string | undefined,
  defaultValue: number,
  min = 1,
  label?: string
): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    if (label) console.warn(`[CONFIG] Invalid integer value for ${label}: "${value}" - using default`);
    return defaultValue;
  }
  if (parsed < min) {
    if (label) console.warn(`[CONFIG] Value for ${label} (${parsed}) below minimum ${min} - using minimum`);
    return min;
  }
  return parsed;
}

/**
 * Parse one of a fixed set of string values (case-insensitive).
 */
export function safeParseEnum<T extends string>(
  value: string | undefined,
  allowed: readonly T[],
  defaultValue: T,
  label?: string
): T {
  if (!value) return defaultValue;
  const lowered = value.trim().toLowerCase();
  const match = allowed.find(candidate => candidate.toLowerCase() === lowered);
  if (match === undefined) {
    if (label) console.warn(`[CONFIG] Unknown value for ${label}: "${value}" - expected one of ${allowed.join(', ')}`);
    return defaultValue;
  }
  return match;
}

/**
 * Parse a `key=value,key=value` list into a record. Entries without `=` or
 * with an empty key are skipped.
 *
 * @example
 * ```typescript
 * parseKeyValueList('email=https://a.example/hook, greenhouse=https://b.example/hook');
 * // { email: 'https://a.example/hook', greenhouse: 'https://b.example/hook' }
 * ```
 */
export function parseKeyValueList(value: string | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  if (!value) return result;
  for (const entry of value.split(',')) {
    const separator = entry.indexOf('=');
    if (separator <= 0) continue;
    const key = entry.slice(0, separator).trim();
    const val = entry.slice(separator + 1).trim();
    if (key && val) {
      result[key] = val;
    }
  }
  return result;
}
