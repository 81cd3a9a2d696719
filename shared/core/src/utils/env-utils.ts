/**
 * Environment Variable Parsing Utilities
 *
 * parseEnvInt throws on invalid/out-of-range values (strict, for service startup).
 */

/**
 * Parse and validate an integer environment variable.
 * Returns defaultValue if the variable is unset or empty.
 *
 * @throws Error if the value is not an integer or lies outside [min, max]
 *
 * @example
 * ```typescript
 * const port = parseEnvInt('PORT', 3000, 1, 65535);
 * ```
 */
export function parseEnvInt(
  name: string,
  defaultValue: number,
  min?: number,
  max?: number,
  env: NodeJS.ProcessEnv = process.env
): number {
  const raw = env[name];
  if (!raw) return defaultValue;

  if (!/^-?\d+$/.test(raw.trim())) {
    throw new Error(`Invalid ${name}: "${raw}" is not a valid integer`);
  }
  const parsed = parseInt(raw, 10);
  if (min !== undefined && max !== undefined) {
    if (parsed < min || parsed > max) {
      throw new Error(`Invalid ${name}: ${parsed} is out of range [${min}, ${max}]`);
    }
  } else if (min !== undefined && parsed < min) {
    throw new Error(`Invalid ${name}: ${parsed} is below minimum ${min}`);
  } else if (max !== undefined && parsed > max) {
    throw new Error(`Invalid ${name}: ${parsed} is above maximum ${max}`);
  }
  return parsed;
}
