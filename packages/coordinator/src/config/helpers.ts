/**
 * Configuration helpers for parsing environment variables.
 */

/**
 * Parse an environment variable as a positive integer with validation.
 * Returns the default value if parsing fails or result is less than min.
 */
export function parsePositiveInt(value: string | undefined, defaultValue: number, min = 1): number {
  const parsed = parseInt(value ?? "", 10);
  if (isNaN(parsed) || parsed < min) {
    return defaultValue;
  }
  return parsed;
}

/**
 * Parse an environment flag. Accepts 1/0, true/false, yes/no, on/off.
 */
export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  switch (value?.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
    case "on":
      return true;
    case "0":
    case "false":
    case "no":
    case "off":
      return false;
    default:
      return defaultValue;
  }
}
