export const clamp = (value: number, min: number, max: number): number => {
  if (Number.isNaN(value)) {
    return min;
  }
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
};

export const parseBooleanFlag = (
  value?: string | null,
  defaultValue = false,
): boolean => {
  return parseOptionalBoolean(value) ?? defaultValue;
};

export const parseOptionalBoolean = (value?: string | null): boolean | null => {
  if (typeof value !== "string") {
    return null;
  }
  const normalised = value.trim().toLowerCase();
  if (
    normalised === "1" ||
    normalised === "true" ||
    normalised === "yes" ||
    normalised === "on"
  ) {
    return true;
  }
  if (
    normalised === "0" ||
    normalised === "false" ||
    normalised === "no" ||
    normalised === "off"
  ) {
    return false;
  }
  return null;
};

type NumericOptions = {
  integer?: boolean;
};

/**
 * Parses a numeric environment value. Returns null when the variable is
 * missing or not a finite number; range checks are left to the caller.
 */
export const parseNumericEnv = (
  value: string | null | undefined,
  options: NumericOptions = {},
): number | null => {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }
  const parsed = options.integer
    ? Number.parseInt(trimmed, 10)
    : Number.parseFloat(trimmed);
  if (!Number.isFinite(parsed)) {
    return null;
  }
  return parsed;
};

export const getEnvVar = (key: string): string | undefined => {
  if (typeof process !== "undefined" && process?.env?.[key] !== undefined) {
    return process.env[key];
  }
  return undefined;
};
