/**
 * Shared helpers dedicated to reading environment variables in a predictable
 * manner. Centralising the parsing logic keeps the coercion rules consistent
 * between the runtime configuration and the logger.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

/** Normalises the raw value retrieved from {@link process.env}. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }

  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/**
 * Reads the provided environment variable and interprets it as a boolean.
 * Accepts "1", "true", "yes", "on" and "0", "false", "no", "off"; anything
 * else falls back to the supplied default.
 */
export function readBool(name: string, defaultValue: boolean): boolean {
  return readOptionalBool(name) ?? defaultValue;
}

/** Returns an optional boolean if {@link name} is set to a recognised literal. */
export function readOptionalBool(name: string): boolean | undefined {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised) {
    return undefined;
  }

  const lower = normalised.toLowerCase();
  if (TRUE_LITERALS.has(lower)) {
    return true;
  }
  if (FALSE_LITERALS.has(lower)) {
    return false;
  }
  return undefined;
}

interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

/**
 * Reads the environment variable as a base-10 integer. Unexpected or
 * out-of-bounds values cause the helper to return the provided default.
 */
export function readInt(name: string, defaultValue: number, options?: NumberOptions): number {
  return readOptionalInt(name, options) ?? defaultValue;
}

/** Returns an optional integer when {@link name} contains a valid base-10 literal. */
export function readOptionalInt(name: string, options?: NumberOptions): number | undefined {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised) {
    return undefined;
  }

  if (!/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }

  const value = Number.parseInt(normalised, 10);
  // Literals beyond Number.MAX_SAFE_INTEGER would be silently rounded.
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }

  return withinBounds(value, options) ? value : undefined;
}

/** Returns the trimmed string when {@link name} is set to a non-empty value. */
export function readOptionalString(name: string): string | undefined {
  return normaliseEnvValue(process.env[name]);
}

/**
 * Reads an enum-like environment variable while validating that the literal
 * belongs to the allow-list. Mixed-case inputs are accepted.
 */
export function readOptionalEnum<T extends string>(name: string, allowed: readonly T[]): T | undefined {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised) {
    return undefined;
  }

  const lookup = new Map<string, T>();
  for (const value of allowed) {
    lookup.set(value.toLowerCase(), value);
  }
  return lookup.get(normalised.toLowerCase());
}

/** Returns a canonical enum value, defaulting when the variable is unset or invalid. */
export function readEnum<T extends string>(name: string, allowed: readonly T[], defaultValue: T): T {
  return readOptionalEnum(name, allowed) ?? defaultValue;
}
