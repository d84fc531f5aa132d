/**
 * Helpers reading `TOPOSCC_*` environment variables with consistent coercion
 * rules: surrounding whitespace is ignored, blank values count as unset and
 * unrecognised literals fall back to the caller's default.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

/** Trims the raw value from {@link process.env}; blank strings become `undefined`. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/** Returns an optional boolean if {@link name} holds a recognised literal. */
export function readOptionalBool(name: string): boolean | undefined {
  const normalised = normaliseEnvValue(process.env[name])?.toLowerCase();
  if (normalised === undefined) {
    return undefined;
  }
  if (TRUE_LITERALS.has(normalised)) {
    return true;
  }
  if (FALSE_LITERALS.has(normalised)) {
    return false;
  }
  return undefined;
}

/**
 * Reads {@link name} as a boolean ("1", "true", "yes", "on" and their falsy
 * counterparts, case-insensitive), or `defaultValue`.
 */
export function readBool(name: string, defaultValue: boolean): boolean {
  return readOptionalBool(name) ?? defaultValue;
}

/** Returns the trimmed value of {@link name}, or `undefined` when unset or blank. */
export function readOptionalString(name: string): string | undefined {
  return normaliseEnvValue(process.env[name]);
}

/**
 * Reads an enum-like variable, matching the allow-list case-insensitively and
 * returning the canonical spelling. Unknown literals yield `undefined`.
 */
export function readOptionalEnum<T extends string>(name: string, allowed: readonly T[]): T | undefined {
  const normalised = normaliseEnvValue(process.env[name])?.toLowerCase();
  if (normalised === undefined) {
    return undefined;
  }
  return allowed.find((value) => value.toLowerCase() === normalised);
}

/** Same as {@link readOptionalEnum} with a fallback. */
export function readEnum<T extends string>(name: string, allowed: readonly T[], defaultValue: T): T {
  return readOptionalEnum(name, allowed) ?? defaultValue;
}
