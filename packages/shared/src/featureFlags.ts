/**
 * Feature Flags
 *
 * Runtime configuration for the frame-visibility packages.
 * Flags are read from environment variables once; tests and hosts can override them at run time.
 */

/**
 * Read a boolean flag from an environment variable or string value.
 */
function readBooleanFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  return value === "true" || value === "1";
}

export type LogLevelName = "debug" | "info" | "warn" | "error";

function readLogLevel(value: string | undefined, fallback: LogLevelName): LogLevelName {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return fallback;
}

function readEnvValue(key: string): string | undefined {
  if (typeof process === "undefined") {
    return undefined;
  }
  return process.env[key];
}

function isDevelopmentEnv(): boolean {
  const env = readEnvValue("NODE_ENV");
  return env === "development" || env === "test";
}

export type FeatureFlags = {
  dev_assertions: boolean;
  log_level: LogLevelName;
};

/**
 * Feature flag definitions.
 * Default values are set here; can be overridden via environment variables.
 */
export const FEATURE_FLAGS: Readonly<FeatureFlags> = {
  /**
   * Run invariant and query-totality checks after every engine call.
   * Default: on under NODE_ENV=development|test, off otherwise.
   */
  dev_assertions: readBooleanFlag(readEnvValue("FRAMEVIS_DEV_ASSERTIONS"), isDevelopmentEnv()),
  /**
   * Minimum level of the default logger.
   */
  log_level: readLogLevel(readEnvValue("FRAMEVIS_LOG_LEVEL"), "info"),
};

/**
 * Runtime feature flag overrides.
 */
let runtimeOverrides: Partial<FeatureFlags> = {};

/**
 * Override a feature flag at runtime.
 * Useful for testing or dynamic feature toggling.
 */
export function setFeatureFlagOverride<K extends keyof FeatureFlags>(
  flag: K,
  value: FeatureFlags[K]
): void {
  runtimeOverrides[flag] = value;
}

/**
 * Clear all runtime feature flag overrides.
 */
export function clearFeatureFlagOverrides(): void {
  runtimeOverrides = {};
}

/**
 * Get the effective value of a feature flag, considering runtime overrides.
 */
export function getFeatureFlag<K extends keyof FeatureFlags>(flag: K): FeatureFlags[K] {
  const override = runtimeOverrides[flag];
  if (override !== undefined) {
    return override;
  }
  return FEATURE_FLAGS[flag];
}

/** Whether dev assertions are on, considering runtime overrides. */
export function areDevAssertionsEnabled(): boolean {
  return getFeatureFlag("dev_assertions");
}
