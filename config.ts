import 'dotenv/config';

/**
 * Reads an environment variable, falling back when it is unset or empty
 *
 * @param name - Environment variable name
 * @param fallback - Value used when the variable is unset
 * @param validator - Optional validation function
 * @returns Validated environment variable value
 * @throws Error if the value fails validation
 */
const optional = (
  name: string,
  fallback: string,
  validator?: (value: string) => boolean,
): string => {
  const raw = process.env[name];
  const value = raw === undefined || raw === '' ? fallback : raw;
  if (validator && !validator(value)) {
    throw new Error(`Invalid value for env var ${name}`);
  }
  return value;
};

/**
 * Validates a whole positive integer such as "60" (no sign, no fraction)
 */
const validatePositiveInteger = (value: string): boolean =>
  /^\d+$/.test(value) && Number(value) > 0;

/**
 * Command-line defaults
 *
 * Loaded by the CLI only. The detection core takes its parameters from the
 * caller and never reads the environment.
 */
export const config = {
  // Detection
  expectedIntervalSeconds: Number(
    optional('HEARTBEAT_INTERVAL_SECONDS', '60', validatePositiveInteger),
  ),
  allowedMisses: Number(optional('HEARTBEAT_ALLOWED_MISSES', '3', validatePositiveInteger)),

  // Batch files
  eventsFile: optional('HEARTBEAT_EVENTS_FILE', 'events.json'),
  alertsFile: optional('HEARTBEAT_ALERTS_FILE', 'alerts.json'),
};

export type AppConfig = typeof config;
