import { MonitorConfigError } from './errors.js';
import type { MonitorConfig } from './shared/types.js';

export const DEFAULT_MONITOR_CONFIG: Readonly<MonitorConfig> = {
  expectedIntervalSeconds: 60,
  allowedMisses: 3,
};

const isPositiveInteger = (value: unknown): value is number =>
  typeof value === 'number' && Number.isSafeInteger(value) && value > 0;

/**
 * Throws MonitorConfigError unless both parameters are positive integers.
 * The detection loop only terminates for a positive interval.
 */
export function assertMonitorConfig(config: MonitorConfig): void {
  if (!isPositiveInteger(config.expectedIntervalSeconds)) {
    throw new MonitorConfigError('expectedIntervalSeconds', config.expectedIntervalSeconds);
  }
  if (!isPositiveInteger(config.allowedMisses)) {
    throw new MonitorConfigError('allowedMisses', config.allowedMisses);
  }
}

/**
 * Fills unset parameters with defaults and validates the result
 */
export function resolveMonitorConfig(overrides: Partial<MonitorConfig> = {}): MonitorConfig {
  const resolved: MonitorConfig = {
    expectedIntervalSeconds:
      overrides.expectedIntervalSeconds ?? DEFAULT_MONITOR_CONFIG.expectedIntervalSeconds,
    allowedMisses: overrides.allowedMisses ?? DEFAULT_MONITOR_CONFIG.allowedMisses,
  };
  assertMonitorConfig(resolved);
  return resolved;
}
