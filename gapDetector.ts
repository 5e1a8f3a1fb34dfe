/**
 * Gap Detector
 *
 * Walks a virtual expected-arrival clock over one service's timeline. The clock
 * starts at the first heartbeat and advances by the interval on every step,
 * always from its own previous value. An event at or before the current slot
 * consumes it; an event after it counts the slot as missed. When the run of
 * consecutive misses reaches the threshold, the slot is reported and the count
 * restarts from zero.
 */

import { assertMonitorConfig } from './monitorConfig.js';
import { secondsToMicros } from './timestamps.js';
import type { MonitorConfig, ServiceTimeline, Timestamp } from './shared/types.js';

/**
 * Finds the expected slots at which consecutive misses crossed the threshold
 *
 * Nothing is reported after the last event: without a later heartbeat there is
 * no evidence of a gap.
 *
 * @param timeline - One service's events, ascending by instant
 * @param config - Interval and miss threshold
 * @returns Alert instants in chronological order
 * @throws MonitorConfigError if the interval or threshold is not a positive integer
 */
export function detectMissedHeartbeats(
  timeline: ServiceTimeline,
  config: MonitorConfig,
): Timestamp[] {
  assertMonitorConfig(config);

  if (timeline.length < 2) {
    return [];
  }

  const interval = secondsToMicros(config.expectedIntervalSeconds);
  const alerts: Timestamp[] = [];
  let expected = timeline[0].instant;
  let misses = 0;
  let cursor = 1;

  while (cursor < timeline.length) {
    expected += interval;
    const actual = timeline[cursor].instant;

    if (actual <= expected) {
      misses = 0;
      cursor += 1;
      continue;
    }

    misses += 1;
    if (misses >= config.allowedMisses) {
      alerts.push(expected);
      misses = 0;
    }
  }

  return alerts;
}
