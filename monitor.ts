/**
 * Heartbeat Monitor
 *
 * Composes normalization and gap detection over a finite batch:
 * normalize → detect per service → flatten alerts tagged with their service.
 * Services never share state; alerts come out grouped by service in
 * first-seen order, chronological within each service.
 */

import { detectMissedHeartbeats } from './gapDetector.js';
import { logger } from './logger.js';
import { resolveMonitorConfig } from './monitorConfig.js';
import { groupAndSort, normalizeEvents, validateEvent } from './normalizer.js';
import { formatTimestamp, parseTimestamp } from './timestamps.js';
import {
  REJECTION_REASONS,
  type Alert,
  type AlertRecord,
  type MonitorConfig,
  type MonitorRun,
  type RawEvent,
  type RejectionReason,
  type ServiceTimeline,
  type Timestamp,
} from './shared/types.js';

const collectAlerts = (
  timelines: Map<string, ServiceTimeline>,
  config: MonitorConfig,
): Alert[] => {
  const alerts: Alert[] = [];
  for (const [service, timeline] of timelines) {
    for (const alertAt of detectMissedHeartbeats(timeline, config)) {
      alerts.push({ service, alertAt });
    }
  }
  return alerts;
};

/**
 * Runs the full detection pipeline over one batch of raw events
 *
 * @param events - Untrusted raw records; invalid ones are skipped
 * @param config - Interval/threshold overrides on top of 60s / 3 misses
 * @returns Alerts grouped by service, chronological within a service
 * @throws MonitorConfigError on a non-positive or fractional parameter
 */
export function monitorHeartbeats(
  events: readonly RawEvent[],
  config: Partial<MonitorConfig> = {},
): Alert[] {
  const resolved = resolveMonitorConfig(config);
  return collectAlerts(groupAndSort(events), resolved);
}

export const toAlertRecord = (alert: Alert): AlertRecord => ({
  service: alert.service,
  alert_at: formatTimestamp(alert.alertAt),
});

export const toAlertRecords = (alerts: readonly Alert[]): AlertRecord[] =>
  alerts.map(toAlertRecord);

const nonZero = (
  counts: Record<RejectionReason, number>,
): Partial<Record<RejectionReason, number>> => {
  const out: Partial<Record<RejectionReason, number>> = {};
  for (const reason of REJECTION_REASONS) {
    if (counts[reason] > 0) {
      out[reason] = counts[reason];
    }
  }
  return out;
};

/**
 * Monitor bound to one configuration, validated at construction.
 *
 * `run()` also reports validation tallies and logs a run summary; it touches
 * no shared state, so recording metrics is left to the caller.
 */
export class HeartbeatMonitor {
  readonly config: Readonly<MonitorConfig>;

  constructor(config: Partial<MonitorConfig> = {}) {
    this.config = Object.freeze(resolveMonitorConfig(config));
  }

  parseTimestamp(value: unknown): Timestamp | null {
    return parseTimestamp(value);
  }

  validateEvent(raw: RawEvent): boolean {
    return validateEvent(raw);
  }

  groupAndSort(events: readonly RawEvent[]): Map<string, ServiceTimeline> {
    return groupAndSort(events);
  }

  detect(timeline: ServiceTimeline): Timestamp[] {
    return detectMissedHeartbeats(timeline, this.config);
  }

  monitor(events: readonly RawEvent[]): Alert[] {
    return this.run(events).alerts;
  }

  run(events: readonly RawEvent[]): MonitorRun {
    const { timelines, accepted, rejected } = normalizeEvents(events);
    const alerts = collectAlerts(timelines, this.config);

    const rejectedTotal = events.length - accepted;
    logger.info(
      {
        events: events.length,
        accepted,
        rejected: rejectedTotal,
        services: timelines.size,
        alerts: alerts.length,
        ...this.config,
      },
      'Heartbeat batch processed',
    );

    if (rejectedTotal > 0) {
      logger.warn({ rejected: nonZero(rejected) }, 'Invalid heartbeat events were skipped');
    }

    return { alerts, accepted, rejected, services: timelines.size };
  }
}
