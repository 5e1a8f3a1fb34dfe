import { register, Counter, Histogram } from 'prom-client';
import { REJECTION_REASONS, type MonitorRun } from '../shared/types.js';

export const eventsAcceptedCounter = new Counter({
  name: 'heartbeat_events_accepted_total',
  help: 'Number of heartbeat events that passed validation',
});

export const eventsRejectedCounter = new Counter({
  name: 'heartbeat_events_rejected_total',
  help: 'Number of heartbeat events dropped during normalization',
  labelNames: ['reason'],
});

// No per-service label: service names come from untrusted input
export const alertsCounter = new Counter({
  name: 'heartbeat_alerts_total',
  help: 'Number of missed-heartbeat alerts raised',
});

export const monitorRunDuration = new Histogram({
  name: 'heartbeat_monitor_run_duration_seconds',
  help: 'Duration of a batch monitor run in seconds',
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
});

/**
 * Adds the tallies of one batch run to the counters
 */
export function recordMonitorRun(run: MonitorRun): void {
  eventsAcceptedCounter.inc(run.accepted);
  for (const reason of REJECTION_REASONS) {
    if (run.rejected[reason] > 0) {
      eventsRejectedCounter.inc({ reason }, run.rejected[reason]);
    }
  }
  alertsCounter.inc(run.alerts.length);
}

export { register };
