/**
 * Core type definitions for heartbeat monitoring
 */

/**
 * A point in time as whole microseconds since the Unix epoch (UTC).
 *
 * Microseconds keep the full `.ffffff` precision heartbeat timestamps may carry,
 * which a millisecond `Date` would truncate. A bigint keeps that exact across the
 * whole 0001-9999 year range.
 */
export type Timestamp = bigint;

/**
 * Raw record as it arrives from a loader. Nothing about its shape is trusted.
 */
export type RawEvent = unknown;

/**
 * A raw event that passed validation
 */
export interface HeartbeatEvent {
  readonly service: string;
  readonly instant: Timestamp;
  /** Position of the record in the raw input batch */
  readonly sequence: number;
}

/**
 * Events for one service, ascending by instant (ties keep input order)
 */
export type ServiceTimeline = readonly HeartbeatEvent[];

/**
 * Why a raw event was left out of processing
 */
export type RejectionReason =
  | 'InvalidRecordShape'
  | 'MissingService'
  | 'EmptyService'
  | 'MissingTimestamp'
  | 'UnparseableTimestamp';

export const REJECTION_REASONS: readonly RejectionReason[] = [
  'InvalidRecordShape',
  'MissingService',
  'EmptyService',
  'MissingTimestamp',
  'UnparseableTimestamp',
];

/**
 * Outcome of checking one raw event: the validated heartbeat, or the first
 * check it failed
 */
export type HeartbeatConversion =
  | { ok: true; event: HeartbeatEvent }
  | { ok: false; reason: RejectionReason };

export interface NormalizationResult {
  timelines: Map<string, ServiceTimeline>;
  accepted: number;
  rejected: Record<RejectionReason, number>;
}

/**
 * Detection parameters, fixed for the lifetime of a monitor
 */
export interface MonitorConfig {
  expectedIntervalSeconds: number;
  allowedMisses: number;
}

/**
 * Expected heartbeat slot at which the consecutive-miss threshold was crossed
 */
export interface Alert {
  service: string;
  alertAt: Timestamp;
}

/**
 * Alerts of one batch run together with its validation tallies
 */
export interface MonitorRun {
  alerts: Alert[];
  accepted: number;
  rejected: Record<RejectionReason, number>;
  services: number;
}

/**
 * Serialized alert as written to the alerts file
 */
export interface AlertRecord {
  service: string;
  alert_at: string;
}
