/**
 * Event Normalizer
 *
 * Turns an untrusted batch of raw records into per-service timelines:
 * - Rejects anything that is not a `{ service, timestamp }` record
 * - Parses timestamps into epoch microseconds
 * - Groups by service in first-seen order
 * - Sorts each timeline ascending by instant (stable on ties)
 */

import { logger } from './logger.js';
import { parseTimestamp } from './timestamps.js';
import type {
  HeartbeatConversion,
  HeartbeatEvent,
  NormalizationResult,
  RawEvent,
  RejectionReason,
  ServiceTimeline,
} from './shared/types.js';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const reject = (reason: RejectionReason): HeartbeatConversion => ({ ok: false, reason });

/**
 * Converts a raw event into a validated heartbeat
 *
 * Checks run in order: record shape, service present, service is a string,
 * service non-empty, timestamp present, timestamp parseable. The first failure
 * is reported as the rejection reason.
 *
 * @param raw - Untrusted event record
 * @param sequence - Position of the record in its batch
 */
export function toHeartbeatEvent(raw: RawEvent, sequence = 0): HeartbeatConversion {
  if (!isRecord(raw)) {
    return reject('InvalidRecordShape');
  }

  const { service, timestamp } = raw;
  if (service === undefined || service === null) {
    return reject('MissingService');
  }
  if (typeof service !== 'string') {
    return reject('InvalidRecordShape');
  }
  if (service === '') {
    return reject('EmptyService');
  }
  if (timestamp === undefined) {
    return reject('MissingTimestamp');
  }

  const instant = parseTimestamp(timestamp);
  if (instant === null) {
    return reject('UnparseableTimestamp');
  }
  return { ok: true, event: { service, instant, sequence } };
}

/**
 * True when the raw event carries a non-empty service and a parseable timestamp
 */
export function validateEvent(raw: RawEvent): boolean {
  return toHeartbeatEvent(raw).ok;
}

const emptyRejections = (): Record<RejectionReason, number> => ({
  InvalidRecordShape: 0,
  MissingService: 0,
  EmptyService: 0,
  MissingTimestamp: 0,
  UnparseableTimestamp: 0,
});

const compareInstants = (a: HeartbeatEvent, b: HeartbeatEvent): number =>
  a.instant < b.instant ? -1 : a.instant > b.instant ? 1 : 0;

/**
 * Validates, groups and sorts a batch, keeping per-reason rejection counts
 *
 * @param events - Raw batch in input order
 * @returns Timelines keyed by service plus accepted/rejected tallies
 */
export function normalizeEvents(events: readonly RawEvent[]): NormalizationResult {
  const grouped = new Map<string, HeartbeatEvent[]>();
  const rejected = emptyRejections();
  let accepted = 0;

  events.forEach((raw, index) => {
    const conversion = toHeartbeatEvent(raw, index);
    if (!conversion.ok) {
      rejected[conversion.reason] += 1;
      logger.debug({ index, reason: conversion.reason }, 'Dropping invalid heartbeat event');
      return;
    }

    const { event } = conversion;
    accepted += 1;
    const timeline = grouped.get(event.service);
    if (timeline) {
      timeline.push(event);
    } else {
      grouped.set(event.service, [event]);
    }
  });

  // Array.prototype.sort is stable, so equal instants keep input order
  const timelines = new Map<string, ServiceTimeline>();
  for (const [service, timeline] of grouped) {
    timelines.set(service, timeline.sort(compareInstants));
  }

  logger.debug(
    { total: events.length, accepted, rejected, services: timelines.size },
    'Normalized heartbeat batch',
  );

  return { timelines, accepted, rejected };
}

/**
 * Groups valid events by service, each timeline sorted ascending by instant
 *
 * An empty or entirely invalid batch yields an empty map.
 */
export function groupAndSort(events: readonly RawEvent[]): Map<string, ServiceTimeline> {
  return normalizeEvents(events).timelines;
}
