import { describe, it, expect, vi } from 'vitest';
import {
  groupAndSort,
  normalizeEvents,
  toHeartbeatEvent,
  validateEvent,
} from '../normalizer.js';
import { formatTimestamp, parseTimestamp } from '../timestamps.js';
import type { ServiceTimeline } from '../shared/types.js';

vi.mock('../logger.js', () => ({
  logger: {
    warn: vi.fn(),
    info: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

const ts = (iso: string): bigint => {
  const parsed = parseTimestamp(iso);
  if (parsed === null) {
    throw new Error(`bad fixture timestamp ${iso}`);
  }
  return parsed;
};

const isoOf = (timeline: ServiceTimeline | undefined): string[] =>
  (timeline ?? []).map((event) => formatTimestamp(event.instant));

describe('Normalizer - validateEvent', () => {
  it('should accept a complete event', () => {
    expect(validateEvent({ service: 'test', timestamp: '2025-08-04T10:00:00Z' })).toBe(true);
  });

  it('should reject events with missing or empty fields', () => {
    expect(validateEvent({ timestamp: '2025-08-04T10:00:00Z' })).toBe(false);
    expect(validateEvent({ service: 'test' })).toBe(false);
    expect(validateEvent({ service: '', timestamp: '2025-08-04T10:00:00Z' })).toBe(false);
    expect(validateEvent({ service: 'test', timestamp: 'invalid' })).toBe(false);
  });

  it('should reject values that are not records', () => {
    expect(validateEvent('not-a-dict')).toBe(false);
    expect(validateEvent(null)).toBe(false);
    expect(validateEvent(undefined)).toBe(false);
    expect(validateEvent(42)).toBe(false);
    expect(validateEvent([{ service: 'test', timestamp: '2025-08-04T10:00:00Z' }])).toBe(false);
  });

  it('should ignore extra fields', () => {
    expect(
      validateEvent({ service: 'test', timestamp: '2025-08-04T10:00:00Z', host: 'web-1' }),
    ).toBe(true);
  });

  it('should give the same answer when called twice', () => {
    const events: unknown[] = [
      { service: 'test', timestamp: '2025-08-04T10:00:00Z' },
      { service: 'test', timestamp: 'nope' },
      {},
      'not-a-dict',
    ];
    for (const event of events) {
      expect(validateEvent(event)).toBe(validateEvent(event));
    }
  });

  it('should not mutate the event', () => {
    const event = { service: 'test', timestamp: '2025-08-04T10:00:00Z' };
    validateEvent(event);
    expect(event).toEqual({ service: 'test', timestamp: '2025-08-04T10:00:00Z' });
  });
});

const rejectionOf = (raw: unknown) => {
  const conversion = toHeartbeatEvent(raw);
  return conversion.ok ? null : conversion.reason;
};

describe('Normalizer - toHeartbeatEvent', () => {
  it('should convert a valid record', () => {
    expect(toHeartbeatEvent({ service: 'api', timestamp: '2025-08-04T10:00:00Z' }, 4)).toEqual({
      ok: true,
      event: {
        service: 'api',
        instant: ts('2025-08-04T10:00:00Z'),
        sequence: 4,
      },
    });
  });

  it('should report the first failing check', () => {
    expect(rejectionOf('not-a-dict')).toBe('InvalidRecordShape');
    expect(rejectionOf(null)).toBe('InvalidRecordShape');
    expect(rejectionOf({})).toBe('MissingService');
    expect(rejectionOf({ service: null, timestamp: '2025-08-04T10:00:00Z' })).toBe(
      'MissingService',
    );
    expect(rejectionOf({ service: 7, timestamp: '2025-08-04T10:00:00Z' })).toBe(
      'InvalidRecordShape',
    );
    expect(rejectionOf({ service: '', timestamp: '2025-08-04T10:00:00Z' })).toBe('EmptyService');
    expect(rejectionOf({ service: 'api' })).toBe('MissingTimestamp');
    expect(rejectionOf({ service: 'api', timestamp: null })).toBe('UnparseableTimestamp');
    expect(rejectionOf({ service: 'api', timestamp: 'yesterday' })).toBe('UnparseableTimestamp');
  });

  it('should agree with the rejection counts of normalizeEvents', () => {
    const batch = [{ service: 'api' }, { service: '', timestamp: '2025-08-04T10:00:00Z' }];
    const { rejected } = normalizeEvents(batch);

    for (const raw of batch) {
      const reason = rejectionOf(raw);
      expect(reason).not.toBeNull();
      if (reason !== null) {
        expect(rejected[reason]).toBe(1);
      }
    }
  });
});

describe('Normalizer - groupAndSort', () => {
  it('should return an empty map for an empty batch', () => {
    expect(groupAndSort([]).size).toBe(0);
  });

  it('should return an empty map when nothing is valid', () => {
    expect(groupAndSort([{}, 'x', { service: 'a' }, null]).size).toBe(0);
  });

  it('should sort each service ascending by instant', () => {
    const timelines = groupAndSort([
      { service: 'push', timestamp: '2025-08-04T10:05:00Z' },
      { service: 'push', timestamp: '2025-08-04T10:00:00Z' },
      { service: 'push', timestamp: '2025-08-04T10:01:00Z' },
    ]);

    expect(isoOf(timelines.get('push'))).toEqual([
      '2025-08-04T10:00:00Z',
      '2025-08-04T10:01:00Z',
      '2025-08-04T10:05:00Z',
    ]);
  });

  it('should order by instant, not by text', () => {
    const timelines = groupAndSort([
      { service: 'api', timestamp: '2025-08-04T10:30:00+00:00' },
      { service: 'api', timestamp: '2025-08-04T12:00:00+02:00' },
    ]);

    expect(isoOf(timelines.get('api'))).toEqual(['2025-08-04T10:00:00Z', '2025-08-04T10:30:00Z']);
  });

  it('should keep input order for equal instants', () => {
    const timelines = groupAndSort([
      { service: 'api', timestamp: '2025-08-04T10:01:00Z' },
      { service: 'api', timestamp: '2025-08-04T12:00:00+02:00' },
      { service: 'api', timestamp: '2025-08-04T10:00:00Z' },
      { service: 'api', timestamp: '2025-08-04T05:00:00-05:00' },
    ]);

    expect(timelines.get('api')?.map((event) => event.sequence)).toEqual([1, 2, 3, 0]);
  });

  it('should key services in first-seen order', () => {
    const timelines = groupAndSort([
      { service: 'sms', timestamp: '2025-08-04T10:00:00Z' },
      { service: 'email', timestamp: '2025-08-04T10:00:00Z' },
      { service: 'sms', timestamp: '2025-08-04T10:01:00Z' },
      { service: 'push', timestamp: '2025-08-04T10:00:00Z' },
    ]);

    expect([...timelines.keys()]).toEqual(['sms', 'email', 'push']);
    expect(timelines.get('sms')).toHaveLength(2);
  });

  it('should drop invalid events and keep their neighbours', () => {
    const timelines = groupAndSort([
      { service: 'test', timestamp: '2025-08-04T10:00:00Z' },
      { service: 'test' },
      { timestamp: '2025-08-04T10:01:00Z' },
      { service: 'test', timestamp: 'not-a-timestamp' },
      { service: 'test', timestamp: '2025-08-04T10:02:00Z' },
      {},
      'not-a-dict',
    ]);

    expect([...timelines.keys()]).toEqual(['test']);
    expect(timelines.get('test')?.map((event) => event.sequence)).toEqual([0, 4]);
  });
});

describe('Normalizer - normalizeEvents', () => {
  it('should count accepted and rejected events by reason', () => {
    const result = normalizeEvents([
      { service: 'test', timestamp: '2025-08-04T10:00:00Z' },
      { service: 'test' },
      { timestamp: '2025-08-04T10:01:00Z' },
      { service: '', timestamp: '2025-08-04T10:01:00Z' },
      { service: 'test', timestamp: 'not-a-timestamp' },
      { service: 'test', timestamp: '2025-08-04T10:02:00Z' },
      {},
      'not-a-dict',
    ]);

    expect(result.accepted).toBe(2);
    expect(result.rejected).toEqual({
      InvalidRecordShape: 1,
      MissingService: 2,
      EmptyService: 1,
      MissingTimestamp: 1,
      UnparseableTimestamp: 1,
    });
    expect(result.timelines.get('test')).toHaveLength(2);
  });
});
