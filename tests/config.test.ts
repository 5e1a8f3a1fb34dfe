import { describe, it, expect, beforeEach, afterAll, vi } from 'vitest';

const CONFIG_VARS = [
  'HEARTBEAT_INTERVAL_SECONDS',
  'HEARTBEAT_ALLOWED_MISSES',
  'HEARTBEAT_EVENTS_FILE',
  'HEARTBEAT_ALERTS_FILE',
] as const;

const originalEnv = Object.fromEntries(CONFIG_VARS.map((name) => [name, process.env[name]]));

describe('Configuration', () => {
  beforeEach(() => {
    // Reset modules before each test so config.ts re-reads the environment
    vi.resetModules();
    for (const name of CONFIG_VARS) {
      delete process.env[name];
    }
  });

  afterAll(() => {
    for (const name of CONFIG_VARS) {
      const value = originalEnv[name];
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
  });

  it('should set default values correctly', async () => {
    const { config } = await import('../config.js');
    expect(config.expectedIntervalSeconds).toBe(60);
    expect(config.allowedMisses).toBe(3);
    expect(config.eventsFile).toBe('events.json');
    expect(config.alertsFile).toBe('alerts.json');
  });

  it('should parse numeric values correctly', async () => {
    process.env.HEARTBEAT_INTERVAL_SECONDS = '30';
    process.env.HEARTBEAT_ALLOWED_MISSES = '5';

    const { config } = await import('../config.js');
    expect(config.expectedIntervalSeconds).toBe(30);
    expect(config.allowedMisses).toBe(5);
  });

  it('should read file paths from the environment', async () => {
    process.env.HEARTBEAT_EVENTS_FILE = '/var/lib/heartbeats/batch.json';
    process.env.HEARTBEAT_ALERTS_FILE = '/var/lib/heartbeats/alerts.json';

    const { config } = await import('../config.js');
    expect(config.eventsFile).toBe('/var/lib/heartbeats/batch.json');
    expect(config.alertsFile).toBe('/var/lib/heartbeats/alerts.json');
  });

  it('should treat an empty variable as unset', async () => {
    process.env.HEARTBEAT_INTERVAL_SECONDS = '';

    const { config } = await import('../config.js');
    expect(config.expectedIntervalSeconds).toBe(60);
  });

  it.each(['0', '-1', '1.5', 'abc'])(
    'should reject HEARTBEAT_INTERVAL_SECONDS=%s',
    async (value) => {
      process.env.HEARTBEAT_INTERVAL_SECONDS = value;

      await expect(import('../config.js')).rejects.toThrow(
        'Invalid value for env var HEARTBEAT_INTERVAL_SECONDS',
      );
    },
  );

  it('should reject a zero miss threshold', async () => {
    process.env.HEARTBEAT_ALLOWED_MISSES = '0';

    await expect(import('../config.js')).rejects.toThrow(
      'Invalid value for env var HEARTBEAT_ALLOWED_MISSES',
    );
  });
});
