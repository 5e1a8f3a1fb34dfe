#!/usr/bin/env node
/**
 * Heartbeat Watch CLI
 *
 * Loads a JSON batch of heartbeat events, reports services that missed too many
 * consecutive heartbeats, and saves the alerts as JSON.
 *
 * Usage: heartbeat-watch --events-file=events.json --interval=60 --allowed-misses=3
 */

import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { config } from './config.js';
import { CliUsageError } from './errors.js';
import { loadEventsFromFile, saveAlertsToFile, saveMetricsToFile } from './lib/eventsFile.js';
import { monitorRunDuration, recordMonitorRun } from './lib/metrics.js';
import { logger } from './logger.js';
import { HeartbeatMonitor, toAlertRecords } from './monitor.js';

export interface CliOptions {
  eventsFile: string;
  intervalSeconds: number;
  allowedMisses: number;
  outputFile: string;
  metricsFile?: string;
  help: boolean;
}

export interface CliOutput {
  out: (line: string) => void;
  err: (line: string) => void;
}

export const USAGE = `Usage: heartbeat-watch [options]

Options:
  --events-file <path>     JSON file containing heartbeat events (default: ${config.eventsFile})
  --interval <seconds>     Expected heartbeat interval (default: ${config.expectedIntervalSeconds})
  --allowed-misses <n>     Consecutive misses before an alert (default: ${config.allowedMisses})
  --output-file <path>     File to store alerts output (default: ${config.alertsFile})
  --metrics-file <path>    Also write Prometheus metrics to this file
  --help                   Show this message`;

const VALUE_FLAGS = [
  '--events-file',
  '--interval',
  '--allowed-misses',
  '--output-file',
  '--metrics-file',
] as const;

type ValueFlag = (typeof VALUE_FLAGS)[number];

const isValueFlag = (flag: string): flag is ValueFlag =>
  VALUE_FLAGS.some((known) => known === flag);

const parsePositiveInt = (flag: string, value: string): number => {
  if (!/^\d+$/.test(value) || Number(value) <= 0) {
    throw new CliUsageError(`${flag} expects a positive integer, got "${value}"`);
  }
  return Number(value);
};

/**
 * Parses command-line flags on top of the environment defaults
 *
 * Accepts both `--flag value` and `--flag=value`.
 *
 * @throws CliUsageError on unknown flags, missing values or bad numbers
 */
export function parseCliArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = {
    eventsFile: config.eventsFile,
    intervalSeconds: config.expectedIntervalSeconds,
    allowedMisses: config.allowedMisses,
    outputFile: config.alertsFile,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      options.help = true;
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    if (!isValueFlag(flag)) {
      throw new CliUsageError(`Unknown argument: ${arg}`);
    }

    let value: string;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      const next = args[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new CliUsageError(`${flag} requires a value`);
      }
      value = next;
      i += 1;
    }

    switch (flag) {
      case '--events-file':
        options.eventsFile = value;
        break;
      case '--interval':
        options.intervalSeconds = parsePositiveInt(flag, value);
        break;
      case '--allowed-misses':
        options.allowedMisses = parsePositiveInt(flag, value);
        break;
      case '--output-file':
        options.outputFile = value;
        break;
      case '--metrics-file':
        options.metricsFile = value;
        break;
    }
  }

  return options;
}

const consoleOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Runs one batch and returns the process exit code
 *
 * 0 on success (with or without alerts), 1 when a result file cannot be
 * written, 2 on a usage error.
 */
export async function runCli(
  args: readonly string[],
  output: CliOutput = consoleOutput,
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(args);
  } catch (error) {
    if (error instanceof CliUsageError) {
      output.err(error.message);
      output.err(USAGE);
      return 2;
    }
    throw error;
  }

  if (options.help) {
    output.out(USAGE);
    return 0;
  }

  const events = await loadEventsFromFile(options.eventsFile);
  if (events.length === 0) {
    output.out('No valid events found.');
    return 0;
  }

  const monitor = new HeartbeatMonitor({
    expectedIntervalSeconds: options.intervalSeconds,
    allowedMisses: options.allowedMisses,
  });
  const endTimer = monitorRunDuration.startTimer();
  const run = monitor.run(events);
  endTimer();
  recordMonitorRun(run);
  const alerts = toAlertRecords(run.alerts);

  if (alerts.length > 0) {
    output.out('Alerts triggered:');
    output.out(JSON.stringify(alerts, null, 2));
  } else {
    output.out('No alerts triggered.');
  }

  try {
    await saveAlertsToFile(options.outputFile, alerts);
    output.out(`Alerts saved to ${options.outputFile}`);
  } catch (error) {
    logger.error({ err: error, path: options.outputFile }, 'Failed to save alerts');
    output.err(`Error saving alerts to ${options.outputFile}: ${describeError(error)}`);
    return 1;
  }

  if (options.metricsFile !== undefined) {
    try {
      await saveMetricsToFile(options.metricsFile);
    } catch (error) {
      logger.error({ err: error, path: options.metricsFile }, 'Failed to save metrics');
      output.err(`Error saving metrics to ${options.metricsFile}: ${describeError(error)}`);
      return 1;
    }
  }

  return 0;
}

const isEntryPoint = (): boolean => {
  const entry = process.argv[1];
  if (entry === undefined) {
    return false;
  }
  try {
    // npm installs bins as symlinks
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
};

if (isEntryPoint()) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      logger.fatal({ err: error }, 'Heartbeat monitor failed');
      process.exitCode = 1;
    });
}
