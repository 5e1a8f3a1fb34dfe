import { readFile, writeFile } from 'fs/promises';
import { logger } from '../logger.js';
import { register } from './metrics.js';
import type { AlertRecord, RawEvent } from '../shared/types.js';

/**
 * Loads a batch of raw heartbeat events from a JSON file
 *
 * A missing or unreadable file, invalid JSON, or a top level that is not an
 * array is logged and yields an empty batch. Individual records are not
 * checked here.
 *
 * @param path - Path to a JSON array of event records
 */
export async function loadEventsFromFile(path: string): Promise<RawEvent[]> {
  let contents: string;
  try {
    contents = await readFile(path, 'utf8');
  } catch (err) {
    logger.error({ err, path }, 'Failed to read events file');
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (err) {
    logger.error({ err, path }, 'Events file is not valid JSON');
    return [];
  }

  if (!Array.isArray(parsed)) {
    logger.error({ path, type: typeof parsed }, 'Events file must contain a JSON array');
    return [];
  }

  logger.debug({ path, count: parsed.length }, 'Loaded heartbeat events');
  return parsed;
}

/**
 * Writes alerts as a pretty-printed JSON array
 *
 * @throws the underlying fs error if the file cannot be written
 */
export async function saveAlertsToFile(
  path: string,
  alerts: readonly AlertRecord[],
): Promise<void> {
  await writeFile(path, `${JSON.stringify(alerts, null, 2)}\n`, 'utf8');
  logger.debug({ path, count: alerts.length }, 'Saved alerts');
}

/**
 * Writes the Prometheus text exposition of the default registry
 */
export async function saveMetricsToFile(path: string): Promise<void> {
  await writeFile(path, await register.metrics(), 'utf8');
}
