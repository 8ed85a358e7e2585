import { setTimeout as delay } from 'node:timers/promises';
import { computeExponentialBackoff } from '@pointforge/shared';
import type { BackoffOptions, Logger } from '@pointforge/shared';
import type { AppendPointInput, SeriesType, TimeRange } from '@pointforge/series-client';
import { AppendBatchError, AppendFailedError } from './errors';
import type { SeriesStore } from './store';
import { formatInstant } from './time';
import type { AppendBatchPolicy, AppendCommand, AppendMode, Point, TimeInterval } from './types';

export const DEFAULT_BATCH_SIZE = 500_000;
export const DEFAULT_WAIT_TIMEOUT_MS = 5 * 60 * 1000;

const POLL_BACKOFF: BackoffOptions = { baseMs: 250, factor: 2, maxMs: 5_000 };

export interface DeliveryTarget {
  uniqueId: string;
  identifier: string;
  type: SeriesType;
}

export interface PlannedBatch {
  index: number;
  points: Point[];
  overwriteRange?: TimeInterval;
}

export interface CompletionResult {
  timedOut: boolean;
  pointsAppended: number;
  pointsDeleted: number;
}

export interface DeliveryResult {
  mode: AppendMode;
  pointsAccepted: number;
  batches: number;
  appendRequestIds: string[];
  completion?: CompletionResult;
}

export interface DeliveryOptions {
  policy: AppendBatchPolicy;
  command: AppendCommand;
  overwriteRange?: TimeInterval;
  logger: Logger;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => delay(ms);

export function partitionPoints<T>(points: readonly T[], batchSize: number): T[][] {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${batchSize}`);
  }
  const batches: T[][] = [];
  for (let start = 0; start < points.length; start += batchSize) {
    batches.push(points.slice(start, start + batchSize));
  }
  return batches;
}

export function resolveAppendMode(
  command: AppendCommand,
  seriesType: SeriesType,
  hasExplicitRange: boolean
): AppendMode {
  if (command !== 'auto') {
    return command;
  }
  if (seriesType === 'reflected') {
    return 'reflected';
  }
  return hasExplicitRange ? 'overwrite' : 'append';
}

export function pointsExtent(points: readonly Point[]): TimeInterval | undefined {
  if (points.length === 0) {
    return undefined;
  }
  let start = Number.POSITIVE_INFINITY;
  let end = Number.NEGATIVE_INFINITY;
  for (const point of points) {
    start = Math.min(start, point.time);
    end = Math.max(end, point.time);
  }
  return { start, end };
}

/**
 * Splits the points into batches. In overwrite and reflected modes each batch gets its own inclusive
 * range, ending just before the next batch's first point, so a later batch never deletes what an
 * earlier batch wrote.
 */
export function planBatches(
  points: readonly Point[],
  options: { batchSize: number; mode: AppendMode; overwriteRange?: TimeInterval }
): PlannedBatch[] {
  const chunks = partitionPoints(points, options.batchSize);
  if (options.mode === 'append') {
    return chunks.map((chunk, index) => ({ index, points: chunk }));
  }

  const range = options.overwriteRange ?? pointsExtent(points);
  return chunks.map((chunk, index) => {
    const first = chunk[0];
    const next = chunks[index + 1]?.[0];
    const start = index === 0 || !first ? (range?.start ?? 0) : first.time;
    const end = next ? next.time - 1 : (range?.end ?? start);
    return { index, points: chunk, overwriteRange: { start, end: Math.max(start, end) } };
  });
}

export function toAppendPointInput(point: Point): AppendPointInput {
  const time = formatInstant(point.time);
  if (point.kind === 'gap') {
    return { time, type: 'gap' };
  }
  const input: AppendPointInput = { time, type: 'point', value: point.value };
  if (point.gradeCode !== undefined) {
    input.gradeCode = point.gradeCode;
  }
  if (point.qualifiers.length > 0) {
    input.qualifiers = [...point.qualifiers];
  }
  return input;
}

function toTimeRange(interval: TimeInterval): TimeRange {
  return { start: formatInstant(interval.start), end: formatInstant(interval.end) };
}

/**
 * Polls every append request under one shared deadline. A failed request raises; an expired
 * deadline returns `timedOut` and leaves the remaining requests queued on the server.
 */
export async function waitForAppends(
  store: SeriesStore,
  appendRequestIds: readonly string[],
  options: { timeoutMs: number; logger: Logger; now?: () => number; sleep?: (ms: number) => Promise<void> }
): Promise<CompletionResult> {
  const now = options.now ?? Date.now;
  const sleep = options.sleep ?? defaultSleep;
  const deadline = now() + options.timeoutMs;
  const result: CompletionResult = { timedOut: false, pointsAppended: 0, pointsDeleted: 0 };

  for (const appendRequestId of appendRequestIds) {
    let attempt = 0;
    for (;;) {
      const status = await store.getAppendStatus(appendRequestId);
      if (status.status === 'completed') {
        result.pointsAppended += status.numberOfPointsAppended;
        result.pointsDeleted += status.numberOfPointsDeleted;
        options.logger.debug({ appendRequestId, appended: status.numberOfPointsAppended }, 'append completed');
        break;
      }
      if (status.status === 'failed') {
        throw new AppendFailedError(appendRequestId, status.failureReason);
      }

      const remaining = deadline - now();
      if (remaining <= 0) {
        options.logger.warn({ appendRequestId, timeoutMs: options.timeoutMs }, 'append wait timed out');
        return { ...result, timedOut: true };
      }
      attempt += 1;
      await sleep(Math.min(computeExponentialBackoff(attempt, POLL_BACKOFF), remaining));
    }
  }

  return result;
}

export async function deliverPoints(
  store: SeriesStore,
  target: DeliveryTarget,
  points: readonly Point[],
  options: DeliveryOptions
): Promise<DeliveryResult> {
  const mode = resolveAppendMode(options.command, target.type, options.overwriteRange !== undefined);
  if (points.length === 0) {
    return { mode, pointsAccepted: 0, batches: 0, appendRequestIds: [] };
  }

  const batches = planBatches(points, {
    batchSize: options.policy.batchSize,
    mode,
    overwriteRange: options.overwriteRange
  });
  const logger = options.logger.child({ component: 'batcher', series: target.identifier });
  const appendRequestIds: string[] = [];
  let pointsAccepted = 0;

  for (const batch of batches) {
    logger.info(
      { batch: batch.index + 1, batches: batches.length, size: batch.points.length, mode },
      'submitting batch'
    );
    try {
      const response = await store.appendPoints(target.uniqueId, batch.points.map(toAppendPointInput), {
        overwriteRange: batch.overwriteRange ? toTimeRange(batch.overwriteRange) : undefined,
        reflected: mode === 'reflected'
      });
      appendRequestIds.push(response.appendRequestId);
    } catch (err) {
      throw new AppendBatchError({
        batchIndex: batch.index,
        batchCount: batches.length,
        acceptedCount: pointsAccepted,
        cause: err
      });
    }
    pointsAccepted += batch.points.length;
  }

  const result: DeliveryResult = { mode, pointsAccepted, batches: batches.length, appendRequestIds };
  if (!options.policy.wait) {
    return result;
  }

  result.completion = await waitForAppends(store, appendRequestIds, {
    timeoutMs: options.policy.timeoutMs,
    logger,
    now: options.now,
    sleep: options.sleep
  });
  return result;
}
