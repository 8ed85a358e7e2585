import type { Logger } from '@pointforge/shared';
import { SeriesClientError } from '@pointforge/series-client';
import { deliverPoints } from './batcher';
import type { DeliveryResult, DeliveryTarget } from './batcher';
import { writePointsCsv } from './csvWriter';
import { ConfigurationError } from './errors';
import { collectManualPoints } from './manual';
import { extractSourcePoints } from './sourceCopy';
import type { SeriesStore, StoreFactory } from './store';
import { loadTabularPoints } from './tabular';
import { transformPoints } from './transform';
import type { Point, RunConfig, SeriesCreationSpec } from './types';
import { generateWaveform } from './waveform';

export interface PipelineContext {
  config: RunConfig;
  storeFactory: StoreFactory;
  logger: Logger;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface RunResult {
  pointCount: number;
  savedCsvPath?: string;
  target?: DeliveryTarget & { created: boolean };
  delivery?: DeliveryResult;
}

/**
 * Concatenates the active sources in a fixed order: manual, waveform, tabular, then source copy.
 */
export async function collectPoints(context: PipelineContext): Promise<Point[]> {
  const { sources, server } = context.config;
  const points: Point[] = [];

  if (sources.manual) {
    points.push(...collectManualPoints(sources.manual));
  }
  if (sources.waveform) {
    points.push(...generateWaveform(sources.waveform));
  }
  for (const tabular of sources.tabular) {
    const loaded = await loadTabularPoints(tabular, context.logger.child({ component: 'tabular' }));
    points.push(...loaded.points);
  }
  if (sources.sourceCopy) {
    points.push(
      ...(await extractSourcePoints(sources.sourceCopy, {
        primary: server,
        storeFactory: context.storeFactory,
        logger: context.logger
      }))
    );
  }
  return points;
}

/**
 * Resolves the target series, creating it when it does not exist and creation is enabled.
 */
export async function resolveTarget(
  store: SeriesStore,
  identifier: string,
  creation: SeriesCreationSpec,
  logger: Logger
): Promise<DeliveryTarget & { created: boolean }> {
  const createType = creation.mode === 'never' ? undefined : creation.mode;
  try {
    const series = await store.resolveSeries(identifier);
    return { uniqueId: series.uniqueId, identifier: series.identifier, type: series.type, created: false };
  } catch (err) {
    if (!(err instanceof SeriesClientError) || !err.isNotFound || !createType) {
      throw err;
    }
    logger.info({ series: identifier, type: createType }, 'creating series');
    const created = await store.createSeries({
      identifier,
      type: createType,
      unit: creation.unit,
      interpolationType: creation.interpolationType,
      utcOffset: creation.utcOffset,
      gapTolerance: creation.gapTolerance,
      publish: creation.publish,
      description: creation.description,
      comment: creation.comment,
      method: creation.method,
      computationIdentifier: creation.computationIdentifier,
      computationPeriodIdentifier: creation.computationPeriodIdentifier,
      subLocationIdentifier: creation.subLocationIdentifier,
      extendedAttributes: creation.extendedAttributes ? [...creation.extendedAttributes] : undefined
    });
    return { uniqueId: created.uniqueId, identifier: created.identifier, type: created.type, created: true };
  }
}

export async function runPipeline(context: PipelineContext): Promise<RunResult> {
  const { config, logger } = context;

  const points = transformPoints(await collectPoints(context), config.transform);
  logger.info({ points: points.length }, 'points ready');

  const result: RunResult = { pointCount: points.length };

  if (config.csvOutput) {
    result.savedCsvPath = await writePointsCsv(points, config.csvOutput, config.timeSeries);
    logger.info({ path: result.savedCsvPath, points: points.length }, 'saved points to csv');
    if (config.csvOutput.stopAfterSaving) {
      return result;
    }
  }

  if (!config.server || !config.timeSeries) {
    throw new ConfigurationError('A server and a target time-series are required to append points');
  }

  if (points.length === 0) {
    logger.warn({ series: config.timeSeries }, 'no points to append');
    return result;
  }

  const store = context.storeFactory(config.server);
  const target = await resolveTarget(store, config.timeSeries, config.creation, logger);
  result.target = target;
  result.delivery = await deliverPoints(store, target, points, {
    policy: config.batch,
    command: config.command,
    overwriteRange: config.overwriteRange,
    logger,
    now: context.now,
    sleep: context.sleep
  });

  const completion = result.delivery.completion;
  if (completion?.timedOut) {
    logger.error(
      { series: target.identifier, accepted: result.delivery.pointsAccepted, timeoutMs: config.batch.timeoutMs },
      'timed out waiting for the append to complete'
    );
  } else {
    logger.info(
      { series: target.identifier, accepted: result.delivery.pointsAccepted, batches: result.delivery.batches },
      'appended points'
    );
  }
  return result;
}
