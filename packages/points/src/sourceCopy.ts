import type { Logger } from '@pointforge/shared';
import type { SeriesPoint } from '@pointforge/series-client';
import { ConfigurationError, SourceCopyError } from './errors';
import { createGapPoint, createValuePoint } from './points';
import type { StoreFactory } from './store';
import { formatInstant, parseIsoInstant } from './time';
import type { Point, ServerConnection, SourceCopySpec } from './types';

const SERVER_PREFIX = /^\[([^\]|]*)(?:\|([^\]]*))?\](.+)$/;

export function normalizeServerUrl(server: string): string {
  const trimmed = server.trim();
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

/**
 * Splits `[server]identifier` and `[server|token]identifier` into a connection and an identifier.
 */
export function parseSourceSeries(text: string): { identifier: string; connection?: ServerConnection } {
  const trimmed = text.trim();
  const match = SERVER_PREFIX.exec(trimmed);
  if (!match) {
    if (trimmed.startsWith('[')) {
      throw new ConfigurationError(`'${text}' is not in [server]identifier or [server|token]identifier syntax`);
    }
    return { identifier: trimmed };
  }
  const [, server, token, identifier] = match;
  if (server.trim().length === 0) {
    throw new ConfigurationError(`'${text}' names an empty server`);
  }
  const connection: ServerConnection = { baseUrl: normalizeServerUrl(server) };
  if (token !== undefined && token.length > 0) {
    connection.token = token;
  }
  return { identifier: identifier.trim(), connection };
}

export function fromSeriesPoint(point: SeriesPoint): Point | undefined {
  const time = parseIsoInstant(point.time);
  if (time === undefined) {
    return undefined;
  }
  if (point.type === 'gap' || point.value === null || point.value === undefined) {
    return createGapPoint(time);
  }
  return createValuePoint(time, point.value, { gradeCode: point.gradeCode, qualifiers: point.qualifiers });
}

export async function extractSourcePoints(
  spec: SourceCopySpec,
  context: { primary?: ServerConnection; storeFactory: StoreFactory; logger: Logger }
): Promise<Point[]> {
  const connection = spec.connection ?? context.primary;
  if (!connection) {
    throw new SourceCopyError(spec.identifier, `No server is configured to copy '${spec.identifier}' from`);
  }
  const logger = context.logger.child({ component: 'source-copy', source: spec.identifier });
  const store = context.storeFactory(connection);

  let remotePoints: SeriesPoint[];
  try {
    const series = await store.resolveSeries(spec.identifier);
    remotePoints = await store.getSeriesPoints(series.uniqueId, {
      from: spec.from !== undefined ? formatInstant(spec.from) : undefined,
      to: spec.to !== undefined ? formatInstant(spec.to) : undefined
    });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SourceCopyError(
      spec.identifier,
      `Unable to copy points from '${spec.identifier}' on ${store.serverUrl}: ${reason}`,
      { cause: err }
    );
  }

  const points: Point[] = [];
  for (const remote of remotePoints) {
    const point = fromSeriesPoint(remote);
    if (!point) {
      throw new SourceCopyError(spec.identifier, `'${remote.time}' from '${spec.identifier}' is not a valid timestamp`);
    }
    points.push(point);
  }
  logger.info({ points: points.length }, 'copied source points');
  return points;
}
