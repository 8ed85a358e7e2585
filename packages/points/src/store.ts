import { TimeSeriesClient } from '@pointforge/series-client';
import type {
  AppendPointInput,
  AppendPointsOptions,
  AppendResponse,
  AppendStatus,
  CreateSeriesInput,
  GetSeriesPointsOptions,
  SeriesDescription,
  SeriesPoint
} from '@pointforge/series-client';
import type { ServerConnection } from './types';

/**
 * The slice of the time-series service the pipeline talks to. `TimeSeriesClient` satisfies it;
 * tests substitute an in-memory store.
 */
export interface SeriesStore {
  readonly serverUrl: string;
  resolveSeries(identifierOrUniqueId: string): Promise<SeriesDescription>;
  createSeries(input: CreateSeriesInput): Promise<SeriesDescription>;
  getSeriesPoints(uniqueId: string, options?: GetSeriesPointsOptions): Promise<SeriesPoint[]>;
  appendPoints(uniqueId: string, points: AppendPointInput[], options?: AppendPointsOptions): Promise<AppendResponse>;
  getAppendStatus(appendRequestId: string): Promise<AppendStatus>;
}

export type StoreFactory = (connection: ServerConnection) => SeriesStore;

export function createStoreFactory(options: { fetchTimeoutMs?: number; userAgent?: string } = {}): StoreFactory {
  return (connection) =>
    new TimeSeriesClient({
      baseUrl: connection.baseUrl,
      token: connection.token,
      fetchTimeoutMs: options.fetchTimeoutMs,
      userAgent: options.userAgent
    });
}
