import { fetch, Headers } from 'undici';
import type { Response } from 'undici';
import type { z } from 'zod';
import { SeriesClientError, SeriesResponseError } from './errors';
import {
  apiErrorSchema,
  appendResponseSchema,
  appendStatusSchema,
  envelopeSchema,
  seriesDescriptionSchema,
  seriesPointsResponseSchema
} from './types';
import type {
  AppendPointInput,
  AppendPointsOptions,
  AppendResponse,
  AppendStatus,
  CreateSeriesInput,
  GetSeriesPointsOptions,
  SeriesDescription,
  SeriesPoint,
  TimeSeriesClientOptions
} from './types';

type QueryValue = string | number | boolean | undefined;

interface RequestOptions {
  body?: unknown;
  query?: Record<string, QueryValue>;
}

function normalizeToken(token: string | undefined): string | null {
  const trimmed = token?.trim();
  return trimmed ? trimmed : null;
}

function isAbortError(err: unknown): err is Error {
  return err instanceof Error && err.name === 'AbortError';
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class TimeSeriesClient {
  private readonly baseUrl: URL;
  private readonly token: string | null;
  private readonly userAgent?: string;
  private readonly fetchTimeoutMs?: number;

  constructor(options: TimeSeriesClientOptions) {
    if (!options.baseUrl) {
      throw new Error('TimeSeriesClient requires a baseUrl');
    }
    this.baseUrl = new URL(options.baseUrl);
    this.token = normalizeToken(options.token);
    this.userAgent = options.userAgent;
    this.fetchTimeoutMs = options.fetchTimeoutMs;
  }

  get serverUrl(): string {
    return this.baseUrl.toString();
  }

  /**
   * Resolves a series identifier (`Parameter.Label@Location`) or unique id to its description.
   * A 404 means the series does not exist; a 409 means the identifier matched more than one series.
   */
  async resolveSeries(identifierOrUniqueId: string): Promise<SeriesDescription> {
    return this.request('GET', '/v1/series/resolve', seriesDescriptionSchema, {
      query: { identifier: identifierOrUniqueId }
    });
  }

  async createSeries(input: CreateSeriesInput): Promise<SeriesDescription> {
    return this.request('POST', '/v1/series', seriesDescriptionSchema, {
      body: {
        identifier: input.identifier,
        type: input.type,
        unit: input.unit,
        interpolationType: input.interpolationType,
        utcOffset: input.utcOffset,
        gapTolerance: input.gapTolerance,
        publish: input.publish ?? false,
        description: input.description,
        comment: input.comment,
        method: input.method,
        computationIdentifier: input.computationIdentifier,
        computationPeriodIdentifier: input.computationPeriodIdentifier,
        subLocationIdentifier: input.subLocationIdentifier,
        extendedAttributes: input.extendedAttributes
      }
    });
  }

  async getSeriesPoints(uniqueId: string, options: GetSeriesPointsOptions = {}): Promise<SeriesPoint[]> {
    const result = await this.request(
      'GET',
      `/v1/series/${encodeURIComponent(uniqueId)}/points`,
      seriesPointsResponseSchema,
      { query: { from: options.from, to: options.to } }
    );
    return result.points;
  }

  async appendPoints(
    uniqueId: string,
    points: AppendPointInput[],
    options: AppendPointsOptions = {}
  ): Promise<AppendResponse> {
    const suffix = options.reflected ? '/appends/reflected' : '/appends';
    return this.request(
      'POST',
      `/v1/series/${encodeURIComponent(uniqueId)}${suffix}`,
      appendResponseSchema,
      {
        body: {
          points,
          overwriteRange: options.overwriteRange ?? null
        }
      }
    );
  }

  async getAppendStatus(appendRequestId: string): Promise<AppendStatus> {
    return this.request(
      'GET',
      `/v1/appends/${encodeURIComponent(appendRequestId)}`,
      appendStatusSchema
    );
  }

  private async request<TSchema extends z.ZodTypeAny>(
    method: string,
    path: string,
    dataSchema: TSchema,
    options: RequestOptions = {}
  ): Promise<z.output<TSchema>> {
    const response = await this.fetchJson(method, path, options);
    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      throw new SeriesResponseError(`Response to ${method} ${path} was not JSON`, describeError(err));
    }
    const envelope = envelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw new SeriesResponseError(`Response to ${method} ${path} has no data envelope`, envelope.error.issues);
    }
    const parsed = dataSchema.safeParse(envelope.data.data);
    if (!parsed.success) {
      throw new SeriesResponseError(`Unexpected response to ${method} ${path}`, parsed.error.issues);
    }
    return parsed.data;
  }

  private async fetchJson(method: string, path: string, options: RequestOptions): Promise<Response> {
    const headers = this.buildHeaders();

    let body: string | undefined;
    if (options.body !== undefined) {
      body = JSON.stringify(options.body);
      headers.set('Content-Type', 'application/json');
    }

    const url = this.buildUrl(path, options.query);
    const controller = new AbortController();
    let timeout: NodeJS.Timeout | undefined;
    if (this.fetchTimeoutMs && this.fetchTimeoutMs > 0) {
      timeout = setTimeout(() => {
        controller.abort(new Error('Request timed out'));
      }, this.fetchTimeoutMs);
    }

    try {
      const response = await fetch(url, {
        method,
        headers,
        body,
        signal: controller.signal
      });

      if (!response.ok) {
        await this.handleErrorResponse(response);
      }

      return response;
    } catch (err) {
      if (err instanceof SeriesClientError) {
        throw err;
      }
      if (isAbortError(err) || controller.signal.aborted) {
        throw new SeriesClientError(`Request timed out after ${this.fetchTimeoutMs} ms`, {
          statusCode: 0,
          code: 'TIMEOUT',
          details: describeError(err)
        });
      }
      throw new SeriesClientError(`Unable to reach ${this.baseUrl.origin}`, {
        statusCode: 0,
        code: 'UNREACHABLE',
        details: describeError(err)
      });
    } finally {
      if (timeout) {
        clearTimeout(timeout);
      }
    }
  }

  private buildHeaders(): Headers {
    const headers = new Headers({ Accept: 'application/json' });
    if (this.token) {
      headers.set('Authorization', `Bearer ${this.token}`);
    }
    if (this.userAgent) {
      headers.set('User-Agent', this.userAgent);
    }
    return headers;
  }

  private buildUrl(path: string, query?: Record<string, QueryValue>): URL {
    const url = new URL(path, this.baseUrl);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value === undefined) {
          continue;
        }
        url.searchParams.set(key, String(value));
      }
    }
    return url;
  }

  private async handleErrorResponse(response: Response): Promise<never> {
    const text = await response.text().catch(() => '');
    let payload: unknown = text;
    if (text.length > 0) {
      try {
        payload = JSON.parse(text);
      } catch {
        payload = text;
      }
    }

    const parsed = apiErrorSchema.safeParse(payload);
    if (parsed.success) {
      const { error } = parsed.data;
      throw new SeriesClientError(error.message ?? 'Time-series request failed', {
        statusCode: response.status,
        code: error.code ?? null,
        details: error.details
      });
    }

    throw new SeriesClientError(response.statusText || 'Time-series request failed', {
      statusCode: response.status,
      code: null,
      details: payload
    });
  }
}
