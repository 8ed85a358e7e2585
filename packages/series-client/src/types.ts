import { z } from 'zod';

export interface TimeSeriesClientOptions {
  baseUrl: string;
  token?: string;
  userAgent?: string;
  fetchTimeoutMs?: number;
}

export const seriesTypeSchema = z.enum(['basic', 'reflected', 'derived']);
export type SeriesType = z.infer<typeof seriesTypeSchema>;

export const seriesDescriptionSchema = z.object({
  uniqueId: z.string().min(1),
  identifier: z.string().min(1),
  type: seriesTypeSchema,
  unit: z.string().nullable().optional(),
  utcOffset: z.string().nullable().optional()
});

export type SeriesDescription = z.infer<typeof seriesDescriptionSchema>;

/** Inclusive ISO 8601 bounds. */
export interface TimeRange {
  start: string;
  end: string;
}

export const seriesPointSchema = z.object({
  time: z.string().min(1),
  type: z.enum(['point', 'gap']).default('point'),
  value: z.number().nullable().optional(),
  gradeCode: z.number().int().nullable().optional(),
  qualifiers: z.array(z.string()).nullable().optional()
});

export type SeriesPoint = z.infer<typeof seriesPointSchema>;

export interface AppendPointInput {
  time: string;
  type: 'point' | 'gap';
  value?: number;
  gradeCode?: number;
  qualifiers?: string[];
}

export interface AppendPointsOptions {
  overwriteRange?: TimeRange;
  reflected?: boolean;
}

export const appendResponseSchema = z.object({
  appendRequestId: z.string().min(1)
});

export type AppendResponse = z.infer<typeof appendResponseSchema>;

export const appendStatusSchema = z.object({
  appendRequestId: z.string().min(1),
  status: z.enum(['pending', 'completed', 'failed']),
  numberOfPointsAppended: z.number().int().nonnegative().default(0),
  numberOfPointsDeleted: z.number().int().nonnegative().default(0),
  failureReason: z.string().nullable().optional()
});

export type AppendStatus = z.infer<typeof appendStatusSchema>;

export interface GetSeriesPointsOptions {
  from?: string;
  to?: string;
}

export const seriesPointsResponseSchema = z.object({
  uniqueId: z.string(),
  points: z.array(seriesPointSchema)
});

export type InterpolationType =
  | 'instantaneousValues'
  | 'precedingConstant'
  | 'precedingTotals'
  | 'instantaneousTotals'
  | 'discreteValues'
  | 'succeedingConstant';

/** `COLUMN@TABLE` names an extended attribute column. */
export interface ExtendedAttributeValue {
  columnIdentifier: string;
  value: string;
}

export interface CreateSeriesInput {
  identifier: string;
  type: 'basic' | 'reflected';
  unit?: string;
  interpolationType?: InterpolationType;
  utcOffset?: string;
  gapTolerance?: string;
  publish?: boolean;
  description?: string;
  comment?: string;
  method?: string;
  computationIdentifier?: string;
  computationPeriodIdentifier?: string;
  subLocationIdentifier?: string;
  extendedAttributes?: ExtendedAttributeValue[];
}

export const apiErrorSchema = z.object({
  error: z.object({
    code: z.string().optional(),
    message: z.string().optional(),
    details: z.unknown().optional()
  })
});

export const envelopeSchema = z.object({
  data: z.unknown()
});
