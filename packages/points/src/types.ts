import type { ExtendedAttributeValue } from '@pointforge/series-client';

/** Epoch milliseconds, UTC. */
export type Instant = number;

export interface ValuePoint {
  kind: 'value';
  time: Instant;
  value: number;
  gradeCode?: number;
  qualifiers: readonly string[];
}

/** A deliberate break in the record. */
export interface GapPoint {
  kind: 'gap';
  time: Instant;
}

export type Point = ValuePoint | GapPoint;

export interface TimeInterval {
  start: Instant;
  end: Instant;
}

export type WaveformShape = 'sine' | 'square' | 'sawtooth' | 'linear' | 'text';

export interface WaveformText {
  content: string;
  channel: 'x' | 'y';
}

export interface WaveformSpec {
  shape: WaveformShape;
  startTime: Instant;
  intervalMs: number;
  /** When zero, the length is derived from `numberOfPeriods * samplesPerPeriod`. */
  numberOfPoints: number;
  numberOfPeriods: number;
  samplesPerPeriod: number;
  scalar: number;
  offset: number;
  /** Fraction of one period. */
  phase: number;
  text?: WaveformText;
  gradeCode?: number;
  qualifiers: readonly string[];
}

export type ManualLiteral = number | 'gap';

export interface ManualPointsSpec {
  literals: readonly ManualLiteral[];
  startTime: Instant;
  intervalMs: number;
  gradeCode?: number;
  qualifiers: readonly string[];
}

/**
 * Column indices are 1-based. Exactly one of `dateTimeField` or `dateOnlyField` is set.
 */
export interface ColumnFormatSpec {
  dateTimeField?: number;
  dateTimeFormat?: string;
  dateOnlyField?: number;
  dateOnlyFormat?: string;
  timeOnlyField?: number;
  timeOnlyFormat?: string;
  defaultTimeOfDay: string;
  valueField: number;
  gradeField?: number;
  qualifiersField?: number;
  qualifierSeparator: string;
  comment?: string;
  skipRows: number;
  delimiter: string;
  nanValue?: string;
  /** Zone applied to timestamps without an explicit offset, e.g. `utc` or `UTC+12:00`. */
  zone: string;
  ignoreInvalidRows: boolean;
  sheetNumber?: number;
  sheetName?: string;
}

export interface TabularSourceSpec {
  path: string;
  format: ColumnFormatSpec;
}

export interface ServerConnection {
  baseUrl: string;
  token?: string;
}

export interface SourceCopySpec {
  identifier: string;
  connection?: ServerConnection;
  from?: Instant;
  to?: Instant;
}

export interface GradeMapping {
  readonly entries: ReadonlyMap<number, number | null>;
  /** Applied to unlisted grades and to points without a grade. */
  readonly defaultGrade: number | null;
}

export interface QualifierMapping {
  readonly entries: ReadonlyMap<string, string | null>;
  readonly defaultQualifiers?: readonly string[];
}

export interface TransformOptions {
  ignoreGrades: boolean;
  ignoreQualifiers: boolean;
  gradeMapping?: GradeMapping;
  qualifierMapping?: QualifierMapping;
  realignTo?: Instant;
  removeDuplicates: boolean;
}

export interface AppendBatchPolicy {
  batchSize: number;
  wait: boolean;
  timeoutMs: number;
}

export type AppendCommand = 'auto' | 'append' | 'overwrite' | 'reflected';

export type AppendMode = 'append' | 'overwrite' | 'reflected';

export type CreateMode = 'never' | 'basic' | 'reflected';

export interface SeriesCreationSpec {
  mode: CreateMode;
  unit?: string;
  interpolationType?:
    | 'instantaneousValues'
    | 'precedingConstant'
    | 'precedingTotals'
    | 'instantaneousTotals'
    | 'discreteValues'
    | 'succeedingConstant';
  utcOffset?: string;
  gapTolerance?: string;
  publish: boolean;
  description?: string;
  comment?: string;
  method?: string;
  computationIdentifier?: string;
  computationPeriodIdentifier?: string;
  subLocationIdentifier?: string;
  extendedAttributes?: readonly ExtendedAttributeValue[];
}

export interface CsvOutputSpec {
  path: string;
  delimiter: string;
  stopAfterSaving: boolean;
}

export interface PointSources {
  manual?: ManualPointsSpec;
  waveform?: WaveformSpec;
  tabular: readonly TabularSourceSpec[];
  sourceCopy?: SourceCopySpec;
}

export interface RunConfig {
  server?: ServerConnection;
  timeSeries?: string;
  command: AppendCommand;
  overwriteRange?: TimeInterval;
  batch: AppendBatchPolicy;
  sources: PointSources;
  transform: TransformOptions;
  creation: SeriesCreationSpec;
  csvOutput?: CsvOutputSpec;
}
