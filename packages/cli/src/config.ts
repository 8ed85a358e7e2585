import { z } from 'zod';
import { LOG_LEVELS } from '@pointforge/shared';
import type { PointforgeEnv } from '@pointforge/shared';
import {
  ConfigurationError,
  DEFAULT_BATCH_SIZE,
  DEFAULT_WAIT_TIMEOUT_MS,
  buildGradeMapping,
  buildQualifierMapping,
  csvFormatPreset,
  normalizeQualifiers,
  normalizeServerUrl,
  parseExtendedAttribute,
  parseCsvFormatName,
  parseDurationMs,
  parseInstant,
  parseSourceSeries,
  parseTimeRange,
  parseUtcOffset,
  validateColumnFormat
} from '@pointforge/points';
import type {
  ColumnFormatSpec,
  CsvOutputSpec,
  Instant,
  ManualPointsSpec,
  RunConfig,
  ServerConnection,
  SourceCopySpec,
  TabularSourceSpec,
  WaveformSpec
} from '@pointforge/points';
import type { PositionalArguments } from './args';

export const DEFAULT_POINT_INTERVAL = '00:01:00';
export const DEFAULT_SAMPLES_PER_PERIOD = 1440;

const TRUE_WORDS = new Set(['true', 'yes', 'on', '1']);
const FALSE_WORDS = new Set(['false', 'no', 'off', '0']);

const textOption = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed && trimmed.length > 0 ? trimmed : undefined;
  });

const flagOption = z
  .union([z.boolean(), z.string()])
  .optional()
  .transform((value, ctx) => {
    if (value === undefined || typeof value === 'boolean') {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    if (TRUE_WORDS.has(normalized)) {
      return true;
    }
    if (FALSE_WORDS.has(normalized)) {
      return false;
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${value}' is not a boolean` });
    return z.NEVER;
  });

function numberOption(options: { integer?: boolean; min?: number } = {}) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim().length === 0) {
        return undefined;
      }
      const parsed = Number(value.trim());
      if (!Number.isFinite(parsed) || (options.integer && !Number.isInteger(parsed))) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `'${value}' is not ${options.integer ? 'an integer' : 'a number'}`
        });
        return z.NEVER;
      }
      if (options.min !== undefined && parsed < options.min) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must be >= ${options.min}` });
        return z.NEVER;
      }
      return parsed;
    });
}

const columnOption = numberOption({ integer: true, min: 1 });
const listOption = z.array(z.string()).default([]);

function enumOption<const T extends string>(values: readonly [T, ...T[]]) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined) {
        return undefined;
      }
      const normalized = value.trim();
      const match = values.find((candidate) => candidate.toLowerCase() === normalized.toLowerCase());
      if (!match) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `'${value}' is not one of ${values.join(', ')}`
        });
        return z.NEVER;
      }
      return match;
    });
}

export const cliOptionsSchema = z.object({
  server: textOption,
  token: textOption,
  wait: flagOption,
  appendTimeout: textOption,
  batchSize: numberOption({ integer: true, min: 1 }),
  timeSeries: textOption,
  timeRange: textOption,
  command: enumOption(['auto', 'append', 'overwrite', 'reflected']),
  gradeCode: numberOption({ integer: true }),
  qualifiers: textOption,
  ignoreGrades: flagOption,
  ignoreQualifiers: flagOption,
  mappedGrades: listOption,
  mappedQualifiers: listOption,
  createMode: enumOption(['never', 'basic', 'reflected']),
  gapTolerance: textOption,
  utcOffset: textOption,
  unit: textOption,
  interpolationType: enumOption([
    'instantaneousValues',
    'precedingConstant',
    'precedingTotals',
    'instantaneousTotals',
    'discreteValues',
    'succeedingConstant'
  ]),
  publish: flagOption,
  description: textOption,
  comment: textOption,
  method: textOption,
  computationIdentifier: textOption,
  computationPeriodIdentifier: textOption,
  subLocationIdentifier: textOption,
  extendedAttribute: listOption,
  sourceTimeSeries: textOption,
  sourceQueryFrom: textOption,
  sourceQueryTo: textOption,
  startTime: textOption,
  pointInterval: textOption,
  numberOfPoints: numberOption({ integer: true, min: 0 }),
  numberOfPeriods: numberOption({ min: 0 }),
  waveformType: enumOption(['sine', 'square', 'sawtooth', 'linear']),
  waveformOffset: numberOption(),
  waveformPhase: numberOption(),
  waveformScalar: numberOption(),
  waveformPeriod: numberOption({ min: 0 }),
  waveformTextX: textOption,
  waveformTextY: textOption,
  csv: listOption,
  csvFormat: textOption,
  csvDateTimeField: columnOption,
  csvDateTimeFormat: textOption,
  csvDateOnlyField: columnOption,
  csvDateOnlyFormat: textOption,
  csvTimeOnlyField: columnOption,
  csvTimeOnlyFormat: textOption,
  csvDefaultTimeOfDay: textOption,
  csvValueField: columnOption,
  csvGradeField: columnOption,
  csvQualifiersField: columnOption,
  csvQualifierSeparator: z.string().optional(),
  csvComment: textOption,
  csvSkipRows: numberOption({ integer: true, min: 0 }),
  csvIgnoreInvalidRows: flagOption,
  csvRealign: flagOption,
  csvRemoveDuplicatePoints: flagOption,
  csvDelimiter: z.string().optional(),
  csvNanValue: textOption,
  excelSheetNumber: numberOption({ integer: true, min: 1 }),
  excelSheetName: textOption,
  saveCsvPath: textOption,
  stopAfterSavingCsv: flagOption,
  json: flagOption,
  logLevel: enumOption(LOG_LEVELS)
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

function toFlagName(key: string | number): string {
  return `--${String(key).replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`)}`;
}

export function parseCliOptions(raw: unknown): CliOptions {
  const result = cliOptionsSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `  - ${issue.path.length > 0 ? toFlagName(issue.path[0]) : '<options>'}: ${issue.message}`)
      .join('\n');
    throw new ConfigurationError(`Invalid options\n${details}`);
  }
  return result.data;
}

function parseDelimiter(text: string | undefined): string | undefined {
  if (text === undefined) {
    return undefined;
  }
  return text === '\\t' || text.toLowerCase() === 'tab' ? '\t' : text;
}

function parseList(text: string | undefined): string[] {
  return text ? normalizeQualifiers(text.split(',')) : [];
}

function resolveServer(options: CliOptions, env: PointforgeEnv): ServerConnection | undefined {
  const server = options.server ?? env.server;
  if (!server) {
    return undefined;
  }
  const connection: ServerConnection = { baseUrl: normalizeServerUrl(server) };
  const token = options.token ?? env.token;
  if (token) {
    connection.token = token;
  }
  return connection;
}

function parseNonNegativeDuration(text: string, label: string): number {
  const millis = parseDurationMs(text);
  if (millis < 0) {
    throw new ConfigurationError(`The ${label} must not be negative, got '${text}'`);
  }
  return millis;
}

/**
 * Starts from the named preset and lays the explicit column options over it. Choosing a date-only
 * column drops the preset's combined date-time column.
 */
export function buildColumnFormat(options: CliOptions, zone: string): ColumnFormatSpec {
  const preset = csvFormatPreset(parseCsvFormatName(options.csvFormat ?? 'ng'));
  const format: ColumnFormatSpec = { ...preset, zone };

  if (options.csvDateOnlyField !== undefined) {
    format.dateTimeField = options.csvDateTimeField;
    format.dateTimeFormat = undefined;
    format.dateOnlyField = options.csvDateOnlyField;
  } else if (options.csvDateTimeField !== undefined) {
    format.dateTimeField = options.csvDateTimeField;
  }
  format.dateTimeFormat = options.csvDateTimeFormat ?? format.dateTimeFormat;
  format.dateOnlyFormat = options.csvDateOnlyFormat ?? format.dateOnlyFormat;
  format.timeOnlyField = options.csvTimeOnlyField ?? format.timeOnlyField;
  format.timeOnlyFormat = options.csvTimeOnlyFormat ?? format.timeOnlyFormat;
  format.defaultTimeOfDay = options.csvDefaultTimeOfDay ?? format.defaultTimeOfDay;
  format.valueField = options.csvValueField ?? format.valueField;
  format.gradeField = options.csvGradeField ?? format.gradeField;
  format.qualifiersField = options.csvQualifiersField ?? format.qualifiersField;
  format.qualifierSeparator = options.csvQualifierSeparator ?? format.qualifierSeparator;
  format.comment = options.csvComment ?? format.comment;
  format.skipRows = options.csvSkipRows ?? format.skipRows;
  format.delimiter = parseDelimiter(options.csvDelimiter) ?? format.delimiter;
  format.nanValue = options.csvNanValue ?? format.nanValue;
  format.ignoreInvalidRows = options.csvIgnoreInvalidRows ?? format.ignoreInvalidRows;
  format.sheetNumber = options.excelSheetNumber;
  format.sheetName = options.excelSheetName;

  return validateColumnFormat(format);
}

function hasWaveformOptions(options: CliOptions): boolean {
  return [
    options.waveformType,
    options.waveformOffset,
    options.waveformPhase,
    options.waveformScalar,
    options.waveformPeriod,
    options.waveformTextX,
    options.waveformTextY,
    options.numberOfPeriods
  ].some((value) => value !== undefined);
}

function buildWaveform(
  options: CliOptions,
  clock: { startTime: Instant; intervalMs: number },
  metadata: { gradeCode?: number; qualifiers: string[] }
): WaveformSpec {
  if (options.waveformTextX && options.waveformTextY) {
    throw new ConfigurationError('Only one of --waveform-text-x or --waveform-text-y can be set');
  }
  const textContent = options.waveformTextX ?? options.waveformTextY;
  const spec: WaveformSpec = {
    shape: textContent ? 'text' : (options.waveformType ?? 'sine'),
    startTime: clock.startTime,
    intervalMs: clock.intervalMs,
    numberOfPoints: options.numberOfPoints ?? 0,
    numberOfPeriods: options.numberOfPeriods ?? 1,
    samplesPerPeriod: options.waveformPeriod ?? DEFAULT_SAMPLES_PER_PERIOD,
    scalar: options.waveformScalar ?? 1,
    offset: options.waveformOffset ?? 0,
    phase: options.waveformPhase ?? 0,
    qualifiers: metadata.qualifiers
  };
  if (textContent) {
    spec.text = { content: textContent, channel: options.waveformTextX ? 'x' : 'y' };
  }
  if (metadata.gradeCode !== undefined) {
    spec.gradeCode = metadata.gradeCode;
  }
  return spec;
}

function buildSourceCopy(options: CliOptions): SourceCopySpec | undefined {
  if (!options.sourceTimeSeries) {
    return undefined;
  }
  const parsed = parseSourceSeries(options.sourceTimeSeries);
  const spec: SourceCopySpec = { identifier: parsed.identifier };
  if (parsed.connection) {
    spec.connection = parsed.connection;
  }
  if (options.sourceQueryFrom) {
    spec.from = parseInstant(options.sourceQueryFrom);
  }
  if (options.sourceQueryTo) {
    spec.to = parseInstant(options.sourceQueryTo);
  }
  if (spec.from !== undefined && spec.to !== undefined && spec.to < spec.from) {
    throw new ConfigurationError('--source-query-to must not be earlier than --source-query-from');
  }
  return spec;
}

export interface RunConfigInputs {
  options: CliOptions;
  positionals: PositionalArguments;
  env: PointforgeEnv;
  now: Instant;
}

/**
 * Validates and assembles the immutable run configuration. Nothing here touches the network.
 */
export function buildRunConfig({ options, positionals, env, now }: RunConfigInputs): RunConfig {
  if (options.command && positionals.command && options.command !== positionals.command) {
    throw new ConfigurationError(
      `Conflicting commands: --command ${options.command} and positional '${positionals.command}'`
    );
  }
  if (options.timeSeries && positionals.timeSeries) {
    throw new ConfigurationError(
      `Conflicting target series: --time-series ${options.timeSeries} and positional '${positionals.timeSeries}'`
    );
  }

  const server = resolveServer(options, env);
  const timeSeries = options.timeSeries ?? positionals.timeSeries;
  const zone = options.utcOffset ? parseUtcOffset(options.utcOffset) : 'utc';

  const startTime = options.startTime ? parseInstant(options.startTime) : now;
  const intervalMs = parseNonNegativeDuration(options.pointInterval ?? DEFAULT_POINT_INTERVAL, 'point interval');
  const metadata = {
    gradeCode: options.gradeCode,
    qualifiers: parseList(options.qualifiers)
  };

  let manual: ManualPointsSpec | undefined;
  if (positionals.literals.length > 0) {
    manual = { literals: positionals.literals, startTime, intervalMs, qualifiers: metadata.qualifiers };
    if (metadata.gradeCode !== undefined) {
      manual.gradeCode = metadata.gradeCode;
    }
  }

  const csvPaths = [...options.csv, ...positionals.csvFiles];
  let tabular: TabularSourceSpec[] = [];
  if (csvPaths.length > 0) {
    const format = buildColumnFormat(options, zone);
    tabular = csvPaths.map((path) => ({ path, format }));
  }

  const sourceCopy = buildSourceCopy(options);
  const noOtherSource = !manual && tabular.length === 0 && !sourceCopy;
  const waveform =
    hasWaveformOptions(options) || noOtherSource
      ? buildWaveform(options, { startTime, intervalMs }, metadata)
      : undefined;

  let csvOutput: CsvOutputSpec | undefined;
  if (options.saveCsvPath) {
    csvOutput = {
      path: options.saveCsvPath,
      delimiter: parseDelimiter(options.csvDelimiter) ?? ',',
      stopAfterSaving: options.stopAfterSavingCsv ?? (!server && !timeSeries)
    };
  } else if (options.stopAfterSavingCsv) {
    throw new ConfigurationError('--stop-after-saving-csv requires --save-csv-path');
  }

  if (!csvOutput?.stopAfterSaving) {
    if (!server) {
      throw new ConfigurationError('A --server is required to append points');
    }
    if (!timeSeries) {
      throw new ConfigurationError('A target --time-series is required to append points');
    }
  }

  if (options.gapTolerance) {
    parseNonNegativeDuration(options.gapTolerance, 'gap tolerance');
  }

  const config: RunConfig = {
    server,
    timeSeries,
    command: options.command ?? positionals.command ?? 'auto',
    overwriteRange: options.timeRange ? parseTimeRange(options.timeRange) : undefined,
    batch: {
      batchSize: options.batchSize ?? DEFAULT_BATCH_SIZE,
      wait: options.wait ?? true,
      timeoutMs: options.appendTimeout
        ? parseNonNegativeDuration(options.appendTimeout, 'append timeout')
        : DEFAULT_WAIT_TIMEOUT_MS
    },
    sources: { manual, waveform, tabular, sourceCopy },
    transform: {
      ignoreGrades: options.ignoreGrades ?? false,
      ignoreQualifiers: options.ignoreQualifiers ?? false,
      gradeMapping: buildGradeMapping(options.mappedGrades),
      qualifierMapping: buildQualifierMapping(options.mappedQualifiers),
      realignTo: options.csvRealign ? startTime : undefined,
      removeDuplicates: options.csvRemoveDuplicatePoints ?? false
    },
    creation: {
      mode: options.createMode ?? 'never',
      unit: options.unit,
      interpolationType: options.interpolationType,
      utcOffset: options.utcOffset,
      gapTolerance: options.gapTolerance,
      publish: options.publish ?? false,
      description: options.description,
      comment: options.comment,
      method: options.method,
      computationIdentifier: options.computationIdentifier,
      computationPeriodIdentifier: options.computationPeriodIdentifier,
      subLocationIdentifier: options.subLocationIdentifier,
      extendedAttributes: options.extendedAttribute.map(parseExtendedAttribute)
    },
    csvOutput
  };

  return Object.freeze(config);
}
