import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { parse } from 'csv-parse/sync';
import type { Logger } from '@pointforge/shared';
import { RowParseError } from './errors';
import { createGapPoint, createValuePoint } from './points';
import { isCommentOrBlank } from './rows';
import type { SourceRow } from './rows';
import { readSpreadsheetRows } from './spreadsheet';
import { parseDate, parseFormattedInstant, parseIsoInstant, parseTimeOfDay } from './time';
import type { ColumnFormatSpec, Instant, Point, TabularSourceSpec } from './types';

export type { SourceRow } from './rows';

export type RowOutcome =
  | { ok: true; rowNumber: number; point: Point }
  | { ok: false; rowNumber: number; reason: string };

export interface TabularLoadResult {
  points: Point[];
  skippedRows: number;
}

const SPREADSHEET_EXTENSIONS = new Set(['.xlsx']);

function splitLine(line: string, format: ColumnFormatSpec): string[] {
  const records: string[][] = parse(line, {
    delimiter: format.delimiter,
    relax_quotes: true,
    relax_column_count: true,
    trim: true
  });
  return records[0] ?? [];
}

/**
 * Applies row skipping, blank and comment filtering, then splits each remaining line into fields.
 * Row numbers are 1-based line numbers of the source text.
 */
export function* readDelimitedRows(text: string, format: ColumnFormatSpec): Generator<SourceRow> {
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);
  for (let index = format.skipRows; index < lines.length; index += 1) {
    const line = lines[index];
    const rowNumber = index + 1;
    if (line === undefined || isCommentOrBlank(line, format.comment)) {
      continue;
    }
    try {
      yield { rowNumber, fields: splitLine(line, format) };
    } catch (err) {
      yield { rowNumber, error: err instanceof Error ? err.message : String(err) };
    }
  }
}

function readField(fields: string[], column: number | undefined): string | undefined {
  if (column === undefined) {
    return undefined;
  }
  const value: string | undefined = fields[column - 1];
  return value?.trim();
}

type Parsed<T> = { ok: true; value: T } | { ok: false; reason: string };

function parseTimestamp(fields: string[], format: ColumnFormatSpec): Parsed<Instant> {
  if (format.dateTimeField !== undefined) {
    const text = readField(fields, format.dateTimeField);
    if (!text) {
      return { ok: false, reason: `missing timestamp in column ${format.dateTimeField}` };
    }
    const time = format.dateTimeFormat
      ? parseFormattedInstant(text, format.dateTimeFormat, format.zone)
      : parseIsoInstant(text, format.zone);
    return time === undefined
      ? { ok: false, reason: `'${text}' is not a valid timestamp` }
      : { ok: true, value: time };
  }

  const dateText = readField(fields, format.dateOnlyField);
  if (!dateText) {
    return { ok: false, reason: `missing date in column ${format.dateOnlyField}` };
  }
  const date = parseDate(dateText, format.dateOnlyFormat, format.zone);
  if (!date) {
    return { ok: false, reason: `'${dateText}' is not a valid date` };
  }

  const timeText = readField(fields, format.timeOnlyField);
  const timeOfDay = timeText
    ? parseTimeOfDay(timeText, format.timeOnlyFormat)
    : parseTimeOfDay(format.defaultTimeOfDay);
  if (timeOfDay === undefined) {
    return { ok: false, reason: `'${timeText ?? format.defaultTimeOfDay}' is not a valid time of day` };
  }
  return { ok: true, value: date.plus({ milliseconds: timeOfDay }).toMillis() };
}

function parseGrade(fields: string[], format: ColumnFormatSpec): Parsed<number | undefined> {
  const text = readField(fields, format.gradeField);
  if (!text) {
    return { ok: true, value: undefined };
  }
  if (!/^[-+]?\d+$/.test(text)) {
    return { ok: false, reason: `'${text}' is not a valid grade code` };
  }
  return { ok: true, value: Number.parseInt(text, 10) };
}

export function parseRow(row: SourceRow, format: ColumnFormatSpec): RowOutcome {
  if ('error' in row) {
    return { ok: false, rowNumber: row.rowNumber, reason: row.error };
  }
  const { rowNumber, fields } = row;

  const time = parseTimestamp(fields, format);
  if (!time.ok) {
    return { ok: false, rowNumber, reason: time.reason };
  }

  const valueText = readField(fields, format.valueField);
  if (format.nanValue !== undefined && valueText === format.nanValue) {
    return { ok: true, rowNumber, point: createGapPoint(time.value) };
  }
  if (!valueText) {
    return { ok: false, rowNumber, reason: `missing value in column ${format.valueField}` };
  }
  const value = Number(valueText);
  if (!Number.isFinite(value)) {
    return { ok: false, rowNumber, reason: `'${valueText}' is not a valid number` };
  }

  const grade = parseGrade(fields, format);
  if (!grade.ok) {
    return { ok: false, rowNumber, reason: grade.reason };
  }

  const qualifiersText = readField(fields, format.qualifiersField);
  const qualifiers = qualifiersText ? qualifiersText.split(format.qualifierSeparator) : [];

  return {
    ok: true,
    rowNumber,
    point: createValuePoint(time.value, value, { gradeCode: grade.value, qualifiers })
  };
}

export function* parseRows(rows: Iterable<SourceRow>, format: ColumnFormatSpec): Generator<RowOutcome> {
  for (const row of rows) {
    yield parseRow(row, format);
  }
}

/**
 * Stops at the first invalid row unless invalid rows are ignored, in which case they are counted.
 */
export function collectTabularPoints(
  outcomes: Iterable<RowOutcome>,
  options: { source: string; ignoreInvalidRows: boolean; logger: Logger }
): TabularLoadResult {
  const points: Point[] = [];
  let skippedRows = 0;
  for (const outcome of outcomes) {
    if (outcome.ok) {
      points.push(outcome.point);
      continue;
    }
    if (!options.ignoreInvalidRows) {
      throw new RowParseError(options.source, outcome.rowNumber, outcome.reason);
    }
    skippedRows += 1;
    options.logger.debug({ source: options.source, rowNumber: outcome.rowNumber, reason: outcome.reason }, 'skipped invalid row');
  }
  return { points, skippedRows };
}

export async function loadTabularPoints(spec: TabularSourceSpec, logger: Logger): Promise<TabularLoadResult> {
  const rows = SPREADSHEET_EXTENSIONS.has(extname(spec.path).toLowerCase())
    ? await readSpreadsheetRows(spec.path, spec.format)
    : readDelimitedRows(await readFile(spec.path, 'utf8'), spec.format);

  const result = collectTabularPoints(parseRows(rows, spec.format), {
    source: spec.path,
    ignoreInvalidRows: spec.format.ignoreInvalidRows,
    logger
  });

  logger.info({ source: spec.path, points: result.points.length, skippedRows: result.skippedRows }, 'loaded tabular points');
  return result;
}
