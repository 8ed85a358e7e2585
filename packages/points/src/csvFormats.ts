import { ConfigurationError } from './errors';
import type { ColumnFormatSpec } from './types';

export const CSV_FORMAT_NAMES = ['ng', '3x', 'native'] as const;

export type CsvFormatName = (typeof CSV_FORMAT_NAMES)[number];

export const NATIVE_GAP_MARKER = 'Gap';

const BASE_FORMAT: ColumnFormatSpec = {
  defaultTimeOfDay: '00:00',
  valueField: 1,
  qualifierSeparator: ',',
  skipRows: 0,
  delimiter: ',',
  zone: 'utc',
  ignoreInvalidRows: false
};

/**
 * Column layouts of known exports.
 *
 * `ng`:     `ISO 8601 UTC, Timestamp, Value, Approval Level, Grade, Qualifiers` with `#` preamble lines.
 * `3x`:     two descriptive rows, then `Date-Time, Value, Grade, Approval, Interpolation Code`.
 * `native`: the layout written by `writePointsCsv`.
 */
export function csvFormatPreset(name: CsvFormatName): ColumnFormatSpec {
  switch (name) {
    case 'ng':
      return {
        ...BASE_FORMAT,
        dateTimeField: 1,
        valueField: 3,
        gradeField: 5,
        qualifiersField: 6,
        comment: '#',
        ignoreInvalidRows: true
      };
    case '3x':
      return {
        ...BASE_FORMAT,
        dateTimeField: 1,
        dateTimeFormat: 'MM/dd/yyyy HH:mm:ss',
        valueField: 2,
        gradeField: 3,
        skipRows: 2,
        ignoreInvalidRows: true
      };
    case 'native':
      return {
        ...BASE_FORMAT,
        dateTimeField: 1,
        valueField: 2,
        gradeField: 3,
        qualifiersField: 4,
        comment: '#',
        skipRows: 1,
        nanValue: NATIVE_GAP_MARKER
      };
  }
}

export function parseCsvFormatName(text: string): CsvFormatName {
  const normalized = text.trim().toLowerCase();
  const match = CSV_FORMAT_NAMES.find((name) => name === normalized);
  if (!match) {
    throw new ConfigurationError(`'${text}' is an unknown CSV format. Use one of ${CSV_FORMAT_NAMES.join(', ')}`);
  }
  return match;
}

/**
 * Enforces the single active timestamp source and positive column indices.
 */
export function validateColumnFormat(format: ColumnFormatSpec): ColumnFormatSpec {
  if (format.dateTimeField !== undefined && format.dateOnlyField !== undefined) {
    throw new ConfigurationError('A combined date-time column and a date-only column cannot both be set');
  }
  if (format.dateTimeField === undefined && format.dateOnlyField === undefined) {
    throw new ConfigurationError('Either a combined date-time column or a date-only column is required');
  }
  if (format.timeOnlyField !== undefined && format.dateOnlyField === undefined) {
    throw new ConfigurationError('A time-only column requires a date-only column');
  }

  const columns: Array<[string, number | undefined]> = [
    ['date-time', format.dateTimeField],
    ['date-only', format.dateOnlyField],
    ['time-only', format.timeOnlyField],
    ['value', format.valueField],
    ['grade', format.gradeField],
    ['qualifiers', format.qualifiersField]
  ];
  for (const [label, column] of columns) {
    if (column !== undefined && (!Number.isInteger(column) || column < 1)) {
      throw new ConfigurationError(`The ${label} column must be a positive 1-based index, got ${column}`);
    }
  }
  if (format.delimiter.length === 0) {
    throw new ConfigurationError('The CSV delimiter must not be empty');
  }
  if (!Number.isInteger(format.skipRows) || format.skipRows < 0) {
    throw new ConfigurationError(`The number of rows to skip must be a non-negative integer, got ${format.skipRows}`);
  }
  return format;
}
