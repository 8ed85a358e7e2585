import { stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { stringify } from 'csv-stringify/sync';
import { NATIVE_GAP_MARKER } from './csvFormats';
import { formatInstant } from './time';
import type { CsvOutputSpec, Point } from './types';

export const CSV_HEADER = ['ISO 8601 UTC', 'Value', 'Grade', 'Qualifiers'] as const;

function toRecord(point: Point): string[] {
  const time = formatInstant(point.time);
  if (point.kind === 'gap') {
    return [time, NATIVE_GAP_MARKER, '', ''];
  }
  return [
    time,
    String(point.value),
    point.gradeCode !== undefined ? String(point.gradeCode) : '',
    point.qualifiers.join(',')
  ];
}

export function formatPointsCsv(points: Iterable<Point>, delimiter = ','): string {
  const records: string[][] = [[...CSV_HEADER]];
  for (const point of points) {
    records.push(toRecord(point));
  }
  return stringify(records, { delimiter });
}

export function csvFileName(seriesIdentifier: string | undefined): string {
  const base = (seriesIdentifier ?? 'points').replace(/[^A-Za-z0-9._@-]/g, '_');
  return `${base}.csv`;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return false;
    }
    throw err;
  }
}

export async function resolveCsvPath(path: string, seriesIdentifier: string | undefined): Promise<string> {
  return (await isDirectory(path)) ? join(path, csvFileName(seriesIdentifier)) : path;
}

export async function writePointsCsv(
  points: readonly Point[],
  output: CsvOutputSpec,
  seriesIdentifier: string | undefined
): Promise<string> {
  const target = await resolveCsvPath(output.path, seriesIdentifier);
  await writeFile(target, formatPointsCsv(points, output.delimiter), 'utf8');
  return target;
}
