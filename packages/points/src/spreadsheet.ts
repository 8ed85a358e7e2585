import { Workbook } from 'exceljs';
import type { Cell, Worksheet } from 'exceljs';
import { DateTime } from 'luxon';
import { ConfigurationError } from './errors';
import { isCommentOrBlank } from './rows';
import type { SourceRow } from './rows';
import type { ColumnFormatSpec } from './types';

function selectWorksheet(workbook: Workbook, path: string, format: ColumnFormatSpec): Worksheet {
  if (format.sheetName) {
    const named = workbook.getWorksheet(format.sheetName);
    if (!named) {
      throw new ConfigurationError(`'${path}' has no sheet named '${format.sheetName}'`);
    }
    return named;
  }
  const sheetNumber = format.sheetNumber ?? 1;
  const sheet = workbook.worksheets[sheetNumber - 1];
  if (!sheet) {
    throw new ConfigurationError(
      `'${path}' has ${workbook.worksheets.length} sheets; sheet ${sheetNumber} does not exist`
    );
  }
  return sheet;
}

const ISO_DATE_TIME = "yyyy-MM-dd'T'HH:mm:ss.SSS";
const ISO_DATE = 'yyyy-MM-dd';
const ISO_TIME = 'HH:mm:ss.SSS';

/**
 * Date cells carry wall-clock digits, so they are rendered without an offset, in the layout the
 * cell's column is parsed with, and read in the configured zone like any other timestamp text.
 */
function formatDateCell(value: Date, column: number, format: ColumnFormatSpec): string {
  const wallClock = DateTime.fromJSDate(value, { zone: 'utc' });
  if (column === format.dateOnlyField) {
    return wallClock.toFormat(format.dateOnlyFormat ?? ISO_DATE);
  }
  if (column === format.timeOnlyField) {
    return wallClock.toFormat(format.timeOnlyFormat ?? ISO_TIME);
  }
  return wallClock.toFormat(format.dateTimeFormat ?? ISO_DATE_TIME);
}

function cellText(cell: Cell, column: number, format: ColumnFormatSpec): string {
  const value = cell.value;
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return formatDateCell(value, column, format);
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (typeof value === 'string') {
    return value;
  }
  return cell.text;
}

export async function readSpreadsheetRows(path: string, format: ColumnFormatSpec): Promise<SourceRow[]> {
  const workbook = new Workbook();
  await workbook.xlsx.readFile(path);
  const sheet = selectWorksheet(workbook, path, format);

  const rows: SourceRow[] = [];
  sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    if (rowNumber <= format.skipRows) {
      return;
    }
    const fields: string[] = [];
    for (let column = 1; column <= row.cellCount; column += 1) {
      fields.push(cellText(row.getCell(column), column, format).trim());
    }
    if (isCommentOrBlank(fields.join(''), undefined)) {
      return;
    }
    if (fields[0] !== undefined && fields[0].length > 0 && isCommentOrBlank(fields[0], format.comment)) {
      return;
    }
    rows.push({ rowNumber, fields });
  });
  return rows;
}
