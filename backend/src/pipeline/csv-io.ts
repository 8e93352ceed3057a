import path from 'node:path';
import { promises as fsp } from 'node:fs';
import Papa from 'papaparse';
import { InputNotFoundError } from '../errors.js';
import { toText } from './coerce.js';
import type { DataRow, Dataset, RawValue } from './types.js';
import { silentLogger, type RunLogger } from '../utils/logger.js';

// Cells read as missing, the usual markers spreadsheet and dataframe exports leave behind.
const MISSING_MARKERS = new Set([
  '',
  '#N/A',
  '#N/A N/A',
  '#NA',
  '-1.#IND',
  '-1.#QNAN',
  '-NaN',
  '-nan',
  '1.#IND',
  '1.#QNAN',
  '<NA>',
  'N/A',
  'NA',
  'NULL',
  'NaN',
  'None',
  'n/a',
  'nan',
  'null',
]);

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

const REPORTED_PARSE_ERRORS = 5;

/** Parses CSV text; malformed rows are kept as far as they parse and reported as warnings. */
export function parseCsv(text: string, logger: RunLogger = silentLogger): Dataset {
  const parsed = Papa.parse<Record<string, string | undefined>>(text.replace(/^\uFEFF/, ''), {
    header: true,
    skipEmptyLines: true,
  });
  if (parsed.errors.length) {
    logger.warn(`CSV parse reported ${parsed.errors.length} issue(s)`);
    for (const error of parsed.errors.slice(0, REPORTED_PARSE_ERRORS)) {
      const where = error.row === undefined ? '' : ` at data row ${error.row + 1}`;
      logger.warn(`CSV ${error.code}${where}: ${error.message}`);
    }
  }
  const columns = parsed.meta.fields ?? [];
  const rows = parsed.data.map((record) => {
    const row: DataRow = {};
    for (const column of columns) {
      const cell = record[column];
      row[column] = cell === undefined || MISSING_MARKERS.has(cell) ? null : cell;
    }
    return row;
  });
  return { columns, rows };
}

export async function readDataset(inputPath: string, logger: RunLogger = silentLogger): Promise<Dataset> {
  let text: string;
  try {
    text = await fsp.readFile(inputPath, 'utf8');
  } catch (error) {
    if (isNodeError(error) && (error.code === 'ENOENT' || error.code === 'EISDIR')) {
      throw new InputNotFoundError(inputPath);
    }
    throw error;
  }
  return parseCsv(text, logger);
}

function formatCell(value: RawValue | undefined): string {
  return toText(value ?? null) ?? '';
}

export function toCsv(columns: readonly string[], rows: readonly Record<string, RawValue>[]): string {
  return Papa.unparse(
    {
      fields: [...columns],
      data: rows.map((row) => columns.map((column) => formatCell(row[column]))),
    },
    { newline: '\n' }
  );
}

export async function writeCsv(
  filePath: string,
  columns: readonly string[],
  rows: readonly Record<string, RawValue>[]
): Promise<string> {
  await fsp.mkdir(path.dirname(filePath), { recursive: true });
  await fsp.writeFile(filePath, `${toCsv(columns, rows)}\n`, 'utf8');
  return filePath;
}
