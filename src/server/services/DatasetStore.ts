import fs from 'fs/promises';
import path from 'path';

import type { DynGameState, MancalaBoardView } from '../../shared/engine/gameState';
import { EngineErrorCode, RecordFormatError, isRecordFormatError } from '../../shared/engine/errors';
import { GameErrorCode, wrapError } from '../../shared/errors/GameDomainErrors';
import { MancalaDataset } from '../../shared/dataset/MancalaDataset';
import {
  MancalaExample,
  decodeExample,
  formatRecordValue,
  pitsForRecordLength,
} from '../../shared/dataset/MancalaExample';
import { createComponentLogger } from '../utils/logger';

const log = createComponentLogger('DatasetStore');

/**
 * Column names for a board of `pits` pits per player, in record order.
 */
export function csvHeader(pits: number): string[] {
  const header = ['store1', 'store2'];
  for (const player of [1, 2]) {
    for (let p = 1; p <= pits; p++) {
      header.push(`player${player}p${p}`);
    }
  }
  header.push('turn', 'ply', 'p2_moved', 'util_swap');
  for (let p = 1; p <= pits; p++) {
    header.push(`util_${p}`);
  }
  return header;
}

const SPECIAL_VALUES = new Map<string, number>([
  ['inf', Infinity],
  ['+inf', Infinity],
  ['infinity', Infinity],
  ['+infinity', Infinity],
  ['-inf', -Infinity],
  ['-infinity', -Infinity],
  ['nan', NaN],
]);

/**
 * Parse one CSV field. Anything that is not a number (an empty field
 * included) becomes NaN; record decoding then decides whether NaN is allowed
 * in that column.
 */
export function parseCsvField(field: string): number {
  const trimmed = field.trim();
  if (trimmed === '') {
    return NaN;
  }
  const special = SPECIAL_VALUES.get(trimmed.toLowerCase());
  if (special !== undefined) {
    return special;
  }
  return Number(trimmed);
}

export function formatDatasetCsv(dataset: MancalaDataset<MancalaBoardView>): string {
  const lines = [csvHeader(dataset.pits()).join(',')];
  for (const record of dataset.toRecords()) {
    lines.push(record.map(formatRecordValue).join(','));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Parse CSV text written by {@link formatDatasetCsv} (or any tool using the
 * same header). Blank lines are ignored.
 *
 * @throws RecordFormatError for a header that does not match its own column
 * count, rows of the wrong width, or rows whose state fields do not decode.
 */
export function parseDatasetCsv(text: string): MancalaDataset<DynGameState> {
  const lines = text.split(/\r?\n/);
  const headerLine = lines[0] ?? '';
  const header = headerLine.split(',').map((column) => column.trim());
  const pits = pitsForRecordLength(header.length);
  if (pits === null || header.join(',') !== csvHeader(pits).join(',')) {
    throw new RecordFormatError(
      EngineErrorCode.RECORD_HEADER_MISMATCH,
      `Unrecognized dataset header: ${headerLine.slice(0, 80)}`,
      { columns: header.length }
    );
  }

  const examples: MancalaExample<DynGameState>[] = [];
  for (let index = 1; index < lines.length; index++) {
    const line = lines[index];
    if (line.trim() === '') {
      continue;
    }
    const lineNumber = index + 1;
    const record = line.split(',').map(parseCsvField);
    if (record.length !== header.length) {
      throw new RecordFormatError(
        EngineErrorCode.RECORD_LENGTH_MISMATCH,
        `Line ${lineNumber}: expected ${header.length} fields, got ${record.length}`,
        { line: lineNumber, expected: header.length, actual: record.length }
      );
    }
    try {
      examples.push(decodeExample(record));
    } catch (error) {
      if (isRecordFormatError(error)) {
        throw new RecordFormatError(error.code, `Line ${lineNumber}: ${error.message}`, {
          ...error.context,
          line: lineNumber,
        });
      }
      throw error;
    }
  }
  return new MancalaDataset(examples);
}

/**
 * Write `dataset` as CSV, creating parent directories as needed.
 *
 * @throws EmptyDatasetError for an empty dataset (no pit count to derive the
 * header from).
 */
export async function saveDatasetCsv(
  dataset: MancalaDataset<MancalaBoardView>,
  filePath: string
): Promise<void> {
  const text = formatDatasetCsv(dataset);
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, text, 'utf8');
  } catch (error) {
    throw wrapError(error, GameErrorCode.DATASET_IO_FAILED, { path: filePath });
  }
  log.info('Dataset saved', { path: filePath, examples: dataset.size });
}

export async function loadDatasetCsv(filePath: string): Promise<MancalaDataset<DynGameState>> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw wrapError(error, GameErrorCode.DATASET_IO_FAILED, { path: filePath });
  }
  const dataset = parseDatasetCsv(text);
  log.info('Dataset loaded', { path: filePath, examples: dataset.size });
  return dataset;
}
