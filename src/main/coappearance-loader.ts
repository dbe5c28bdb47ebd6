/**
 * Reads the co-appearance table (CSV with "Character 1", "Character 2" and
 * "Scenes Together" columns) into typed records.
 *
 * Rows are validated as they are read. A bad weight stops the load with the
 * offending line number instead of being turned into zero.
 */

import fs from 'fs/promises';
import { z } from 'zod';
import { EnsembleError, ErrorCode } from '../shared/errors';
import { createLogger } from '../shared/logger';
import type { CoAppearanceRecord } from '../shared/types';

const log = createLogger('DataLoader');

export const COLUMN_CHARACTER_1 = 'Character 1';
export const COLUMN_CHARACTER_2 = 'Character 2';
export const COLUMN_SCENES_TOGETHER = 'Scenes Together';

const RecordRowSchema = z.object({
  character1: z.string().refine((value) => value.trim().length > 0, 'character name is empty'),
  character2: z.string().refine((value) => value.trim().length > 0, 'character name is empty'),
  scenesTogether: z
    .string()
    .trim()
    .regex(/^\d+$/, 'scene count must be a non-negative integer')
    .transform(Number),
});

interface CsvRow {
  /** 1-based line the row starts on */
  line: number;
  fields: string[];
}

/**
 * Split CSV text into rows. Double-quoted fields may hold commas, newlines
 * and "" escapes. Blank lines are skipped.
 */
export function parseCsvRows(text: string): CsvRow[] {
  const rows: CsvRow[] = [];
  let fields: string[] = [];
  let field = '';
  let inQuotes = false;
  let line = 1;
  let rowStart = 1;

  const endRow = () => {
    fields.push(field);
    if (fields.length > 1 || fields[0] !== '') {
      rows.push({ line: rowStart, fields });
    }
    fields = [];
    field = '';
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (char === '\n') line++;
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      fields.push(field);
      field = '';
    } else if (char === '\n') {
      endRow();
      line++;
      rowStart = line;
    } else if (char !== '\r') {
      field += char;
    }
  }
  endRow();

  return rows;
}

function columnIndex(header: string[], column: string): number {
  const index = header.indexOf(column);
  if (index === -1) {
    throw new EnsembleError(`Missing column "${column}"`, ErrorCode.DATA_MISSING_COLUMN, {
      context: { column, header },
    });
  }
  return index;
}

/**
 * Parse the co-appearance CSV table into records, in file order.
 */
export function parseCoAppearanceCsv(text: string): CoAppearanceRecord[] {
  const rows = parseCsvRows(text.replace(/^\uFEFF/, ''));
  if (rows.length === 0) {
    throw new EnsembleError('Co-appearance table has no header row', ErrorCode.DATA_MISSING_COLUMN);
  }

  const [headerRow, ...dataRows] = rows;
  const header = headerRow.fields.map((name) => name.trim());
  const first = columnIndex(header, COLUMN_CHARACTER_1);
  const second = columnIndex(header, COLUMN_CHARACTER_2);
  const scenes = columnIndex(header, COLUMN_SCENES_TOGETHER);

  return dataRows.map(({ line, fields }) => {
    const result = RecordRowSchema.safeParse({
      character1: fields[first] ?? '',
      character2: fields[second] ?? '',
      scenesTogether: fields[scenes] ?? '',
    });

    if (!result.success) {
      const reason = result.error.issues.map((issue) => issue.message).join('; ');
      throw new EnsembleError(`Invalid record on line ${line}: ${reason}`, ErrorCode.DATA_INVALID_RECORD, {
        context: { line, fields },
      });
    }

    return result.data;
  });
}

/**
 * Read and parse the co-appearance table from disk.
 */
export async function loadCoAppearances(filePath: string): Promise<CoAppearanceRecord[]> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const code =
      error instanceof Error && 'code' in error && error.code === 'ENOENT'
        ? ErrorCode.FS_NOT_FOUND
        : ErrorCode.FS_READ_ERROR;
    throw EnsembleError.from(error, code, { path: filePath });
  }

  const records = parseCoAppearanceCsv(text);
  log.info(`Loaded ${records.length} co-appearance records from ${filePath}`);
  return records;
}
