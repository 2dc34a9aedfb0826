import { promises as fsp } from 'node:fs';
import { z } from 'zod';
import { withTransaction, type Session } from '../db.js';
import { InputFormatError, describeError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logger.js';

export type LoadDestination = 'container' | 'member';

type TableColumn = {
  name: string;
  field: string;
};

type TableConfig = {
  table: string;
  columns: TableColumn[];
};

export const DESTINATIONS: Record<LoadDestination, TableConfig> = {
  container: {
    table: 'room',
    columns: [
      { name: 'id', field: 'id' },
      { name: 'name', field: 'name' },
    ],
  },
  member: {
    table: 'student',
    columns: [
      { name: 'birthday', field: 'birthday' },
      { name: 'id', field: 'id' },
      { name: 'name', field: 'name' },
      { name: 'room', field: 'room' },
      { name: 'sex', field: 'sex' },
    ],
  },
};

// Rows per insert statement; all chunks of one load share a transaction.
export const INSERT_BATCH_SIZE = 500;

export type LoadSummary = {
  destination: LoadDestination;
  table: string;
  received: number;
  inserted: number;
};

const recordsSchema = z.array(z.record(z.string(), z.unknown()));

type SourceRecord = z.infer<typeof recordsSchema>[number];

export function parseRecords(sourcePath: string, text: string): SourceRecord[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new InputFormatError(sourcePath, `invalid JSON (${describeError(error)})`);
  }
  const parsed = recordsSchema.safeParse(data);
  if (!parsed.success) {
    throw new InputFormatError(sourcePath, 'expected an array of objects', parsed.error.issues);
  }
  return parsed.data;
}

/** Missing fields become null; extraction never fails. */
export function projectRecord(record: SourceRecord, config: TableConfig): unknown[] {
  return config.columns.map((column) => record[column.field] ?? null);
}

export function buildInsert(config: TableConfig, rows: unknown[][]): { text: string; values: unknown[] } {
  const width = config.columns.length;
  const tuples = rows.map((_, rowIndex) => {
    const placeholders = config.columns.map((__, columnIndex) => `$${rowIndex * width + columnIndex + 1}`);
    return `(${placeholders.join(', ')})`;
  });
  const columnList = config.columns.map((column) => column.name).join(', ');
  return {
    text: `insert into ${config.table} (${columnList}) values ${tuples.join(', ')} on conflict (id) do nothing`,
    values: rows.flat(),
  };
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size));
  }
  return chunks;
}

/**
 * Inserts every record of a JSON array file into the destination table,
 * skipping ids that already exist. Returns null when nothing was attempted:
 * no live session, or the file could not be read.
 */
export async function loadRecords(
  session: Session | null,
  sourcePath: string,
  destination: LoadDestination,
  log: Logger = defaultLogger
): Promise<LoadSummary | null> {
  const config = DESTINATIONS[destination];

  if (!session?.isOpen) {
    log.error({ component: 'loader', table: config.table }, `Failed to load data into ${config.table}: No connection to the DB.`);
    return null;
  }

  let text: string;
  try {
    text = await fsp.readFile(sourcePath, 'utf8');
  } catch (error) {
    log.error({ component: 'loader', path: sourcePath, err: describeError(error) }, `Error opening ${sourcePath}`);
    return null;
  }

  const rows = parseRecords(sourcePath, text).map((record) => projectRecord(record, config));

  const inserted = rows.length
    ? await withTransaction(session, async (tx) => {
        let count = 0;
        for (const batch of chunk(rows, INSERT_BATCH_SIZE)) {
          const { text: sql, values } = buildInsert(config, batch);
          const result = await tx.query(sql, values);
          count += result.rowCount ?? 0;
        }
        return count;
      })
    : 0;

  log.info(
    { component: 'loader', table: config.table, received: rows.length, inserted },
    `Loaded ${sourcePath} into ${config.table}`
  );
  return { destination, table: config.table, received: rows.length, inserted };
}
