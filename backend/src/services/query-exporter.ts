import { promises as fsp } from 'node:fs';
import path from 'node:path';
import type { Session } from '../db.js';
import { StatementError, describeError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import { readStatements } from '../utils/sql-script.js';
import { serializeMarkup, serializeRecords, type ResultSet } from './serializers.js';

export type { ResultSet };

export type ExportFormat = 'records' | 'markup';

export const FORMAT_EXTENSIONS: Record<ExportFormat, string> = {
  records: '.json',
  markup: '.xml',
};

const FORMAT_ALIASES: Record<string, ExportFormat> = {
  records: 'records',
  json: 'records',
  markup: 'markup',
  xml: 'markup',
};

export function resolveExportFormat(input: string): ExportFormat | null {
  return FORMAT_ALIASES[input.trim().toLowerCase()] ?? null;
}

const OUTPUT_STEM = 'output';

/** `output_1.json` … `output_<count>.json`, numbered in statement order. */
export function outputFileNames(count: number, format: ExportFormat): string[] {
  return Array.from({ length: count }, (_, index) => `${OUTPUT_STEM}_${index + 1}${FORMAT_EXTENSIONS[format]}`);
}

/**
 * Runs every statement of the file in order and keeps each result set.
 * The first failing statement is logged and aborts the batch.
 */
export async function executeBatch(session: Session, statementPath: string, log: Logger = defaultLogger): Promise<ResultSet[]> {
  const statements = await readStatements(statementPath);
  const resultSets: ResultSet[] = [];

  for (const [index, statement] of statements.entries()) {
    try {
      const { columns, rows } = await session.queryArray(statement);
      resultSets.push({ statement, columns, rows });
      log.info({ component: 'exporter', statement: index + 1, rows: rows.length }, 'SQL query executed successfully');
    } catch (error) {
      log.error({ component: 'exporter', statement, err: describeError(error) }, 'Error executing query');
      throw new StatementError(statement, error);
    }
  }

  return resultSets;
}

/**
 * Applies each index statement on its own. Statements run outside an explicit
 * transaction, so each one commits as soon as it completes.
 */
export async function buildIndexes(session: Session, indexPath: string, log: Logger = defaultLogger): Promise<number> {
  const statements = await readStatements(indexPath);

  for (const statement of statements) {
    try {
      await session.query(statement);
    } catch (error) {
      log.error({ component: 'exporter', statement, err: describeError(error) }, 'Error creating index');
      throw new StatementError(statement, error);
    }
    log.info({ component: 'exporter', statement }, 'Index created successfully');
  }

  return statements.length;
}

async function writeOutputs(contents: string[], destinations: string[]): Promise<void> {
  const count = Math.min(contents.length, destinations.length);
  for (let index = 0; index < count; index += 1) {
    const destination = destinations[index];
    const content = contents[index];
    if (destination === undefined || content === undefined) continue;
    await fsp.mkdir(path.dirname(destination), { recursive: true });
    await fsp.writeFile(destination, content, 'utf8');
  }
}

// Every result set is serialized before the first file is written.
export async function exportAsRecords(resultSets: ResultSet[], destinations: string[]): Promise<void> {
  await writeOutputs(resultSets.map(serializeRecords), destinations);
}

export async function exportAsMarkup(resultSets: ResultSet[], destinations: string[]): Promise<void> {
  await writeOutputs(resultSets.map(serializeMarkup), destinations);
}

/**
 * Executes the statement file and writes one numbered output file per
 * statement into `outputDir`. Returns the written paths; an unknown format or
 * a missing session is logged and writes nothing.
 */
export async function exportResult(
  session: Session | null,
  format: string,
  statementPath: string,
  outputDir: string,
  log: Logger = defaultLogger
): Promise<string[]> {
  const resolved = resolveExportFormat(format);
  if (!resolved) {
    log.error({ component: 'exporter', format }, 'Unknown file format');
    return [];
  }

  if (!session?.isOpen) {
    log.error({ component: 'exporter', format: resolved }, 'Failed to export results: No connection to the DB.');
    return [];
  }

  const resultSets = await executeBatch(session, statementPath, log);
  const destinations = outputFileNames(resultSets.length, resolved).map((name) => path.join(outputDir, name));

  switch (resolved) {
    case 'records':
      await exportAsRecords(resultSets, destinations);
      break;
    case 'markup':
      await exportAsMarkup(resultSets, destinations);
      break;
    default: {
      const unreachable: never = resolved;
      throw new Error(`unhandled export format ${String(unreachable)}`);
    }
  }

  log.info({ component: 'exporter', format: resolved, files: destinations.length }, `Data exported to '${resolved}' format successfully`);
  return destinations;
}
