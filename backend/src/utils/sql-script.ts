import { promises as fsp } from 'node:fs';

export const STATEMENT_DELIMITER = ';';

/**
 * Splits a script on the delimiter, keeping order and dropping blank pieces.
 * The split is purely textual: a `;` inside a string literal or a function
 * body also ends a statement.
 */
export function splitStatements(script: string): string[] {
  return script
    .split(STATEMENT_DELIMITER)
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
}

export async function readSqlFile(filePath: string): Promise<string> {
  return fsp.readFile(filePath, 'utf8');
}

export async function readStatements(filePath: string): Promise<string[]> {
  return splitStatements(await readSqlFile(filePath));
}
