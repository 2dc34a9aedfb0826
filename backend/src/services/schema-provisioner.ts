import { withTransaction, type Session } from '../db.js';
import { DUPLICATE_DATABASE, UNDEFINED_TABLE, describeError, sqlState } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import { readSqlFile } from '../utils/sql-script.js';

export async function databaseExists(session: Session, name: string): Promise<boolean> {
  const { rows } = await session.query(
    'select exists (select 1 from pg_database where datname = $1) as exists',
    [name]
  );
  return rows[0]?.exists === true;
}

/**
 * Creates `name` through an administrative session unless the catalog already
 * lists it. Returns true when the database was created by this call.
 *
 * The admin session runs without an open transaction, so `create database`
 * commits on its own.
 */
export async function ensureDatabase(adminSession: Session, name: string, log: Logger = defaultLogger): Promise<boolean> {
  if (await databaseExists(adminSession, name)) {
    log.info({ component: 'schema', database: name }, `Database '${name}' already exists.`);
    return false;
  }

  try {
    await adminSession.query(`create database ${adminSession.escapeIdentifier(name)}`);
  } catch (error) {
    // Another process may create it between the check and the create.
    if (sqlState(error) === DUPLICATE_DATABASE) {
      log.info({ component: 'schema', database: name }, `Database '${name}' already exists.`);
      return false;
    }
    throw error;
  }

  log.info({ component: 'schema', database: name }, `Database '${name}' created successfully.`);
  return true;
}

/**
 * Applies the schema script as a single statement in one transaction.
 * An undefined-table failure is rolled back and reported as `false`; any
 * other failure is rolled back and rethrown.
 */
export async function ensureTables(session: Session, schemaPath: string, log: Logger = defaultLogger): Promise<boolean> {
  const script = await readSqlFile(schemaPath);

  try {
    await withTransaction(session, async (tx) => {
      await tx.query(script);
    });
  } catch (error) {
    if (sqlState(error) === UNDEFINED_TABLE) {
      log.error({ component: 'schema', path: schemaPath, err: describeError(error) }, 'Error creating tables');
      return false;
    }
    log.error({ component: 'schema', path: schemaPath, err: describeError(error) }, 'Error executing schema file');
    throw error;
  }

  log.info({ component: 'schema', path: schemaPath }, 'Tables created successfully.');
  return true;
}
