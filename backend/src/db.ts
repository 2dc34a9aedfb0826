import pg, { type Client, type QueryArrayConfig, type QueryResultRow } from 'pg';
import type { DbConfig } from './config.js';
import { describeError } from './errors.js';
import { logger as defaultLogger, type Logger } from './logger.js';
import { decodeRow, type ColumnInfo } from './utils/values.js';

export type QueryOutcome = {
  rows: QueryResultRow[];
  rowCount: number | null;
};

export type ArrayOutcome = {
  columns: ColumnInfo[];
  rows: unknown[][];
};

/**
 * Handle on one live connection. The orchestrator owns it and lends it to
 * each step; steps never close it.
 */
export interface Session {
  readonly database: string;
  readonly isOpen: boolean;
  query(text: string, params?: unknown[]): Promise<QueryOutcome>;
  /** Rows as value arrays in column order, with the column list reported by the server. */
  queryArray(text: string): Promise<ArrayOutcome>;
  escapeIdentifier(value: string): string;
  close(): Promise<void>;
}

export type Connector = (config: DbConfig) => Promise<Session>;

class PgSession implements Session {
  readonly database: string;
  private readonly client: Client;
  private closed = false;

  constructor(client: Client, database: string, log: Logger) {
    this.client = client;
    this.database = database;
    // An unhandled 'error' event would take the process down; mark the session dead instead.
    client.on('error', (error) => {
      this.closed = true;
      log.warn({ component: 'db', database, err: describeError(error) }, 'connection error');
    });
    client.on('end', () => {
      this.closed = true;
    });
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  async query(text: string, params?: unknown[]): Promise<QueryOutcome> {
    const result = await this.client.query(text, params);
    return { rows: result.rows, rowCount: result.rowCount };
  }

  async queryArray(text: string): Promise<ArrayOutcome> {
    const config: QueryArrayConfig = { text, rowMode: 'array' };
    const result = await this.client.query(config);
    const columns = result.fields.map((field) => ({ name: field.name, dataTypeID: field.dataTypeID }));
    return { columns, rows: result.rows.map((row) => decodeRow(row, columns)) };
  }

  escapeIdentifier(value: string): string {
    return this.client.escapeIdentifier(value);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.client.end();
  }
}

export function createPgConnector(log: Logger = defaultLogger): Connector {
  return async (config) => {
    const client = new pg.Client({
      host: config.host,
      port: config.port,
      user: config.user,
      password: config.password,
      database: config.database,
      connectionTimeoutMillis: config.connectTimeoutMs,
      statement_timeout: config.statementTimeoutMs > 0 ? config.statementTimeoutMs : undefined,
    });
    await client.connect();
    return new PgSession(client, config.database, log);
  };
}

export class ConnectionManager {
  private readonly config: DbConfig;
  private readonly log: Logger;
  private readonly connector: Connector;
  private session: Session | null = null;

  constructor(config: DbConfig, options: { logger?: Logger; connector?: Connector } = {}) {
    this.config = config;
    this.log = options.logger ?? defaultLogger;
    this.connector = options.connector ?? createPgConnector(this.log);
  }

  /**
   * Returns the current session after a `select 1` probe, or opens a new one.
   * A failed probe gets exactly one reconnect; if that fails too the error is
   * logged and `null` comes back instead of a throw.
   */
  async acquire(): Promise<Session | null> {
    const current = this.session;
    if (current?.isOpen) {
      try {
        await current.query('select 1');
        return current;
      } catch (error) {
        this.log.warn(
          { component: 'db', database: this.config.database, err: describeError(error) },
          'liveness probe failed, reconnecting'
        );
        await this.discard(current);
        return this.open(true);
      }
    }
    if (current) {
      await this.discard(current);
    }
    return this.open(current !== null);
  }

  async close(): Promise<void> {
    const current = this.session;
    this.session = null;
    if (current) {
      await current.close();
    }
  }

  private async open(reconnect: boolean): Promise<Session | null> {
    const { database } = this.config;
    try {
      const session = await this.connector(this.config);
      this.session = session;
      this.log.info(
        { component: 'db', database },
        reconnect ? `Reconnection to PostgreSQL ${database} successful` : `Connection to PostgreSQL ${database} successful`
      );
      return session;
    } catch (error) {
      this.session = null;
      this.log.error(
        { component: 'db', database, err: describeError(error) },
        reconnect ? `Error reconnecting to ${database}` : `Error connecting to ${database}`
      );
      return null;
    }
  }

  private async discard(session: Session): Promise<void> {
    this.session = null;
    try {
      await session.close();
    } catch (error) {
      this.log.debug({ component: 'db', err: describeError(error) }, 'closing a dead session failed');
    }
  }
}

export async function withTransaction<T>(session: Session, fn: (session: Session) => Promise<T>): Promise<T> {
  await session.query('begin');
  try {
    const result = await fn(session);
    await session.query('commit');
    return result;
  } catch (error) {
    await session.query('rollback');
    throw error;
  }
}
