import { adminDbConfig, type AppConfig } from './config.js';
import { ConnectionManager, type Connector } from './db.js';
import { logger as defaultLogger, type Logger } from './logger.js';
import { loadRecords, type LoadSummary } from './services/bulk-loader.js';
import { buildIndexes, exportResult } from './services/query-exporter.js';
import { ensureDatabase, ensureTables } from './services/schema-provisioner.js';

export type PipelineOptions = {
  studentsPath: string;
  roomsPath: string;
  format: string;
  outputDir: string;
  schemaPath: string;
  selectPath: string;
  indexPath: string;
};

export type PipelineDeps = {
  config: AppConfig;
  logger?: Logger;
  connector?: Connector;
};

export type PipelineReport = {
  connected: boolean;
  databaseCreated: boolean | null;
  tablesReady: boolean;
  rooms: LoadSummary | null;
  students: LoadSummary | null;
  indexes: number;
  outputs: string[];
};

async function provisionDatabase({ config, logger, connector }: PipelineDeps, log: Logger): Promise<boolean | null> {
  const admin = new ConnectionManager(adminDbConfig(config), { logger, connector });
  try {
    const adminSession = await admin.acquire();
    if (!adminSession) {
      log.error({ component: 'pipeline', database: config.adminDatabase }, 'No administrative connection; skipping database creation');
      return null;
    }
    return await ensureDatabase(adminSession, config.db.database, log);
  } finally {
    await admin.close();
  }
}

/**
 * Database and tables first, then rooms before students (students reference
 * rooms), then indexes, then the export. The session is re-acquired before
 * each step so a dropped connection is replaced between steps.
 */
export async function runPipeline(options: PipelineOptions, deps: PipelineDeps): Promise<PipelineReport> {
  const log = deps.logger ?? defaultLogger;
  const databaseCreated = await provisionDatabase(deps, log);

  const manager = new ConnectionManager(deps.config.db, { logger: log, connector: deps.connector });
  try {
    const session = await manager.acquire();
    const tablesReady = session ? await ensureTables(session, options.schemaPath, log) : false;
    if (!tablesReady) {
      log.warn({ component: 'pipeline', path: options.schemaPath }, 'Schema was not applied; continuing with the existing tables');
    }

    const rooms = await loadRecords(await manager.acquire(), options.roomsPath, 'container', log);
    const students = await loadRecords(await manager.acquire(), options.studentsPath, 'member', log);

    const indexSession = await manager.acquire();
    let indexes = 0;
    if (indexSession) {
      indexes = await buildIndexes(indexSession, options.indexPath, log);
    } else {
      log.error({ component: 'pipeline' }, 'Failed to create indexes: No connection to the DB.');
    }

    const outputs = await exportResult(await manager.acquire(), options.format, options.selectPath, options.outputDir, log);

    return {
      connected: session !== null,
      databaseCreated,
      tablesReady,
      rooms,
      students,
      indexes,
      outputs,
    };
  } finally {
    await manager.close();
  }
}
