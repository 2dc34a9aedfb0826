#!/usr/bin/env node
import 'dotenv/config';
import path from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { loadConfig, type AppConfig } from './config.js';
import { describeError } from './errors.js';
import { createLogger, logger as bootLogger } from './logger.js';
import { runPipeline } from './pipeline.js';

type CliArgs = {
  students: string;
  rooms: string;
  format: string;
  outputDir?: string;
  schema?: string;
  queries?: string;
  indexes?: string;
};

async function main(args: CliArgs): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    bootLogger.fatal({ component: 'pipeline', err: describeError(error) }, 'Invalid configuration');
    return 1;
  }

  const log = createLogger({ level: config.logLevel, file: config.logFile });
  try {
    const report = await runPipeline(
      {
        studentsPath: path.resolve(args.students),
        roomsPath: path.resolve(args.rooms),
        format: args.format,
        outputDir: args.outputDir ? path.resolve(args.outputDir) : config.outputDir,
        schemaPath: args.schema ? path.resolve(args.schema) : config.schemaSqlPath,
        selectPath: args.queries ? path.resolve(args.queries) : config.selectSqlPath,
        indexPath: args.indexes ? path.resolve(args.indexes) : config.indexSqlPath,
      },
      { config, logger: log }
    );
    log.info({ component: 'pipeline', report }, 'Run finished');
    return report.connected ? 0 : 1;
  } catch (error) {
    log.fatal({ component: 'pipeline', err: describeError(error) }, 'Run aborted');
    return 1;
  }
}

await yargs(hideBin(process.argv))
  .scriptName('room-report')
  .command(
    '$0 <students> <rooms> <format>',
    'Load rooms and students into PostgreSQL and export the report queries',
    (cmd) =>
      cmd
        .positional('students', { type: 'string', demandOption: true, describe: 'Student file path' })
        .positional('rooms', { type: 'string', demandOption: true, describe: 'Rooms file path' })
        .positional('format', { type: 'string', demandOption: true, describe: 'Output file format (json or xml)' })
        .option('output-dir', { type: 'string', describe: 'Directory for output_<n> files' })
        .option('schema', { type: 'string', describe: 'Schema SQL file' })
        .option('queries', { type: 'string', describe: 'Report queries SQL file' })
        .option('indexes', { type: 'string', describe: 'Index SQL file' }),
    async (argv) => {
      process.exitCode = await main({
        students: argv.students,
        rooms: argv.rooms,
        format: argv.format,
        outputDir: argv.outputDir,
        schema: argv.schema,
        queries: argv.queries,
        indexes: argv.indexes,
      });
    }
  )
  .strict()
  .parseAsync();
