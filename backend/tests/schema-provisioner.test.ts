import { promises as fsp } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DUPLICATE_DATABASE, UNDEFINED_TABLE } from '../src/errors.js';
import { databaseExists, ensureDatabase, ensureTables } from '../src/services/schema-provisioner.js';
import { LEVEL, captureLogger } from './support/capture-logger.js';
import { FakeSession, PgLikeError } from './support/fake-session.js';

const schemaPath = fileURLToPath(new URL('../sql/db_schema.sql', import.meta.url));

describe('ensureDatabase', () => {
  it('checks the catalog for the database name', async () => {
    const admin = new FakeSession('postgres');
    admin.databases.add('university');

    await expect(databaseExists(admin, 'university')).resolves.toBe(true);
    await expect(databaseExists(admin, 'archive')).resolves.toBe(false);
  });

  it('creates a missing database with a quoted name', async () => {
    const admin = new FakeSession('postgres');
    const { logger, messages } = captureLogger();

    await expect(ensureDatabase(admin, 'university', logger)).resolves.toBe(true);

    expect(admin.statements).toContain('create database "university"');
    expect(admin.databases.has('university')).toBe(true);
    expect(messages(LEVEL.info)).toEqual(["Database 'university' created successfully."]);
  });

  it('skips creation when the database already exists', async () => {
    const admin = new FakeSession('postgres');
    admin.databases.add('university');
    const { logger, messages } = captureLogger();

    await expect(ensureDatabase(admin, 'university', logger)).resolves.toBe(false);

    expect(admin.statements.some((statement) => statement.startsWith('create database'))).toBe(false);
    expect(messages(LEVEL.info)).toEqual(["Database 'university' already exists."]);
    expect(messages(LEVEL.error)).toEqual([]);
  });

  it('treats a concurrent duplicate-database failure as already existing', async () => {
    const admin = new FakeSession('postgres').failOn(
      /^create database/,
      new PgLikeError(DUPLICATE_DATABASE, 'database "university" already exists')
    );
    const { logger, messages } = captureLogger();

    await expect(ensureDatabase(admin, 'university', logger)).resolves.toBe(false);
    expect(messages(LEVEL.info)).toEqual(["Database 'university' already exists."]);
  });

  it('propagates any other failure', async () => {
    const admin = new FakeSession('postgres').failOn(
      /^create database/,
      new PgLikeError('42501', 'permission denied to create database')
    );

    await expect(ensureDatabase(admin, 'university', captureLogger().logger)).rejects.toThrow(
      'permission denied to create database'
    );
  });
});

describe('ensureTables', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fsp.mkdtemp(path.join(os.tmpdir(), 'schema-test-'));
  });

  afterEach(async () => {
    await fsp.rm(tmpDir, { recursive: true, force: true });
  });

  it('runs the whole schema file as one statement and commits', async () => {
    const session = new FakeSession();
    const script = await fsp.readFile(schemaPath, 'utf8');
    const { logger, messages } = captureLogger();

    await expect(ensureTables(session, schemaPath, logger)).resolves.toBe(true);

    expect(session.statements).toEqual(['begin', script, 'commit']);
    expect(messages(LEVEL.info)).toEqual(['Tables created successfully.']);
  });

  it('rolls back and reports false on an undefined table', async () => {
    const file = path.join(tmpDir, 'schema.sql');
    await fsp.writeFile(file, 'CREATE TABLE student (room INTEGER REFERENCES missing (id));');
    const session = new FakeSession().failOn(
      /REFERENCES missing/,
      new PgLikeError(UNDEFINED_TABLE, 'relation "missing" does not exist')
    );
    const { logger, messages } = captureLogger();

    await expect(ensureTables(session, file, logger)).resolves.toBe(false);

    expect(session.statements.at(-1)).toBe('rollback');
    expect(messages(LEVEL.error)).toEqual(['Error creating tables']);
  });

  it('rolls back and rethrows other failures', async () => {
    const file = path.join(tmpDir, 'schema.sql');
    await fsp.writeFile(file, 'CREATE TABLE room (id INTEGER PRIMARY KEY,);');
    const session = new FakeSession().failOn(/^CREATE TABLE/, new PgLikeError('42601', 'syntax error at or near ")"'));

    await expect(ensureTables(session, file, captureLogger().logger)).rejects.toThrow('syntax error at or near ")"');
    expect(session.statements.at(-1)).toBe('rollback');
  });

  it('propagates a missing schema file', async () => {
    const session = new FakeSession();

    await expect(ensureTables(session, path.join(tmpDir, 'absent.sql'), captureLogger().logger)).rejects.toThrow(
      /ENOENT/
    );
    expect(session.statements).toEqual([]);
  });
});
