import { describe, expect, it, vi } from 'vitest';
import type { DbConfig } from '../src/config.js';
import { ConnectionManager, withTransaction, type Connector } from '../src/db.js';
import { LEVEL, captureLogger } from './support/capture-logger.js';
import { FakeSession } from './support/fake-session.js';

const dbConfig: DbConfig = {
  host: 'localhost',
  port: 5432,
  user: 'postgres',
  password: 'test-secret',
  database: 'university',
  connectTimeoutMs: 1000,
  statementTimeoutMs: 0,
};

function scriptedConnector(...outcomes: (FakeSession | Error)[]) {
  const connector = vi.fn<Connector>(async () => {
    const next = outcomes.shift();
    if (!next) throw new Error('no more connections scripted');
    if (next instanceof Error) throw next;
    return next;
  });
  return connector;
}

describe('ConnectionManager.acquire', () => {
  it('opens a session on first use and logs the connection', async () => {
    const session = new FakeSession();
    const connector = scriptedConnector(session);
    const { logger, messages } = captureLogger();
    const manager = new ConnectionManager(dbConfig, { logger, connector });

    await expect(manager.acquire()).resolves.toBe(session);
    expect(connector).toHaveBeenCalledWith(dbConfig);
    expect(messages(LEVEL.info)).toEqual(['Connection to PostgreSQL university successful']);
  });

  it('reuses a healthy session after a liveness probe', async () => {
    const session = new FakeSession();
    const connector = scriptedConnector(session);
    const manager = new ConnectionManager(dbConfig, { logger: captureLogger().logger, connector });

    const first = await manager.acquire();
    const second = await manager.acquire();

    expect(second).toBe(first);
    expect(connector).toHaveBeenCalledTimes(1);
    expect(session.statements).toEqual(['select 1']);
  });

  it('reconnects once when the probe fails', async () => {
    const broken = new FakeSession().failOn(/^select 1$/, new Error('server closed the connection unexpectedly'));
    const replacement = new FakeSession();
    const connector = scriptedConnector(broken, replacement);
    const { logger, messages } = captureLogger();
    const manager = new ConnectionManager(dbConfig, { logger, connector });

    await manager.acquire();
    await expect(manager.acquire()).resolves.toBe(replacement);

    expect(connector).toHaveBeenCalledTimes(2);
    expect(broken.closeCount).toBe(1);
    expect(messages(LEVEL.warn)).toEqual(['liveness probe failed, reconnecting']);
    expect(messages(LEVEL.info)).toContain('Reconnection to PostgreSQL university successful');
  });

  it('returns null instead of throwing when the reconnect fails too', async () => {
    const broken = new FakeSession().failOn(/^select 1$/, new Error('terminating connection'));
    const connector = scriptedConnector(broken, new Error('connect ECONNREFUSED 127.0.0.1:5432'));
    const { logger, lines } = captureLogger();
    const manager = new ConnectionManager(dbConfig, { logger, connector });

    await manager.acquire();
    await expect(manager.acquire()).resolves.toBeNull();

    expect(connector).toHaveBeenCalledTimes(2);
    expect(broken.closeCount).toBe(1);
    const failure = lines.find((line) => line.level === LEVEL.error);
    expect(failure?.msg).toBe('Error reconnecting to university');
    expect(failure?.err).toBe('connect ECONNREFUSED 127.0.0.1:5432');
  });

  it('returns null when the first connection cannot be made', async () => {
    const connector = scriptedConnector(new Error('password authentication failed'));
    const { logger, messages } = captureLogger();
    const manager = new ConnectionManager(dbConfig, { logger, connector });

    await expect(manager.acquire()).resolves.toBeNull();
    expect(messages(LEVEL.error)).toEqual(['Error connecting to university']);
  });

  it('replaces a closed session without probing it', async () => {
    const first = new FakeSession();
    const second = new FakeSession();
    const connector = scriptedConnector(first, second);
    const manager = new ConnectionManager(dbConfig, { logger: captureLogger().logger, connector });

    await manager.acquire();
    first.isOpen = false;

    await expect(manager.acquire()).resolves.toBe(second);
    expect(first.statements).toEqual([]);
  });

  it('closes the owned session', async () => {
    const session = new FakeSession();
    const manager = new ConnectionManager(dbConfig, { logger: captureLogger().logger, connector: scriptedConnector(session) });

    await manager.acquire();
    await manager.close();
    await manager.close();

    expect(session.closeCount).toBe(1);
  });
});

describe('withTransaction', () => {
  it('commits after the callback succeeds', async () => {
    const session = new FakeSession();

    await expect(withTransaction(session, async (tx) => (await tx.query('select 1')).rowCount)).resolves.toBe(1);
    expect(session.statements).toEqual(['begin', 'select 1', 'commit']);
  });

  it('rolls back and rethrows when the callback fails', async () => {
    const session = new FakeSession().failOn(/^update/, new Error('deadlock detected'));

    await expect(withTransaction(session, (tx) => tx.query('update room set name = $1', ['x']))).rejects.toThrow(
      'deadlock detected'
    );
    expect(session.statements).toEqual(['begin', 'update room set name = $1', 'rollback']);
  });
});
