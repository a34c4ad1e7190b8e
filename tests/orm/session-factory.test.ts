import { describe, expect, it } from 'vitest';

import { ConfigurationError, ExecutorError } from '../../src/core/errors.js';
import { defineStatement } from '../../src/core/mapping/mapped-statement.js';
import { createConfiguration, type Environment } from '../../src/orm/configuration.js';
import type { WarningLogEntry } from '../../src/orm/query-logger.js';
import { SessionFactory } from '../../src/orm/session-factory.js';
import { FakeRunner, FakeTransaction } from './fake-runner.js';

const selectBlog = defineStatement({ id: 'selectBlog', sql: 'SELECT * FROM blog WHERE id = ?', parameterMappings: ['id'] });

describe('SessionFactory', () => {
  it('should open executors on a new transaction', async () => {
    const transactions: FakeTransaction[] = [];
    const autoCommits: boolean[] = [];
    const runner = new FakeRunner(() => [{ id: 1 }]);
    const environment: Environment = {
      id: 'test',
      transactionFactory: {
        newTransaction: ({ autoCommit }) => {
          autoCommits.push(autoCommit);
          const transaction = new FakeTransaction();
          transactions.push(transaction);
          return transaction;
        },
      },
      runnerFactory: () => runner,
    };
    const factory = new SessionFactory(createConfiguration({ environment }));

    const session = await factory.openSession();
    await factory.openSession({ autoCommit: true });

    expect(autoCommits).toEqual([false, true]);
    expect(session.getTransaction()).toBe(transactions[0]);
    await expect(session.query(selectBlog, { id: 1 })).resolves.toEqual([{ id: 1 }]);
  });

  it('should require an environment', async () => {
    const factory = new SessionFactory(createConfiguration());

    await expect(factory.openSession()).rejects.toThrow(ConfigurationError);
  });

  it('should close the transaction and wrap the failure when the runner cannot be created', async () => {
    const transaction = new FakeTransaction();
    const failure = new Error('no connection');
    const factory = new SessionFactory(
      createConfiguration({
        environment: {
          id: 'test',
          transactionFactory: { newTransaction: () => transaction },
          runnerFactory: () => {
            throw failure;
          },
        },
      })
    );

    const error = await factory.openSession().then(
      () => undefined,
      (rejection: unknown) => rejection
    );

    expect(error).toBeInstanceOf(ExecutorError);
    expect(error instanceof ExecutorError ? error.message : undefined).toBe('Error opening session. Cause: no connection');
    expect(error instanceof ExecutorError ? error.cause : undefined).toBe(failure);
    expect(transaction.closes).toBe(1);
  });

  it('should report a failing close and keep the original error', async () => {
    const transaction = new FakeTransaction();
    transaction.closeError = new Error('already gone');
    const warnings: WarningLogEntry[] = [];
    const factory = new SessionFactory(
      createConfiguration({
        warningLogger: entry => warnings.push(entry),
        environment: {
          id: 'test',
          transactionFactory: { newTransaction: () => transaction },
          runnerFactory: () => {
            throw new Error('no connection');
          },
        },
      })
    );

    await expect(factory.openSession()).rejects.toThrow('Error opening session. Cause: no connection');
    expect(warnings.map(entry => entry.message)).toEqual([
      'Failed to close transaction of a session that could not be opened. Cause: already gone',
    ]);
  });
});
