/**
 * Tests for transaction handling on a pooled connection
 * Covers: unreachable database versus failed query, commit, rollback,
 *         discarding a connection whose rollback failed
 */

jest.mock('../utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

import {
  isStoreUnavailable,
  runTransaction,
  translateStoreError,
  type TransactionConnection,
} from '../stores/pg-transaction';
import { StoreUnavailableError } from '../utils/errors';

function pgError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('isStoreUnavailable', () => {
  it.each([
    ['admin shutdown', pgError('terminating connection due to administrator command', '57P01')],
    ['connection exception class', pgError('connection failure', '08006')],
    ['too many connections', pgError('sorry, too many clients already', '53300')],
    ['refused socket', pgError('connect ECONNREFUSED 127.0.0.1:5432', 'ECONNREFUSED')],
    ['pool connect timeout', new Error('timeout exceeded when trying to connect')],
  ])('treats %s as unavailable', (_label, error) => {
    expect(isStoreUnavailable(error)).toBe(true);
  });

  it.each([
    ['unique violation', pgError('duplicate key value violates unique constraint', '23505')],
    ['syntax error', pgError('syntax error at or near "SELEC"', '42601')],
    ['plain error', new Error('something else')],
  ])('does not treat %s as unavailable', (_label, error) => {
    expect(isStoreUnavailable(error)).toBe(false);
  });
});

describe('translateStoreError', () => {
  it('wraps connectivity failures', () => {
    const translated = translateStoreError(pgError('Connection terminated unexpectedly', 'ECONNRESET'), 'submit');
    expect(translated).toBeInstanceOf(StoreUnavailableError);
    expect(translated).toMatchObject({
      message: 'Database unavailable during submit: Connection terminated unexpectedly',
      details: { operation: 'submit', code: 'ECONNRESET' },
    });
  });

  it('passes query errors through unchanged', () => {
    const error = pgError('duplicate key value violates unique constraint', '23505');
    expect(translateStoreError(error, 'insert')).toBe(error);
  });
});

/**
 * Records the statements it is sent; fails the ones named in `failOn`
 */
class ScriptedConnection implements TransactionConnection {
  readonly statements: string[] = [];
  readonly releases: Array<Error | undefined> = [];

  constructor(private readonly failOn: Record<string, Error> = {}) {}

  async query(text: string): Promise<unknown> {
    this.statements.push(text);
    const failure = this.failOn[text];
    if (failure) throw failure;
    return { rows: [] };
  }

  release(err?: Error): void {
    this.releases.push(err);
  }
}

describe('runTransaction', () => {
  it('commits and returns the result', async () => {
    const connection = new ScriptedConnection();

    const result = await runTransaction(connection, 'submit', async (client) => {
      await client.query('SELECT 1');
      return 'done';
    });

    expect(result).toBe('done');
    expect(connection.statements).toEqual(['BEGIN', 'SELECT 1', 'COMMIT']);
    expect(connection.releases).toEqual([undefined]);
  });

  it('rolls back, rethrows and returns the connection for reuse', async () => {
    const connection = new ScriptedConnection();

    await expect(
      runTransaction(connection, 'allocate', async () => {
        throw new Error('overlap');
      })
    ).rejects.toThrow('overlap');

    expect(connection.statements).toEqual(['BEGIN', 'ROLLBACK']);
    expect(connection.releases).toEqual([undefined]);
  });

  it('discards the connection when the rollback fails too', async () => {
    const rollbackFailure = pgError('Connection terminated unexpectedly', 'ECONNRESET');
    const connection = new ScriptedConnection({ ROLLBACK: rollbackFailure });

    await expect(
      runTransaction(connection, 'claimWinner', async (client) => {
        await client.query('UPDATE');
        throw pgError('Connection terminated unexpectedly', 'ECONNRESET');
      })
    ).rejects.toBeInstanceOf(StoreUnavailableError);

    expect(connection.releases).toEqual([rollbackFailure]);
  });
});
