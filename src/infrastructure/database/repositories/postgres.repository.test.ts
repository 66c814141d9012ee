import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Pool } from 'pg';
import pino from 'pino';
import { PostgresConnectionProvider } from './postgres.repository';

describe('PostgresConnectionProvider', () => {
  const client = {
    query: vi.fn(),
    release: vi.fn(),
  };
  const pool = {
    connect: vi.fn(),
    query: vi.fn(),
    end: vi.fn(),
    totalCount: 2,
    idleCount: 1,
    waitingCount: 0,
  };
  let provider: PostgresConnectionProvider;

  beforeEach(() => {
    vi.clearAllMocks();
    pool.connect.mockResolvedValue(client);
    pool.end.mockResolvedValue(undefined);
    provider = new PostgresConnectionProvider(
      pool as unknown as Pool,
      pino({ level: 'silent' }),
    );
  });

  describe('withConnection', () => {
    it('binds named parameters positionally and releases the client', async () => {
      client.query.mockResolvedValueOnce({ rows: [{ id: 1 }], rowCount: 1 });

      const result = await provider.withConnection((conn) =>
        conn.query('SELECT Id FROM Room WHERE Id = @id AND Name = @name', {
          id: 1,
          name: 'Maple',
        }),
      );

      expect(client.query).toHaveBeenCalledWith(
        'SELECT Id FROM Room WHERE Id = $1 AND Name = $2',
        [1, 'Maple'],
      );
      expect(result).toEqual({ rows: [{ id: 1 }], rowCount: 1 });
      expect(pool.connect).toHaveBeenCalledTimes(1);
      expect(client.release).toHaveBeenCalledTimes(1);
    });

    it('reports a null rowCount as 0', async () => {
      client.query.mockResolvedValueOnce({ rows: [], rowCount: null });

      const result = await provider.withConnection((conn) =>
        conn.query('SELECT Id, Name, MaxOccupancy FROM Room'),
      );

      expect(result).toEqual({ rows: [], rowCount: 0 });
      expect(client.query).toHaveBeenCalledWith(
        'SELECT Id, Name, MaxOccupancy FROM Room',
        [],
      );
    });

    it('rethrows the driver error and still releases the client', async () => {
      const dbError = Object.assign(new Error('duplicate key'), { code: '23505' });
      client.query.mockRejectedValueOnce(dbError);

      await expect(
        provider.withConnection((conn) =>
          conn.query('DELETE FROM Room WHERE Id = @id', { id: 1 }),
        ),
      ).rejects.toBe(dbError);
      expect(client.release).toHaveBeenCalledTimes(1);
    });

    it('releases the client when a parameter is missing', async () => {
      await expect(
        provider.withConnection((conn) =>
          conn.query('DELETE FROM Room WHERE Id = @id', {}),
        ),
      ).rejects.toThrow('Missing value for query parameter @id');
      expect(client.query).not.toHaveBeenCalled();
      expect(client.release).toHaveBeenCalledTimes(1);
    });

    it('surfaces a connection failure without running the callback', async () => {
      const refused = new Error('connect ECONNREFUSED 127.0.0.1:5432');
      pool.connect.mockRejectedValueOnce(refused);
      const fn = vi.fn();

      await expect(provider.withConnection(fn)).rejects.toBe(refused);
      expect(fn).not.toHaveBeenCalled();
      expect(client.release).not.toHaveBeenCalled();
    });

    it('acquires a fresh client for each call', async () => {
      client.query.mockResolvedValue({ rows: [], rowCount: 0 });

      await provider.withConnection((conn) => conn.query('SELECT 1'));
      await provider.withConnection((conn) => conn.query('SELECT 1'));

      expect(pool.connect).toHaveBeenCalledTimes(2);
      expect(client.release).toHaveBeenCalledTimes(2);
    });
  });

  describe('checkHealth', () => {
    it('reports pool counters when the probe succeeds', async () => {
      pool.query.mockResolvedValueOnce({ rows: [{ '?column?': 1 }], rowCount: 1 });

      const health = await provider.checkHealth();

      expect(pool.query).toHaveBeenCalledWith('SELECT 1');
      expect(health.connected).toBe(true);
      expect(health.latencyMs).toBeGreaterThanOrEqual(0);
      expect(health).toMatchObject({ poolSize: 2, idleCount: 1, waitingCount: 0 });
    });

    it('reports disconnected when the probe fails', async () => {
      pool.query.mockRejectedValueOnce(new Error('connection terminated'));

      await expect(provider.checkHealth()).resolves.toEqual({
        connected: false,
        latencyMs: -1,
        poolSize: 2,
        idleCount: 1,
        waitingCount: 0,
      });
    });
  });

  describe('close', () => {
    it('ends the pool once', async () => {
      await provider.close();
      await provider.close();

      expect(pool.end).toHaveBeenCalledTimes(1);
    });
  });
});
