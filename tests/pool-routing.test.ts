import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createDerivationPool, getConnectionInfo, getPrimaryDatabaseUrl } from '../src/db/pool';

describe('Derivation Pool', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    process.env = originalEnv;
    vi.restoreAllMocks();
  });

  describe('getPrimaryDatabaseUrl', () => {
    it('prefers DATABASE_URL_PRIMARY', () => {
      expect(
        getPrimaryDatabaseUrl({
          DATABASE_URL_PRIMARY: 'postgresql://primary:5432/racing',
          DATABASE_URL: 'postgresql://fallback:5432/racing'
        })
      ).toBe('postgresql://primary:5432/racing');
    });

    it('falls back to DATABASE_URL', () => {
      expect(getPrimaryDatabaseUrl({ DATABASE_URL_PRIMARY: ' ', DATABASE_URL: 'postgresql://fallback:5432/racing' })).toBe(
        'postgresql://fallback:5432/racing'
      );
    });

    it('fails closed when no URL is configured', () => {
      expect(() => getPrimaryDatabaseUrl({})).toThrow('FAIL_CLOSED: DATABASE_URL is not set');
    });
  });

  describe('getConnectionInfo', () => {
    it('detects SSL from connection string', () => {
      expect(getConnectionInfo({ DATABASE_URL: 'postgresql://host:5432/racing?sslmode=require' })).toEqual({
        host: 'host',
        ssl: true
      });
    });

    it('detects no SSL when not specified', () => {
      expect(getConnectionInfo({ DATABASE_URL: 'postgresql://host:5432/racing' })).toEqual({ host: 'host', ssl: false });
    });
  });

  describe('createDerivationPool', () => {
    it('creates a pool without connecting', async () => {
      process.env.DATABASE_URL = 'postgresql://localhost:5432/racing';

      const pool = createDerivationPool();

      expect(pool.totalCount).toBe(0);
      await pool.end();
    });

    it('requires a database URL', () => {
      delete process.env.DATABASE_URL;
      delete process.env.DATABASE_URL_PRIMARY;

      expect(() => createDerivationPool()).toThrow('FAIL_CLOSED: DATABASE_URL is not set');
    });
  });
});
