import { ConfigService } from '@nestjs/config';
import { Pool } from 'pg';

import { PostgresService, isUniqueViolation } from './postgres.service';
import { AppLogger } from '../logging/app-logger.service';

jest.mock('pg', () => ({ Pool: jest.fn() }));

describe('PostgresService', () => {
  const client = { query: jest.fn(), release: jest.fn() };
  const pool = { query: jest.fn(), connect: jest.fn(), end: jest.fn(), on: jest.fn() };
  let service: PostgresService;

  beforeEach(() => {
    jest.clearAllMocks();
    client.query.mockResolvedValue({ rows: [] });
    pool.connect.mockResolvedValue(client);
    pool.query.mockResolvedValue({ rows: [] });
    jest.mocked(Pool).mockImplementation(() => pool as unknown as Pool);
    service = new PostgresService(new ConfigService({ DATABASE_URL: 'postgresql://test@localhost/test' }), new AppLogger());
  });

  it('should connect with DATABASE_URL', () => {
    expect(Pool).toHaveBeenCalledWith({ connectionString: 'postgresql://test@localhost/test' });
  });

  it('should apply the schema on init', async () => {
    await service.onModuleInit();

    expect(pool.query).toHaveBeenCalledWith(expect.stringContaining('CREATE TABLE IF NOT EXISTS'));
  });

  it('should commit a transaction whose work resolves', async () => {
    const result = await service.transaction(async tx => {
      await tx.query('SELECT 1');
      return 'done';
    });

    expect(result).toBe('done');
    expect(client.query.mock.calls.map(call => call[0])).toEqual(['BEGIN', 'SELECT 1', 'COMMIT']);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('should roll back and rethrow when the work rejects', async () => {
    const failure = new Error('insert failed');

    await expect(service.transaction(async () => { throw failure; })).rejects.toBe(failure);

    expect(client.query.mock.calls.map(call => call[0])).toEqual(['BEGIN', 'ROLLBACK']);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('should close the pool on shutdown', async () => {
    await service.onModuleDestroy();

    expect(pool.end).toHaveBeenCalledTimes(1);
  });
});

describe('isUniqueViolation', () => {
  it('should recognise SQLSTATE 23505 only', () => {
    expect(isUniqueViolation({ code: '23505' })).toBe(true);
    expect(isUniqueViolation({ code: '23503' })).toBe(false);
    expect(isUniqueViolation(new Error('x'))).toBe(false);
    expect(isUniqueViolation(null)).toBe(false);
  });
});
