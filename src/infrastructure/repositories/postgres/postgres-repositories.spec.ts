import type { QueryResult, QueryResultRow } from 'pg';

import type { PostgresService, Queryable } from '../../../modules/postgres/postgres.service';
import { UniqueViolation } from '../../../domain/repositories/principal.repository.interface';
import type { InventoryItemCreateInput } from '../../../domain/models/inventory-item.model';
import { PostgresPrincipalRepository, type PrincipalRow } from './postgres-principal.repository';
import { PostgresInventoryRepository } from './postgres-inventory.repository';
import { PostgresInventoryItemRepository, type InventoryItemRow } from './postgres-inventory-item.repository';
import { PostgresAuthTokenRepository } from './postgres-auth-token.repository';

function result<R extends QueryResultRow>(rows: R[]): QueryResult<R> {
  return { rows, rowCount: rows.length, command: '', oid: 0, fields: [] };
}

function createDb() {
  const query = jest.fn<Promise<QueryResult<QueryResultRow>>, [string, unknown[]?]>();
  const txQuery = jest.fn<Promise<QueryResult<QueryResultRow>>, [string, unknown[]?]>();
  const tx = { query: txQuery } as unknown as Queryable;
  const db = {
    query,
    transaction: jest.fn(<T>(work: (client: Queryable) => Promise<T>) => work(tx)),
  };
  return { db, query, txQuery, service: db as unknown as PostgresService };
}

const principalRow: PrincipalRow = {
  id: 3,
  username: 'usos_42',
  first_name: 'Jan',
  last_name: 'Nowak',
  email: '',
  is_active: true,
  is_staff: false,
  password: '!x',
  date_joined: new Date('2024-01-01T00:00:00Z'),
  last_login: null,
};

const itemRow: InventoryItemRow = {
  id: 9,
  inventory_id: 2,
  department: 1,
  asset_group: 2,
  category: 'IT',
  inventory_number: 'N-1',
  asset_component: '5000000000',
  sub_number: 0,
  acquisition_date: '2020-05-05',
  asset_description: 'Desk',
  quantity: 1,
  initial_value: '10.00',
  last_inventory_room: 'A',
  current_room: null,
  scanned: false,
};

const itemInput: InventoryItemCreateInput = {
  inventoryId: 2,
  department: 1,
  assetGroup: 2,
  category: 'IT',
  inventoryNumber: 'N-1',
  assetComponent: 5000000000,
  subNumber: 0,
  acquisitionDate: '2020-05-05',
  assetDescription: 'Desk',
  quantity: 1,
  initialValue: '10.00',
  lastInventoryRoom: 'A',
  currentRoom: null,
  scanned: false,
};

describe('PostgresPrincipalRepository', () => {
  it('should map a row to the domain record', async () => {
    const { query, service } = createDb();
    query.mockResolvedValue(result([principalRow]));

    const found = await new PostgresPrincipalRepository(service).findByUsername('usos_42');

    expect(found).toEqual({
      id: 3,
      username: 'usos_42',
      firstName: 'Jan',
      lastName: 'Nowak',
      email: '',
      isActive: true,
      isStaff: false,
      password: '!x',
      dateJoined: new Date('2024-01-01T00:00:00Z'),
      lastLogin: null,
    });
    expect(query).toHaveBeenCalledWith(expect.stringContaining('WHERE username = $1'), ['usos_42']);
  });

  it('should look up an id at the top of the serial range', async () => {
    const { query, service } = createDb();
    query.mockResolvedValue(result([]));

    expect(await new PostgresPrincipalRepository(service).findById(2147483647)).toBeNull();
    expect(query).toHaveBeenCalledWith(expect.stringContaining('WHERE id = $1'), [2147483647]);
  });

  it('should translate a unique violation', async () => {
    const { query, service } = createDb();
    query.mockRejectedValue(Object.assign(new Error('duplicate key'), { code: '23505' }));

    await expect(
      new PostgresPrincipalRepository(service).create({
        username: 'usos_42',
        firstName: '',
        lastName: '',
        email: '',
        isActive: true,
        isStaff: false,
        password: '!x',
      }),
    ).rejects.toBeInstanceOf(UniqueViolation);
  });

  it('should update only the given columns', async () => {
    const { query, service } = createDb();
    query.mockResolvedValue(result([{ ...principalRow, is_staff: true }]));

    await new PostgresPrincipalRepository(service).update(3, { isStaff: true, email: 'a@b.c' });

    expect(query).toHaveBeenCalledWith(
      expect.stringContaining('SET email = $1, is_staff = $2 WHERE id = $3'),
      ['a@b.c', true, 3],
    );
  });
});

describe('PostgresInventoryRepository', () => {
  it('should keep unchanged columns through COALESCE', async () => {
    const { query, service } = createDb();
    query.mockResolvedValue(result([{ id: 1, name: 'New', date: '2024-01-01', owner_id: 4 }]));

    const updated = await new PostgresInventoryRepository(service).update(1, { name: 'New' });

    expect(updated).toEqual({ id: 1, name: 'New', date: '2024-01-01', ownerId: 4 });
    expect(query).toHaveBeenCalledWith(expect.stringContaining('COALESCE'), ['New', null, 1]);
  });

  it('should find nothing for an id beyond the serial range without querying', async () => {
    const { query, service } = createDb();

    expect(await new PostgresInventoryRepository(service).findById(99999999999)).toBeNull();
    expect(query).not.toHaveBeenCalled();
  });

  it('should throw when the updated row is gone', async () => {
    const { query, service } = createDb();
    query.mockResolvedValue(result([]));

    await expect(new PostgresInventoryRepository(service).update(1, {})).rejects.toThrow('Inventory with id 1 not found');
  });
});

describe('PostgresInventoryItemRepository', () => {
  it('should convert int8 and keep numeric strings', async () => {
    const { query, service } = createDb();
    query.mockResolvedValue(result([itemRow]));

    const item = await new PostgresInventoryItemRepository(service).findById(9);

    expect(item).toMatchObject({ assetComponent: 5000000000, initialValue: '10.00', scanned: false, inventoryId: 2 });
  });

  it('should insert a batch inside one transaction', async () => {
    const { db, query, txQuery, service } = createDb();
    txQuery.mockResolvedValueOnce(result([itemRow])).mockResolvedValueOnce(result([{ ...itemRow, id: 10 }]));

    const created = await new PostgresInventoryItemRepository(service).createMany([itemInput, itemInput]);

    expect(created.map(item => item.id)).toEqual([9, 10]);
    expect(db.transaction).toHaveBeenCalledTimes(1);
    expect(txQuery).toHaveBeenCalledTimes(2);
    expect(query).not.toHaveBeenCalled();
  });

  it('should propagate a failed insert out of the transaction', async () => {
    const { txQuery, service } = createDb();
    txQuery.mockResolvedValueOnce(result([itemRow])).mockRejectedValueOnce(new Error('check violation'));

    await expect(
      new PostgresInventoryItemRepository(service).createMany([itemInput, itemInput]),
    ).rejects.toThrow('check violation');
  });

  it('should find nothing for ids no serial column can hold', async () => {
    const { query, service } = createDb();
    const repository = new PostgresInventoryItemRepository(service);

    expect(await repository.findById(99999999999)).toBeNull();
    expect(await repository.findById(0)).toBeNull();
    expect(query).not.toHaveBeenCalled();
  });

  it('should not query for an empty id list', async () => {
    const { query, service } = createDb();

    expect(await new PostgresInventoryItemRepository(service).findAll({ inventoryIds: [] })).toEqual([]);
    expect(query).not.toHaveBeenCalled();
  });
});

describe('PostgresAuthTokenRepository', () => {
  const row = { key: 'k'.repeat(40), principal_id: 3, created_at: new Date('2024-01-01T00:00:00Z') };

  it('should report a fresh insert as created', async () => {
    const { query, service } = createDb();
    query.mockResolvedValue(result([row]));

    const outcome = await new PostgresAuthTokenRepository(service).findOrCreate(3, row.key);

    expect(outcome).toEqual({ token: { key: row.key, principalId: 3, createdAt: row.created_at }, created: true });
  });

  it('should fall back to the stored token when the insert conflicts', async () => {
    const { query, service } = createDb();
    query.mockResolvedValueOnce(result([])).mockResolvedValueOnce(result([row]));

    const outcome = await new PostgresAuthTokenRepository(service).findOrCreate(3, 'other');

    expect(outcome.created).toBe(false);
    expect(outcome.token.key).toBe(row.key);
  });
});
