import { InventoryService } from './inventory.service';
import { OwnershipScope } from './ownership-scope.service';
import { InMemoryInventoryRepository } from '../../infrastructure/repositories/inmemory/inmemory-inventory.repository';
import { InMemoryInventoryItemRepository } from '../../infrastructure/repositories/inmemory/inmemory-inventory-item.repository';
import { NotFoundError, UnauthorizedError } from '../common/api-errors';
import { AppLogger } from '../logging/app-logger.service';
import type { PrincipalRecord } from '../../domain/models/principal.model';

const principal = (id: number): PrincipalRecord => ({
  id,
  username: `usos_${id}`,
  firstName: '',
  lastName: '',
  email: `p${id}@example.com`,
  isActive: true,
  isStaff: false,
  password: '!x',
  dateJoined: new Date(0),
  lastLogin: null,
});

describe('InventoryService', () => {
  let service: InventoryService;
  let items: InMemoryInventoryItemRepository;
  const owner = principal(1);
  const stranger = principal(2);

  beforeEach(() => {
    items = new InMemoryInventoryItemRepository();
    const inventories = new InMemoryInventoryRepository(items);
    const logger = new AppLogger();
    service = new InventoryService(inventories, items, new OwnershipScope(inventories, items, logger), logger);
  });

  it('should set the owner from the caller', async () => {
    const view = await service.create(owner, { name: 'Lab', date: '2024-05-01' });

    expect(view).toEqual({
      id: 1,
      name: 'Lab',
      date: '2024-05-01',
      user: { id: 1, username: 'usos_1', email: 'p1@example.com' },
      items: [],
    });
  });

  it('should refuse to create without a caller', async () => {
    await expect(service.create(undefined, { name: 'Lab', date: '2024-05-01' })).rejects.toBeInstanceOf(
      UnauthorizedError,
    );
  });

  it('should group item ids per inventory', async () => {
    await service.create(owner, { name: 'A', date: '2024-05-01' });
    await service.create(owner, { name: 'B', date: '2024-05-01' });
    const base = {
      department: 1, assetGroup: 1, category: 'IT', inventoryNumber: 'N', assetComponent: 0, subNumber: 0,
      acquisitionDate: '2020-01-01', assetDescription: 'Desk', quantity: 1, initialValue: '1.00',
      lastInventoryRoom: 'A', currentRoom: null, scanned: null,
    };
    await items.createMany([{ ...base, inventoryId: 2 }, { ...base, inventoryId: 1 }, { ...base, inventoryId: 2 }]);

    const listed = await service.list(owner);

    expect(listed.map(inv => [inv.id, inv.items])).toEqual([[1, [2]], [2, [1, 3]]]);
  });

  it('should list nothing for another user_id or an anonymous caller', async () => {
    await service.create(owner, { name: 'A', date: '2024-05-01' });

    expect(await service.list(owner, stranger.id)).toEqual([]);
    expect(await service.list(undefined)).toEqual([]);
    expect(await service.list(owner, owner.id)).toHaveLength(1);
  });

  it('should answer foreign reads and writes with NotFound', async () => {
    await service.create(owner, { name: 'A', date: '2024-05-01' });

    await expect(service.get(stranger, 1)).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.update(stranger, 1, { name: 'x' })).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.remove(stranger, 1)).rejects.toBeInstanceOf(NotFoundError);
    expect((await service.get(owner, 1)).name).toBe('A');
  });

  it('should update only the given fields', async () => {
    await service.create(owner, { name: 'A', date: '2024-05-01' });

    const updated = await service.update(owner, 1, { date: '2024-06-01' });

    expect(updated).toMatchObject({ name: 'A', date: '2024-06-01' });
  });
});
