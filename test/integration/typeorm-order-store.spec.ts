import { DataSource } from 'typeorm';
import { TypeORMOrderStore, createDataSource } from '../../src';
import { createTestOrder } from '../../src/testing';
import { describeOrderStoreContract } from './order-store.contract';

describe('TypeORMOrderStore', () => {
  let dataSource: DataSource;
  let store: TypeORMOrderStore;

  beforeEach(async () => {
    // In-process SQLite; tables are created from the entities
    dataSource = createDataSource({
      type: 'better-sqlite3',
      database: ':memory:',
      synchronize: true,
      logging: false,
    });
    await dataSource.initialize();
    store = new TypeORMOrderStore(dataSource);
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  describeOrderStoreContract('TypeORMOrderStore', () => store);

  it('writes notes to their own table', async () => {
    await store.saveOrder(createTestOrder());
    await store.withOrderLock(42, (order) => order.addNote('Recorded.'));

    const rows: unknown = await dataSource.query(
      'SELECT order_id, message FROM order_notes',
    );
    expect(rows).toEqual([{ order_id: 42, message: 'Recorded.' }]);
  });

  it('refuses a row with an unknown status', async () => {
    await store.saveOrder(createTestOrder());
    await dataSource.query(`UPDATE orders SET status = 'weird' WHERE id = 42`);

    await expect(store.findOrder(42)).rejects.toThrow(
      'Order 42 has unknown status weird',
    );
  });

  it('reports unhealthy once the connection is gone', async () => {
    const closed = createDataSource({
      type: 'better-sqlite3',
      database: ':memory:',
    });

    await expect(new TypeORMOrderStore(closed).isHealthy()).resolves.toBe(
      false,
    );
  });
});
