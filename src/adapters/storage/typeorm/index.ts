/**
 * TypeORM order store (PostgreSQL in production, SQLite in tests)
 */

export { TypeORMOrderStore } from './typeorm-order-store.adapter';
export {
  createDataSource,
  createTypeORMConfig,
  ORDER_ENTITIES,
} from './typeorm.config';
export * from './entities';
