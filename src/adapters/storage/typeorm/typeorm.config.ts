import { DataSource, DataSourceOptions } from 'typeorm';
import { OrderEntity, OrderNoteEntity } from './entities';

export const ORDER_ENTITIES = [OrderEntity, OrderNoteEntity];

/**
 * TypeORM configuration for the order store.
 * Without options, connects to PostgreSQL from DB_* environment variables.
 */
export const createTypeORMConfig = (
  options?: DataSourceOptions,
): DataSourceOptions => {
  if (options) {
    return { ...options, entities: ORDER_ENTITIES };
  }

  return {
    type: 'postgres',
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    username: process.env.DB_USERNAME || 'checkout',
    password: process.env.DB_PASSWORD || 'checkout',
    database: process.env.DB_NAME || 'checkout',
    entities: ORDER_ENTITIES,
    synchronize: process.env.NODE_ENV === 'development',
    logging: process.env.DB_LOGGING === 'true',
    // Connection pool settings
    extra: {
      max: parseInt(process.env.DB_POOL_SIZE || '10', 10),
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    },
  };
};

/**
 * Create TypeORM DataSource
 */
export const createDataSource = (options?: DataSourceOptions): DataSource => {
  return new DataSource(createTypeORMConfig(options));
};
