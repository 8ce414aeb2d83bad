export { InMemoryOrderStore } from './memory-order-store.adapter';
export type { InMemoryOrderStoreOptions } from './memory-order-store.adapter';
