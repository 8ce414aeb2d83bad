import { InMemoryOrderStore, createTestOrder } from '../../src/testing';
import { describeOrderStoreContract } from './order-store.contract';

describe('InMemoryOrderStore', () => {
  let store: InMemoryOrderStore;

  beforeEach(() => {
    store = new InMemoryOrderStore();
  });

  describeOrderStoreContract('InMemoryOrderStore', () => store);

  it('hands out copies, so unlocked edits are not persisted', async () => {
    await store.saveOrder(createTestOrder());

    const copy = await store.findOrder(42);
    copy?.addNote('not saved');

    expect((await store.findOrder(42))?.notes).toEqual([]);
  });

  it('does not make other orders wait', async () => {
    const slow = new InMemoryOrderStore({ simulateLatency: true, latencyMs: 20 });
    await slow.saveOrder(createTestOrder({ id: 1 }));
    await slow.saveOrder(createTestOrder({ id: 2 }));

    const finished: number[] = [];
    let releaseFirst: () => void = () => undefined;
    const firstHeld = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = slow.withOrderLock(1, async () => {
      await firstHeld;
      finished.push(1);
    });
    await slow.withOrderLock(2, () => {
      finished.push(2);
    });
    releaseFirst();
    await first;

    expect(finished).toEqual([2, 1]);
  });

  it('clears all orders', async () => {
    await store.saveOrder(createTestOrder());
    store.clear();

    await expect(store.findOrder(42)).resolves.toBeNull();
  });
});
