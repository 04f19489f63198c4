import { vi } from 'vitest';
import type { Mock } from 'vitest';

type ChainMethod = Mock<(...args: unknown[]) => DrizzleQueryMock>;

/**
 * One chain shared by every query. Each `await` on it settles with the next
 * queued result, so a test lists results in the order the code awaits them.
 */
export interface DrizzleQueryMock extends PromiseLike<unknown> {
  from: ChainMethod;
  where: ChainMethod;
  orderBy: ChainMethod;
  groupBy: ChainMethod;
  limit: ChainMethod;
  offset: ChainMethod;
  values: ChainMethod;
  set: ChainMethod;
  onConflictDoNothing: ChainMethod;
  onConflictDoUpdate: ChainMethod;
  returning: ChainMethod;
}

export interface DrizzleMock {
  select: ChainMethod;
  insert: ChainMethod;
  update: ChainMethod;
  delete: ChainMethod;
  execute: ChainMethod;
  /** Runs the callback against this same mock */
  transaction: Mock<
    (callback: (tx: DrizzleMock) => Promise<unknown>) => Promise<unknown>
  >;
  query: DrizzleQueryMock;
  queueResult(...results: unknown[]): DrizzleMock;
  queueError(error: unknown): DrizzleMock;
  /** Results queued but never awaited */
  pendingResults(): number;
}

type Settlement = { ok: true; value: unknown } | { ok: false; error: unknown };

/**
 * Chainable stand-in for the Drizzle client. The root object is not
 * thenable, so it can be handed to Nest as a `useValue` provider.
 * An await with nothing queued resolves to an empty row list.
 */
export function createDrizzleMock(): DrizzleMock {
  const settlements: Settlement[] = [];

  const link = (): ChainMethod =>
    vi.fn<(...args: unknown[]) => DrizzleQueryMock>(() => query);

  const query: DrizzleQueryMock = {
    from: link(),
    where: link(),
    orderBy: link(),
    groupBy: link(),
    limit: link(),
    offset: link(),
    values: link(),
    set: link(),
    onConflictDoNothing: link(),
    onConflictDoUpdate: link(),
    returning: link(),
    then<TResult1 = unknown, TResult2 = never>(
      onFulfilled?:
        | ((value: unknown) => TResult1 | PromiseLike<TResult1>)
        | null,
      onRejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
    ): PromiseLike<TResult1 | TResult2> {
      const next: Settlement = settlements.shift() ?? { ok: true, value: [] };
      const settled = next.ok
        ? Promise.resolve(next.value)
        : Promise.reject(next.error);
      return settled.then(onFulfilled, onRejected);
    },
  };

  const db: DrizzleMock = {
    select: link(),
    insert: link(),
    update: link(),
    delete: link(),
    execute: link(),
    transaction: vi.fn(
      (callback: (tx: DrizzleMock) => Promise<unknown>) => callback(db),
    ),
    query,
    queueResult(...results) {
      for (const value of results) {
        settlements.push({ ok: true, value });
      }
      return db;
    },
    queueError(error) {
      settlements.push({ ok: false, error });
      return db;
    },
    pendingResults() {
      return settlements.length;
    },
  };

  return db;
}
