// ---------------------------------------------------------------------------
// Shared mock DB for service and route tests
// ---------------------------------------------------------------------------
// Simulates the slice of Drizzle's query builder the moderation service uses.
// ---------------------------------------------------------------------------

import { vi } from 'vitest'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type MockFn = ReturnType<typeof vi.fn>

export interface DbChain {
  values: MockFn
  set: MockFn
  from: MockFn
  where: MockFn
  groupBy: MockFn
  orderBy: MockFn
  limit: MockFn
  returning: MockFn
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create a chainable mock of Drizzle's query builder.
 *
 * `values`, `set` and `from` return the chain. `where`, `groupBy`, `orderBy`,
 * `limit` and `returning` return a thenable that still exposes the chain, so
 * both `await db.select().from(t).where(c)` and
 * `await db.update(t).set(v).where(c).returning()` resolve.
 *
 * @param terminalResult - The value that awaiting the chain resolves to.
 */
export function createChainableProxy(terminalResult: unknown = []): DbChain {
  const chain: DbChain = {
    values: vi.fn(),
    set: vi.fn(),
    from: vi.fn(),
    where: vi.fn(),
    groupBy: vi.fn(),
    orderBy: vi.fn(),
    limit: vi.fn(),
    returning: vi.fn(),
  }

  // Spread the chain's methods so per-test overrides keep working after a terminal call
  const makeThenable = () => ({
    ...chain,
    then: (resolve: (val: unknown) => void, reject?: (err: unknown) => void) =>
      Promise.resolve(terminalResult).then(resolve, reject),
  })

  for (const m of ['values', 'set', 'from'] as const) {
    chain[m].mockImplementation(() => chain)
  }
  for (const m of ['where', 'groupBy', 'orderBy', 'limit', 'returning'] as const) {
    chain[m].mockImplementation(() => makeThenable())
  }

  return chain
}

// ---------------------------------------------------------------------------
// Mock DB instance
// ---------------------------------------------------------------------------

export interface MockDb {
  insert: MockFn
  select: MockFn
  update: MockFn
  transaction: MockFn
  execute: MockFn
}

export function createMockDb(): MockDb {
  return {
    insert: vi.fn(),
    select: vi.fn(),
    update: vi.fn(),
    transaction: vi.fn(),
    execute: vi.fn(),
  }
}

/**
 * Reset all mock DB chains to fresh state. Call this in beforeEach.
 * Transactions run their callback against the same mock.
 */
export function resetDbMocks(mockDb: MockDb): {
  selectChain: DbChain
  insertChain: DbChain
  updateChain: DbChain
} {
  const selectChain = createChainableProxy([])
  const insertChain = createChainableProxy()
  const updateChain = createChainableProxy([])
  mockDb.insert.mockReturnValue(insertChain)
  mockDb.select.mockReturnValue(selectChain)
  mockDb.update.mockReturnValue(updateChain)
  mockDb.transaction.mockImplementation(async (fn: (tx: MockDb) => Promise<unknown>) => {
    return await fn(mockDb)
  })
  mockDb.execute.mockReset()
  return { selectChain, insertChain, updateChain }
}
