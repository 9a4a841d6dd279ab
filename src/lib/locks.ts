// /lib/locks.ts

import { ResourceBusyError } from "../core/errors.js";
import { err, ok, type Result } from "../core/result.js";

/**
 * Proof that the holder owns a market's execution scope. Pool mutations
 * require one so they cannot run outside the lock.
 */
export interface MarketLockGuard {
  readonly marketId: string;
  readonly held: boolean;
}

interface Waiter {
  grant: (guard: LockHandle) => void;
  timer: NodeJS.Timeout;
}

interface LockSlot {
  holder: LockHandle | null;
  waiters: Waiter[];
}

export class LockHandle implements MarketLockGuard {
  private released = false;

  constructor(
    public readonly marketId: string,
    private readonly onRelease: (handle: LockHandle) => void
  ) {}

  get held(): boolean {
    return !this.released;
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.onRelease(this);
  }
}

/**
 * Keyed mutex: one FIFO execution scope per market id. Different markets
 * never contend. Slots are dropped once idle so the map only holds
 * markets with a holder or waiters.
 */
export class MarketLockManager {
  private slots = new Map<string, LockSlot>();

  constructor(private readonly timeoutMs: number) {}

  acquire(marketId: string): Promise<Result<LockHandle, ResourceBusyError>> {
    let slot = this.slots.get(marketId);
    if (slot === undefined) {
      slot = { holder: null, waiters: [] };
      this.slots.set(marketId, slot);
    }

    if (slot.holder === null) {
      const handle = this.newHandle(marketId);
      slot.holder = handle;
      return Promise.resolve(ok(handle));
    }

    const waiting = slot;
    return new Promise((resolve) => {
      const waiter: Waiter = {
        grant: (handle) => resolve(ok(handle)),
        timer: setTimeout(() => {
          const idx = waiting.waiters.indexOf(waiter);
          if (idx >= 0) waiting.waiters.splice(idx, 1);
          resolve(err(new ResourceBusyError(marketId)));
        }, this.timeoutMs),
      };
      waiting.waiters.push(waiter);
    });
  }

  /** Number of markets currently locked or awaited */
  get activeKeys(): number {
    return this.slots.size;
  }

  isLocked(marketId: string): boolean {
    return this.slots.get(marketId)?.holder != null;
  }

  private newHandle(marketId: string): LockHandle {
    return new LockHandle(marketId, (handle) => this.handOff(handle));
  }

  private handOff(handle: LockHandle): void {
    const slot = this.slots.get(handle.marketId);
    if (slot === undefined || slot.holder !== handle) return;

    const next = slot.waiters.shift();
    if (next === undefined) {
      this.slots.delete(handle.marketId);
      return;
    }

    clearTimeout(next.timer);
    const nextHandle = this.newHandle(handle.marketId);
    slot.holder = nextHandle;
    next.grant(nextHandle);
  }
}

/**
 * Execute fn inside the market's exclusive scope. The lock is released on
 * every exit path, including thrown invariant violations.
 */
export async function withMarketLock<T>(
  locks: MarketLockManager,
  marketId: string,
  fn: (guard: MarketLockGuard) => Promise<Result<T>>
): Promise<Result<T>> {
  const acquired = await locks.acquire(marketId);
  if (!acquired.ok) return acquired;

  const handle = acquired.value;
  try {
    return await fn(handle);
  } finally {
    handle.release();
  }
}
