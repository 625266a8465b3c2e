/**
 * Resource Arbiter
 *
 * Per-device async locks shared by capture operations and the preview feed.
 * - Capture/sequence work calls withExclusive() and waits (FIFO per device).
 * - The preview feed calls tryExclusive(), which never waits and gives way
 *   when a device is held or has a queued waiter, so capture wins every tie.
 * - Multi-device acquisitions take locks in one global order (natural
 *   ascending key order), so two overlapping requests cannot deadlock.
 */

import type { CameraId } from "@visionrig/types";
import { deviceLogger } from "./logger";
import type { DeviceKey } from "./types";

export const LIGHT_KEY: DeviceKey = "light";

export function cameraKey(id: CameraId): DeviceKey {
  return `camera:${id}`;
}

export interface LockContext {
  operation: string;
  /** Abandon the wait (locks already taken are released) */
  signal?: AbortSignal;
}

export type TryExclusiveResult<T> =
  | { acquired: true; value: T }
  | { acquired: false; busy: DeviceKey[] };

export interface LockStatus {
  key: DeviceKey;
  held: boolean;
  holder: string | null;
  waiting: number;
}

interface Waiter {
  operation: string;
  grant: () => void;
}

const keyCollator = new Intl.Collator("en", { numeric: true });

/**
 * Deduplicate and sort keys into the global acquisition order
 */
export function orderKeys(keys: readonly DeviceKey[]): DeviceKey[] {
  return [...new Set(keys)].sort(keyCollator.compare);
}

class DeviceLock {
  private held = false;
  private holder: string | null = null;
  private waiters: Waiter[] = [];

  constructor(readonly key: DeviceKey) {}

  isHeld(): boolean {
    return this.held;
  }

  isFree(): boolean {
    return !this.held && this.waiters.length === 0;
  }

  status(): LockStatus {
    return {
      key: this.key,
      held: this.held,
      holder: this.holder,
      waiting: this.waiters.length,
    };
  }

  tryAcquire(operation: string): boolean {
    if (!this.isFree()) {
      return false;
    }
    this.held = true;
    this.holder = operation;
    return true;
  }

  acquire(context: LockContext): Promise<void> {
    if (context.signal?.aborted) {
      return Promise.reject(abortReason(context.signal));
    }

    if (this.tryAcquire(context.operation)) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const signal = context.signal;

      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        reject(signal ? abortReason(signal) : new Error("Lock wait aborted"));
      };

      const waiter: Waiter = {
        operation: context.operation,
        grant: () => {
          signal?.removeEventListener("abort", onAbort);
          this.holder = context.operation;
          resolve();
        },
      };

      this.waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Hand over without ever marking the lock free
      next.grant();
      return;
    }
    this.held = false;
    this.holder = null;
  }
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error
    ? signal.reason
    : new Error("Lock wait aborted");
}

export class ResourceArbiter {
  private locks = new Map<DeviceKey, DeviceLock>();

  private lockFor(key: DeviceKey): DeviceLock {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new DeviceLock(key);
      this.locks.set(key, lock);
    }
    return lock;
  }

  /**
   * Acquire every key (waiting as needed), run the operation, release all
   */
  async withExclusive<T>(
    keys: readonly DeviceKey[],
    operation: () => Promise<T>,
    context: LockContext,
  ): Promise<T> {
    const ordered = orderKeys(keys);
    const acquired: DeviceLock[] = [];

    try {
      for (const key of ordered) {
        const lock = this.lockFor(key);
        await lock.acquire(context);
        acquired.push(lock);
      }

      deviceLogger.debug("Arbiter: Locks acquired", {
        keys: ordered,
        operation: context.operation,
      });

      return await operation();
    } finally {
      this.releaseAll(acquired);
      if (acquired.length > 0) {
        deviceLogger.debug("Arbiter: Locks released", {
          keys: acquired.map((lock) => lock.key),
          operation: context.operation,
        });
      }
    }
  }

  /**
   * Run the operation only if every key is free right now
   */
  async tryExclusive<T>(
    keys: readonly DeviceKey[],
    operation: () => Promise<T>,
    context: { operation: string },
  ): Promise<TryExclusiveResult<T>> {
    const ordered = orderKeys(keys);
    const locks = ordered.map((key) => this.lockFor(key));
    const busy = locks.filter((lock) => !lock.isFree()).map((lock) => lock.key);

    if (busy.length > 0) {
      return { acquired: false, busy };
    }

    // All free: take them synchronously, nothing can interleave
    for (const lock of locks) {
      lock.tryAcquire(context.operation);
    }

    try {
      const value = await operation();
      return { acquired: true, value };
    } finally {
      this.releaseAll(locks);
    }
  }

  isLocked(key: DeviceKey): boolean {
    return this.locks.get(key)?.isHeld() ?? false;
  }

  getLockStatus(): LockStatus[] {
    return orderKeys([...this.locks.keys()]).map((key) =>
      this.lockFor(key).status(),
    );
  }

  private releaseAll(locks: DeviceLock[]): void {
    for (const lock of [...locks].reverse()) {
      lock.release();
    }
  }
}
