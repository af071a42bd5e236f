/**
 * Channel Pool
 * Bounds the number of command channels open at once on one transport
 */

import { logger } from "../utils/logger.js";
import { ConfigError, PoolClosedError } from "../errors.js";
import type { CommandChannel, Transport } from "../ssh/types.js";

/**
 * Default number of concurrent channels. OpenSSH allows 10 sessions per
 * connection (MaxSessions), so the pool stays at or below that.
 */
export const DEFAULT_MAX_SESSIONS = 10;

export interface ChannelPoolOptions {
  maxSessions?: number;
}

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * Counting semaphore over a transport.
 * Only slot bookkeeping is serialized; commands run outside of it.
 */
export class ChannelPool {
  public readonly capacity: number;
  private readonly transport: Transport;
  private readonly leased = new Set<CommandChannel>();
  private readonly waiters: Waiter[] = [];
  private readonly idle: Array<() => void> = [];
  private slots: number;
  private closed = false;

  constructor(transport: Transport, options: ChannelPoolOptions = {}) {
    const capacity = options.maxSessions ?? DEFAULT_MAX_SESSIONS;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ConfigError(`maxSessions must be a positive integer, got ${capacity}`);
    }
    this.transport = transport;
    this.capacity = capacity;
    this.slots = capacity;
  }

  /**
   * Number of leases currently held
   */
  public get outstanding(): number {
    return this.capacity - this.slots;
  }

  public isClosed(): boolean {
    return this.closed;
  }

  /**
   * Wait for a free slot, then open a fresh channel.
   * Rejects with PoolClosedError once the pool is closed.
   */
  public async acquire(): Promise<CommandChannel> {
    await this.takeSlot();

    try {
      const channel = await this.transport.openChannel();
      this.leased.add(channel);
      return channel;
    } catch (error) {
      this.giveSlot();
      throw error;
    }
  }

  /**
   * Close the channel and free its slot. Unknown or already released
   * channels are ignored.
   */
  public release(channel?: CommandChannel | null): void {
    if (!channel || !this.leased.delete(channel)) {
      return;
    }

    try {
      channel.close();
    } catch (error) {
      logger.warn("Failed to close command channel", { error });
    } finally {
      this.giveSlot();
    }
  }

  /**
   * Lease a channel for the duration of `fn`; the lease is released on every
   * exit path.
   */
  public async withChannel<T>(fn: (channel: CommandChannel) => Promise<T>): Promise<T> {
    const channel = await this.acquire();
    try {
      return await fn(channel);
    } finally {
      this.release(channel);
    }
  }

  /**
   * Stop granting leases. Leases already held are left to finish and release
   * normally; callers still waiting for a slot are rejected.
   */
  public close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    logger.debug("Channel pool closed", { outstanding: this.outstanding });

    const pending = this.waiters.splice(0);
    for (const waiter of pending) {
      waiter.reject(new PoolClosedError());
    }
  }

  /**
   * Resolves once no lease is held. Pair with close() to let in-flight
   * commands finish before the transport goes away.
   */
  public drained(): Promise<void> {
    if (this.outstanding === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idle.push(resolve);
    });
  }

  private takeSlot(): Promise<void> {
    if (this.closed) {
      return Promise.reject(new PoolClosedError());
    }
    if (this.slots > 0) {
      this.slots--;
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  private giveSlot(): void {
    const next = this.closed ? undefined : this.waiters.shift();
    if (next) {
      // slot passes straight to the next waiter
      next.resolve();
      return;
    }
    if (this.slots < this.capacity) {
      this.slots++;
    }
    if (this.outstanding === 0) {
      for (const resolve of this.idle.splice(0)) {
        resolve();
      }
    }
  }
}
