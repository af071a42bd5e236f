import { describe, it, expect } from "vitest";
import { ChannelPool, DEFAULT_MAX_SESSIONS } from "../src/pool/channel-pool.js";
import { runCommand } from "../src/runner/command-runner.js";
import { ConfigError, PoolClosedError, TransportError } from "../src/errors.js";
import { FakeHost } from "./helpers/fake-host.js";

const tick = (ms = 10) => new Promise((resolve) => setTimeout(resolve, ms));

describe("ChannelPool", () => {
  it("defaults to ten sessions", () => {
    const pool = new ChannelPool(new FakeHost());
    expect(pool.capacity).toBe(DEFAULT_MAX_SESSIONS);
    expect(pool.capacity).toBe(10);
  });

  it("rejects a capacity below one", () => {
    expect(() => new ChannelPool(new FakeHost(), { maxSessions: 0 })).toThrow(ConfigError);
    expect(() => new ChannelPool(new FakeHost(), { maxSessions: 1.5 })).toThrow(ConfigError);
  });

  it("holds a second acquire until the first lease is released", async () => {
    const host = new FakeHost();
    const pool = new ChannelPool(host, { maxSessions: 1 });

    const first = await pool.acquire();
    let granted = false;
    const second = pool.acquire().then((channel) => {
      granted = true;
      return channel;
    });

    await tick();
    expect(granted).toBe(false);
    expect(pool.outstanding).toBe(1);

    pool.release(first);
    const channel = await second;
    expect(granted).toBe(true);
    expect(pool.outstanding).toBe(1);

    pool.release(channel);
    expect(pool.outstanding).toBe(0);
    expect(host.openChannels).toBe(0);
  });

  it("never has more channels open than its capacity", async () => {
    const host = new FakeHost({ execDelayMs: 5 });
    const pool = new ChannelPool(host, { maxSessions: 3 });

    const results = await Promise.all(
      Array.from({ length: 10 }, () =>
        pool.withChannel(async (channel) => {
          expect(pool.outstanding).toBeLessThanOrEqual(3);
          const output = await runCommand(channel, "stat -c %a /tmp");
          return output.stdout.toString();
        })
      )
    );

    expect(results).toEqual(Array.from({ length: 10 }, () => "1777\n"));
    expect(host.maxOpenChannels).toBe(3);
    expect(host.channelsOpened).toBe(10);
    expect(pool.outstanding).toBe(0);
  });

  it("serves waiters in arrival order", async () => {
    const pool = new ChannelPool(new FakeHost(), { maxSessions: 1 });
    const order: number[] = [];

    const first = await pool.acquire();
    const waiting = [1, 2, 3].map((n) =>
      pool.acquire().then((channel) => {
        order.push(n);
        pool.release(channel);
      })
    );

    pool.release(first);
    await Promise.all(waiting);
    expect(order).toEqual([1, 2, 3]);
  });

  it("ignores a second release of the same channel", async () => {
    const host = new FakeHost();
    const pool = new ChannelPool(host, { maxSessions: 2 });

    const channel = await pool.acquire();
    pool.release(channel);
    pool.release(channel);
    pool.release(null);
    pool.release(undefined);

    expect(pool.outstanding).toBe(0);
    expect(host.openChannels).toBe(0);

    const a = await pool.acquire();
    const b = await pool.acquire();
    let third = false;
    void pool.acquire().then((c) => {
      third = true;
      pool.release(c);
    });
    await tick();
    expect(third).toBe(false);

    pool.release(a);
    pool.release(b);
    await tick();
    expect(third).toBe(true);
  });

  it("releases the lease when the scoped callback throws", async () => {
    const host = new FakeHost();
    const pool = new ChannelPool(host, { maxSessions: 1 });

    await expect(
      pool.withChannel(async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(pool.outstanding).toBe(0);
    expect(host.openChannels).toBe(0);
  });

  it("gives the slot back when the channel cannot be opened", async () => {
    const host = new FakeHost();
    host.failOpens = 1;
    const pool = new ChannelPool(host, { maxSessions: 1 });

    await expect(pool.acquire()).rejects.toBeInstanceOf(TransportError);
    expect(pool.outstanding).toBe(0);

    const channel = await pool.acquire();
    expect(pool.outstanding).toBe(1);
    pool.release(channel);
  });

  it("reports drained once the last lease is released", async () => {
    const pool = new ChannelPool(new FakeHost(), { maxSessions: 2 });
    await pool.drained();

    const a = await pool.acquire();
    const b = await pool.acquire();
    let drained = false;
    const done = pool.drained().then(() => {
      drained = true;
    });

    pool.close();
    pool.release(a);
    await tick();
    expect(drained).toBe(false);

    pool.release(b);
    await done;
    expect(drained).toBe(true);
  });

  it("refuses new leases once closed but lets held ones finish", async () => {
    const host = new FakeHost();
    const pool = new ChannelPool(host, { maxSessions: 1 });

    const held = await pool.acquire();
    const waiter = pool.acquire();

    pool.close();
    pool.close();

    expect(pool.isClosed()).toBe(true);
    await expect(waiter).rejects.toBeInstanceOf(PoolClosedError);
    await expect(pool.acquire()).rejects.toBeInstanceOf(PoolClosedError);

    const output = await runCommand(held, "stat -c %u /tmp");
    expect(output.stdout.toString()).toBe("0\n");

    pool.release(held);
    expect(pool.outstanding).toBe(0);
    expect(host.openChannels).toBe(0);
  });
});
