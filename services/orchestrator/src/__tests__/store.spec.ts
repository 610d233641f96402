import { describe, it, expect } from "vitest";
import MemoryCoordinationStore from "../coordination/memoryStore";
import { settlesWithin, withRetry } from "../coordination/retry";
import { DurableWriteError } from "../errors";

describe("MemoryCoordinationStore", () => {
  it("sets a key only when absent and honours TTLs", async () => {
    let now = 0;
    const store = new MemoryCoordinationStore(() => now);

    expect(await store.setIfAbsent("run:r1:lock", "inst-a", 10)).toBe(true);
    expect(await store.setIfAbsent("run:r1:lock", "inst-b", 10)).toBe(false);
    expect(await store.get("run:r1:lock")).toBe("inst-a");
    expect(store.ttl("run:r1:lock")).toBe(10);

    now = 10_000;
    expect(await store.get("run:r1:lock")).toBeNull();
    expect(await store.setIfAbsent("run:r1:lock", "inst-b", 10)).toBe(true);
    expect(await store.get("run:r1:lock")).toBe("inst-b");
  });

  it("extends TTLs only for live keys", async () => {
    let now = 0;
    const store = new MemoryCoordinationStore(() => now);
    await store.set("k", "v", 5);

    now = 4_000;
    expect(await store.expire("k", 5)).toBe(true);
    now = 8_000;
    expect(await store.get("k")).toBe("v");
    expect(await store.expire("missing", 5)).toBe(false);
  });

  it("appends to lists and reads inclusive ranges", async () => {
    const store = new MemoryCoordinationStore();
    expect(await store.append("list", "a")).toBe(1);
    await store.append("list", "b");
    await store.append("list", "c");

    expect(await store.range("list", 0, -1)).toEqual(["a", "b", "c"]);
    expect(await store.range("list", 1, 1)).toEqual(["b"]);
    expect(await store.range("list", -2, -1)).toEqual(["b", "c"]);
    expect(await store.range("list", 5, -1)).toEqual([]);
    expect(store.ttl("list")).toBe(-1);
    expect(store.ttl("nothing")).toBe(-2);
  });

  it("delivers published messages to subscribers and times out when idle", async () => {
    const store = new MemoryCoordinationStore();
    const sub = await store.subscribe(["a", "b"]);

    await store.publish("b", "hello");
    await store.publish("c", "ignored");

    expect(await sub.next(10)).toEqual({ channel: "b", message: "hello" });
    expect(await sub.next(10)).toBeNull();

    const pending = sub.next(1000);
    await sub.close();
    expect(await pending).toBeNull();

    await store.publish("a", "after close");
    expect(await sub.next(10)).toBeNull();
  });
});

describe("retry helpers", () => {
  it("retries until the operation succeeds", async () => {
    let attempts = 0;
    const result = await withRetry(
      "flaky write",
      async () => {
        attempts++;
        if (attempts < 3) throw new Error("connection reset");
        return "ok";
      },
      { attempts: 3, baseDelayMs: 1 }
    );

    expect(result).toBe("ok");
    expect(attempts).toBe(3);
  });

  it("throws DurableWriteError once attempts run out", async () => {
    const failing = withRetry(
      "transcript append",
      async () => {
        throw new Error("connection reset");
      },
      { attempts: 2, baseDelayMs: 1 }
    );

    await expect(failing).rejects.toBeInstanceOf(DurableWriteError);
    await expect(failing).rejects.toThrow("transcript append failed after 2 attempts");
  });

  it("reports whether a promise settles in time", async () => {
    expect(await settlesWithin(Promise.resolve(), 50)).toBe(true);
    expect(await settlesWithin(new Promise<void>(() => undefined), 10)).toBe(false);
  });
});
