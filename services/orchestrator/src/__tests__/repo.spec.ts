import { describe, it, expect, afterAll } from "vitest";
import MemoryRepo from "../repo/memoryRepo";
import RedisRepo from "../repo/redisRepo";
import RedisCoordinationStore from "../coordination/redisStore";
import type { RunRepository } from "../repo/types";
import type { Run } from "../types";

function newRun(id: string): Run {
  return {
    id,
    threadId: "thread-1",
    projectId: "project-1",
    status: "running",
    startedAt: new Date().toISOString(),
    transcript: []
  };
}

function repositoryContract(name: string, make: () => RunRepository, runId: string) {
  describe(name, () => {
    it("createRun/getRun roundtrip and monotonic completion", async () => {
      const repo = make();
      const run = newRun(runId);

      await repo.createRun(run);
      const got = await repo.getRun(run.id);
      expect(got).not.toBeNull();
      expect(got?.id).toBe(run.id);
      expect(got?.status).toBe("running");

      const first = await repo.completeRun(run.id, {
        status: "stopped",
        completedAt: "2024-01-01T00:02:00.000Z",
        transcript: [{ type: "content", content: "partial" }]
      });
      expect(first).toBe("updated");

      // a late completion must not overwrite the terminal status
      const second = await repo.completeRun(run.id, {
        status: "completed",
        completedAt: "2024-01-01T00:03:00.000Z"
      });
      expect(second).toBe("already-terminal");

      const final = await repo.getRun(run.id);
      expect(final?.status).toBe("stopped");
      expect(final?.completedAt).toBe("2024-01-01T00:02:00.000Z");
      expect(final?.transcript).toEqual([{ type: "content", content: "partial" }]);
    });

    it("lets exactly one of two racing completions through", async () => {
      const repo = make();
      const run = newRun(`${runId}-race`);
      await repo.createRun(run);

      const results = await Promise.all([
        repo.completeRun(run.id, { status: "stopped", completedAt: "2024-01-01T00:02:00.000Z" }),
        repo.completeRun(run.id, { status: "completed", completedAt: "2024-01-01T00:03:00.000Z" })
      ]);

      expect([...results].sort()).toEqual(["already-terminal", "updated"]);
      const final = await repo.getRun(run.id);
      const winner = results[0] === "updated" ? "stopped" : "completed";
      expect(final?.status).toBe(winner);
    });

    it("reports unknown runs", async () => {
      const repo = make();
      expect(await repo.getRun(`${runId}-missing`)).toBeNull();
      expect(await repo.completeRun(`${runId}-missing`, { status: "failed", completedAt: "2024-01-01T00:00:00.000Z" })).toBe(
        "not-found"
      );
    });
  });
}

repositoryContract("MemoryRepo", () => new MemoryRepo(), "mem-test-run-1");

it("MemoryRepo returns copies, not live records", async () => {
  const repo = new MemoryRepo();
  await repo.createRun(newRun("mem-copy"));
  const got = await repo.getRun("mem-copy");
  got?.transcript.push({ type: "content", content: "local edit" });
  expect((await repo.getRun("mem-copy"))?.transcript).toEqual([]);
});

const redisUrl = process.env.REDIS_URL?.trim() ?? "";

if (redisUrl !== "") {
  const repos: RedisRepo[] = [];
  const suffix = Date.now().toString(36);

  repositoryContract(
    "RedisRepo (requires REDIS_URL)",
    () => {
      const repo = new RedisRepo(redisUrl);
      repos.push(repo);
      return repo;
    },
    `redis-test-run-${suffix}`
  );

  describe("RedisCoordinationStore (requires REDIS_URL)", () => {
    const store = new RedisCoordinationStore(redisUrl);

    it("locks, appends and delivers pub/sub messages", async () => {
      const lock = `run:store-${suffix}:lock`;
      expect(await store.setIfAbsent(lock, "inst-a", 30)).toBe(true);
      expect(await store.setIfAbsent(lock, "inst-b", 30)).toBe(false);
      expect(await store.get(lock)).toBe("inst-a");

      const list = `run:store-${suffix}:transcript`;
      await store.append(list, "a");
      await store.append(list, "b");
      expect(await store.range(list, 0, -1)).toEqual(["a", "b"]);

      const sub = await store.subscribe([`run:store-${suffix}:notify`]);
      await store.publish(`run:store-${suffix}:notify`, "new");
      expect(await sub.next(2000)).toEqual({ channel: `run:store-${suffix}:notify`, message: "new" });
      await sub.close();

      await store.delete(lock);
      await store.delete(list);
    });

    afterAll(async () => {
      await store.close();
      await Promise.all(repos.map((r) => r.close()));
    });
  });
}
