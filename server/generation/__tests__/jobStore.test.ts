import { describe, it, expect, beforeEach } from "vitest";
import type { GenerationJob } from "@shared/generationSchema";
import { JobStoreError } from "../../utils/errors";
import { KEYS, MemoryJobStore, RedisJobStore, deserializeJob, serializeJob, type RedisCommands } from "../jobStore";
import { makeRequest } from "./helpers";

function makeJob(id: string, overrides: Partial<GenerationJob> = {}): GenerationJob {
  return {
    id,
    userId: "user-1",
    status: "pending",
    request: makeRequest(),
    numCardsGenerated: 0,
    cards: [],
    errorMessage: null,
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-01T00:00:00.000Z",
    startedAt: null,
    completedAt: null,
    metadata: {},
    ...overrides,
  };
}

/** Map-backed stand-in for the ioredis commands the store uses. */
class FakeRedis implements RedisCommands {
  readonly values = new Map<string, string>();
  readonly ttls = new Map<string, number>();
  readonly lists = new Map<string, string[]>();
  failWith: Error | null = null;
  /** Drops the conflicting key on the next failed SET NX, as if it expired right after. */
  expireNextConflict = false;

  async setex(key: string, seconds: number, value: string): Promise<"OK"> {
    this.check();
    this.values.set(key, value);
    this.ttls.set(key, seconds);
    return "OK";
  }

  async get(key: string): Promise<string | null> {
    this.check();
    return this.values.get(key) ?? null;
  }

  async exists(...keys: string[]): Promise<number> {
    this.check();
    return keys.filter((key) => this.values.has(key)).length;
  }

  async set(key: string, value: string, _ex: "EX", seconds: number, _nx: "NX"): Promise<"OK" | null> {
    this.check();
    if (this.values.has(key)) {
      if (this.expireNextConflict) {
        this.expireNextConflict = false;
        this.values.delete(key);
      }
      return null;
    }
    this.values.set(key, value);
    this.ttls.set(key, seconds);
    return "OK";
  }

  async lpush(key: string, ...values: string[]): Promise<number> {
    this.check();
    const list = this.lists.get(key) ?? [];
    list.unshift(...values.reverse());
    this.lists.set(key, list);
    return list.length;
  }

  async ltrim(key: string, start: number, stop: number): Promise<"OK"> {
    this.check();
    this.lists.set(key, (this.lists.get(key) ?? []).slice(start, stop + 1));
    return "OK";
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    this.check();
    return (this.lists.get(key) ?? []).slice(start, stop + 1);
  }

  private check(): void {
    if (this.failWith) throw this.failWith;
  }
}

describe("deserializeJob", () => {
  it("should round-trip a valid record", () => {
    const job = makeJob("job-1");
    expect(deserializeJob(serializeJob(job), "job-1")).toEqual(job);
  });

  it("should treat corrupt records as missing", () => {
    expect(deserializeJob("{not json", "job-1")).toBeNull();
    expect(deserializeJob(JSON.stringify({ id: "job-1", status: "exploded" }), "job-1")).toBeNull();
  });
});

describe("MemoryJobStore", () => {
  let store: MemoryJobStore;

  beforeEach(() => {
    store = new MemoryJobStore();
  });

  it("should store and overwrite whole records", async () => {
    await store.put(makeJob("job-1"));
    await store.put(makeJob("job-1", { status: "running" }));

    expect((await store.get("job-1"))?.status).toBe("running");
    expect(await store.get("missing")).toBeNull();
  });

  it("should keep cancel flags per job", async () => {
    await store.setCancelFlag("job-1");

    expect(await store.isCancelled("job-1")).toBe(true);
    expect(await store.isCancelled("job-2")).toBe(false);
  });

  it("should list recent jobs newest first and trim the list", async () => {
    for (const id of ["a", "b", "c", "d"]) {
      await store.pushRecent("user-1", id, 3);
    }

    expect(await store.listRecent("user-1", 0, 10)).toEqual(["d", "c", "b"]);
    expect(await store.listRecent("user-1", 1, 1)).toEqual(["c"]);
    expect(await store.listRecent("user-2", 0, 10)).toEqual([]);
  });

  it("should bind an idempotency key once", async () => {
    expect(await store.claimIdempotencyKey("user-1", "key-1", "job-1")).toBeNull();
    expect(await store.claimIdempotencyKey("user-1", "key-1", "job-2")).toBe("job-1");
    expect(await store.claimIdempotencyKey("user-2", "key-1", "job-3")).toBeNull();
  });

  it("should rebind an idempotency key to a replacement job", async () => {
    await store.claimIdempotencyKey("user-1", "key-1", "job-1");
    await store.bindIdempotencyKey("user-1", "key-1", "job-2");

    expect(await store.claimIdempotencyKey("user-1", "key-1", "job-3")).toBe("job-2");
  });
});

describe("RedisJobStore", () => {
  let redis: FakeRedis;
  let store: RedisJobStore;

  beforeEach(() => {
    redis = new FakeRedis();
    store = new RedisJobStore(redis, 600);
  });

  it("should write jobs under the job key with the TTL", async () => {
    const job = makeJob("job-1");
    await store.put(job);

    expect(redis.values.get(KEYS.job("job-1"))).toBe(serializeJob(job));
    expect(redis.ttls.get("generation:job:job-1")).toBe(600);
    expect(await store.get("job-1")).toEqual(job);
  });

  it("should set the cancel flag with the job TTL", async () => {
    await store.setCancelFlag("job-1");

    expect(redis.values.get("generation:cancel:job-1")).toBe("1");
    expect(redis.ttls.get("generation:cancel:job-1")).toBe(600);
    expect(await store.isCancelled("job-1")).toBe(true);
  });

  it("should keep the recent list trimmed", async () => {
    for (const id of ["a", "b", "c"]) {
      await store.pushRecent("user-1", id, 2);
    }

    expect(redis.lists.get("generation:user_jobs:user-1")).toEqual(["c", "b"]);
    expect(await store.listRecent("user-1", 0, 20)).toEqual(["c", "b"]);
  });

  it("should return the bound job id for a reused idempotency key", async () => {
    expect(await store.claimIdempotencyKey("user-1", "key-1", "job-1")).toBeNull();
    expect(await store.claimIdempotencyKey("user-1", "key-1", "job-2")).toBe("job-1");
    expect(redis.values.get("generation:idempotency:user-1:key-1")).toBe("job-1");
  });

  it("should claim the key when the existing binding expires mid-claim", async () => {
    await store.claimIdempotencyKey("user-1", "key-1", "job-1");
    redis.expireNextConflict = true;

    expect(await store.claimIdempotencyKey("user-1", "key-1", "job-2")).toBeNull();
    expect(redis.values.get("generation:idempotency:user-1:key-1")).toBe("job-2");
  });

  it("should rebind an idempotency key with the job TTL", async () => {
    await store.bindIdempotencyKey("user-1", "key-1", "job-2");

    expect(redis.values.get("generation:idempotency:user-1:key-1")).toBe("job-2");
    expect(redis.ttls.get("generation:idempotency:user-1:key-1")).toBe(600);
  });

  it("should wrap Redis failures", async () => {
    redis.failWith = new Error("connection reset");

    await expect(store.get("job-1")).rejects.toBeInstanceOf(JobStoreError);
    await expect(store.get("job-1")).rejects.toThrow("Job store get failed: connection reset");
  });
});
