import { LRUCache } from "lru-cache";
import { GenerationJobSchema, type GenerationJob } from "@shared/generationSchema";
import { JobStoreError } from "../utils/errors";
import { createLogger, errorMessage } from "../utils/logger";

const logger = createLogger("JobStore");

export const DEFAULT_JOB_TTL_SECONDS = 60 * 60 * 24;
export const DEFAULT_MAX_RECENT_JOBS = 100;

/**
 * Key-value persistence for generation jobs.
 *
 * `put` always rewrites the whole record; callers read-modify-write and rely
 * on a single owning run per job for consistency.
 */
export interface JobStore {
  put(job: GenerationJob, ttlSeconds?: number): Promise<void>;
  get(jobId: string): Promise<GenerationJob | null>;
  setCancelFlag(jobId: string, ttlSeconds?: number): Promise<void>;
  isCancelled(jobId: string): Promise<boolean>;
  pushRecent(userId: string, jobId: string, maxKept?: number): Promise<void>;
  listRecent(userId: string, offset: number, limit: number): Promise<string[]>;
  /** Returns the job id already bound to the key, or null after binding `jobId`. */
  claimIdempotencyKey(userId: string, key: string, jobId: string, ttlSeconds?: number): Promise<string | null>;
  /** Points the key at `jobId`, replacing a binding whose job has expired. */
  bindIdempotencyKey(userId: string, key: string, jobId: string, ttlSeconds?: number): Promise<void>;
}

export const KEYS = {
  job: (jobId: string) => `generation:job:${jobId}`,
  cancel: (jobId: string) => `generation:cancel:${jobId}`,
  userJobs: (userId: string) => `generation:user_jobs:${userId}`,
  idempotency: (userId: string, key: string) => `generation:idempotency:${userId}:${key}`,
} as const;

export function serializeJob(job: GenerationJob): string {
  return JSON.stringify(job);
}

export function deserializeJob(raw: string, jobId: string): GenerationJob | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    logger.error("Stored job record is not valid JSON", { jobId, error: errorMessage(error) });
    return null;
  }

  const parsed = GenerationJobSchema.safeParse(data);
  if (!parsed.success) {
    logger.error("Stored job record failed validation", {
      jobId,
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
    return null;
  }
  return parsed.data;
}

// ============================================================================
// Redis
// ============================================================================

/** The ioredis commands the store relies on. */
export interface RedisCommands {
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  get(key: string): Promise<string | null>;
  exists(...keys: string[]): Promise<number>;
  set(key: string, value: string, secondsToken: "EX", seconds: number, nx: "NX"): Promise<"OK" | null>;
  lpush(key: string, ...values: string[]): Promise<number>;
  ltrim(key: string, start: number, stop: number): Promise<unknown>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
}

export class RedisJobStore implements JobStore {
  constructor(
    private readonly redis: RedisCommands,
    private readonly defaultTtlSeconds: number = DEFAULT_JOB_TTL_SECONDS
  ) {}

  async put(job: GenerationJob, ttlSeconds: number = this.defaultTtlSeconds): Promise<void> {
    await this.run("put", () => this.redis.setex(KEYS.job(job.id), ttlSeconds, serializeJob(job)));
  }

  async get(jobId: string): Promise<GenerationJob | null> {
    const raw = await this.run("get", () => this.redis.get(KEYS.job(jobId)));
    return raw === null ? null : deserializeJob(raw, jobId);
  }

  async setCancelFlag(jobId: string, ttlSeconds: number = this.defaultTtlSeconds): Promise<void> {
    await this.run("setCancelFlag", () => this.redis.setex(KEYS.cancel(jobId), ttlSeconds, "1"));
  }

  async isCancelled(jobId: string): Promise<boolean> {
    const count = await this.run("isCancelled", () => this.redis.exists(KEYS.cancel(jobId)));
    return count > 0;
  }

  async pushRecent(userId: string, jobId: string, maxKept: number = DEFAULT_MAX_RECENT_JOBS): Promise<void> {
    const key = KEYS.userJobs(userId);
    await this.run("pushRecent", async () => {
      await this.redis.lpush(key, jobId);
      await this.redis.ltrim(key, 0, maxKept - 1);
    });
  }

  async listRecent(userId: string, offset: number, limit: number): Promise<string[]> {
    if (limit <= 0) return [];
    return this.run("listRecent", () => this.redis.lrange(KEYS.userJobs(userId), offset, offset + limit - 1));
  }

  async claimIdempotencyKey(
    userId: string,
    key: string,
    jobId: string,
    ttlSeconds: number = this.defaultTtlSeconds
  ): Promise<string | null> {
    const redisKey = KEYS.idempotency(userId, key);
    // The existing binding can expire between SET NX and GET; claim again once.
    for (let attempt = 0; attempt < 2; attempt++) {
      const result = await this.run("claimIdempotencyKey", () => this.redis.set(redisKey, jobId, "EX", ttlSeconds, "NX"));
      if (result === "OK") return null;
      const existing = await this.run("claimIdempotencyKey", () => this.redis.get(redisKey));
      if (existing !== null) return existing;
    }
    throw new JobStoreError(`Job store claimIdempotencyKey failed: key ${key} keeps expiring`);
  }

  async bindIdempotencyKey(
    userId: string,
    key: string,
    jobId: string,
    ttlSeconds: number = this.defaultTtlSeconds
  ): Promise<void> {
    await this.run("bindIdempotencyKey", () => this.redis.setex(KEYS.idempotency(userId, key), ttlSeconds, jobId));
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      logger.error("Redis operation failed", { operation, error: errorMessage(error) });
      throw new JobStoreError(`Job store ${operation} failed: ${errorMessage(error)}`, error);
    }
  }
}

// ============================================================================
// In-memory
// ============================================================================

export interface MemoryJobStoreOptions {
  defaultTtlSeconds?: number;
  maxEntries?: number;
}

/**
 * Process-local store with the same semantics as the Redis layout. Used when
 * REDIS_URL is not configured and in tests.
 */
export class MemoryJobStore implements JobStore {
  private readonly entries: LRUCache<string, string>;
  private readonly recent = new Map<string, string[]>();
  private readonly defaultTtlSeconds: number;

  constructor(options: MemoryJobStoreOptions = {}) {
    this.defaultTtlSeconds = options.defaultTtlSeconds ?? DEFAULT_JOB_TTL_SECONDS;
    this.entries = new LRUCache<string, string>({
      max: options.maxEntries ?? 10000,
      ttl: this.defaultTtlSeconds * 1000,
    });
  }

  async put(job: GenerationJob, ttlSeconds: number = this.defaultTtlSeconds): Promise<void> {
    this.entries.set(KEYS.job(job.id), serializeJob(job), { ttl: ttlSeconds * 1000 });
  }

  async get(jobId: string): Promise<GenerationJob | null> {
    const raw = this.entries.get(KEYS.job(jobId));
    return raw === undefined ? null : deserializeJob(raw, jobId);
  }

  async setCancelFlag(jobId: string, ttlSeconds: number = this.defaultTtlSeconds): Promise<void> {
    this.entries.set(KEYS.cancel(jobId), "1", { ttl: ttlSeconds * 1000 });
  }

  async isCancelled(jobId: string): Promise<boolean> {
    return this.entries.has(KEYS.cancel(jobId));
  }

  async pushRecent(userId: string, jobId: string, maxKept: number = DEFAULT_MAX_RECENT_JOBS): Promise<void> {
    const ids = [jobId, ...(this.recent.get(userId) ?? [])].slice(0, maxKept);
    this.recent.set(userId, ids);
  }

  async listRecent(userId: string, offset: number, limit: number): Promise<string[]> {
    if (limit <= 0) return [];
    return (this.recent.get(userId) ?? []).slice(offset, offset + limit);
  }

  async claimIdempotencyKey(
    userId: string,
    key: string,
    jobId: string,
    ttlSeconds: number = this.defaultTtlSeconds
  ): Promise<string | null> {
    const storeKey = KEYS.idempotency(userId, key);
    const existing = this.entries.get(storeKey);
    if (existing !== undefined) return existing;
    this.entries.set(storeKey, jobId, { ttl: ttlSeconds * 1000 });
    return null;
  }

  async bindIdempotencyKey(
    userId: string,
    key: string,
    jobId: string,
    ttlSeconds: number = this.defaultTtlSeconds
  ): Promise<void> {
    this.entries.set(KEYS.idempotency(userId, key), jobId, { ttl: ttlSeconds * 1000 });
  }
}
