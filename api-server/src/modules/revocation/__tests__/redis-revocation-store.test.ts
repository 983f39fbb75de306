import { createRedisRevocationStore, RedisClientLike } from "..";

// Stands in for the node-redis client: a map of keys to values and ttls.
class FakeRedis implements RedisClientLike {
  readonly keys = new Map<string, { value: string; ex?: number }>();

  async exists(key: string): Promise<number> {
    return this.keys.has(key) ? 1 : 0;
  }

  async set(key: string, value: string, options?: { EX?: number }): Promise<unknown> {
    this.keys.set(key, { value, ex: options?.EX });
    return "OK";
  }
}

describe("createRedisRevocationStore", () => {
  it("stores the jti under the prefix with the remaining lifetime as ttl", async () => {
    const redis = new FakeRedis();
    const store = createRedisRevocationStore(redis, "token_revoked:");

    await store.revoke("jti-1", 1799.2);

    expect(redis.keys.get("token_revoked:jti-1")).toEqual({ value: "1", ex: 1800 });
    expect(await store.isRevoked("jti-1")).toBe(true);
    expect(await store.isRevoked("jti-2")).toBe(false);
  });

  it("never asks redis for a ttl below one second", async () => {
    const redis = new FakeRedis();
    const store = createRedisRevocationStore(redis, "token_revoked:");

    await store.revoke("jti-1", 0.2);

    expect(redis.keys.get("token_revoked:jti-1")?.ex).toBe(1);
  });
});
