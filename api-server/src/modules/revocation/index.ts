/**
 * Revocation list for signed tokens, keyed by jti. Entries only need to live
 * as long as the token they revoke could still verify.
 */
export interface RevocationStore {
  revoke(jti: string, ttlSeconds: number): Promise<void>;
  isRevoked(jti: string): Promise<boolean>;
}

/**
 * The subset of a node-redis v4 client the revocation list needs.
 */
export interface RedisClientLike {
  exists(key: string): Promise<number>;
  set(key: string, value: string, options?: { EX?: number }): Promise<unknown>;
}

export function createRedisRevocationStore(
  client: RedisClientLike,
  prefix: string,
): RevocationStore {
  return {
    async revoke(jti: string, ttlSeconds: number): Promise<void> {
      // Redis rejects EX 0; an already-expired token still gets a short entry
      // so a concurrent verify in flight sees it.
      const ttl = Math.max(1, Math.ceil(ttlSeconds));
      await client.set(`${prefix}${jti}`, "1", { EX: ttl });
    },

    async isRevoked(jti: string): Promise<boolean> {
      const exists = await client.exists(`${prefix}${jti}`);
      return exists === 1;
    },
  };
}
