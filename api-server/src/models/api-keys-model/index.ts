import { Knex } from "knex";

/* Mapped to the api_keys table. `api_key_hash` has a unique index;
 * `user_id` references users(id). */
export interface ApiKey {
  id: string;
  user_id: string;
  api_key_hash: string;
  expires_at: Date;
  created_at: Date;
}

/** What callers ever see of a key: no hash, validity computed on read. */
export interface PublicApiKey {
  id: string;
  userId: string;
  expiresAt: Date;
  createdAt: Date;
  valid: boolean;
}

export const isApiKeyValid = (key: ApiKey, now: Date): boolean =>
  key.expires_at.getTime() > now.getTime();

export const toPublicApiKey = (key: ApiKey, now: Date): PublicApiKey => ({
  id: key.id,
  userId: key.user_id,
  expiresAt: key.expires_at,
  createdAt: key.created_at,
  valid: isApiKeyValid(key, now),
});

export interface ApiKeysStore {
  /** Rejects with a unique violation when the hash already exists */
  create(key: ApiKey): Promise<ApiKey>;
  findById(id: string): Promise<ApiKey | null>;
  findByHash(apiKeyHash: string): Promise<ApiKey | null>;
  listByUser(userId: string): Promise<ApiKey[]>;
  destroy(id: string): Promise<boolean>;
}

export class ApiKeysModel implements ApiKeysStore {
  constructor(private db: Knex) {}

  async create(key: ApiKey): Promise<ApiKey> {
    await this.db<ApiKey>("api_keys").insert(key);
    return key;
  }

  async findById(id: string): Promise<ApiKey | null> {
    const key: ApiKey | undefined = await this.db<ApiKey>("api_keys")
      .where({ id })
      .first();
    return key || null;
  }

  async findByHash(apiKeyHash: string): Promise<ApiKey | null> {
    const key: ApiKey | undefined = await this.db<ApiKey>("api_keys")
      .where({ api_key_hash: apiKeyHash })
      .first();
    return key || null;
  }

  async listByUser(userId: string): Promise<ApiKey[]> {
    return this.db<ApiKey>("api_keys")
      .where({ user_id: userId })
      .orderBy("created_at", "desc");
  }

  async destroy(id: string): Promise<boolean> {
    const deleted = await this.db<ApiKey>("api_keys").where({ id }).del();
    return deleted > 0;
  }
}
