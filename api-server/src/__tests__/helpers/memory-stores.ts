import { ApiKey, ApiKeysStore } from '../../models/api-keys-model';
import { TokenRecord, TokensStore } from '../../models/tokens-model';
import { User, UserPatch, UsersStore } from '../../models/users-model';
import { RevocationStore } from '../../modules/revocation';

// What pg rejects with when a unique index is hit
export function uniqueViolation(constraint: string): Error & { code: string; constraint: string } {
  return Object.assign(new Error(`duplicate key value violates unique constraint "${constraint}"`), {
    code: '23505',
    constraint,
  });
}

// Stores hand out copies, like rows read back from a database.
const copy = <T extends object>(row: T): T => ({ ...row });

export class MemoryApiKeysStore implements ApiKeysStore {
  readonly rows = new Map<string, ApiKey>();

  async create(key: ApiKey): Promise<ApiKey> {
    for (const row of this.rows.values()) {
      if (row.api_key_hash === key.api_key_hash) {
        throw uniqueViolation('api_keys_api_key_hash_index');
      }
    }
    this.rows.set(key.id, copy(key));
    return copy(key);
  }

  async findById(id: string): Promise<ApiKey | null> {
    const row = this.rows.get(id);
    return row ? copy(row) : null;
  }

  async findByHash(apiKeyHash: string): Promise<ApiKey | null> {
    for (const row of this.rows.values()) {
      if (row.api_key_hash === apiKeyHash) return copy(row);
    }
    return null;
  }

  async listByUser(userId: string): Promise<ApiKey[]> {
    return [...this.rows.values()].filter((row) => row.user_id === userId).map(copy);
  }

  async destroy(id: string): Promise<boolean> {
    return this.rows.delete(id);
  }

  /** Moves a key's expiry, as an operator editing the row would. */
  setExpiresAt(id: string, expiresAt: Date): void {
    const row = this.rows.get(id);
    if (!row) throw new Error(`no api key ${id}`);
    row.expires_at = expiresAt;
  }
}

export class MemoryTokensStore implements TokensStore {
  readonly rows = new Map<string, TokenRecord>();

  async create(token: TokenRecord): Promise<TokenRecord> {
    if (this.rows.has(token.jti)) {
      throw uniqueViolation('tokens_jti_index');
    }
    this.rows.set(token.jti, copy(token));
    return copy(token);
  }

  async findByJti(jti: string): Promise<TokenRecord | null> {
    const row = this.rows.get(jti);
    return row ? copy(row) : null;
  }

  async deleteByJti(jti: string): Promise<boolean> {
    return this.rows.delete(jti);
  }

  async listBySubject(subject: string): Promise<TokenRecord[]> {
    return [...this.rows.values()].filter((row) => row.subject === subject).map(copy);
  }

  async deleteBySubject(subject: string): Promise<number> {
    let deleted = 0;
    for (const [jti, row] of this.rows) {
      if (row.subject === subject) {
        this.rows.delete(jti);
        deleted++;
      }
    }
    return deleted;
  }
}

export class MemoryUsersStore implements UsersStore {
  readonly rows = new Map<string, User>();

  constructor(
    private readonly apiKeys: MemoryApiKeysStore,
    private readonly tokens: MemoryTokensStore,
  ) {}

  async findById(id: string): Promise<User | null> {
    const row = this.rows.get(id);
    return row ? copy(row) : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    for (const row of this.rows.values()) {
      if (row.email === email) return copy(row);
    }
    return null;
  }

  async create(user: User): Promise<User> {
    for (const row of this.rows.values()) {
      if (row.email === user.email) {
        throw uniqueViolation('users_unique_email_index');
      }
    }
    this.rows.set(user.id, copy(user));
    return copy(user);
  }

  async update(id: string, patch: UserPatch, updatedAt: Date): Promise<User | null> {
    const row = this.rows.get(id);
    if (!row) return null;
    const updated = { ...row, ...patch, updated_at: updatedAt };
    this.rows.set(id, updated);
    return copy(updated);
  }

  async destroyWithDependents(id: string): Promise<boolean> {
    await this.tokens.deleteBySubject(id);
    for (const key of await this.apiKeys.listByUser(id)) {
      await this.apiKeys.destroy(key.id);
    }
    return this.rows.delete(id);
  }
}

export class MemoryRevocationStore implements RevocationStore {
  readonly entries = new Map<string, number>();
  failing = false;

  async revoke(jti: string, ttlSeconds: number): Promise<void> {
    this.entries.set(jti, ttlSeconds);
  }

  async isRevoked(jti: string): Promise<boolean> {
    if (this.failing) throw new Error('revocation store unavailable');
    return this.entries.has(jti);
  }
}

export interface MemoryStores {
  users: MemoryUsersStore;
  apiKeys: MemoryApiKeysStore;
  tokens: MemoryTokensStore;
  revocation: MemoryRevocationStore;
}

export function createMemoryStores(): MemoryStores {
  const apiKeys = new MemoryApiKeysStore();
  const tokens = new MemoryTokensStore();
  return {
    users: new MemoryUsersStore(apiKeys, tokens),
    apiKeys,
    tokens,
    revocation: new MemoryRevocationStore(),
  };
}
