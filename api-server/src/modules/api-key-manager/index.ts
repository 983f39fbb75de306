import { randomUUID } from "crypto";
import {
  authorize,
  expired,
  KeywardConflictError,
  KeywardExpiredError,
  KeywardUnauthenticatedError,
  KeywardValidationError,
  Logger,
  NoopLogger,
  fingerprintCredential,
  isAllowed,
  unauthenticated,
  validationError,
} from "keyward-core";
import { digestsEqual, hmacSha256, randomSecret } from "#lib/crypto-utils";
import { conflictFromUniqueViolation, isUniqueViolation } from "#lib/db/errors";
import {
  ApiKey,
  ApiKeysStore,
  isApiKeyValid,
  PublicApiKey,
  toPublicApiKey,
} from "../../models/api-keys-model";
import { UsersStore } from "../../models/users-model";
import { apiKeyPolicies } from "../policies";

export const API_KEY_SECRET_BYTES = 32;

// Five years
export const DEFAULT_API_KEY_MAX_TTL_SECONDS = 5 * 365 * 24 * 3600;

export interface ApiKeyManagerOptions {
  /** HMAC key mixed into every stored hash */
  pepper: string;
  /** Plaintext keys look like `<prefix>_<secret>` */
  prefix: string;
  /** Longest lifetime a key may be issued with */
  maxTtlSeconds?: number;
  apiKeysStore: ApiKeysStore;
  usersStore: UsersStore;
  clock?: () => Date;
  /** Source of the random part of a key; replaceable in tests */
  generateSecret?: () => string;
  logger?: Logger;
}

export interface IssuedApiKey {
  /** Shown once; only its hash is stored */
  plaintextKey: string;
  record: PublicApiKey;
}

export class ApiKeyManager {
  private readonly clock: () => Date;
  private readonly generateSecret: () => string;
  private readonly maxTtlSeconds: number;
  private readonly logger: Logger;

  constructor(private readonly options: ApiKeyManagerOptions) {
    if (!options.pepper) {
      throw new Error("ApiKeyManagerOptions: pepper is required.");
    }
    if (!/^[a-z0-9]+$/.test(options.prefix)) {
      throw new Error(
        "ApiKeyManagerOptions: prefix must be lower-case letters and digits.",
      );
    }
    this.maxTtlSeconds = options.maxTtlSeconds ?? DEFAULT_API_KEY_MAX_TTL_SECONDS;
    if (!Number.isInteger(this.maxTtlSeconds) || this.maxTtlSeconds <= 0) {
      throw new Error(
        "ApiKeyManagerOptions: maxTtlSeconds must be a positive integer.",
      );
    }
    this.clock = options.clock ?? (() => new Date());
    this.generateSecret =
      options.generateSecret ?? (() => randomSecret(API_KEY_SECRET_BYTES));
    this.logger = options.logger ?? new NoopLogger();
  }

  /** Whether a presented credential has the shape of one of our keys. */
  looksLikeApiKey(presented: string): boolean {
    return (
      presented.startsWith(`${this.options.prefix}_`) &&
      presented.length > this.options.prefix.length + 1
    );
  }

  hashKey(plaintextKey: string): string {
    return hmacSha256(this.options.pepper, plaintextKey);
  }

  async issue(
    userId: string,
    ttlSeconds: number,
  ): Promise<IssuedApiKey | KeywardValidationError | KeywardConflictError> {
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      return validationError("ttl must be a positive whole number of seconds");
    }
    if (ttlSeconds > this.maxTtlSeconds) {
      return validationError(`ttl must not exceed ${this.maxTtlSeconds} seconds`);
    }

    const user = await this.options.usersStore.findById(userId);
    if (!user) {
      return validationError(`user ${userId} does not exist`);
    }

    const now = this.clock();
    const expiresAt = new Date(now.getTime() + ttlSeconds * 1000);
    if (Number.isNaN(expiresAt.getTime())) {
      return validationError("ttl puts the expiry past the latest representable date");
    }

    const plaintextKey = `${this.options.prefix}_${this.generateSecret()}`;
    const record: ApiKey = {
      id: randomUUID(),
      user_id: userId,
      api_key_hash: this.hashKey(plaintextKey),
      expires_at: expiresAt,
      created_at: now,
    };

    try {
      await this.options.apiKeysStore.create(record);
    } catch (error) {
      // Never retried: a retry could hand out a second key for one request.
      if (isUniqueViolation(error)) {
        this.logger.warn("API key hash collision", {
          type: "api_key_conflict",
          user_id: userId,
        });
        return conflictFromUniqueViolation(error, "API key already exists");
      }
      throw error;
    }

    this.logger.info("API key issued", {
      type: "api_key_issued",
      api_key_id: record.id,
      user_id: userId,
      expires_at: record.expires_at.toISOString(),
    });

    return { plaintextKey, record: toPublicApiKey(record, now) };
  }

  /**
   * Resolves a presented key to its owner's id. Unknown keys and expired keys
   * fail differently here; callers facing the outside world report both the
   * same way.
   */
  async validate(
    presented: string,
  ): Promise<string | KeywardUnauthenticatedError | KeywardExpiredError> {
    if (!this.looksLikeApiKey(presented)) {
      return unauthenticated("API key has an unknown format");
    }

    const hash = this.hashKey(presented);
    const record = await this.options.apiKeysStore.findByHash(hash);
    if (!record || !digestsEqual(record.api_key_hash, hash)) {
      this.logger.debug("API key not found", {
        type: "api_key_not_found",
        key: fingerprintCredential(presented),
      });
      return unauthenticated("API key not found");
    }

    const decision = authorize(apiKeyPolicies, {
      actor: null,
      action: "read",
      resource: record,
      interaction: "authentication",
    });
    if (!isAllowed(decision)) {
      return unauthenticated(decision.message);
    }

    if (!isApiKeyValid(record, this.clock())) {
      return expired("API key expired");
    }

    return record.user_id;
  }

  async list(userId: string): Promise<PublicApiKey[]> {
    const now = this.clock();
    const keys = await this.options.apiKeysStore.listByUser(userId);
    return keys.map((key) => toPublicApiKey(key, now));
  }

  async find(id: string): Promise<ApiKey | null> {
    return this.options.apiKeysStore.findById(id);
  }

  async destroy(id: string): Promise<boolean> {
    const destroyed = await this.options.apiKeysStore.destroy(id);
    if (destroyed) {
      this.logger.info("API key destroyed", {
        type: "api_key_destroyed",
        api_key_id: id,
      });
    }
    return destroyed;
  }
}
