import { Knex } from "knex";

export const TOKEN_PURPOSES = [
  "user",
  "confirm_new_user",
  "password_reset",
  "magic_link",
] as const;

export type TokenPurpose = (typeof TOKEN_PURPOSES)[number];

export const isTokenPurpose = (value: unknown): value is TokenPurpose =>
  typeof value === "string" &&
  TOKEN_PURPOSES.some((purpose) => purpose === value);

/* Mapped to the tokens table. One row per issued signed token that is still
 * usable; `jti` has a unique index and `subject` references users(id). */
export interface TokenRecord {
  jti: string;
  subject: string;
  purpose: TokenPurpose;
  expires_at: Date;
  created_at: Date;
}

export interface TokensStore {
  /** Rejects with a unique violation when the jti already exists */
  create(token: TokenRecord): Promise<TokenRecord>;
  findByJti(jti: string): Promise<TokenRecord | null>;
  deleteByJti(jti: string): Promise<boolean>;
  listBySubject(subject: string): Promise<TokenRecord[]>;
  deleteBySubject(subject: string): Promise<number>;
}

export class TokensModel implements TokensStore {
  constructor(private db: Knex) {}

  async create(token: TokenRecord): Promise<TokenRecord> {
    await this.db<TokenRecord>("tokens").insert(token);
    return token;
  }

  async findByJti(jti: string): Promise<TokenRecord | null> {
    const token: TokenRecord | undefined = await this.db<TokenRecord>("tokens")
      .where({ jti })
      .first();
    return token || null;
  }

  async deleteByJti(jti: string): Promise<boolean> {
    const deleted = await this.db<TokenRecord>("tokens").where({ jti }).del();
    return deleted > 0;
  }

  async listBySubject(subject: string): Promise<TokenRecord[]> {
    return this.db<TokenRecord>("tokens").where({ subject });
  }

  async deleteBySubject(subject: string): Promise<number> {
    return this.db<TokenRecord>("tokens").where({ subject }).del();
  }
}
