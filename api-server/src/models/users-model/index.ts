import { Knex } from "knex";

/* Mapped to the users table. `email` has a unique index and is always stored
 * normalized (trimmed, lower-cased). */
export interface User {
  id: string;
  email: string;
  hashed_password: string | null;
  confirmed_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export type UserPatch = Partial<Pick<User, "hashed_password" | "confirmed_at">>;

export interface PublicUser {
  id: string;
  email: string;
  confirmedAt: Date | null;
  createdAt: Date;
}

export const toPublicUser = (user: User): PublicUser => ({
  id: user.id,
  email: user.email,
  confirmedAt: user.confirmed_at,
  createdAt: user.created_at,
});

export interface UsersStore {
  findById(id: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  /** Rejects with a unique violation when the email is taken */
  create(user: User): Promise<User>;
  update(id: string, patch: UserPatch, updatedAt: Date): Promise<User | null>;
  /** Deletes the user together with its api keys and tokens */
  destroyWithDependents(id: string): Promise<boolean>;
}

export class UsersModel implements UsersStore {
  constructor(private db: Knex) {}

  async findById(id: string): Promise<User | null> {
    const user: User | undefined = await this.db<User>("users")
      .where({ id })
      .first();
    return user || null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const user: User | undefined = await this.db<User>("users")
      .where({ email })
      .first();
    return user || null;
  }

  async create(user: User): Promise<User> {
    await this.db<User>("users").insert(user);
    return user;
  }

  async update(
    id: string,
    patch: UserPatch,
    updatedAt: Date,
  ): Promise<User | null> {
    const updated = await this.db<User>("users")
      .where({ id })
      .update({ ...patch, updated_at: updatedAt });
    if (updated === 0) {
      return null;
    }
    return this.findById(id);
  }

  async destroyWithDependents(id: string): Promise<boolean> {
    return this.db.transaction(async (trx) => {
      await trx("tokens").where({ subject: id }).del();
      await trx("api_keys").where({ user_id: id }).del();
      const deleted = await trx("users").where({ id }).del();
      return deleted > 0;
    });
  }
}
