import bcrypt from "bcrypt";
import { randomUUID } from "crypto";
import {
  AuthenticationFailure,
  isAuthenticationFailure,
  KeywardConflictError,
  KeywardValidationError,
  Logger,
  NoopLogger,
  unauthenticated,
  validationError,
} from "keyward-core";
import { z } from "zod";
import { conflictFromUniqueViolation, isUniqueViolation } from "#lib/db/errors";
import { getErrorMessageFromZodParse } from "#lib/zod-utils";
import { User, UsersStore } from "../../models/users-model";
import { buildAccountEmail, AccountEmailKind, Sender } from "../senders";
import { TokenService } from "../session-token";

const emailSchema = z.string().trim().toLowerCase().email().max(320);

// bcrypt only looks at the first 72 bytes of the UTF-8 encoding
const BCRYPT_MAX_PASSWORD_BYTES = 72;

const passwordSchema = z
  .string()
  .min(8)
  .refine((password) => Buffer.byteLength(password, "utf8") <= BCRYPT_MAX_PASSWORD_BYTES, {
    message: `String must contain at most ${BCRYPT_MAX_PASSWORD_BYTES} byte(s)`,
  });

const registrationSchema = z.object({
  email: emailSchema,
  password: passwordSchema,
});

const newPasswordSchema = z.object({ password: passwordSchema });

const normalizeEmail = (email: string): string =>
  email.trim().toLowerCase();

export interface AccountServiceOptions {
  usersStore: UsersStore;
  tokens: TokenService;
  sender: Sender;
  appBaseUrl: string;
  bcryptRounds: number;
  requireConfirmedUser: boolean;
  clock?: () => Date;
  logger?: Logger;
}

export interface SignedInUser {
  user: User;
  token: string;
}

/**
 * Users, their passwords and the emailed single-use tokens (confirmation,
 * password reset, magic link).
 */
export class AccountService {
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private dummyHash: Promise<string> | null = null;

  constructor(private readonly options: AccountServiceOptions) {
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? new NoopLogger();
  }

  async register(
    email: string,
    password: string,
  ): Promise<User | KeywardValidationError | KeywardConflictError> {
    const parsed = registrationSchema.safeParse({ email, password });
    if (!parsed.success) {
      return validationError(getErrorMessageFromZodParse(parsed.error));
    }

    const now = this.clock();
    const user: User = {
      id: randomUUID(),
      email: parsed.data.email,
      hashed_password: await bcrypt.hash(password, this.options.bcryptRounds),
      confirmed_at: null,
      created_at: now,
      updated_at: now,
    };

    try {
      await this.options.usersStore.create(user);
    } catch (error) {
      if (isUniqueViolation(error)) {
        return conflictFromUniqueViolation(error, "Email already registered");
      }
      throw error;
    }

    // Without its confirmation email the account could never be confirmed,
    // so it is removed and the email stays free to register again.
    const emailProblem = await this.sendTokenEmail(user, "confirm_new_user");
    if (emailProblem) {
      await this.options.usersStore.destroyWithDependents(user.id);
      return emailProblem;
    }

    this.logger.info("User registered", { type: "user_registered", user_id: user.id });
    return user;
  }

  /**
   * Checks an email/password pair. Unknown emails still pay for a bcrypt
   * comparison so response timing does not reveal which emails exist.
   */
  async authenticatePassword(
    email: string,
    password: string,
  ): Promise<User | AuthenticationFailure> {
    const user = await this.options.usersStore.findByEmail(normalizeEmail(email));

    if (!user || !user.hashed_password) {
      await bcrypt.compare(password, await this.getDummyHash());
      return unauthenticated("Unknown email or password");
    }

    const matches = await bcrypt.compare(password, user.hashed_password);
    if (!matches) {
      return unauthenticated("Unknown email or password");
    }

    if (this.options.requireConfirmedUser && !user.confirmed_at) {
      return unauthenticated("User has not confirmed their email");
    }

    return user;
  }

  async signIn(user: User): Promise<SignedInUser | KeywardConflictError> {
    const token = await this.options.tokens.signIn(user);
    if (typeof token !== "string") {
      return token;
    }
    this.logger.info("User signed in", { type: "user_signed_in", user_id: user.id });
    return { user, token };
  }

  async confirm(token: string): Promise<User | AuthenticationFailure> {
    const consumed = await this.options.tokens.consume(token, "confirm_new_user");
    if (isAuthenticationFailure(consumed)) {
      return consumed;
    }

    const user = await this.options.usersStore.update(
      consumed.userId,
      { confirmed_at: this.clock() },
      this.clock(),
    );
    if (!user) {
      return unauthenticated("User behind the confirmation token no longer exists");
    }

    this.logger.info("User confirmed", { type: "user_confirmed", user_id: user.id });
    return user;
  }

  /** Always succeeds, whether or not the email belongs to a user. */
  async requestPasswordReset(email: string): Promise<void> {
    const user = await this.options.usersStore.findByEmail(normalizeEmail(email));
    if (user) {
      await this.sendTokenEmail(user, "password_reset");
    }
  }

  /** Checks a reset token without consuming it. */
  async checkPasswordResetToken(token: string): Promise<User | AuthenticationFailure> {
    const verified = await this.options.tokens.verify(token, "password_reset");
    if (isAuthenticationFailure(verified)) {
      return verified;
    }

    const user = await this.options.usersStore.findById(verified.userId);
    if (!user) {
      return unauthenticated("User behind the reset token no longer exists");
    }
    return user;
  }

  async resetPassword(
    token: string,
    password: string,
  ): Promise<User | AuthenticationFailure | KeywardValidationError> {
    // Checked first so a rejected password does not burn the token
    const passwordProblem = this.checkPassword(password);
    if (passwordProblem) {
      return passwordProblem;
    }

    const consumed = await this.options.tokens.consume(token, "password_reset");
    if (isAuthenticationFailure(consumed)) {
      return consumed;
    }

    const user = await this.options.usersStore.update(
      consumed.userId,
      { hashed_password: await bcrypt.hash(password, this.options.bcryptRounds) },
      this.clock(),
    );
    if (!user) {
      return unauthenticated("User behind the reset token no longer exists");
    }

    await this.options.tokens.revokeAllForUser(user.id);
    this.logger.info("Password reset", { type: "password_reset", user_id: user.id });
    return user;
  }

  /** Always succeeds, whether or not the email belongs to a user. */
  async requestMagicLink(email: string): Promise<void> {
    const user = await this.options.usersStore.findByEmail(normalizeEmail(email));
    if (user) {
      await this.sendTokenEmail(user, "magic_link");
    }
  }

  /** Following a magic link proves control of the email, so it confirms too. */
  async signInWithMagicLink(
    token: string,
  ): Promise<SignedInUser | AuthenticationFailure | KeywardConflictError> {
    const consumed = await this.options.tokens.consume(token, "magic_link");
    if (isAuthenticationFailure(consumed)) {
      return consumed;
    }

    let user = await this.options.usersStore.findById(consumed.userId);
    if (user && !user.confirmed_at) {
      user = await this.options.usersStore.update(
        user.id,
        { confirmed_at: this.clock() },
        this.clock(),
      );
    }
    if (!user) {
      return unauthenticated("User behind the magic link no longer exists");
    }

    return this.signIn(user);
  }

  async findUser(id: string): Promise<User | null> {
    return this.options.usersStore.findById(id);
  }

  async destroyUser(id: string): Promise<boolean> {
    const destroyed = await this.options.usersStore.destroyWithDependents(id);
    if (destroyed) {
      this.logger.info("User destroyed", { type: "user_destroyed", user_id: id });
    }
    return destroyed;
  }

  private checkPassword(password: string): KeywardValidationError | null {
    const parsed = newPasswordSchema.safeParse({ password });
    if (parsed.success) {
      return null;
    }
    return validationError(getErrorMessageFromZodParse(parsed.error));
  }

  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      this.dummyHash = bcrypt.hash(randomUUID(), this.options.bcryptRounds);
    }
    return this.dummyHash;
  }

  private async sendTokenEmail(
    user: User,
    kind: AccountEmailKind,
  ): Promise<KeywardConflictError | null> {
    const issued = await this.options.tokens.issue(user, kind);
    if (!("token" in issued)) {
      this.logger.error("Could not issue emailed token", {
        type: "token_issue_conflict",
        kind,
        user_id: user.id,
      });
      return issued;
    }
    await this.options.sender.send(
      buildAccountEmail(kind, user.email, issued.token, this.options.appBaseUrl),
    );
    return null;
  }
}
