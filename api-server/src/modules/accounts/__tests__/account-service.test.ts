import bcrypt from "bcrypt";
import { isKeywardError } from "keyward-core";
import { uniqueViolation } from "../../../__tests__/helpers/memory-stores";
import {
  buildTestContext,
  seedUser,
  TEST_PASSWORD,
  TestContext,
} from "../../../__tests__/helpers/test-services";

describe("AccountService", () => {
  let context: TestContext;

  beforeEach(() => {
    context = buildTestContext();
  });

  describe("register", () => {
    it("stores a normalized email and a bcrypt hash, then sends a confirmation link", async () => {
      const user = await context.services.accounts.register("  New.User@Example.TEST ", TEST_PASSWORD);
      if (isKeywardError(user)) throw new Error(user.message);

      expect(user.email).toBe("new.user@example.test");
      expect(user.confirmed_at).toBeNull();
      expect(user.hashed_password).not.toBe(TEST_PASSWORD);
      expect(await bcrypt.compare(TEST_PASSWORD, user.hashed_password ?? "")).toBe(true);

      expect(context.sender.sent).toHaveLength(1);
      const [email] = context.sender.sent;
      expect(email.kind).toBe("confirm_new_user");
      expect(email.to).toBe("new.user@example.test");
      expect(email.subject).toBe("Confirm your email address");
      expect(email.url.startsWith("https://app.example.test/auth/confirm?token=")).toBe(true);
    });

    it("reports a taken email as a conflict", async () => {
      await seedUser(context, "taken@example.test");

      const result = await context.services.accounts.register("Taken@example.test", TEST_PASSWORD);

      expect(result).toEqual({
        kind: "conflict",
        message: "Email already registered",
        constraint: "users_unique_email_index",
      });
      expect(context.sender.sent).toHaveLength(0);
    });

    it("rejects a malformed email", async () => {
      const result = await context.services.accounts.register("not-an-email", TEST_PASSWORD);

      expect(result).toEqual({ kind: "validation-error", message: "email Invalid email" });
    });

    it("rejects a short password", async () => {
      const result = await context.services.accounts.register("short@example.test", "short");

      expect(result).toEqual({
        kind: "validation-error",
        message: "password String must contain at least 8 character(s)",
      });
      expect(context.stores.users.rows.size).toBe(0);
    });

    it("measures the password limit in UTF-8 bytes", async () => {
      // 24 three-byte characters plus 11 ASCII: 35 characters, 83 bytes
      const result = await context.services.accounts.register(
        "bytes@example.test",
        "\u20ac".repeat(24) + "RealSecret!",
      );

      expect(result).toEqual({
        kind: "validation-error",
        message: "password String must contain at most 72 byte(s)",
      });
      expect(context.stores.users.rows.size).toBe(0);
    });

    it("accepts a multibyte password that fits in 72 bytes", async () => {
      // 24 three-byte characters: exactly 72 bytes
      const password = "\u20ac".repeat(24);
      const user = await context.services.accounts.register("fits@example.test", password);
      if (isKeywardError(user)) throw new Error(user.message);

      expect(await bcrypt.compare(password, user.hashed_password ?? "")).toBe(true);
    });

    it("rolls the user back and reports the conflict when the confirmation token cannot be issued", async () => {
      jest
        .spyOn(context.stores.tokens, "create")
        .mockRejectedValueOnce(uniqueViolation("tokens_jti_index"));

      const result = await context.services.accounts.register("unlucky@example.test", TEST_PASSWORD);

      expect(result).toEqual({
        kind: "conflict",
        message: "Token id already in use",
        constraint: "tokens_jti_index",
      });
      expect(context.stores.users.rows.size).toBe(0);
      expect(context.sender.sent).toHaveLength(0);
    });
  });

  describe("authenticatePassword", () => {
    it("returns the user for the right password", async () => {
      const seeded = await seedUser(context, "right@example.test");

      const user = await context.services.accounts.authenticatePassword("RIGHT@example.test", TEST_PASSWORD);

      expect(user).toMatchObject({ id: seeded.id });
    });

    it("fails the same way for a wrong password and an unknown email", async () => {
      await seedUser(context, "known@example.test");

      const wrongPassword = await context.services.accounts.authenticatePassword(
        "known@example.test",
        "not-the-password",
      );
      const unknownEmail = await context.services.accounts.authenticatePassword(
        "unknown@example.test",
        TEST_PASSWORD,
      );

      expect(wrongPassword).toEqual({ kind: "unauthenticated", message: "Unknown email or password" });
      expect(unknownEmail).toEqual(wrongPassword);
    });

    it("refuses an unconfirmed user while confirmation is required", async () => {
      await seedUser(context, "pending@example.test", { confirmed: false });

      const result = await context.services.accounts.authenticatePassword("pending@example.test", TEST_PASSWORD);

      expect(result).toEqual({
        kind: "unauthenticated",
        message: "User has not confirmed their email",
      });
    });

    it("lets an unconfirmed user in when confirmation is not required", async () => {
      context = buildTestContext({ requireConfirmedUser: false });
      const seeded = await seedUser(context, "pending@example.test", { confirmed: false });

      const result = await context.services.accounts.authenticatePassword("pending@example.test", TEST_PASSWORD);

      expect(result).toMatchObject({ id: seeded.id });
    });
  });

  describe("confirm", () => {
    it("confirms the user once and burns the token", async () => {
      const user = await context.services.accounts.register("confirm@example.test", TEST_PASSWORD);
      if (isKeywardError(user)) throw new Error(user.message);
      const token = context.sender.lastToken("confirm_new_user", "confirm@example.test");

      const confirmed = await context.services.accounts.confirm(token);
      const again = await context.services.accounts.confirm(token);

      expect(confirmed).toMatchObject({ id: user.id, confirmed_at: context.clock.now() });
      expect(again).toEqual({ kind: "revoked", message: "Token is revoked" });
    });

    it("refuses a session token", async () => {
      const user = await seedUser(context, "session@example.test");
      const session = await context.services.tokens.signIn(user);
      if (isKeywardError(session)) throw new Error(session.message);

      expect(await context.services.accounts.confirm(session)).toEqual({
        kind: "unauthenticated",
        message: "Token purpose 'user' cannot be used as 'confirm_new_user'",
      });
    });
  });

  describe("password reset", () => {
    it("sends nothing for an unknown email", async () => {
      await context.services.accounts.requestPasswordReset("nobody@example.test");

      expect(context.sender.sent).toHaveLength(0);
    });

    it("keeps the token usable when the new password is rejected", async () => {
      await seedUser(context, "reset@example.test");
      await context.services.accounts.requestPasswordReset("reset@example.test");
      const token = context.sender.lastToken("password_reset", "reset@example.test");

      const rejected = await context.services.accounts.resetPassword(token, "short");
      const accepted = await context.services.accounts.resetPassword(token, "a-new-long-password");

      expect(rejected).toEqual({
        kind: "validation-error",
        message: "password String must contain at least 8 character(s)",
      });
      expect(isKeywardError(accepted)).toBe(false);
    });

    it("changes the password and signs out every session", async () => {
      const user = await seedUser(context, "reset@example.test");
      const session = await context.services.tokens.signIn(user);
      if (isKeywardError(session)) throw new Error(session.message);
      await context.services.accounts.requestPasswordReset("reset@example.test");
      const token = context.sender.lastToken("password_reset", "reset@example.test");

      await context.services.accounts.resetPassword(token, "a-new-long-password");

      expect(await context.services.tokens.verify(session)).toMatchObject({ kind: "revoked" });
      expect(
        await context.services.accounts.authenticatePassword("reset@example.test", TEST_PASSWORD),
      ).toEqual({ kind: "unauthenticated", message: "Unknown email or password" });
      expect(
        await context.services.accounts.authenticatePassword("reset@example.test", "a-new-long-password"),
      ).toMatchObject({ id: user.id });
    });
  });

  describe("signInWithMagicLink", () => {
    it("confirms an unconfirmed user and returns a session token", async () => {
      const user = await seedUser(context, "magic@example.test", { confirmed: false });
      await context.services.accounts.requestMagicLink("magic@example.test");
      const token = context.sender.lastToken("magic_link", "magic@example.test");

      const signedIn = await context.services.accounts.signInWithMagicLink(token);
      if (isKeywardError(signedIn)) throw new Error(signedIn.message);

      expect(signedIn.user.confirmed_at).toEqual(context.clock.now());
      expect(await context.services.tokens.verify(signedIn.token)).toMatchObject({ userId: user.id });
      expect(await context.services.accounts.signInWithMagicLink(token)).toEqual({
        kind: "revoked",
        message: "Token is revoked",
      });
    });
  });

  describe("destroyUser", () => {
    it("removes the user together with its keys and tokens", async () => {
      const user = await seedUser(context, "leaving@example.test");
      await context.services.apiKeys.issue(user.id, 3600);
      const session = await context.services.tokens.signIn(user);
      if (isKeywardError(session)) throw new Error(session.message);

      expect(await context.services.accounts.destroyUser(user.id)).toBe(true);

      expect(context.stores.users.rows.size).toBe(0);
      expect(context.stores.apiKeys.rows.size).toBe(0);
      expect(context.stores.tokens.rows.size).toBe(0);
      expect(await context.services.tokens.verify(session)).toEqual({
        kind: "revoked",
        message: "Token record not found",
      });
      expect(await context.services.accounts.destroyUser(user.id)).toBe(false);
    });
  });
});
