import * as jwt from "jsonwebtoken";
import {
  AuthenticationFailure,
  invalidSignature,
  isAuthenticationFailure,
  KeywardConflictError,
  KeywardInvalidSignatureError,
  Logger,
  NoopLogger,
  revoked,
  unauthenticated,
} from "keyward-core";
import { randomId } from "#lib/crypto-utils";
import { conflictFromUniqueViolation, isUniqueViolation } from "#lib/db/errors";
import {
  TokenPurpose,
  TokenRecord,
  TokensStore,
} from "../../models/tokens-model";
import { RevocationStore } from "../revocation";
import { TokenJwt } from "./token-jwt";

export interface TokenServiceOptions {
  secretKey: string;
  algorithm: jwt.Algorithm;
  issuer: string;
  audience: string;
  /** Lifetime in seconds per purpose */
  lifetimes: Record<TokenPurpose, number>;
  tokensStore: TokensStore;
  revocationStore: RevocationStore;
  clock?: () => Date;
  logger?: Logger;
}

export interface IssuedToken {
  token: string;
  record: TokenRecord;
}

export interface VerifiedToken {
  userId: string;
  jti: string;
  purpose: TokenPurpose;
  expiresAt: Date;
}

export type SignOutResult =
  | { kind: "signed-out"; jti: string; userId: string }
  | KeywardInvalidSignatureError;

const toEpochSeconds = (date: Date): number => Math.floor(date.getTime() / 1000);

/**
 * Issues and verifies signed tokens. Every issued token has a row in the
 * tokens table; verification requires that row to still exist and the jti to
 * be absent from the revocation list.
 */
export class TokenService {
  private readonly jwt: TokenJwt;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(private readonly options: TokenServiceOptions) {
    this.jwt = new TokenJwt({
      secretKey: options.secretKey,
      algorithm: options.algorithm,
      issuer: options.issuer,
      audience: options.audience,
    });
    for (const [purpose, lifetime] of Object.entries(options.lifetimes)) {
      if (!Number.isInteger(lifetime) || lifetime <= 0) {
        throw new Error(
          `TokenServiceOptions: lifetime for '${purpose}' must be a positive integer.`,
        );
      }
    }
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? new NoopLogger();
  }

  async issue(
    user: { id: string },
    purpose: TokenPurpose,
  ): Promise<IssuedToken | KeywardConflictError> {
    const now = this.clock();
    const issuedAt = toEpochSeconds(now);
    const expiresAt = issuedAt + this.options.lifetimes[purpose];

    const record: TokenRecord = {
      jti: randomId(),
      subject: user.id,
      purpose,
      expires_at: new Date(expiresAt * 1000),
      created_at: now,
    };

    try {
      await this.options.tokensStore.create(record);
    } catch (error) {
      if (isUniqueViolation(error)) {
        return conflictFromUniqueViolation(error, "Token id already in use");
      }
      throw error;
    }

    const token = this.jwt.sign({
      userId: user.id,
      jti: record.jti,
      purpose,
      issuedAt,
      expiresAt,
    });

    this.logger.debug("Token issued", {
      type: "token_issued",
      purpose,
      jti: record.jti,
      user_id: user.id,
    });

    return { token, record };
  }

  async signIn(user: { id: string }): Promise<string | KeywardConflictError> {
    const issued = await this.issue(user, "user");
    return "token" in issued ? issued.token : issued;
  }

  async verify(
    token: string,
    purpose: TokenPurpose = "user",
  ): Promise<VerifiedToken | AuthenticationFailure> {
    const claims = this.jwt.verify(token, {
      now: toEpochSeconds(this.clock()),
    });
    if (isAuthenticationFailure(claims)) {
      return claims;
    }
    if (claims.purpose !== purpose) {
      return unauthenticated(
        `Token purpose '${claims.purpose}' cannot be used as '${purpose}'`,
      );
    }

    let isRevoked: boolean;
    try {
      isRevoked = await this.options.revocationStore.isRevoked(claims.jti);
    } catch (error) {
      this.logger.error("Revocation list lookup failed", {
        type: "revocation_lookup_error",
        jti: claims.jti,
        error: error instanceof Error ? error.message : String(error),
      });
      return unauthenticated(
        "Could not verify token revocation status due to a data store error",
      );
    }
    if (isRevoked) {
      return revoked("Token is revoked");
    }

    const record = await this.options.tokensStore.findByJti(claims.jti);
    if (!record || record.subject !== claims.userId || record.purpose !== purpose) {
      return revoked("Token record not found");
    }

    return {
      userId: claims.userId,
      jti: claims.jti,
      purpose: claims.purpose,
      expiresAt: new Date(claims.exp * 1000),
    };
  }

  /**
   * Verifies a single-use token and deletes its record. Only one of several
   * concurrent consumers wins the delete; the others see `revoked`.
   */
  async consume(
    token: string,
    purpose: TokenPurpose,
  ): Promise<VerifiedToken | AuthenticationFailure> {
    const verified = await this.verify(token, purpose);
    if (isAuthenticationFailure(verified)) {
      return verified;
    }

    const deleted = await this.options.tokensStore.deleteByJti(verified.jti);
    if (!deleted) {
      return revoked("Token already used");
    }
    await this.revokeJti(verified.jti, verified.expiresAt);
    return verified;
  }

  /**
   * Revokes a token. Expiry is ignored so an expired session can still be
   * signed out; signing out an already signed-out token succeeds.
   */
  async signOut(token: string): Promise<SignOutResult> {
    const claims = this.jwt.verify(token, {
      now: toEpochSeconds(this.clock()),
      ignoreExpiration: true,
    });
    if (isAuthenticationFailure(claims)) {
      return claims.kind === "invalid-signature"
        ? claims
        : invalidSignature(claims.message);
    }

    await this.revokeJti(claims.jti, new Date(claims.exp * 1000));
    await this.options.tokensStore.deleteByJti(claims.jti);

    this.logger.info("Token signed out", {
      type: "token_signed_out",
      jti: claims.jti,
      user_id: claims.userId,
    });
    return { kind: "signed-out", jti: claims.jti, userId: claims.userId };
  }

  /** Revokes every stored token of a user. Returns how many were revoked. */
  async revokeAllForUser(userId: string): Promise<number> {
    const records = await this.options.tokensStore.listBySubject(userId);
    for (const record of records) {
      await this.revokeJti(record.jti, record.expires_at);
    }
    await this.options.tokensStore.deleteBySubject(userId);

    this.logger.info("Revoked all tokens for user", {
      type: "tokens_revoked_for_user",
      user_id: userId,
      count: records.length,
    });
    return records.length;
  }

  private async revokeJti(jti: string, expiresAt: Date): Promise<void> {
    const remainingSeconds = (expiresAt.getTime() - this.clock().getTime()) / 1000;
    if (remainingSeconds <= 0) {
      // Verification already rejects it on expiry.
      return;
    }
    await this.options.revocationStore.revoke(jti, remainingSeconds);
  }
}
