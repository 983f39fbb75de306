import * as jwt from "jsonwebtoken";
import {
  AuthenticationFailure,
  expired,
  invalidSignature,
  KeywardExpiredError,
  KeywardInvalidSignatureError,
  unauthenticated,
} from "keyward-core";
import { isTokenPurpose, TokenPurpose } from "../../models/tokens-model";

export interface TokenJwtConfig {
  secretKey: string;
  algorithm: jwt.Algorithm;
  issuer: string;
  audience: string;
}

export interface TokenClaims {
  userId: string;
  jti: string;
  purpose: TokenPurpose;
  /** Seconds since the epoch */
  exp: number;
}

export interface SignTokenParams {
  userId: string;
  jti: string;
  purpose: TokenPurpose;
  /** Seconds since the epoch */
  issuedAt: number;
  /** Seconds since the epoch */
  expiresAt: number;
}

interface VerifyOptions {
  /** Seconds since the epoch; the clock expiry is checked against */
  now: number;
  ignoreExpiration?: boolean;
}

function describeJwtError(error: jwt.JsonWebTokenError): string {
  const message = error.message;
  if (message.includes("invalid signature")) return "Invalid signature";
  if (message.includes("jwt issuer invalid")) return "Issuer mismatch";
  if (message.includes("jwt audience invalid")) return "Audience mismatch";
  if (message.includes("invalid algorithm")) return "Invalid algorithm";
  if (message.includes("jwt malformed")) return "Token malformed";
  if (message.includes("Unexpected token") && message.includes("JSON"))
    return "Token malformed (payload not JSON)";
  return `Token validation error: ${message}`;
}

export class TokenJwt {
  private readonly config: TokenJwtConfig;

  constructor(config: TokenJwtConfig) {
    if (!config.secretKey) {
      throw new Error("TokenJwtConfig: secretKey is required.");
    }
    if (!config.algorithm) {
      throw new Error("TokenJwtConfig: algorithm is required.");
    }
    if (!config.issuer) {
      throw new Error("TokenJwtConfig: issuer is required.");
    }
    if (!config.audience) {
      throw new Error("TokenJwtConfig: audience is required.");
    }
    this.config = config;
  }

  sign(params: SignTokenParams): string {
    return jwt.sign(
      { purpose: params.purpose, iat: params.issuedAt, exp: params.expiresAt },
      this.config.secretKey,
      {
        algorithm: this.config.algorithm,
        issuer: this.config.issuer,
        audience: this.config.audience,
        jwtid: params.jti,
        subject: params.userId,
      },
    );
  }

  /**
   * Checks signature, algorithm, issuer, audience and (unless told otherwise)
   * expiry, then the claims every token must carry.
   */
  verify(
    tokenString: string,
    options: VerifyOptions,
  ): TokenClaims | AuthenticationFailure {
    const verified = this._verifySignatureAndStandardClaims(tokenString, options);
    if (verified.kind !== "payload") {
      return verified;
    }
    return this._validateEssentialClaims(verified.payload);
  }

  private _verifySignatureAndStandardClaims(
    tokenString: string,
    options: VerifyOptions,
  ):
    | { kind: "payload"; payload: jwt.JwtPayload }
    | KeywardExpiredError
    | KeywardInvalidSignatureError {
    try {
      const payload = jwt.verify(tokenString, this.config.secretKey, {
        algorithms: [this.config.algorithm],
        issuer: this.config.issuer,
        audience: this.config.audience,
        clockTimestamp: options.now,
        ignoreExpiration: options.ignoreExpiration ?? false,
      });
      if (typeof payload === "string") {
        return invalidSignature("Token payload is not an object");
      }
      return { kind: "payload", payload };
    } catch (error) {
      // TokenExpiredError extends JsonWebTokenError, so it goes first
      if (error instanceof jwt.TokenExpiredError) {
        return expired("Token expired");
      }
      if (error instanceof jwt.JsonWebTokenError) {
        return invalidSignature(describeJwtError(error));
      }
      throw error;
    }
  }

  private _validateEssentialClaims(
    payload: jwt.JwtPayload,
  ): TokenClaims | AuthenticationFailure {
    const { jti, sub, exp } = payload;
    const purpose: unknown = payload["purpose"];

    if (typeof jti !== "string" || jti.length === 0) {
      return invalidSignature("Token missing JTI claim");
    }
    if (typeof sub !== "string" || sub.length === 0) {
      return invalidSignature("Token missing SUB claim");
    }
    if (typeof exp !== "number") {
      return invalidSignature("Token missing EXP claim");
    }
    if (!isTokenPurpose(purpose)) {
      return unauthenticated("Token has an unknown purpose");
    }

    return { userId: sub, jti, purpose, exp };
  }
}
