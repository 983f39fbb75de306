import {
  AuthenticationFailure,
  isAuthenticationFailure,
  unauthenticated,
} from "keyward-core";
import { AccountService } from "../accounts";
import { ApiKeyManager } from "../api-key-manager";
import { TokenService } from "../session-token";

export type Credential =
  | { kind: "bearer"; value: string }
  | { kind: "password"; email: string; password: string };

export type StrategyName = "api_key" | "session_token" | "password";

export interface Strategy {
  name: StrategyName;
  accepts(credential: Credential): boolean;
  /** Resolves the credential to a user id */
  authenticate(credential: Credential): Promise<string | AuthenticationFailure>;
}

const JWT_SHAPE = /^[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]*$/;

export function apiKeyStrategy(apiKeys: ApiKeyManager): Strategy {
  return {
    name: "api_key",
    accepts: (credential) =>
      credential.kind === "bearer" && apiKeys.looksLikeApiKey(credential.value),
    async authenticate(credential) {
      if (credential.kind !== "bearer") {
        return unauthenticated("api_key strategy expects a bearer credential");
      }
      return apiKeys.validate(credential.value);
    },
  };
}

export function sessionTokenStrategy(tokens: TokenService): Strategy {
  return {
    name: "session_token",
    accepts: (credential) =>
      credential.kind === "bearer" && JWT_SHAPE.test(credential.value),
    async authenticate(credential) {
      if (credential.kind !== "bearer") {
        return unauthenticated("session_token strategy expects a bearer credential");
      }
      const verified = await tokens.verify(credential.value, "user");
      return isAuthenticationFailure(verified) ? verified : verified.userId;
    },
  };
}

export function passwordStrategy(accounts: AccountService): Strategy {
  return {
    name: "password",
    accepts: (credential) => credential.kind === "password",
    async authenticate(credential) {
      if (credential.kind !== "password") {
        return unauthenticated("password strategy expects an email and password");
      }
      const user = await accounts.authenticatePassword(
        credential.email,
        credential.password,
      );
      return isAuthenticationFailure(user) ? user : user.id;
    },
  };
}

export function selectStrategy(
  strategies: readonly Strategy[],
  credential: Credential,
): Strategy | null {
  return strategies.find((strategy) => strategy.accepts(credential)) ?? null;
}

export interface AuthenticationResult {
  userId: string;
  strategy: StrategyName;
}

export async function authenticateCredential(
  strategies: readonly Strategy[],
  credential: Credential,
): Promise<AuthenticationResult | AuthenticationFailure> {
  const strategy = selectStrategy(strategies, credential);
  if (!strategy) {
    return unauthenticated("No strategy accepts this credential");
  }
  const outcome = await strategy.authenticate(credential);
  if (typeof outcome !== "string") {
    return outcome;
  }
  return { userId: outcome, strategy: strategy.name };
}
