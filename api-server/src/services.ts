import * as jwt from "jsonwebtoken";
import { Logger } from "keyward-core";
import { ApiKeysStore } from "./models/api-keys-model";
import { TokenPurpose, TokensStore } from "./models/tokens-model";
import { UsersStore } from "./models/users-model";
import { AccountService } from "./modules/accounts";
import { ApiKeyManager } from "./modules/api-key-manager";
import { RevocationStore } from "./modules/revocation";
import { Sender } from "./modules/senders";
import { TokenService } from "./modules/session-token";
import {
  apiKeyStrategy,
  passwordStrategy,
  sessionTokenStrategy,
  Strategy,
} from "./modules/strategies";

export interface ServiceSettings {
  appBaseUrl: string;
  tokens: {
    signingSecret: string;
    algorithm: jwt.Algorithm;
    issuer: string;
    audience: string;
    lifetimes: Record<TokenPurpose, number>;
  };
  authn: {
    apiKeyPepperV1: string;
    apiKeyPrefix: string;
    apiKeyMaxTtlSeconds: number;
    bcryptRounds: number;
    requireConfirmedUser: boolean;
  };
}

export interface ServiceDependencies {
  settings: ServiceSettings;
  usersStore: UsersStore;
  apiKeysStore: ApiKeysStore;
  tokensStore: TokensStore;
  revocationStore: RevocationStore;
  sender: Sender;
  logger: Logger;
  clock?: () => Date;
  generateApiKeySecret?: () => string;
}

export interface Services {
  accounts: AccountService;
  apiKeys: ApiKeyManager;
  tokens: TokenService;
  /** Bearer strategies, in the order credentials are matched against them */
  bearerStrategies: Strategy[];
  passwordStrategy: Strategy;
}

export function createServices(deps: ServiceDependencies): Services {
  const { settings, logger, clock } = deps;

  const tokens = new TokenService({
    secretKey: settings.tokens.signingSecret,
    algorithm: settings.tokens.algorithm,
    issuer: settings.tokens.issuer,
    audience: settings.tokens.audience,
    lifetimes: settings.tokens.lifetimes,
    tokensStore: deps.tokensStore,
    revocationStore: deps.revocationStore,
    clock,
    logger,
  });

  const apiKeys = new ApiKeyManager({
    pepper: settings.authn.apiKeyPepperV1,
    prefix: settings.authn.apiKeyPrefix,
    maxTtlSeconds: settings.authn.apiKeyMaxTtlSeconds,
    apiKeysStore: deps.apiKeysStore,
    usersStore: deps.usersStore,
    clock,
    generateSecret: deps.generateApiKeySecret,
    logger,
  });

  const accounts = new AccountService({
    usersStore: deps.usersStore,
    tokens,
    sender: deps.sender,
    appBaseUrl: settings.appBaseUrl,
    bcryptRounds: settings.authn.bcryptRounds,
    requireConfirmedUser: settings.authn.requireConfirmedUser,
    clock,
    logger,
  });

  return {
    accounts,
    apiKeys,
    tokens,
    bearerStrategies: [apiKeyStrategy(apiKeys), sessionTokenStrategy(tokens)],
    passwordStrategy: passwordStrategy(accounts),
  };
}
