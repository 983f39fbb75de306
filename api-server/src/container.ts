import { config } from "./lib/config";
import { dbMain } from "./lib/db";
import { logger } from "./lib/logger";
import redisClient from "./lib/redisClient";
import { ApiKeysModel } from "./models/api-keys-model";
import { TokensModel } from "./models/tokens-model";
import { UsersModel } from "./models/users-model";
import { createRedisRevocationStore } from "./modules/revocation";
import { LoggingSender } from "./modules/senders";
import { createServices, Services } from "./services";

/** Services wired to Postgres, Redis and the logging sender. */
export function createProductionServices(): Services {
  return createServices({
    settings: {
      appBaseUrl: config.appBaseUrl,
      tokens: config.tokens,
      authn: config.authn,
    },
    usersStore: new UsersModel(dbMain),
    apiKeysStore: new ApiKeysModel(dbMain),
    tokensStore: new TokensModel(dbMain),
    revocationStore: createRedisRevocationStore(
      redisClient,
      config.tokens.redisRevocationPrefix,
    ),
    sender: new LoggingSender(logger),
    logger,
  });
}
