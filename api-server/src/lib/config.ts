import * as jwt from "jsonwebtoken";

const nodeEnv = process.env.NODE_ENV || "development";

const tokenAlgorithm: jwt.Algorithm = "HS256";

const seconds = (value: string | undefined, fallback: number): number =>
  parseInt(value || String(fallback), 10);

export const config = {
  port: parseInt(process.env.PORT || "3030", 10),
  appBaseUrl: process.env.APP_BASE_URL as string,
  nodeEnv: nodeEnv,

  redis: {
    host: process.env.REDIS_HOST || "localhost",
    port: parseInt(process.env.REDIS_PORT || "6379", 10),
    password: process.env.REDIS_PASSWORD,
    db: parseInt(process.env.REDIS_DB || "0", 10),
  },

  tokens: {
    signingSecret: process.env.TOKEN_SIGNING_SECRET as string,
    algorithm: tokenAlgorithm,
    issuer: process.env.TOKEN_ISSUER as string,
    audience: process.env.TOKEN_AUDIENCE as string,
    redisRevocationPrefix:
      process.env.TOKEN_REDIS_REVOCATION_PREFIX || "token_revoked:",
    lifetimes: {
      user: seconds(process.env.TOKEN_LIFETIME_USER_SECONDS, 14 * 24 * 3600),
      confirm_new_user: seconds(
        process.env.TOKEN_LIFETIME_CONFIRM_SECONDS,
        3 * 24 * 3600,
      ),
      password_reset: seconds(
        process.env.TOKEN_LIFETIME_RESET_SECONDS,
        3 * 24 * 3600,
      ),
      magic_link: seconds(process.env.TOKEN_LIFETIME_MAGIC_LINK_SECONDS, 600),
    },
  },

  authn: {
    apiKeyPepperV1: process.env.API_KEY_PEPPER_V1 as string,
    apiKeyPrefix: process.env.API_KEY_PREFIX || "keyward",
    apiKeyMaxTtlSeconds: seconds(
      process.env.API_KEY_MAX_TTL_SECONDS,
      5 * 365 * 24 * 3600,
    ),
    bcryptRounds: parseInt(process.env.BCRYPT_ROUNDS || "12", 10),
    requireConfirmedUser:
      (process.env.REQUIRE_CONFIRMED_USER || "true").toLowerCase() !== "false",
  },

  dbMainUrl: process.env.DB_MAIN_URL as string,
};

validateRequiredConfigProperties([
  "appBaseUrl",
  "dbMainUrl",
  "tokens.signingSecret",
  "tokens.issuer",
  "tokens.audience",
  "authn.apiKeyPepperV1",
]);

function validateRequiredConfigProperties(
  // Either a top-level key of the config object, or a dotted path into one of
  // its nested objects (e.g. "tokens.issuer").
  propertyPaths: Array<
    keyof typeof config | `${keyof typeof config}.${string}`
  >,
) {
  const errorMessages: string[] = [];
  propertyPaths.forEach((path) => {
    let value: unknown = config;

    for (const part of path.split(".")) {
      value =
        typeof value === "object" && value !== null
          ? Reflect.get(value, part)
          : undefined;
    }

    if (!value) {
      errorMessages.push(`${envVarNameFor(path)} environment variable is required`);
    }
  });

  if (errorMessages.length > 0) {
    throw new Error(errorMessages.join("\n"));
  }
}

// Config paths don't map mechanically onto variable names, so the ones that
// can be missing are listed explicitly.
function envVarNameFor(path: string): string {
  const names: Record<string, string> = {
    appBaseUrl: "APP_BASE_URL",
    dbMainUrl: "DB_MAIN_URL",
    "tokens.signingSecret": "TOKEN_SIGNING_SECRET",
    "tokens.issuer": "TOKEN_ISSUER",
    "tokens.audience": "TOKEN_AUDIENCE",
    "authn.apiKeyPepperV1": "API_KEY_PEPPER_V1",
  };
  return names[path] ?? path;
}
