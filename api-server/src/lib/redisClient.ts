import { createClient } from "redis";
import { config } from "./config";
import { logger } from "./logger";

// node-redis keeps a single pipelined connection, which is all the revocation
// list needs.
const redisClient = createClient({
  socket: {
    host: config.redis.host,
    port: config.redis.port,
  },
  password: config.redis.password,
  database: config.redis.db,
});

redisClient.on("ready", () => {
  logger.info(
    `Redis client ready, connected to ${config.redis.host}:${config.redis.port}`,
  );
});

redisClient.on("error", (err: Error) => {
  // node-redis reconnects on its own after most errors.
  logger.error("Redis client error", { error: err.message });
});

// Commands issued before the connection is up are queued.
redisClient.connect().catch((err: Error) => {
  logger.error("Failed to connect to Redis on startup", { error: err.message });
});

export default redisClient;
