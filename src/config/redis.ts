import { createClient } from "redis";
import { config } from "./env";

const MAX_RECONNECT_ATTEMPTS = 10;

// Cache, rate limiter and token blacklist share this client
const redisClient = createClient({
  url: config.redisUrl,
  socket: {
    connectTimeout: 5000,
    reconnectStrategy: (attempt) =>
      attempt > MAX_RECONNECT_ATTEMPTS
        ? new Error(`Redis unreachable after ${attempt} attempts`)
        : Math.min(attempt * 100, 3000),
  },
});

let lastError: string | null = null;

redisClient.on("error", (err: Error) => {
  // Reconnect attempts repeat the same error; log it once
  if (err.message === lastError) return;
  lastError = err.message;
  console.error("Redis:", err.message);
});

redisClient.on("ready", () => {
  lastError = null;
  console.log(`Redis: ready at ${config.redisUrl}`);
});

/** False while disconnected; callers skip Redis instead of waiting on it. */
export const isRedisReady = (): boolean =>
  redisClient.isOpen && redisClient.isReady;

/**
 * Opens the connection at startup. Never rejects: without Redis the
 * category cache, rate limits and access-token blacklist are skipped.
 */
export const connectRedis = async (): Promise<void> => {
  if (redisClient.isOpen) return;
  try {
    await redisClient.connect();
  } catch (error) {
    console.warn("Redis: starting without cache and rate limits", error);
  }
};

export default redisClient;
