import { Request, Response, NextFunction } from "express";
import redisClient, { isRedisReady } from "../config/redis";

/** Counter key for a request, or null to let the request through uncounted. */
export type RateLimitKey = (req: Request) => string | null;

export interface RateLimitRule {
  /** Namespaces the counters, e.g. "login". */
  name: string;
  windowSeconds: number;
  maxRequests: number;
  key: RateLimitKey;
}

const clientIp = (req: Request) =>
  (req.ip || req.socket.remoteAddress || "unknown").replace(/:/g, "_");

export const byClientIp: RateLimitKey = (req) => clientIp(req);

/**
 * Login attempts counted per account and address, so guessing passwords
 * for one email is throttled without locking out other users behind the
 * same IP. The OAuth2 form sends the email as `username`.
 */
export const byLoginIdentity: RateLimitKey = (req) => {
  const body: unknown = req.body;
  if (typeof body !== "object" || body === null) return clientIp(req);

  const identity =
    "email" in body && typeof body.email === "string"
      ? body.email
      : "username" in body && typeof body.username === "string"
        ? body.username
        : null;
  if (!identity) return clientIp(req);

  return `${identity.trim().toLowerCase()}:${clientIp(req)}`;
};

/** Fixed-window counter in Redis. Requests pass uncounted while Redis is down. */
export const rateLimit = ({ name, windowSeconds, maxRequests, key }: RateLimitRule) => {
  return async (req: Request, res: Response, next: NextFunction) => {
    const subject = key(req);
    if (!subject || !isRedisReady()) return next();

    const counterKey = `ratelimit:${name}:${subject}`;
    try {
      const attempts = await redisClient.incr(counterKey);
      if (attempts === 1) {
        await redisClient.expire(counterKey, windowSeconds);
      }

      if (attempts > maxRequests) {
        const ttl = Math.max(await redisClient.ttl(counterKey), 0);
        res.setHeader("Retry-After", String(ttl));
        return res.status(429).json({
          error: "Too many requests. Please try again later.",
          retryAfter: ttl,
        });
      }
    } catch (error) {
      console.error(`Rate Limit Error [${name}]:`, error);
    }
    next();
  };
};
