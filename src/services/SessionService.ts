import crypto from "crypto";
import jwt from "jsonwebtoken";
import { v4 as uuidv4 } from "uuid";
import { config } from "../config/env";
import { RefreshToken, TokenPair } from "../models/types";
import { CacheService, CACHE_KEYS } from "../utils/cache";
import { PgSessionStore, SessionStore } from "./SessionStore";

export interface AccessTokenClaims {
  sub: string;
  jti: string;
  iat: number;
  exp: number;
}

export interface SessionOptions {
  secret: string;
  accessTokenExpireMinutes: number;
  refreshTokenExpireMinutes: number;
}

const toSeconds = (date: Date) => Math.floor(date.getTime() / 1000);

export class SessionService {
  constructor(
    private readonly store: SessionStore,
    private readonly options: SessionOptions,
  ) {}

  /** Login: a fresh access token plus a stored refresh token. */
  async issue(userId: number, now: Date = new Date()): Promise<TokenPair> {
    const accessToken = jwt.sign(
      { iat: toSeconds(now) },
      this.options.secret,
      {
        subject: String(userId),
        jwtid: uuidv4(),
        expiresIn: this.options.accessTokenExpireMinutes * 60,
      },
    );

    const refreshToken = crypto.randomBytes(32).toString("hex");
    const expiresAt = new Date(
      now.getTime() + this.options.refreshTokenExpireMinutes * 60 * 1000,
    );
    await this.store.create(userId, refreshToken, expiresAt);

    return {
      access_token: accessToken,
      refresh_token: refreshToken,
      token_type: "bearer",
    };
  }

  /** Unexpired refresh token row, or null. */
  async findRefreshToken(
    token: string,
    now: Date = new Date(),
  ): Promise<RefreshToken | null> {
    const row = await this.store.find(token);
    if (!row || new Date(row.expired_at) < now) return null;
    return row;
  }

  /**
   * Rotation: the presented refresh token is consumed and a new pair is
   * issued. Null when the token is unknown, expired or already used.
   */
  async renew(token: string, now: Date = new Date()): Promise<TokenPair | null> {
    const row = await this.store.consume(token);
    if (!row || new Date(row.expired_at) < now) return null;

    await this.store.purgeExpired(row.user_id, now);
    return this.issue(row.user_id, now);
  }

  async revoke(token: string): Promise<void> {
    await this.store.revoke(token);
  }

  /** Drops every refresh token of a user; returns how many were removed. */
  async revokeAll(userId: number): Promise<number> {
    return this.store.revokeAll(userId);
  }

  verifyAccessToken(token: string): AccessTokenClaims | null {
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.options.secret);
    } catch (error) {
      return null;
    }

    if (
      typeof payload === "string" ||
      typeof payload.sub !== "string" ||
      typeof payload.jti !== "string" ||
      typeof payload.iat !== "number" ||
      typeof payload.exp !== "number"
    ) {
      return null;
    }
    return {
      sub: payload.sub,
      jti: payload.jti,
      iat: payload.iat,
      exp: payload.exp,
    };
  }

  /** Blocks an access token until it would have expired anyway. */
  async blacklistAccessToken(
    claims: AccessTokenClaims,
    now: Date = new Date(),
  ): Promise<void> {
    const ttl = claims.exp - toSeconds(now);
    if (ttl > 0) {
      await CacheService.set(CACHE_KEYS.blacklist(claims.jti), true, ttl);
    }
  }

  async isBlacklisted(jti: string): Promise<boolean> {
    const entry = await CacheService.get<boolean>(CACHE_KEYS.blacklist(jti));
    return entry !== null;
  }
}

export const sessionService = new SessionService(new PgSessionStore(), {
  secret: config.jwtSecret,
  accessTokenExpireMinutes: config.accessTokenExpireMinutes,
  refreshTokenExpireMinutes: config.refreshTokenExpireMinutes,
});
