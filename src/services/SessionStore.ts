import { query } from "../config/db";
import { RefreshToken } from "../models/types";

/**
 * Storage behind refresh tokens. `consume` must be atomic: when two
 * requests consume the same token only one of them gets the row.
 */
export interface SessionStore {
  create(userId: number, token: string, expiresAt: Date): Promise<RefreshToken>;
  find(token: string): Promise<RefreshToken | null>;
  consume(token: string): Promise<RefreshToken | null>;
  revoke(token: string): Promise<void>;
  revokeAll(userId: number): Promise<number>;
  purgeExpired(userId: number, now: Date): Promise<number>;
}

export class PgSessionStore implements SessionStore {
  async create(
    userId: number,
    token: string,
    expiresAt: Date,
  ): Promise<RefreshToken> {
    const res = await query<RefreshToken>(
      "INSERT INTO refresh_tokens (token, user_id, expired_at) VALUES ($1, $2, $3) RETURNING *",
      [token, userId, expiresAt],
    );
    return res.rows[0];
  }

  async find(token: string): Promise<RefreshToken | null> {
    const res = await query<RefreshToken>(
      "SELECT * FROM refresh_tokens WHERE token = $1",
      [token],
    );
    return res.rows[0] || null;
  }

  async consume(token: string): Promise<RefreshToken | null> {
    const res = await query<RefreshToken>(
      "DELETE FROM refresh_tokens WHERE token = $1 RETURNING *",
      [token],
    );
    return res.rows[0] || null;
  }

  async revoke(token: string): Promise<void> {
    await query("DELETE FROM refresh_tokens WHERE token = $1", [token]);
  }

  async revokeAll(userId: number): Promise<number> {
    const res = await query("DELETE FROM refresh_tokens WHERE user_id = $1", [
      userId,
    ]);
    return res.rowCount ?? 0;
  }

  async purgeExpired(userId: number, now: Date): Promise<number> {
    const res = await query(
      "DELETE FROM refresh_tokens WHERE user_id = $1 AND expired_at < $2",
      [userId, now],
    );
    return res.rowCount ?? 0;
  }
}
