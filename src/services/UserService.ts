import bcrypt from "bcryptjs";
import { isUniqueViolation, query } from "../config/db";
import { User, UserPrivate } from "../models/types";
import { UserCreate } from "../models/schemas";

const PRIVATE_COLUMNS = "id, username, email, role, is_active";

export const toUserPrivate = (user: User): UserPrivate => ({
  id: user.id,
  username: user.username,
  email: user.email,
  role: user.role,
  is_active: user.is_active,
});

export class UserService {
  async findById(id: number): Promise<User | null> {
    const res = await query<User>("SELECT * FROM users WHERE id = $1", [id]);
    return res.rows[0] || null;
  }

  async findActiveByEmail(email: string): Promise<User | null> {
    const res = await query<User>(
      "SELECT * FROM users WHERE lower(email) = lower($1) AND is_active",
      [email],
    );
    return res.rows[0] || null;
  }

  async usernameTaken(username: string): Promise<boolean> {
    const res = await query(
      "SELECT id FROM users WHERE lower(username) = lower($1)",
      [username],
    );
    return res.rows.length > 0;
  }

  async emailTaken(email: string): Promise<boolean> {
    const res = await query(
      "SELECT id FROM users WHERE lower(email) = lower($1)",
      [email],
    );
    return res.rows.length > 0;
  }

  /**
   * Null when the username or email is already registered, including a
   * concurrent sign-up that got past the duplicate checks first.
   */
  async create(input: UserCreate): Promise<UserPrivate | null> {
    const salt = await bcrypt.genSalt(10);
    const passwordHash = await bcrypt.hash(input.password, salt);

    try {
      const res = await query<UserPrivate>(
        `INSERT INTO users (username, email, password_hash, role)
         VALUES ($1, $2, $3, $4)
         RETURNING ${PRIVATE_COLUMNS}`,
        [input.username, input.email.toLowerCase(), passwordHash, input.role],
      );
      return res.rows[0];
    } catch (error) {
      if (isUniqueViolation(error)) return null;
      throw error;
    }
  }

  async verifyPassword(user: User, password: string): Promise<boolean> {
    return bcrypt.compare(password, user.password_hash);
  }
}

export const userService = new UserService();
