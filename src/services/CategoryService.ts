import { query } from "../config/db";
import { Category, Page } from "../models/types";

export class CategoryService {
  async listActive({ offset, limit }: Page): Promise<Category[]> {
    const res = await query<Category>(
      `SELECT id, name, parent_id, is_active FROM categories
       WHERE is_active
       ORDER BY id
       OFFSET $1 LIMIT $2`,
      [offset, limit],
    );
    return res.rows;
  }

  async findActive(id: number): Promise<Category | null> {
    const res = await query<Category>(
      "SELECT id, name, parent_id, is_active FROM categories WHERE id = $1 AND is_active",
      [id],
    );
    return res.rows[0] || null;
  }
}

export const categoryService = new CategoryService();
