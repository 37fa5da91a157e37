import { query } from "../config/db";
import { Page, Review } from "../models/types";

export class ReviewService {
  async listForProduct(
    productId: number,
    { offset, limit }: Page,
  ): Promise<Review[]> {
    const res = await query<Review>(
      `SELECT id, user_id, product_id, comment, grade, created_at
       FROM reviews
       WHERE product_id = $1 AND is_active
       ORDER BY created_at DESC, id DESC
       OFFSET $2 LIMIT $3`,
      [productId, offset, limit],
    );
    return res.rows;
  }
}

export const reviewService = new ReviewService();
