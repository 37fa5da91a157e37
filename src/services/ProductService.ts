import { query } from "../config/db";
import { Category, Page, Product, ProductWithCategory } from "../models/types";
import { ProductCreate, ProductUpdate } from "../models/schemas";

// numeric columns arrive from pg as strings
type ProductRow = Omit<Product, "price" | "rating"> & {
  price: string | number;
  rating: string | number;
};
type ProductWithCategoryRow = ProductRow & { category: Category };

const WITH_CATEGORY = `p.*, json_build_object(
    'id', c.id, 'name', c.name, 'parent_id', c.parent_id, 'is_active', c.is_active
  ) AS category`;

const UPDATABLE_COLUMNS = [
  "name",
  "description",
  "price",
  "image_url",
  "stock",
  "is_active",
  "category_id",
] as const;

const toProduct = (row: ProductRow): Product => ({
  id: row.id,
  name: row.name,
  description: row.description,
  price: Number(row.price),
  image_url: row.image_url,
  stock: row.stock,
  is_active: row.is_active,
  rating: Number(row.rating),
  category_id: row.category_id,
  seller_id: row.seller_id,
});

const toProductWithCategory = (
  row: ProductWithCategoryRow,
): ProductWithCategory => ({ ...toProduct(row), category: row.category });

export class ProductService {
  async listActive({ offset, limit }: Page): Promise<ProductWithCategory[]> {
    const res = await query<ProductWithCategoryRow>(
      `SELECT ${WITH_CATEGORY}
       FROM products p
       JOIN categories c ON c.id = p.category_id
       WHERE p.is_active AND c.is_active
       ORDER BY p.id
       OFFSET $1 LIMIT $2`,
      [offset, limit],
    );
    return res.rows.map(toProductWithCategory);
  }

  async listByCategory(
    categoryId: number,
    { offset, limit }: Page,
  ): Promise<Product[]> {
    const res = await query<ProductRow>(
      `SELECT p.*
       FROM products p
       JOIN categories c ON c.id = p.category_id
       WHERE p.category_id = $1 AND p.is_active AND c.is_active
       ORDER BY p.id
       OFFSET $2 LIMIT $3`,
      [categoryId, offset, limit],
    );
    return res.rows.map(toProduct);
  }

  async findActive(id: number): Promise<ProductWithCategory | null> {
    const res = await query<ProductWithCategoryRow>(
      `SELECT ${WITH_CATEGORY}
       FROM products p
       JOIN categories c ON c.id = p.category_id
       WHERE p.id = $1 AND p.is_active AND c.is_active`,
      [id],
    );
    return res.rows[0] ? toProductWithCategory(res.rows[0]) : null;
  }

  /** Any product regardless of state; used for ownership checks. */
  async findById(id: number): Promise<Product | null> {
    const res = await query<ProductRow>("SELECT * FROM products WHERE id = $1", [
      id,
    ]);
    return res.rows[0] ? toProduct(res.rows[0]) : null;
  }

  async create(
    sellerId: number,
    input: ProductCreate,
  ): Promise<ProductWithCategory> {
    const res = await query<ProductWithCategoryRow>(
      `WITH p AS (
         INSERT INTO products (name, description, price, image_url, stock, category_id, seller_id)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         RETURNING *
       )
       SELECT ${WITH_CATEGORY} FROM p JOIN categories c ON c.id = p.category_id`,
      [
        input.name,
        input.description,
        input.price,
        input.image_url,
        input.stock,
        input.category_id,
        sellerId,
      ],
    );
    return toProductWithCategory(res.rows[0]);
  }

  async update(
    id: number,
    changes: ProductUpdate,
  ): Promise<ProductWithCategory | null> {
    // Build dynamic update
    const fields: string[] = [];
    const values: unknown[] = [];

    for (const column of UPDATABLE_COLUMNS) {
      const value = changes[column];
      if (value !== undefined) {
        values.push(value);
        fields.push(`${column} = $${values.length}`);
      }
    }

    if (fields.length === 0) {
      const current = await query<ProductWithCategoryRow>(
        `SELECT ${WITH_CATEGORY} FROM products p
         JOIN categories c ON c.id = p.category_id
         WHERE p.id = $1`,
        [id],
      );
      return current.rows[0] ? toProductWithCategory(current.rows[0]) : null;
    }

    values.push(id);
    const res = await query<ProductWithCategoryRow>(
      `WITH p AS (
         UPDATE products SET ${fields.join(", ")}
         WHERE id = $${values.length}
         RETURNING *
       )
       SELECT ${WITH_CATEGORY} FROM p JOIN categories c ON c.id = p.category_id`,
      values,
    );
    return res.rows[0] ? toProductWithCategory(res.rows[0]) : null;
  }
}

export const productService = new ProductService();
