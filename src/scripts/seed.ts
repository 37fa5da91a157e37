import fs from "fs";
import path from "path";
import bcrypt from "bcryptjs";
import { z } from "zod";
import pool from "../config/db";
import { UserRoleSchema } from "../models/schemas";
import { CacheService } from "../utils/cache";
import redisClient, { connectRedis } from "../config/redis";

const seedFileSchema = z.object({
  categories: z.array(
    z.object({ name: z.string(), children: z.array(z.string()) }),
  ),
  users: z.array(
    z.object({
      username: z.string(),
      email: z.string().email(),
      role: UserRoleSchema,
    }),
  ),
  products: z.array(
    z.object({
      name: z.string(),
      category: z.string(),
      price: z.number().positive(),
      stock: z.number().int().min(0),
    }),
  ),
});

const seed = async () => {
  const seedPath = path.resolve(process.cwd(), "src/db/seed.json");
  const data = seedFileSchema.parse(
    JSON.parse(fs.readFileSync(seedPath, "utf8")),
  );

  console.log("🌱 Starting Seed...");
  await pool.query(
    "TRUNCATE TABLE reviews, products, categories, refresh_tokens, users RESTART IDENTITY CASCADE",
  );

  // 1. Category tree
  const categoryIds = new Map<string, number>();
  for (const root of data.categories) {
    const rootRes = await pool.query<{ id: number }>(
      "INSERT INTO categories (name) VALUES ($1) RETURNING id",
      [root.name],
    );
    categoryIds.set(root.name, rootRes.rows[0].id);

    for (const child of root.children) {
      const childRes = await pool.query<{ id: number }>(
        "INSERT INTO categories (name, parent_id) VALUES ($1, $2) RETURNING id",
        [child, rootRes.rows[0].id],
      );
      categoryIds.set(child, childRes.rows[0].id);
    }
  }
  console.log(`✅ ${categoryIds.size} Categories Created`);

  // 2. Demo users
  const hashedPassword = await bcrypt.hash(
    process.env.SEED_PASSWORD || "password123",
    10,
  );
  let sellerId: number | null = null;
  for (const user of data.users) {
    const res = await pool.query<{ id: number }>(
      "INSERT INTO users (username, email, password_hash, role) VALUES ($1, $2, $3, $4) RETURNING id",
      [user.username, user.email.toLowerCase(), hashedPassword, user.role],
    );
    if (user.role === "seller" && sellerId === null) sellerId = res.rows[0].id;
  }
  console.log(`✅ ${data.users.length} Users Created`);

  // 3. Products owned by the first seller
  if (sellerId === null) {
    console.warn("No seller in seed file, skipping products");
    return;
  }
  for (const product of data.products) {
    const categoryId = categoryIds.get(product.category);
    if (categoryId === undefined) {
      throw new Error(`Unknown category in seed file: ${product.category}`);
    }
    await pool.query(
      "INSERT INTO products (name, price, stock, category_id, seller_id) VALUES ($1, $2, $3, $4, $5)",
      [product.name, product.price, product.stock, categoryId, sellerId],
    );
  }
  console.log(`✅ ${data.products.length} Products Created`);

  await connectRedis();
  await CacheService.deleteByPattern("categories:*");
};

seed()
  .then(() => console.log("🚀 Seed Completed Successfully"))
  .catch((e) => {
    console.error("❌ Seed Failed:", e);
    process.exitCode = 1;
  })
  .finally(async () => {
    await pool.end();
    if (redisClient.isOpen) await redisClient.quit();
  });
